// Centralized site registry

import type { CatalogSiteAdapter } from "../core/types";
import { adapter as fixprice } from "./fixprice/adapter";

// Adapters dictionary (single source of truth for site keys)
const adapters = {
  fixprice,
} as const;

export type RegistryKey = keyof typeof adapters;

export const DEFAULT_SITE: RegistryKey = "fixprice";

export const registry = new Map<string, CatalogSiteAdapter>(
  Object.entries(adapters),
);

/**
 * @throws Error if no adapter is registered under `key`
 */
export function getAdapter(key: string = DEFAULT_SITE): CatalogSiteAdapter {
  const adapter = registry.get(key);
  if (!adapter) {
    throw new Error(
      `Unknown site "${key}". Available: ${Array.from(registry.keys()).join(", ")}`,
    );
  }
  return adapter;
}
