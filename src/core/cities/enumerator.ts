/**
 * City enumeration
 *
 * Walks the site's city selector with the same scheduler and walker used for
 * product listings: one unscoped walker, so effectively one fetch at a time.
 */

import type { CrawlScheduler } from "../crawl/scheduler";
import type { WalkPlan } from "../crawl/walker";
import type {
  CatalogSiteAdapter,
  City,
  CrawlOutcome,
  RawCityRecord,
} from "../types";
import { Logger } from "../utils/logger";
import {
  ValidationError,
  validateCity,
} from "../validation/product-validator";

/** Walk target of the city selector; it is not scoped to any city */
export const CITY_SELECTOR_SLUG = "cities";

export interface CityListing {
  cities: City[];
  outcome: CrawlOutcome;
  duplicates: number;
  rejected: number;
}

/** Sorted by name, ties by id */
export function sortCities<C extends { id: string; name: string }>(
  cities: readonly C[],
): C[] {
  return [...cities].sort(
    (a, b) =>
      a.name.localeCompare(b.name, "ru") ||
      a.id.localeCompare(b.id, "en", { numeric: true }),
  );
}

/**
 * Lists every city offered by the site's city selector
 * @returns Distinct cities (first sighting of an id wins), sorted by name
 */
export async function enumerateCities(
  scheduler: CrawlScheduler,
  adapter: CatalogSiteAdapter,
): Promise<CityListing> {
  const seen = new Map<string, City>();
  let duplicates = 0;
  let rejected = 0;

  const plan: WalkPlan<RawCityRecord> = {
    pageType: "city-selector",
    context: () => adapter.requestContext(null),
    request: (cursor) => adapter.citySelectorRequest(cursor),
    extractor: adapter.cityExtractor,
    emit: async (records) => {
      for (const raw of records) {
        let city: City;
        try {
          city = validateCity(raw);
        } catch (e) {
          if (!(e instanceof ValidationError)) throw e;
          rejected++;
          Logger.warn(`City entry rejected: ${e.message}`, { field: e.field });
          continue;
        }
        const first = seen.get(city.id);
        if (first) {
          duplicates++;
          Logger.debug(`Duplicate city id ${city.id}`, {
            city: city.id,
            kept: first.name,
            dropped: city.name,
          });
          continue;
        }
        seen.set(city.id, city);
      }
    },
  };

  const outcome = await scheduler.walk(
    { slug: CITY_SELECTOR_SLUG, city: null },
    plan,
  );
  if (duplicates > 0) {
    Logger.warn(`Dropped ${duplicates} duplicate city entries`, {
      count: duplicates,
    });
  }
  return {
    cities: sortCities(Array.from(seen.values())),
    outcome,
    duplicates,
    rejected,
  };
}

/**
 * Finds `id` in an enumerated city list
 */
export function resolveCity(
  cities: readonly City[],
  id: string,
): City | undefined {
  const wanted = id.trim();
  return cities.find((c) => c.id === wanted);
}
