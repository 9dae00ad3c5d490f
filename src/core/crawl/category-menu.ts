/**
 * Category menu lookups
 */

import type { CategoryNode } from "../types/config";

export interface SectionMatch {
  titles: string[];
  /** Path segments with no menu entry at their level */
  unresolved: string[];
}

/**
 * Section titles along the path of a (possibly nested) slug, e.g.
 * "kosmetika-i-gigiena/ukhod-za-litsom" → ["Косметика и гигиена", "Уход за лицом"].
 * A segment missing from the menu is skipped; the lookup continues at the
 * same level.
 */
export function sectionFor(
  menu: readonly CategoryNode[],
  slug: string,
): SectionMatch {
  const titles: string[] = [];
  const unresolved: string[] = [];
  let level = menu;
  for (const segment of slug.split("/").filter(Boolean)) {
    const node = level.find((n) => n.slug === segment);
    if (!node) {
      unresolved.push(segment);
      continue;
    }
    titles.push(node.title);
    level = node.children;
  }
  return { titles, unresolved };
}
