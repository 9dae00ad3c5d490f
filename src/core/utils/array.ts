/**
 * Array utilities
 */

/**
 * Removes duplicate elements from an array, keeping first-occurrence order
 * @param arr - Array to deduplicate
 * @returns New array with unique elements only
 */
export function uniq<T>(arr: readonly T[]): T[] {
  return Array.from(new Set(arr));
}

/**
 * Splits a comma-separated list, trimming and dropping empty entries
 */
export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
