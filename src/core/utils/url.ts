/**
 * URL manipulation utilities
 */

/**
 * Host part used to key per-host pacing
 * @param raw - Absolute URL
 * @returns Lower-cased host (with port), or the input itself if unparsable
 */
export const hostOf = (raw: string): string => {
  try {
    return new URL(raw).host.toLowerCase();
  } catch {
    return raw;
  }
};

/**
 * Accepts only absolute http(s) URLs
 * @returns The normalized URL or null if invalid
 */
export function sanitizeUrl(url: string): string | null {
  try {
    const parsed = new URL(url);
    if (!["http:", "https:"].includes(parsed.protocol)) {
      return null;
    }
    return parsed.toString();
  } catch {
    return null;
  }
}
