/**
 * Environment variable utilities
 */

/**
 * Gets an environment variable as a string with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set
 * @returns Environment variable value or default
 */
export const envStr = (k: string, d: string): string =>
  process.env[k] ?? d;

/**
 * Gets an environment variable as an integer
 * @param k - Environment variable key
 * @returns Parsed integer value, or undefined if unset or invalid
 */
export const envOptionalInt = (k: string): number | undefined => {
  const v = process.env[k];
  if (!v) return undefined;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : undefined;
};

/**
 * Gets an environment variable as a boolean with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set
 * @returns Boolean value (true for "1", "true", "yes", "on", false otherwise)
 */
export const envBool = (k: string, d: boolean): boolean =>
  /^(1|true|yes|on)$/i.test(process.env[k] ?? String(d));
