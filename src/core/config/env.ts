/**
 * Environment variable utilities
 */

/**
 * Gets an environment variable as a string with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set or empty
 */
export const envStr = (k: string, d: string): string => process.env[k] || d;

/**
 * Gets an environment variable as an integer with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set or invalid
 */
export const envInt = (k: string, d: number): number =>
  envOptionalInt(k) ?? d;

/**
 * Gets an environment variable as a float with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set or invalid
 */
export const envNum = (k: string, d: number): number => {
  const v = process.env[k];
  if (!v) return d;
  const n = Number(v);
  return Number.isFinite(n) ? n : d;
};

/**
 * Gets an environment variable as an integer, or undefined when unset/invalid
 * @param k - Environment variable key
 */
export const envOptionalInt = (k: string): number | undefined => {
  const v = process.env[k];
  if (!v) return undefined;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : undefined;
};
