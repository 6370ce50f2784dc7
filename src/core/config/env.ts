/**
 * Environment variable utilities
 */

/**
 * Gets an environment variable as a string with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set
 * @returns Environment variable value or default
 */
export const envStr = (k: string, d: string): string => process.env[k] ?? d;

/**
 * Gets an environment variable as an integer
 * @param k - Environment variable key
 * @returns Parsed integer value, or undefined if not set or invalid
 */
export const envInt = (k: string): number | undefined => {
  const v = process.env[k];
  if (!v) return undefined;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : undefined;
};

/**
 * Gets an environment variable as a (possibly fractional) number
 */
export const envNum = (k: string): number | undefined => {
  const v = process.env[k];
  if (!v) return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
};

/**
 * Gets an environment variable as a boolean
 * @returns true for "1", "true", "yes", "on"; false for any other set value
 */
export const envBool = (k: string): boolean | undefined => {
  const v = process.env[k];
  if (v === undefined || v === "") return undefined;
  return /^(1|true|yes|on)$/i.test(v);
};

/**
 * Gets an environment variable as array (comma-separated)
 */
export const envList = (k: string): string[] | undefined => {
  const v = process.env[k];
  if (!v) return undefined;
  const items = v
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length ? items : undefined;
};
