/**
 * Environment readers shared by the notifier packages.
 *
 * Every reader takes the environment as its last argument so configuration
 * can be built from an explicit map in tests instead of `process.env`.
 */

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Get a trimmed string value. Empty strings count as unset.
 */
export function getEnvString(
  key: string,
  defaultValue?: string,
  env: EnvSource = process.env,
): string | undefined {
  const value = env[key]?.trim();
  if (value === undefined || value === '') return defaultValue;
  return value;
}

/**
 * Get a whole number (intervals, ids, counts).
 * Returns the raw string when it does not parse, so schema validation can
 * report it instead of silently falling back to the default.
 */
export function getEnvNumber(
  key: string,
  defaultValue?: number,
  env: EnvSource = process.env,
): number | string | undefined {
  const value = getEnvString(key, undefined, env);
  if (value === undefined) return defaultValue;
  if (!/^-?\d+$/.test(value)) return value;
  return parseInt(value, 10);
}

/**
 * Get a comma-separated list. Entries are trimmed, empty entries dropped.
 */
export function getEnvList(key: string, env: EnvSource = process.env): string[] {
  const value = getEnvString(key, undefined, env);
  if (value === undefined) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}
