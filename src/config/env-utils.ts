/**
 * Environment variable parsing
 */

/**
 * Read a string variable, falling back when it is unset
 *
 * @example
 * parseStringEnv('LOG_LEVEL', 'info') // 'info' if LOG_LEVEL is not set
 */
export function parseStringEnv(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value === undefined ? defaultValue : value;
}

/**
 * Read a variable restricted to a fixed set of values.
 * Unset, empty and unrecognized values (compared case-insensitively) fall back to the default.
 *
 * @example
 * parseEnumEnv('SMELTER_PROVENANCE_FILTER', ['line', 'structural'], 'line')
 */
export function parseEnumEnv<T extends string>(
  key: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  const value = process.env[key]?.trim().toLowerCase();
  if (!value) return defaultValue;
  return allowed.find((candidate) => candidate.toLowerCase() === value) ?? defaultValue;
}
