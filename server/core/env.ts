/**
 * Environment variable utilities
 * Consistent parsing of boolean, numeric and optional values
 */

export type EnvSource = Record<string, string | undefined>;

/**
 * Parse truthy environment variable
 * Accepts: 1, true, yes, on (case-insensitive)
 */
export const isTrue = (v?: string): boolean =>
  /^(1|true|yes|on)$/i.test(String(v || ''));

/**
 * Parse falsy environment variable
 * Accepts: 0, false, no, off (case-insensitive)
 */
export const isFalse = (v?: string): boolean =>
  /^(0|false|no|off)$/i.test(String(v || ''));

/**
 * Get trimmed string variable, undefined when unset or blank
 */
export const getEnvString = (env: EnvSource, key: string): string | undefined => {
  const val = env[key]?.trim();
  return val ? val : undefined;
};

/**
 * Get integer environment variable with default
 */
export const getEnvInt = (env: EnvSource, key: string, defaultValue: number): number => {
  const val = env[key];
  if (!val) return defaultValue;
  const parsed = parseInt(val, 10);
  return Number.isFinite(parsed) ? parsed : defaultValue;
};

export const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));
