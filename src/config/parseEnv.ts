/**
 * Environment variable parsing utilities with explicit boolean/int handling.
 * A "false" string must never coerce to true.
 */

/**
 * Parse boolean environment variable
 * @param defaultValue - Used when the value is undefined or empty
 * @throws Error for anything other than true/false/1/0/yes/no
 */
export function parseBoolEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();

  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }

  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }

  throw new Error(`Invalid boolean value: "${value}"`);
}

/**
 * Parse integer environment variable, clamped to [min, max]
 * @returns defaultValue when the value is undefined, empty or not an integer
 */
export function parseIntEnv(
  value: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);

  if (isNaN(parsed)) {
    return defaultValue;
  }

  let result = parsed;

  if (min !== undefined && result < min) {
    result = min;
  }

  if (max !== undefined && result > max) {
    result = max;
  }

  return result;
}

/**
 * Strict integer parse for values that must not fall back silently
 * @throws Error when the value is not a base-10 integer
 */
export function parseStrictInt(value: string, name: string): number {
  const trimmed = value.trim();
  if (!/^-?[0-9]+$/.test(trimmed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return Number(trimmed);
}
