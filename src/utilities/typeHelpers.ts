/**
 * Type helper functions for safe value extraction from loosely typed maps
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Safely get string value, returns undefined if not a string
 */
export function getString(val: unknown): string | undefined {
  return typeof val === 'string' ? val : undefined;
}

/**
 * Safely get a finite number. Numeric strings are accepted since the remote
 * API serializes most attributes as strings.
 */
export function getNumeric(val: unknown): number | undefined {
  if (typeof val === 'number') return Number.isFinite(val) ? val : undefined;
  if (typeof val !== 'string' || val.trim() === '') return undefined;
  const parsed = Number(val);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Like getNumeric but truncates to an integer
 */
export function getInteger(val: unknown): number | undefined {
  const num = getNumeric(val);
  return num === undefined ? undefined : Math.trunc(num);
}
