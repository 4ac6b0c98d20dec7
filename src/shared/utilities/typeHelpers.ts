/**
 * Type helper functions for safe value extraction from parsed YAML
 */

/**
 * Safely get string value, returns undefined if not a string
 */
export function getString(val: unknown): string | undefined {
  return typeof val === 'string' ? val : undefined;
}

/**
 * Safely get number value
 */
export function getNumber(val: unknown): number | undefined {
  return typeof val === 'number' && Number.isFinite(val) ? val : undefined;
}

/**
 * Safely get boolean value
 */
export function getBoolean(val: unknown): boolean | undefined {
  return typeof val === 'boolean' ? val : undefined;
}

/**
 * Safely get record (object) value
 */
export function getRecordUnknown(val: unknown): Record<string, unknown> | undefined {
  if (typeof val !== 'object' || val === null || Array.isArray(val)) return undefined;
  return Object.fromEntries(Object.entries(val));
}
