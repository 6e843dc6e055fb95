/**
 * Shared config utilities for layered YAML documents.
 */

/**
 * Flatten a nested config object into dot-separated key/value pairs.
 *
 * Objects are recursed into; arrays and primitives are leaf values.
 */
export function flattenConfigValues(source: object, prefix = ''): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value)) {
      Object.assign(result, flattenConfigValues(value, fullKey));
    } else {
      result[fullKey] = value;
    }
  }
  return result;
}

/**
 * Flatten a nested config object and return just the dot-separated keys.
 */
export function flattenConfigKeys(source: object, prefix = ''): string[] {
  return Object.keys(flattenConfigValues(source, prefix));
}

/**
 * Deep-merge two config objects. `override` values take precedence.
 * Plain objects are merged recursively; arrays and primitives are replaced.
 */
export function deepMergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    if (isPlainObject(existing) && isPlainObject(value)) {
      result[key] = deepMergeConfig(existing, value);
      continue;
    }
    result[key] = value;
  }
  return result;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}
