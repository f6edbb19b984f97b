/**
 * Document merging used for layered settings, multiple plan files and overrides.
 *
 * Objects merge key by key, arrays append, anything else is replaced by the
 * later value. Inputs are never mutated.
 */

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(base: PlainObject, overlay: PlainObject): PlainObject {
  const result: PlainObject = { ...base };

  for (const [key, value] of Object.entries(overlay)) {
    const existing = result[key];
    if (isPlainObject(existing) && isPlainObject(value)) {
      result[key] = deepMerge(existing, value);
    } else if (Array.isArray(existing) && Array.isArray(value)) {
      result[key] = [...existing, ...value];
    } else {
      result[key] = cloneValue(value);
    }
  }

  return result;
}

export function mergeAll(documents: PlainObject[]): PlainObject {
  return documents.reduce<PlainObject>((acc, doc) => deepMerge(acc, doc), {});
}

function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (isPlainObject(value)) {
    return deepMerge({}, value);
  }
  return value;
}
