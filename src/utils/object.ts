/**
 * Helpers operating on plain JSON-like objects. Every function is pure.
 */

/** True for non-null, non-array objects whose prototype is `Object` or null. */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Returns a shallow copy of the record without the listed keys and without
 * entries whose value is `null` or `undefined`.
 */
export function omitKeysAndEmpty(
  record: Readonly<Record<string, unknown>>,
  keys: ReadonlySet<string>,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (keys.has(key) || value === null || value === undefined) {
      continue;
    }
    result[key] = value;
  }
  return result;
}

/**
 * Deep copy of JSON-like data. Plain objects and arrays are rebuilt; every
 * other value (strings, numbers, functions, class instances) is shared.
 */
export function cloneJsonLike(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((entry: unknown) => cloneJsonLike(entry));
  }
  if (isPlainRecord(value)) {
    return cloneRecord(value);
  }
  return value;
}

/** {@link cloneJsonLike} for a record, keeping the record type. */
export function cloneRecord(record: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(record)) {
    result[key] = cloneJsonLike(entry);
  }
  return result;
}
