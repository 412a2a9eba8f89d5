/** JSON scalar leaf */
export type JsonScalar = string | number | boolean | null;

/** JSON value tree - what argument values look like once every variable is substituted */
export type JsonValue = JsonScalar | JsonValue[] | JsonObject;

/** JSON object with insertion-ordered keys */
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Adds `key` as an own enumerable property. Plain assignment of `__proto__`
 * would replace the prototype and the entry would be lost.
 */
export function setEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
