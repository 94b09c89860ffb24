export function hasOwn(record: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/**
 * Own-property lookup that never falls through to `Object.prototype`
 * (a field named "constructor" must not resolve to a function).
 */
export function getOwn<T>(record: Readonly<Record<string, T>> | undefined, key: string): T | undefined {
  if (!record || !hasOwn(record, key)) {
    return undefined;
  }
  return record[key];
}
