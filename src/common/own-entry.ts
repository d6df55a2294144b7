/**
 * Record lookup that only sees the record's own keys, so "constructor" or
 * "__proto__" never resolve to Object.prototype members.
 */
export function ownEntry<T>(
  record: Readonly<Record<string, T>> | undefined,
  key: string,
): T | undefined {
  return record && Object.hasOwn(record, key) ? record[key] : undefined;
}
