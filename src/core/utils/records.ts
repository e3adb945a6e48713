/**
 * Own-property lookup for the catalog's name-keyed tables, so that names
 * such as `constructor` never resolve through the prototype
 */
export function ownEntry<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}
