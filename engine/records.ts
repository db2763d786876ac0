// engine/records.ts
// Build a total Record over a fixed key list (roles, KPI ids, domains).

export function recordFromKeys<K extends string, V>(
  keys: readonly K[],
  valueOf: (key: K) => V
): Record<K, V> {
  const record: Partial<Record<K, V>> = {};
  for (const key of keys) {
    record[key] = valueOf(key);
  }
  // Every key of K was assigned above.
  return record as Record<K, V>;
}
