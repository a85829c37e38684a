/**
 * Tally items by a closed set of keys. Every key appears, zero or not.
 */
export function countBy<T>(
  keys: readonly string[],
  items: readonly T[],
  keyOf: (item: T) => string
): Record<string, number> {
  const counts: Record<string, number> = Object.fromEntries(keys.map((k) => [k, 0]));
  for (const item of items) {
    const key = keyOf(item);
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

/** Pair keys with counts fetched in the same order; a missing count is zero. */
export function zipCounts(keys: readonly string[], counts: readonly number[]): Record<string, number> {
  return Object.fromEntries(keys.map((key, i) => [key, counts[i] ?? 0]));
}
