/**
 * Helpers for building PostgREST filters from user input.
 */

/**
 * `ilike` pattern for a free-text search. Characters that have meaning inside a
 * PostgREST `or=(...)` expression are dropped.
 */
export function ilikePattern(search: string): string {
  const cleaned = search.replace(/[%_,()*\\]/g, ' ').trim();
  return `%${cleaned}%`;
}

/** `or` expression matching the search term in any of the columns. */
export function searchAcross(columns: string[], search: string): string {
  const pattern = ilikePattern(search);
  return columns.map((c) => `${c}.ilike.${pattern}`).join(',');
}
