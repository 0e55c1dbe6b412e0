import type {
  AccessLogEntry,
  SortKey,
} from '../../core/entities/access-log-entry.entity.js';

// Relational comparison keeps infinities equal to each other
function compareValues(a: number | bigint, b: number | bigint): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Returns a new array ordered by `key`. Entries with equal keys keep their
 * input order in both directions.
 */
export function sortEntries(
  entries: readonly AccessLogEntry[],
  key: SortKey,
  descending = false,
): AccessLogEntry[] {
  const direction = descending ? -1 : 1;
  return [...entries].sort(
    (a, b) => direction * compareValues(a.sortValue(key), b.sortValue(key)),
  );
}

export function takeFirst<T>(items: readonly T[], limit?: number): T[] {
  return limit === undefined ? [...items] : items.slice(0, limit);
}
