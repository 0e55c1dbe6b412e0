import type { AccessLogEntry } from '../../core/entities/access-log-entry.entity.js';

export interface RecordFilterCriteria {
  status?: readonly number[];
  method?: readonly string[];
  pathContains?: string;
  ip?: readonly string[];
  /** Inclusive lower bound, UTC epoch ms. */
  since?: number;
  /** Inclusive upper bound, UTC epoch ms. */
  until?: number;
}

export type RecordPredicate = (entry: AccessLogEntry) => boolean;

function hasItems<T>(list: readonly T[] | undefined): list is readonly T[] {
  return list !== undefined && list.length > 0;
}

/**
 * Builds a predicate that accepts an entry only when every configured
 * criterion does. Empty lists and empty strings impose nothing.
 */
export function createRecordFilter(
  criteria: RecordFilterCriteria,
): RecordPredicate {
  const { status, method, pathContains, ip, since, until } = criteria;
  const statuses = hasItems(status) ? new Set(status) : null;
  const methods = hasItems(method) ? new Set(method) : null;
  const ips = hasItems(ip) ? new Set(ip) : null;

  return (entry) => {
    if (statuses && (entry.status === null || !statuses.has(entry.status))) {
      return false;
    }
    if (methods && !methods.has(entry.method)) return false;
    if (pathContains && !entry.path.includes(pathContains)) return false;
    if (ips && !ips.has(entry.remoteAddr)) return false;
    if (since !== undefined && entry.instant < since) return false;
    if (until !== undefined && entry.instant > until) return false;
    return true;
  };
}
