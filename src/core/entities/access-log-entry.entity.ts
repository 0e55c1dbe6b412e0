import { z } from 'zod';

// Counters may exceed 2^53
const nullableCount = z.bigint().nullable();

const accessLogRowSchema = z.object({
  remote_addr: z.string().min(1),
  time_local: z.string().min(1),
  time_utc: z.string().min(1),
  method: z.string(),
  uri: z.string(),
  path: z.string(),
  proto: z.string(),
  status: z.number().int().nullable(),
  body_bytes_sent: nullableCount,
  http_referer: z.string(),
  http_user_agent: z.string(),
  request_length: nullableCount,
  request_time: z.number().nullable(),
  upstream_name: z.string(),
  upstream_alternative: z.string(),
  upstream_addr: z.string(),
  upstream_response_length: nullableCount,
  upstream_response_time: z.number().nullable(),
  upstream_status: z.union([z.bigint(), z.string()]),
  request_id: z.string(),
  query_keys_count: z.number().int().nonnegative(),
});

export type AccessLogRow = z.infer<typeof accessLogRowSchema>;

export const CSV_COLUMNS = [
  'remote_addr',
  'time_local',
  'time_utc',
  'method',
  'uri',
  'path',
  'proto',
  'status',
  'body_bytes_sent',
  'http_referer',
  'http_user_agent',
  'request_length',
  'request_time',
  'upstream_name',
  'upstream_alternative',
  'upstream_addr',
  'upstream_response_length',
  'upstream_response_time',
  'upstream_status',
  'request_id',
  'query_keys_count',
] as const satisfies readonly (keyof AccessLogRow)[];

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export const SORT_KEYS = [
  'time_utc',
  'status',
  'request_time',
  'body_bytes_sent',
  'upstream_response_time',
] as const;

export type SortKey = (typeof SORT_KEYS)[number];

/**
 * One parsed access log line. `instant` is the UTC epoch in milliseconds and
 * drives time filters and the default ordering; it is not exported.
 */
export class AccessLogEntry {
  private readonly props: AccessLogRow;
  readonly instant: number;

  private constructor(props: AccessLogRow, instant: number) {
    this.props = props;
    this.instant = instant;
  }

  static fromRow(row: AccessLogRow, instant: number): AccessLogEntry {
    const parsed = accessLogRowSchema.parse(row);
    return new AccessLogEntry(parsed, instant);
  }

  /** Like `fromRow`, but returns null for a row that fails validation. */
  static tryFromRow(row: AccessLogRow, instant: number): AccessLogEntry | null {
    const result = accessLogRowSchema.safeParse(row);
    return result.success ? new AccessLogEntry(result.data, instant) : null;
  }

  get remoteAddr(): string {
    return this.props.remote_addr;
  }

  get method(): string {
    return this.props.method;
  }

  get path(): string {
    return this.props.path;
  }

  get status(): number | null {
    return this.props.status;
  }

  // Missing numeric values order before every real one
  sortValue(key: SortKey): number | bigint {
    switch (key) {
      case 'time_utc':
        return this.instant;
      case 'status':
        return this.props.status ?? -1;
      case 'request_time':
        return this.props.request_time ?? -1;
      case 'body_bytes_sent':
        return this.props.body_bytes_sent ?? -1n;
      case 'upstream_response_time':
        return this.props.upstream_response_time ?? -1;
    }
  }

  toJSON(): AccessLogRow {
    return { ...this.props };
  }
}

export default AccessLogEntry;
