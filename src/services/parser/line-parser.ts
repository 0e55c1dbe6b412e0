import { AccessLogEntry } from '../../core/entities/access-log-entry.entity.js';
import { countQueryKeys, splitRequest } from './request-line.js';
import { formatUtc, parseNginxTime } from './timestamps.js';

/**
 * ingress-nginx `upstreaminfo` log format:
 *
 * $remote_addr - $remote_user [$time_local] "$request" $status $body_bytes_sent
 * "$http_referer" "$http_user_agent" $request_length $request_time
 * [$proxy_upstream_name] [$proxy_alternative_upstream_name] $upstream_addr
 * $upstream_response_length $upstream_response_time $upstream_status $req_id
 */
export const ACCESS_LOG_PATTERN = new RegExp(
  [
    '^',
    '(?<remote_addr>\\S+)\\s+\\S+\\s+\\S+\\s+',
    '\\[(?<time_local>[^\\]]+)\\]\\s+',
    '"(?<request>[^"]*)"\\s+',
    '(?<status>\\d{3})\\s+',
    '(?<body_bytes_sent>\\S+)\\s+',
    '"(?<http_referer>[^"]*)"\\s+',
    '"(?<http_user_agent>[^"]*)"\\s+',
    '(?<request_length>\\S+)\\s+',
    '(?<request_time>\\S+)\\s+',
    '\\[(?<upstream_name>[^\\]]*)\\]\\s+',
    '\\[(?<upstream_alternative>[^\\]]*)\\]\\s+',
    '(?<upstream_addr>\\S+)\\s+',
    '(?<upstream_response_length>\\S+)\\s+',
    '(?<upstream_response_time>\\S+)\\s+',
    '(?<upstream_status>\\S+)\\s+',
    '(?<request_id>\\S+)',
    '$',
  ].join(''),
);

const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** `-`, empty and non-numeric fields become null. Any length is exact. */
export function parseInteger(value: string): bigint | null {
  if (!INTEGER_RE.test(value)) return null;
  const magnitude = BigInt(value.replace(/^[+-]/, ''));
  return value.startsWith('-') ? -magnitude : magnitude;
}

export function parseDecimal(value: string): number | null {
  if (!FLOAT_RE.test(value)) return null;
  return Number(value);
}

function group(groups: Record<string, string | undefined>, name: string): string {
  return groups[name] ?? '';
}

/**
 * Parses one log line. Returns null when the line does not match the format,
 * its timestamp is not a real date or a field falls outside its column type.
 */
export function parseLine(line: string): AccessLogEntry | null {
  const match = ACCESS_LOG_PATTERN.exec(line);
  if (!match?.groups) return null;
  const g = match.groups;

  const timeLocal = group(g, 'time_local');
  const instant = parseNginxTime(timeLocal);
  if (instant === null) return null;

  const { method, uri, path, query, proto } = splitRequest(group(g, 'request'));
  const upstreamStatus = group(g, 'upstream_status');

  return AccessLogEntry.tryFromRow(
    {
      remote_addr: group(g, 'remote_addr'),
      time_local: timeLocal,
      time_utc: formatUtc(instant),
      method,
      uri,
      path,
      proto,
      status: Number.parseInt(group(g, 'status'), 10),
      body_bytes_sent: parseInteger(group(g, 'body_bytes_sent')),
      http_referer: group(g, 'http_referer'),
      http_user_agent: group(g, 'http_user_agent'),
      request_length: parseInteger(group(g, 'request_length')),
      request_time: parseDecimal(group(g, 'request_time')),
      upstream_name: group(g, 'upstream_name'),
      upstream_alternative: group(g, 'upstream_alternative'),
      upstream_addr: group(g, 'upstream_addr'),
      upstream_response_length: parseInteger(
        group(g, 'upstream_response_length'),
      ),
      upstream_response_time: parseDecimal(group(g, 'upstream_response_time')),
      upstream_status: /^\d+$/.test(upstreamStatus)
        ? BigInt(upstreamStatus)
        : upstreamStatus,
      request_id: group(g, 'request_id'),
      query_keys_count: countQueryKeys(query),
    },
    instant,
  );
}
