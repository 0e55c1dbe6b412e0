import { describe, it, expect } from 'vitest';
import {
  parseDecimal,
  parseInteger,
  parseLine,
} from '../src/services/parser/line-parser.js';
import { logLine } from './helpers/log-lines.js';

describe('parseLine', () => {
  it('parses every field of a well-formed line', () => {
    const entry = parseLine(logLine());
    expect(entry?.toJSON()).toEqual({
      remote_addr: '10.0.0.5',
      time_local: '26/Apr/2021:21:20:17 +0000',
      time_utc: '2021-04-26T21:20:17Z',
      method: 'GET',
      uri: '/api/items?page=2&sort=asc',
      path: '/api/items',
      proto: 'HTTP/1.1',
      status: 200,
      body_bytes_sent: 512n,
      http_referer: '-',
      http_user_agent: 'curl/8.0',
      request_length: 120n,
      request_time: 0.015,
      upstream_name: 'default-api-80',
      upstream_alternative: '',
      upstream_addr: '10.1.0.7:8080',
      upstream_response_length: 512n,
      upstream_response_time: 0.014,
      upstream_status: 200n,
      request_id: 'req-1',
      query_keys_count: 2,
    });
    expect(entry?.instant).toBe(Date.UTC(2021, 3, 26, 21, 20, 17));
  });

  it('converts local time with an offset to UTC', () => {
    const entry = parseLine(logLine({ time: '26/Apr/2021:23:20:17 +0200' }));
    expect(entry?.toJSON().time_utc).toBe('2021-04-26T21:20:17Z');
    expect(entry?.toJSON().time_local).toBe('26/Apr/2021:23:20:17 +0200');
  });

  it('maps dashes to null and keeps a non-numeric upstream status as text', () => {
    const row = parseLine(
      logLine({
        bytes: '-',
        requestTime: '-',
        upstreamAddr: '-',
        upstreamResponseLength: '-',
        upstreamResponseTime: '-',
        upstreamStatus: '-',
      }),
    )?.toJSON();
    expect(row).toMatchObject({
      body_bytes_sent: null,
      request_time: null,
      upstream_addr: '-',
      upstream_response_length: null,
      upstream_response_time: null,
      upstream_status: '-',
    });
  });

  it('accepts an empty request', () => {
    const row = parseLine(logLine({ request: '', status: '400' }))?.toJSON();
    expect(row).toMatchObject({ method: '', uri: '', path: '', proto: '', status: 400 });
  });

  it('returns null for lines that do not match', () => {
    expect(parseLine('not a log line')).toBeNull();
    expect(parseLine(logLine({ status: '20' }))).toBeNull();
    expect(parseLine(`${logLine()} trailing`)).toBeNull();
  });

  it('returns null when the timestamp is not a real date', () => {
    expect(parseLine(logLine({ time: '31/Apr/2021:10:00:00 +0000' }))).toBeNull();
  });

  it('keeps counters above 2^53 exact', () => {
    const row = parseLine(
      logLine({ bytes: '9007199254740993', upstreamStatus: '18446744073709551616' }),
    )?.toJSON();
    expect(row?.body_bytes_sent).toBe(9007199254740993n);
    expect(row?.upstream_status).toBe(18446744073709551616n);
  });

  it('parses counters too long for a double', () => {
    const digits = '9'.repeat(400);
    const row = parseLine(logLine({ bytes: digits, requestLength: digits }))?.toJSON();
    expect(row?.body_bytes_sent).toBe(BigInt(digits));
    expect(row?.request_length).toBe(BigInt(digits));
  });

  it('reads overflowing decimals as infinity', () => {
    const row = parseLine(logLine({ requestTime: '1e999' }))?.toJSON();
    expect(row?.request_time).toBe(Infinity);
  });
});

describe('numeric fields', () => {
  it('parses integers', () => {
    expect(parseInteger('42')).toBe(42n);
    expect(parseInteger('+5')).toBe(5n);
    expect(parseInteger('-7')).toBe(-7n);
    expect(parseInteger('-')).toBeNull();
    expect(parseInteger('')).toBeNull();
    expect(parseInteger('12a')).toBeNull();
  });

  it('parses decimals', () => {
    expect(parseDecimal('0.015')).toBe(0.015);
    expect(parseDecimal('.5')).toBe(0.5);
    expect(parseDecimal('1e3')).toBe(1000);
    expect(parseDecimal('-')).toBeNull();
    expect(parseDecimal('0.1,0.2')).toBeNull();
  });
});
