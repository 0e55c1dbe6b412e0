import { describe, it, expect } from 'vitest';
import { sortEntries, takeFirst } from '../src/services/sort/record-sorter.js';
import { entryFor } from './helpers/log-lines.js';

const ids = (entries: { toJSON(): { request_id: string } }[]) =>
  entries.map((e) => e.toJSON().request_id);

describe('sortEntries', () => {
  const late = entryFor({ requestId: 'late', time: '26/Apr/2021:21:30:00 +0000', status: '500' });
  const early = entryFor({ requestId: 'early', time: '26/Apr/2021:21:00:00 +0000', status: '200' });
  const middle = entryFor({ requestId: 'middle', time: '26/Apr/2021:21:10:00 +0000', status: '200' });

  it('orders by time by default', () => {
    expect(ids(sortEntries([late, early, middle], 'time_utc'))).toEqual([
      'early',
      'middle',
      'late',
    ]);
  });

  it('keeps input order for equal keys in both directions', () => {
    expect(ids(sortEntries([late, early, middle], 'status'))).toEqual([
      'early',
      'middle',
      'late',
    ]);
    expect(ids(sortEntries([late, early, middle], 'status', true))).toEqual([
      'late',
      'early',
      'middle',
    ]);
  });

  it('places missing numbers first when ascending', () => {
    const unknownSize = entryFor({ requestId: 'unknown', bytes: '-' });
    const small = entryFor({ requestId: 'small', bytes: '0' });
    expect(ids(sortEntries([small, unknownSize], 'body_bytes_sent'))).toEqual([
      'unknown',
      'small',
    ]);
  });

  it('orders infinite and huge values without breaking stability', () => {
    const slowA = entryFor({ requestId: 'slow-a', requestTime: '1e999' });
    const fast = entryFor({ requestId: 'fast', requestTime: '0.001' });
    const slowB = entryFor({ requestId: 'slow-b', requestTime: '1e999' });
    expect(ids(sortEntries([slowA, fast, slowB], 'request_time'))).toEqual([
      'fast',
      'slow-a',
      'slow-b',
    ]);
    expect(ids(sortEntries([slowA, fast, slowB], 'request_time', true))).toEqual([
      'slow-a',
      'slow-b',
      'fast',
    ]);
  });

  it('compares byte counts beyond 2^53 exactly', () => {
    const bigger = entryFor({ requestId: 'bigger', bytes: '9007199254740993' });
    const smaller = entryFor({ requestId: 'smaller', bytes: '9007199254740992' });
    expect(ids(sortEntries([bigger, smaller], 'body_bytes_sent'))).toEqual([
      'smaller',
      'bigger',
    ]);
  });

  it('does not mutate its input', () => {
    const input = [late, early];
    sortEntries(input, 'time_utc');
    expect(ids(input)).toEqual(['late', 'early']);
  });
});

describe('takeFirst', () => {
  it('truncates only when a limit is given', () => {
    expect(takeFirst([1, 2, 3], 2)).toEqual([1, 2]);
    expect(takeFirst([1, 2, 3], 0)).toEqual([]);
    expect(takeFirst([1, 2, 3])).toEqual([1, 2, 3]);
  });
});
