const MONTHS: Record<string, number> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  oct: 9,
  nov: 10,
  dec: 11,
};

// 26/Apr/2021:21:20:17 +0000
const NGINX_TIME_RE =
  /^(\d{1,2})\/([A-Za-z]{3})\/(\d{4}):(\d{2}):(\d{2}):(\d{2})\s+(Z|[+-]\d{2}:?\d{2})$/;

// 2021-04-26, 2021-04-26T21:20:00Z, 2021-04-26 21:20:00.250+02:00
const ISO_TIME_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

function utcEpoch(
  year: number,
  monthIndex: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millis = 0,
): number | null {
  if (hour > 23 || minute > 59 || second > 59) return null;
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  date.setUTCHours(hour, minute, second, millis);
  // rejects 31/Apr and friends, which Date would silently roll over
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== monthIndex ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date.getTime();
}

/** Offset east of UTC in minutes, or null when out of range. */
function offsetMinutes(raw: string): number | null {
  if (raw === 'Z') return 0;
  const sign = raw.startsWith('-') ? -1 : 1;
  const digits = raw.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

/**
 * Parses an nginx `$time_local` value into a UTC epoch (ms).
 * Returns null for malformed or impossible dates.
 */
export function parseNginxTime(value: string): number | null {
  const m = NGINX_TIME_RE.exec(value);
  if (!m) return null;
  const [, day, mon, year, hh, mm, ss, zone] = m;
  const monthIndex = MONTHS[mon.toLowerCase()];
  if (monthIndex === undefined) return null;
  const offset = offsetMinutes(zone);
  if (offset === null) return null;
  const local = utcEpoch(
    Number(year),
    monthIndex,
    Number(day),
    Number(hh),
    Number(mm),
    Number(ss),
  );
  if (local === null) return null;
  return local - offset * 60_000;
}

/**
 * Parses an ISO 8601 date or date-time. A trailing `Z` means UTC and so does a
 * missing offset.
 */
export function parseIsoUtc(value: string): number | null {
  const m = ISO_TIME_RE.exec(value.trim());
  if (!m) return null;
  const [, year, month, day, hh, mm, ss, fraction, zone] = m;
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;
  const local = utcEpoch(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hh ?? 0),
    Number(mm ?? 0),
    Number(ss ?? 0),
    millis,
  );
  if (local === null) return null;
  const offset = zone ? offsetMinutes(zone) : 0;
  if (offset === null) return null;
  return local - offset * 60_000;
}

/** `2021-04-26T21:20:17Z`; sub-second precision is kept only when present. */
export function formatUtc(epochMs: number): string {
  return new Date(epochMs).toISOString().replace('.000Z', 'Z');
}
