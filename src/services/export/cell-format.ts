import type {
  AccessLogEntry,
  AccessLogRow,
  CsvColumn,
} from '../../core/entities/access-log-entry.entity.js';
import { CSV_COLUMNS } from '../../core/entities/access-log-entry.entity.js';

const FLOAT_COLUMNS: ReadonlySet<CsvColumn> = new Set<CsvColumn>([
  'request_time',
  'upstream_response_time',
]);

/**
 * Shortest round-trip form that always reads as a float: `0.0`, `1.5`,
 * `1e+16`, `1.5e-05`, `inf`. Scientific notation is used below 1e-4 and from
 * 1e16 up.
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  const sign = value < 0 || Object.is(value, -0) ? '-' : '';
  const abs = Math.abs(value);
  if (abs === Infinity) return `${sign}inf`;

  const [mantissa = '0', exponentText = '0'] = abs.toExponential().split('e');
  const digits = mantissa.replace('.', '');
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= 16) {
    const fraction = digits.length > 1 ? `.${digits.slice(1)}` : '';
    const expSign = exponent < 0 ? '-' : '+';
    const expDigits = String(Math.abs(exponent)).padStart(2, '0');
    return `${sign}${digits[0]}${fraction}e${expSign}${expDigits}`;
  }
  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }
  const whole = digits.slice(0, exponent + 1).padEnd(exponent + 1, '0');
  const fraction = digits.slice(exponent + 1) || '0';
  return `${sign}${whole}.${fraction}`;
}

export function formatCell(
  column: CsvColumn,
  value: AccessLogRow[CsvColumn],
): string | null {
  if (value === null) return null;
  if (typeof value === 'number' && FLOAT_COLUMNS.has(column)) {
    return formatFloat(value);
  }
  return String(value);
}

/** One CSV record keyed by column, with every cell already rendered. */
export function toCsvRecord(entry: AccessLogEntry): Record<string, string | null> {
  const row = entry.toJSON();
  return Object.fromEntries(
    CSV_COLUMNS.map((column) => [column, formatCell(column, row[column])]),
  );
}
