import minimist from 'minimist';
import { z } from 'zod';
import { SORT_KEYS } from '../core/entities/access-log-entry.entity.js';
import { UsageError } from '../core/errors/parser-errors.js';
import { parseIsoUtc } from '../services/parser/timestamps.js';

export const USAGE = `usage: parse-log -i INPUT -o OUTPUT [--status N [N ...]] [--method M [M ...]]
                 [--path-contains TEXT] [--ip ADDR [ADDR ...]]
                 [--since TIME] [--until TIME]
                 [--sort-by {${SORT_KEYS.join(',')}}] [--desc]
                 [--limit N] [--strict]

Parse an nginx ingress access log and export it to CSV.

options:
  -h, --help            show this help message and exit
  -i, --input INPUT     path to the nginx log file
  -o, --output OUTPUT   path to the CSV file to write
  --status N [N ...]    keep only these HTTP statuses, e.g. --status 200 404
  --method M [M ...]    keep only these methods, e.g. --method GET POST
  --path-contains TEXT  keep only rows whose path contains TEXT
  --ip ADDR [ADDR ...]  keep only these client addresses
  --since TIME          start time (UTC), e.g. 2021-04-26T21:20:00Z
  --until TIME          end time (UTC), e.g. 2021-04-26T21:30:00Z
  --sort-by COLUMN      sort output by column (default: time_utc)
  --desc                sort descending
  --limit N             write only the first N rows after filtering and sorting
  --strict              fail if any line does not match the expected format
`;

const MULTI_VALUE_FLAGS = ['status', 'method', 'ip'];
const MULTI_VALUE_SET = new Set(MULTI_VALUE_FLAGS);

const STRING_FLAGS = [
  'input',
  'output',
  ...MULTI_VALUE_FLAGS,
  'path-contains',
  'since',
  'until',
  'sort-by',
  'limit',
];

const BOOLEAN_FLAGS = ['desc', 'strict', 'help'];

const ALIASES: Record<string, string> = { i: 'input', o: 'output', h: 'help' };

const FLAG_LABELS: Record<string, string> = {
  input: '-i/--input',
  output: '-o/--output',
  status: '--status',
  method: '--method',
  pathContains: '--path-contains',
  ip: '--ip',
  since: '--since',
  until: '--until',
  sortBy: '--sort-by',
  limit: '--limit',
};

const isoInstant = z.string().transform((value, ctx) => {
  const instant = parseIsoUtc(value);
  if (instant === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid ISO 8601 time: '${value}'`,
    });
    return z.NEVER;
  }
  return instant;
});

const integerText = (message: string) =>
  z
    .string()
    .regex(/^[+-]?\d+$/, message)
    .transform((value) => Number.parseInt(value, 10));

const requiredPath = (label: string) =>
  z
    .string({ required_error: `the following arguments are required: ${label}` })
    .min(1, 'expected one argument');

export const parseOptionsSchema = z
  .object({
    input: requiredPath('-i/--input'),
    output: requiredPath('-o/--output'),
    status: z.array(integerText('invalid int value')).optional(),
    method: z.array(z.string().min(1)).optional(),
    pathContains: z.string().optional(),
    ip: z.array(z.string().min(1)).optional(),
    since: isoInstant.optional(),
    until: isoInstant.optional(),
    sortBy: z
      .enum(SORT_KEYS, {
        errorMap: () => ({
          message: `invalid choice (choose from ${SORT_KEYS.join(', ')})`,
        }),
      })
      .default('time_utc'),
    desc: z.boolean().default(false),
    limit: integerText('invalid int value')
      .refine((n) => n >= 0, 'must not be negative')
      .optional(),
    strict: z.boolean().default(false),
  })
  .strict();

export type ParseOptions = z.infer<typeof parseOptionsSchema>;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'run'; options: ParseOptions };

function flagName(token: string): string | null {
  if (!token.startsWith('--')) return null;
  const eq = token.indexOf('=');
  return eq < 0 ? token.slice(2) : token.slice(2, eq);
}

/**
 * `--status 200 404` → `--status 200 --status 404`, so that every value
 * following a multi-value flag lands on that flag instead of the positionals.
 * The inline `--status=200` form takes one value only.
 */
export function expandMultiValueFlags(argv: readonly string[]): string[] {
  const out: string[] = [];
  let i = 0;
  while (i < argv.length) {
    const token = argv[i];
    i += 1;
    if (token === '--') {
      out.push(...argv.slice(i - 1));
      break;
    }
    const name = flagName(token);
    if (name === null || !MULTI_VALUE_SET.has(name)) {
      out.push(token);
      continue;
    }
    if (token.includes('=')) {
      out.push(`--${name}`, token.slice(token.indexOf('=') + 1));
      continue;
    }
    const values: string[] = [];
    while (i < argv.length && !argv[i].startsWith('-')) {
      values.push(argv[i]);
      i += 1;
    }
    if (values.length === 0) {
      throw new UsageError(`argument --${name}: expected at least one argument`);
    }
    for (const value of values) out.push(`--${name}`, value);
  }
  return out;
}

function asList(value: unknown): string[] | undefined {
  if (value === undefined) return undefined;
  const items = Array.isArray(value) ? value : [value];
  return items.map((item) => String(item));
}

// A repeated single-value flag keeps its last value
function asSingle(value: unknown): string | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) {
    return value.length > 0 ? String(value[value.length - 1]) : undefined;
  }
  return String(value);
}

function describeIssue(issue: z.ZodIssue): string {
  const key = issue.path[0];
  const label = typeof key === 'string' ? FLAG_LABELS[key] : undefined;
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    return issue.message;
  }
  return label ? `argument ${label}: ${issue.message}` : issue.message;
}

/**
 * Turns raw process arguments into a validated command. Throws UsageError on
 * unknown options, stray positionals and invalid values.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const unrecognized: string[] = [];
  const parsed = minimist(expandMultiValueFlags(argv), {
    string: STRING_FLAGS,
    boolean: BOOLEAN_FLAGS,
    alias: ALIASES,
    unknown: (arg) => {
      unrecognized.push(arg);
      return false;
    },
  });

  if (parsed.help === true) return { kind: 'help' };

  const extra = [...unrecognized, ...parsed._.map(String)];
  if (extra.length > 0) {
    throw new UsageError(`unrecognized arguments: ${extra.join(' ')}`);
  }

  const result = parseOptionsSchema.safeParse({
    input: asSingle(parsed.input),
    output: asSingle(parsed.output),
    status: asList(parsed.status),
    method: asList(parsed.method),
    pathContains: asSingle(parsed['path-contains']),
    ip: asList(parsed.ip),
    since: asSingle(parsed.since),
    until: asSingle(parsed.until),
    sortBy: asSingle(parsed['sort-by']),
    desc: parsed.desc === true,
    limit: asSingle(parsed.limit),
    strict: parsed.strict === true,
  });

  if (!result.success) {
    const [first] = result.error.issues;
    throw new UsageError(first ? describeIssue(first) : 'invalid arguments');
  }
  return { kind: 'run', options: result.data };
}
