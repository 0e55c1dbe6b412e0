import path from 'node:path';
import type { AccessLogEntry } from '../core/entities/access-log-entry.entity.js';
import {
  FormatMismatchError,
  InputNotFoundError,
} from '../core/errors/parser-errors.js';
import type { ILogReader } from '../core/interfaces/services/log-reader.service.js';
import type { IRecordExporter } from '../core/interfaces/services/record-exporter.service.js';
import type { ParseOptions } from '../config/cli-options.js';
import { debugWithContext } from '../utils/logger.js';
import { createRecordFilter } from './filter/record-filter.js';
import { parseLine } from './parser/line-parser.js';
import { sortEntries, takeFirst } from './sort/record-sorter.js';

export interface RunSummary {
  /** Rows written to the CSV. */
  parsed: number;
  /** Non-blank lines that did not match the log format. */
  skipped: number;
  output: string;
}

export interface ProcessLogServiceDeps {
  reader: ILogReader;
  exporter: IRecordExporter;
}

export function formatSummary(summary: RunSummary): string {
  return `OK: parsed=${summary.parsed} rows, skipped_bad_lines=${summary.skipped}, output=${summary.output}`;
}

/**
 * Read → parse → filter → sort → limit → export. Nothing is written when the
 * run fails.
 */
export class ProcessLogService {
  constructor(private readonly deps: ProcessLogServiceDeps) {}

  async run(options: ParseOptions): Promise<RunSummary> {
    const { reader, exporter } = this.deps;
    const inputPath = path.normalize(options.input);
    const outputPath = path.normalize(options.output);

    if (!(await reader.exists(inputPath))) {
      throw new InputNotFoundError(inputPath);
    }

    const accept = createRecordFilter({
      status: options.status,
      method: options.method,
      pathContains: options.pathContains,
      ip: options.ip,
      since: options.since,
      until: options.until,
    });

    const kept: AccessLogEntry[] = [];
    let skipped = 0;
    for await (const { lineNumber, text } of reader.lines(inputPath)) {
      if (!text.trim()) continue;
      const entry = parseLine(text);
      if (!entry) {
        if (options.strict) throw new FormatMismatchError(lineNumber, text);
        skipped += 1;
        debugWithContext('PARSER', 'Skipping malformed line', { lineNumber });
        continue;
      }
      if (accept(entry)) kept.push(entry);
    }

    const rows = takeFirst(
      sortEntries(kept, options.sortBy, options.desc),
      options.limit,
    );
    await exporter.write(outputPath, rows);

    debugWithContext('PARSER', 'Export complete', {
      input: inputPath,
      output: outputPath,
      rows: rows.length,
      skipped,
    });
    return { parsed: rows.length, skipped, output: outputPath };
  }
}

export default ProcessLogService;
