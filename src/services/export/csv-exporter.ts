import { createWriteStream } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { stringify } from 'csv-stringify';
import {
  CSV_COLUMNS,
  type AccessLogEntry,
} from '../../core/entities/access-log-entry.entity.js';
import { toCsvRecord } from './cell-format.js';
import type { IRecordExporter } from '../../core/interfaces/services/record-exporter.service.js';

/**
 * Writes entries as RFC 4180 CSV with a header row and CRLF line endings.
 * Null cells are left empty; float columns always carry a fraction or exponent.
 */
export class CsvExporter implements IRecordExporter {
  async write(
    filePath: string,
    entries: readonly AccessLogEntry[],
  ): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await pipeline(
      Readable.from(entries.map(toCsvRecord)),
      stringify({
        header: true,
        columns: [...CSV_COLUMNS],
        record_delimiter: 'windows',
      }),
      createWriteStream(filePath, { encoding: 'utf8' }),
    );
  }
}

export default CsvExporter;
