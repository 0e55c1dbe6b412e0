import { createReadStream } from 'node:fs';
import fs from 'node:fs/promises';
import readline from 'node:readline';
import type {
  ILogReader,
  LogLine,
} from '../../core/interfaces/services/log-reader.service.js';

/**
 * Streams a log file line by line. Invalid UTF-8 is replaced with U+FFFD and
 * CRLF endings are folded into one break. A leading byte order mark is dropped.
 */
export class LogReader implements ILogReader {
  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.stat(filePath);
      return true;
    } catch (e: unknown) {
      if (
        e instanceof Error &&
        'code' in e &&
        (e.code === 'ENOENT' || e.code === 'ENOTDIR')
      ) {
        return false;
      }
      throw e;
    }
  }

  async *lines(filePath: string): AsyncIterable<LogLine> {
    const input = createReadStream(filePath, { encoding: 'utf8' });
    const rl = readline.createInterface({ input, crlfDelay: Infinity });
    let lineNumber = 0;
    try {
      for await (const line of rl) {
        lineNumber += 1;
        const text =
          lineNumber === 1 && line.startsWith('\uFEFF') ? line.slice(1) : line;
        yield { lineNumber, text };
      }
    } finally {
      rl.close();
      input.destroy();
    }
  }
}

export default LogReader;
