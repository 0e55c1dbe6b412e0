import type { AccessLogEntry } from '../../entities/access-log-entry.entity.js';

export interface IRecordExporter {
  write(filePath: string, entries: readonly AccessLogEntry[]): Promise<void>;
}
