import { LogReader } from '../services/input/log-reader.js';
import { CsvExporter } from '../services/export/csv-exporter.js';
import { ProcessLogService } from '../services/process-log.service.js';
import {
  ErrorClassifier,
  defaultErrorClassifier,
} from '../core/errors/error-classifier.js';
import type { ILogReader } from '../core/interfaces/services/log-reader.service.js';
import type { IRecordExporter } from '../core/interfaces/services/record-exporter.service.js';

export interface Container {
  logReader: ILogReader;
  exporter: IRecordExporter;
  processLogService: ProcessLogService;
  errorClassifier: ErrorClassifier;
}

let cachedContainer: Container | null = null;

export function createContainer(overrides: Partial<Container> = {}): Container {
  const logReader = overrides.logReader ?? new LogReader();
  const exporter = overrides.exporter ?? new CsvExporter();
  const processLogService =
    overrides.processLogService ??
    new ProcessLogService({ reader: logReader, exporter });

  return {
    logReader,
    exporter,
    processLogService,
    errorClassifier: overrides.errorClassifier ?? defaultErrorClassifier,
  };
}

export function getContainer(): Container {
  if (!cachedContainer) {
    cachedContainer = createContainer();
  }
  return cachedContainer;
}

export function resetContainer(): void {
  cachedContainer = null;
}
