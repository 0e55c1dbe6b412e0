import { parseCliArgs, USAGE } from './config/cli-options.js';
import { getContainer, type Container } from './config/container.config.js';
import {
  ClassifiedErrorCode,
  type ClassifiedError,
} from './core/errors/error-classifier.js';
import { formatSummary } from './services/process-log.service.js';
import { logWithContext } from './utils/logger.js';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliStreams {
  stdout: OutputStream;
  stderr: OutputStream;
}

function reportFailure(streams: CliStreams, failure: ClassifiedError): void {
  if (failure.code === ClassifiedErrorCode.Usage) {
    streams.stderr.write(USAGE.split('\n\n')[0] + '\n');
    streams.stderr.write(`parse-log: error: ${failure.message}\n`);
    return;
  }
  if (failure.code === ClassifiedErrorCode.Unknown) {
    logWithContext('CLI', 'Unexpected failure', {
      message: failure.message,
      meta: failure.meta,
    });
  }
  streams.stderr.write(`ERROR: ${failure.message}\n`);
}

/**
 * Runs the parser for one argument vector and resolves to the exit code.
 */
export async function runCli(
  argv: readonly string[],
  streams: CliStreams = { stdout: process.stdout, stderr: process.stderr },
  container: Container = getContainer(),
): Promise<number> {
  try {
    const command = parseCliArgs(argv);
    if (command.kind === 'help') {
      streams.stdout.write(USAGE);
      return 0;
    }
    const summary = await container.processLogService.run(command.options);
    streams.stdout.write(formatSummary(summary) + '\n');
    return 0;
  } catch (error) {
    const failure = container.errorClassifier.classify(error);
    reportFailure(streams, failure);
    return failure.exitCode;
  }
}
