import {
  ParserError,
  UsageError,
  InputNotFoundError,
  FormatMismatchError,
  PrivilegedExecutionError,
  ScriptNotFoundError,
  LaunchError,
} from './parser-errors.js';

export enum ClassifiedErrorCode {
  Usage = 'usage',
  InputMissing = 'input_missing',
  FormatMismatch = 'format_mismatch',
  Privileged = 'privileged',
  ScriptMissing = 'script_missing',
  LaunchFailed = 'launch_failed',
  FsPermission = 'fs_permission',
  Unknown = 'unknown',
}

export interface ClassifiedError {
  code: ClassifiedErrorCode;
  message: string;
  exitCode: number;
  // Raw underlying error for logging / debugging
  original?: unknown;
  meta?: Record<string, unknown>;
}

export interface ErrorClassifierOptions {
  // Whether to attach original error object (default true)
  includeOriginal?: boolean;
}

function errnoCode(err: unknown): string | undefined {
  if (err !== null && typeof err === 'object' && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? 'unknown error');
}

export class ErrorClassifier {
  private includeOriginal: boolean;

  constructor(opts: ErrorClassifierOptions = {}) {
    this.includeOriginal = opts.includeOriginal !== false;
  }

  classify(err: unknown): ClassifiedError {
    const original = this.includeOriginal ? err : undefined;

    if (err instanceof ParserError) {
      return {
        code: this.codeFor(err),
        message: err.message,
        exitCode: err.exitCode,
        original,
      };
    }

    const errno = errnoCode(err);
    if (errno === 'EACCES' || errno === 'EPERM') {
      return {
        code: ClassifiedErrorCode.FsPermission,
        message: messageOf(err),
        exitCode: 1,
        original,
        meta: { errno },
      };
    }

    return {
      code: ClassifiedErrorCode.Unknown,
      message: messageOf(err),
      exitCode: 1,
      original,
      meta: errno ? { errno } : undefined,
    };
  }

  private codeFor(err: ParserError): ClassifiedErrorCode {
    if (err instanceof UsageError) return ClassifiedErrorCode.Usage;
    if (err instanceof InputNotFoundError) return ClassifiedErrorCode.InputMissing;
    if (err instanceof FormatMismatchError) return ClassifiedErrorCode.FormatMismatch;
    if (err instanceof PrivilegedExecutionError) return ClassifiedErrorCode.Privileged;
    if (err instanceof ScriptNotFoundError) return ClassifiedErrorCode.ScriptMissing;
    if (err instanceof LaunchError) return ClassifiedErrorCode.LaunchFailed;
    return ClassifiedErrorCode.Unknown;
  }
}

export const defaultErrorClassifier = new ErrorClassifier();

export default ErrorClassifier;
