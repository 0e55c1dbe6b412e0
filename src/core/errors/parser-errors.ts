/**
 * Failures the program reports through its exit status. Each carries the code
 * the process exits with so the entrypoint never has to guess.
 */
export class ParserError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class UsageError extends ParserError {
  constructor(message: string) {
    super(message, 2);
  }
}

export class InputNotFoundError extends ParserError {
  constructor(readonly inputPath: string) {
    super(`input not found: ${inputPath}`, 2);
  }
}

export class FormatMismatchError extends ParserError {
  constructor(
    readonly lineNumber: number,
    readonly line: string,
  ) {
    super(`line ${lineNumber} does not match format:\n${line}`, 3);
  }
}

export class PrivilegedExecutionError extends ParserError {
  constructor(readonly uid: number) {
    super(`refusing to run as uid ${uid}; set PARSER_ALLOW_ROOT=1 to override`, 126);
  }
}

export class ScriptNotFoundError extends ParserError {
  constructor(readonly scriptPath: string) {
    super(`entry script not found: ${scriptPath}`, 127);
  }
}

export class LaunchError extends ParserError {
  constructor(
    readonly command: string,
    readonly failure: Error,
  ) {
    super(`failed to launch ${command}: ${failure.message}`, 127);
  }
}
