import { spawn as nodeSpawn } from 'node:child_process';
import fs from 'node:fs/promises';
import os from 'node:os';
import {
  LaunchError,
  PrivilegedExecutionError,
  ScriptNotFoundError,
} from '../../core/errors/parser-errors.js';
import { debugWithContext } from '../../utils/logger.js';

export interface ChildHandle {
  on(
    event: 'exit',
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): this;
  on(event: 'error', listener: (err: Error) => void): this;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (
  command: string,
  args: string[],
  options: { stdio: 'inherit'; env: NodeJS.ProcessEnv },
) => ChildHandle;

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface EntrypointRunnerOptions {
  scriptPath: string;
  args?: readonly string[];
  /** Interpreter; defaults to the running node binary. */
  command?: string;
  env?: NodeJS.ProcessEnv;
  allowRoot?: boolean;
  forwardSignals?: readonly NodeJS.Signals[];
  spawn?: SpawnFn;
  getUid?: () => number | undefined;
  fileExists?: (filePath: string) => Promise<boolean>;
  signalSource?: SignalSource;
}

const DEFAULT_FORWARDED: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

async function defaultFileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** 128 + n for a child killed by signal n, the shell convention. */
export function exitCodeFor(
  code: number | null,
  signal: NodeJS.Signals | null,
): number {
  if (code !== null) return code;
  if (signal !== null) {
    const signo: number | undefined = os.constants.signals[signal];
    return 128 + (signo ?? 0);
  }
  return 1;
}

/**
 * Launches the program as the single foreground child with inherited stdio
 * and resolves to its exit status. The runner refuses to start as uid 0.
 */
export class EntrypointRunner {
  private readonly options: EntrypointRunnerOptions;

  constructor(options: EntrypointRunnerOptions) {
    this.options = options;
  }

  async run(): Promise<number> {
    const {
      scriptPath,
      args = [],
      command = process.execPath,
      env = process.env,
      allowRoot = false,
      forwardSignals = DEFAULT_FORWARDED,
      spawn = (cmd, argv, opts) => nodeSpawn(cmd, argv, opts),
      getUid = () => process.getuid?.(),
      fileExists = defaultFileExists,
      signalSource = process,
    } = this.options;

    const uid = getUid();
    if (uid === 0 && !allowRoot) {
      throw new PrivilegedExecutionError(uid);
    }
    if (!(await fileExists(scriptPath))) {
      throw new ScriptNotFoundError(scriptPath);
    }

    debugWithContext('RUNNER', 'Launching entry script', {
      command,
      scriptPath,
      argc: args.length,
      uid,
    });

    return new Promise<number>((resolve, reject) => {
      let settled = false;
      const child = spawn(command, [scriptPath, ...args], { stdio: 'inherit', env });

      const forward = (signal: NodeJS.Signals) => {
        child.kill(signal);
      };
      // as PID 1 node has no default handlers, so termination only reaches
      // the child through these listeners
      for (const signal of forwardSignals) signalSource.on(signal, forward);
      const cleanup = () => {
        for (const signal of forwardSignals) signalSource.off(signal, forward);
      };

      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(new LaunchError(command, err));
      });
      child.on('exit', (code, signal) => {
        if (settled) return;
        settled = true;
        cleanup();
        const exitCode = exitCodeFor(code, signal);
        debugWithContext('RUNNER', 'Entry script exited', {
          code,
          signal,
          exitCode,
        });
        resolve(exitCode);
      });
    });
  }
}

export default EntrypointRunner;
