import { spawn, spawnSync, type ChildProcessByStdio } from 'child_process';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import {
  ExecutionError,
  InterruptedError,
  UsageError,
  isWindows,
  systemErrorCode,
  type EventSink,
  type Logger,
  type SessionStats,
  type Severity,
} from '@kiln/shared';
import { ClassifierRegistry } from '../classify/classifier';
import { parseCommand } from '../classify/parser';
import type { ClassifiedLine, LineSeverity } from '../classify/types';

function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM') {
  if (isWindows()) {
    // process.kill does not reach grandchildren on Windows.
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
  } else {
    // Negative PID signals the whole process group; the child was spawned detached.
    try {
      process.kill(-pid, signal);
    } catch {
      // Already exited.
    }
  }
}

const SEVERITY_TAGS: Record<LineSeverity, Severity> = {
  error: 'ERROR',
  warning: 'WARN',
  info: 'INFO',
};

export interface CommandResult {
  /** Exit code was 0. Independent of the classified counts. */
  success: boolean;
  /** Process exit code, -1 when the process was terminated by a signal */
  exitCode: number;
  durationMs: number;
  /** Combined stdout/stderr lines, in the order they were read */
  output: string;
  errorCount: number;
  warningCount: number;
}

export interface ExecuteOptions {
  /** Extra environment variables, merged over the parent environment */
  env?: Record<string, string>;
  /** Aborting kills the child process tree and rejects with InterruptedError */
  signal?: AbortSignal;
  /** Receives every line as soon as it is read */
  onLine?: (line: ClassifiedLine) => void;
}

export interface CommandRunnerOptions {
  /** Durable sink receiving every output line */
  sink: EventSink;
  session: SessionStats;
  classifiers?: ClassifierRegistry;
  logger?: Logger;
}

/**
 * Spawns one external program at a time and streams its output line by line,
 * classifying and forwarding each line to the session log.
 */
export class CommandRunner {
  private readonly classifiers: ClassifierRegistry;

  constructor(private readonly options: CommandRunnerOptions) {
    this.classifiers = options.classifiers ?? new ClassifierRegistry();
  }

  /**
   * Runs a configured command line (`cargo build --package ignite`) with extra arguments appended.
   */
  executeLine(
    commandLine: string,
    extraArgs: string[],
    cwd: string,
    options: ExecuteOptions = {},
  ): Promise<CommandResult> {
    const parsed = parseCommand(commandLine);
    if (!parsed.bin) {
      return Promise.reject(new UsageError(`Could not parse command: ${commandLine}`));
    }
    return this.execute(parsed.bin, [...parsed.args, ...extraArgs], cwd, {
      ...options,
      env: { ...parsed.env, ...options.env },
    });
  }

  async execute(
    program: string,
    args: string[],
    cwd: string,
    options: ExecuteOptions = {},
  ): Promise<CommandResult> {
    const { sink, session, logger } = this.options;
    const { signal } = options;

    if (signal?.aborted) {
      throw new InterruptedError(`Interrupted before starting ${program}`);
    }

    const classifier = this.classifiers.for(program);
    const commandText = [program, ...args].join(' ');

    session.commandsRun++;
    sink.write('INFO', `$ ${commandText}`);
    logger?.log({
      type: 'CommandStarted',
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      sessionId: session.sessionId,
      payload: { program, args, cwd },
    });

    const start = Date.now();
    const lines: string[] = [];
    let errorCount = 0;
    let warningCount = 0;

    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawn(program, args, {
        cwd,
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: !isWindows(),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      sink.write('ERROR', `Failed to start ${program}: ${message}`);
      throw new ExecutionError(`Failed to start process: ${message}`, {
        cause: err,
        durationMs: Date.now() - start,
        osCode: systemErrorCode(err),
      });
    }

    return new Promise<CommandResult>((resolve, reject) => {
      let settled = false;
      let pending = 3; // stdout, stderr, process close
      let exitCode = -1;

      const onLine = (text: string) => {
        if (settled) return;
        const severity = classifier.classify(text);
        if (severity === 'error') errorCount++;
        if (severity === 'warning') warningCount++;
        lines.push(text);
        sink.write(SEVERITY_TAGS[severity], text);
        options.onLine?.({ text, severity });
      };

      const cleanup = () => {
        signal?.removeEventListener('abort', onAbort);
      };

      const finish = () => {
        pending--;
        if (pending > 0 || settled) return;
        settled = true;
        cleanup();

        const durationMs = Date.now() - start;
        session.warnings += warningCount;
        logger?.log({
          type: 'CommandFinished',
          schemaVersion: 1,
          timestamp: new Date().toISOString(),
          sessionId: session.sessionId,
          payload: { program, exitCode, durationMs, errorCount, warningCount },
        });

        resolve({
          success: exitCode === 0,
          exitCode,
          durationMs,
          output: lines.join('\n'),
          errorCount,
          warningCount,
        });
      };

      function onAbort() {
        if (settled) return;
        settled = true;
        cleanup();
        if (child.pid) {
          killProcessTree(child.pid, 'SIGTERM');
        }
        const durationMs = Date.now() - start;
        sink.write('WARN', `Interrupted: ${commandText}`);
        reject(
          new InterruptedError(`Interrupted while running ${program}`, {
            details: { durationMs, linesRead: lines.length },
          }),
        );
      }

      for (const stream of [child.stdout, child.stderr]) {
        const reader = createInterface({ input: stream, crlfDelay: Infinity });
        reader.on('line', onLine);
        reader.on('close', finish);
      }

      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        cleanup();
        const durationMs = Date.now() - start;
        sink.write('ERROR', `Failed to start ${program}: ${err.message}`);
        reject(
          new ExecutionError(`Failed to start process: ${err.message}`, {
            cause: err,
            durationMs,
            osCode: systemErrorCode(err),
            details: { program, args, cwd },
          }),
        );
      });

      child.on('close', (code) => {
        exitCode = code ?? -1;
        finish();
      });

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
