import { execFile } from 'child_process';
import which from 'which';
import { parseCommand } from '@kiln/exec';

export interface CaptureResult {
  /** -1 when the program could not be started */
  exitCode: number;
  /** stdout followed by stderr, trimmed */
  output: string;
  /** Spawn error message, when the program could not be started */
  error?: string;
}

/**
 * Read-only environment inspection. Unlike CommandRunner, probes are not
 * recorded in the session log or counters.
 */
export interface ToolProbe {
  /** Absolute path of `program` on PATH, if found */
  locate(program: string): Promise<string | undefined>;
  /** Runs a short command line and captures its output */
  capture(commandLine: string, cwd: string): Promise<CaptureResult>;
}

const PROBE_TIMEOUT_MS = 15_000;

export class SystemToolProbe implements ToolProbe {
  async locate(program: string): Promise<string | undefined> {
    const found = await which(program, { nothrow: true });
    return found ?? undefined;
  }

  capture(commandLine: string, cwd: string): Promise<CaptureResult> {
    const parsed = parseCommand(commandLine);
    if (!parsed.bin) {
      return Promise.resolve({ exitCode: -1, output: '', error: 'empty command' });
    }

    return new Promise((resolve) => {
      execFile(
        parsed.bin,
        parsed.args,
        {
          cwd,
          env: { ...process.env, ...parsed.env },
          timeout: PROBE_TIMEOUT_MS,
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          const output = `${stdout}${stderr}`.trim();
          if (!error) {
            resolve({ exitCode: 0, output });
            return;
          }
          if (typeof error.code === 'number') {
            resolve({ exitCode: error.code, output });
            return;
          }
          resolve({ exitCode: -1, output, error: error.message });
        },
      );
    });
  }
}
