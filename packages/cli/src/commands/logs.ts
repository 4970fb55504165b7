import { Command } from 'commander';
import { readFile } from 'fs/promises';
import { listSessionLogs, UsageError, type SessionLogInfo } from '@kiln/shared';
import { ConfigLoader } from '@kiln/core';
import { formatBytes } from '../output/format';
import { formatTable } from '../output/index';
import { readGlobalOptions } from './session';

export const DEFAULT_TAIL = 20;

export interface LogsReport {
  logDir: string;
  logs: SessionLogInfo[];
  latest?: { name: string; lines: string[] };
}

export function tailLines(content: string, count: number): string[] {
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return count === 0 ? [] : lines.slice(-count);
}

/**
 * Lists session logs newest first, with the last lines of the newest one.
 * Opens no session, so the listing does not include a log of its own.
 */
export async function collectLogs(logDir: string, tail: number): Promise<LogsReport> {
  const logs = await listSessionLogs(logDir);
  if (logs.length === 0) return { logDir, logs };
  const newest = logs[0];
  const content = await readFile(newest.path, 'utf8');
  return { logDir, logs, latest: { name: newest.name, lines: tailLines(content, tail) } };
}

export function renderLogs(report: LogsReport, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }
  if (report.logs.length === 0) {
    console.log(`No session logs in ${report.logDir}`);
    return;
  }
  console.log(
    formatTable(
      report.logs.map((log) => ({
        Log: log.name,
        Size: formatBytes(log.sizeBytes),
        Modified: log.modifiedAt.toISOString(),
      })),
    ),
  );
  if (report.latest && report.latest.lines.length > 0) {
    console.log(`\n${report.latest.name}:`);
    report.latest.lines.forEach((line) => console.log(line));
  }
}

function parseTail(value: unknown): number {
  if (value === undefined) return DEFAULT_TAIL;
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new UsageError(`Invalid --tail '${String(value)}'. Expected a non-negative integer`);
  }
  return count;
}

export function registerLogsCommand(program: Command) {
  program
    .command('logs')
    .description('List session logs and show the end of the newest one')
    .option('--tail <n>', `Number of lines to show from the newest log (default ${DEFAULT_TAIL})`)
    .action(async (options: Record<string, unknown>) => {
      const globalOpts = readGlobalOptions(program);
      const tail = parseTail(options.tail);
      const { paths } = ConfigLoader.load({ cwd: globalOpts.cwd, configPath: globalOpts.config });
      const report = await collectLogs(paths.logs, tail);
      renderLogs(report, globalOpts.json);
    });
}
