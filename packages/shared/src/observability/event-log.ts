import fs from 'fs';
import { readdir, stat } from 'fs/promises';
import path from 'path';
import { systemErrorCode } from '../errors';
import type { EventSink, Severity } from '../types/events';

export const SESSION_LOG_PREFIX = 'kiln_';
export const SESSION_LOG_EXTENSION = '.log';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Builds the per-session log file name, e.g. `kiln_20261019_142501.log`.
 * Uses local time, like the timestamps operators see in their shell.
 */
export function sessionLogFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${SESSION_LOG_PREFIX}${day}_${time}${SESSION_LOG_EXTENSION}`;
}

export interface SessionEventLogOptions {
  /** Clock used for record timestamps */
  now?: () => Date;
}

/**
 * Append-only UTF-8 text log for one process session.
 * Each record is `<ISO timestamp> [<SEVERITY>] <text>`.
 */
export class SessionEventLog implements EventSink {
  private readonly stream: fs.WriteStream;
  private readonly now: () => Date;
  private closed = false;

  constructor(
    readonly logPath: string,
    options: SessionEventLogOptions = {},
  ) {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    this.stream = fs.createWriteStream(logPath, { flags: 'a', encoding: 'utf8' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Opens a fresh log named after `startedAt`. When a session that started in
   * the same second already owns that name, a counter is appended
   * (`kiln_20261019_142501_2.log`).
   */
  static open(logDir: string, startedAt: Date, options: SessionEventLogOptions = {}) {
    fs.mkdirSync(logDir, { recursive: true });
    const base = sessionLogFileName(startedAt).slice(0, -SESSION_LOG_EXTENSION.length);
    for (let attempt = 1; ; attempt++) {
      const suffix = attempt === 1 ? '' : `_${attempt}`;
      const candidate = path.join(logDir, `${base}${suffix}${SESSION_LOG_EXTENSION}`);
      try {
        // Exclusive create: once this succeeds the name belongs to this session.
        fs.writeFileSync(candidate, '', { flag: 'wx' });
      } catch (error) {
        if (systemErrorCode(error) === 'EEXIST') continue;
        throw error;
      }
      return new SessionEventLog(candidate, options);
    }
  }

  write(severity: Severity, text: string): void {
    if (this.closed) {
      console.warn(`Attempted to write to closed session log: ${this.logPath}`);
      return;
    }
    const timestamp = this.now().toISOString();
    for (const line of text.split(/\r?\n/)) {
      this.stream.write(`${timestamp} [${severity}] ${line}\n`);
    }
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      if (this.closed) {
        resolve();
        return;
      }
      this.closed = true;
      this.stream.end(() => resolve());
    });
  }
}

export interface SessionLogInfo {
  name: string;
  path: string;
  sizeBytes: number;
  modifiedAt: Date;
}

/**
 * Lists session log files in `logDir`, newest first. A missing directory yields an empty list.
 */
export async function listSessionLogs(logDir: string): Promise<SessionLogInfo[]> {
  let entries: string[];
  try {
    entries = await readdir(logDir);
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const logs = await Promise.all(
    entries
      .filter((name) => name.startsWith(SESSION_LOG_PREFIX) && name.endsWith(SESSION_LOG_EXTENSION))
      .map(async (name) => {
        const fullPath = path.join(logDir, name);
        const info = await stat(fullPath);
        return { name, path: fullPath, sizeBytes: info.size, modifiedAt: info.mtime };
      }),
  );

  // Names embed the start time and any same-second counter, so comparing them
  // numerically without the extension puts the newest first.
  const stem = (name: string) => name.slice(0, -SESSION_LOG_EXTENSION.length);
  return logs.sort((a, b) =>
    stem(b.name).localeCompare(stem(a.name), undefined, { numeric: true }),
  );
}
