import * as fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  SessionEventLog,
  listSessionLogs,
  sessionLogFileName,
} from './event-log';

describe('sessionLogFileName', () => {
  it('embeds the local start time', () => {
    expect(sessionLogFileName(new Date(2026, 9, 19, 8, 5, 3))).toBe('kiln_20261019_080503.log');
  });
});

describe('SessionEventLog', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kiln-log-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('appends severity-tagged records in order', async () => {
    const logPath = path.join(tmpDir, 'session.log');
    const log = new SessionEventLog(logPath, {
      now: () => new Date('2026-10-19T10:00:00.000Z'),
    });

    log.write('INFO', '   Compiling ignite v0.4.0');
    log.write('ERROR', 'error[E0425]: cannot find value');
    await log.close();

    const content = await fs.readFile(logPath, 'utf8');
    expect(content).toBe(
      '2026-10-19T10:00:00.000Z [INFO]    Compiling ignite v0.4.0\n' +
        '2026-10-19T10:00:00.000Z [ERROR] error[E0425]: cannot find value\n',
    );
  });

  it('splits multi-line text into one record per line', async () => {
    const logPath = path.join(tmpDir, 'session.log');
    const log = new SessionEventLog(logPath, {
      now: () => new Date('2026-10-19T10:00:00.000Z'),
    });

    log.write('WARN', 'first\nsecond');
    await log.close();

    const lines = (await fs.readFile(logPath, 'utf8')).trimEnd().split('\n');
    expect(lines).toEqual([
      '2026-10-19T10:00:00.000Z [WARN] first',
      '2026-10-19T10:00:00.000Z [WARN] second',
    ]);
  });

  it('creates the log directory and is safe to close twice', async () => {
    const log = SessionEventLog.open(
      path.join(tmpDir, 'nested', 'log'),
      new Date(2026, 0, 2, 3, 4, 5),
    );
    log.write('INFO', 'hello');
    await log.close();
    await log.close();

    expect(log.logPath).toBe(path.join(tmpDir, 'nested', 'log', 'kiln_20260102_030405.log'));
    const content = await fs.readFile(log.logPath, 'utf8');
    expect(content.endsWith('[INFO] hello\n')).toBe(true);
  });

  it('gives sessions started in the same second their own files', async () => {
    const startedAt = new Date(2026, 9, 19, 14, 25, 1);
    const first = SessionEventLog.open(tmpDir, startedAt);
    const second = SessionEventLog.open(tmpDir, startedAt);
    const third = SessionEventLog.open(tmpDir, startedAt);
    first.write('INFO', 'one');
    second.write('INFO', 'two');
    await Promise.all([first.close(), second.close(), third.close()]);

    expect(path.basename(first.logPath)).toBe('kiln_20261019_142501.log');
    expect(path.basename(second.logPath)).toBe('kiln_20261019_142501_2.log');
    expect(path.basename(third.logPath)).toBe('kiln_20261019_142501_3.log');
    expect((await fs.readFile(first.logPath, 'utf8')).endsWith('[INFO] one\n')).toBe(true);
    expect((await fs.readFile(second.logPath, 'utf8')).endsWith('[INFO] two\n')).toBe(true);
    expect((await listSessionLogs(tmpDir)).map((l) => l.name)).toEqual([
      'kiln_20261019_142501_3.log',
      'kiln_20261019_142501_2.log',
      'kiln_20261019_142501.log',
    ]);
  });

  it('warns and does not write after being closed', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logPath = path.join(tmpDir, 'session.log');
    const log = new SessionEventLog(logPath);
    await log.close();

    log.write('INFO', 'late');

    expect(warnSpy).toHaveBeenCalledWith(`Attempted to write to closed session log: ${logPath}`);
    expect(await fs.readFile(logPath, 'utf8')).toBe('');
  });
});

describe('listSessionLogs', () => {
  it('returns an empty list for a missing directory', async () => {
    expect(await listSessionLogs(path.join(os.tmpdir(), 'kiln-missing-logs-dir'))).toEqual([]);
  });

  it('lists only session logs, newest first', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kiln-logs-'));
    await fs.writeFile(path.join(dir, 'kiln_20260101_000000.log'), 'a');
    await fs.writeFile(path.join(dir, 'kiln_20261019_120000.log'), 'abc');
    await fs.writeFile(path.join(dir, 'kiln_20261019_120000_10.log'), '');
    await fs.writeFile(path.join(dir, 'kiln_20261019_120000_2.log'), '');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'ignored');

    const logs = await listSessionLogs(dir);

    expect(logs.map((l) => l.name)).toEqual([
      'kiln_20261019_120000_10.log',
      'kiln_20261019_120000_2.log',
      'kiln_20261019_120000.log',
      'kiln_20260101_000000.log',
    ]);
    expect(logs[2].sizeBytes).toBe(3);

    await fs.rm(dir, { recursive: true, force: true });
  });
});
