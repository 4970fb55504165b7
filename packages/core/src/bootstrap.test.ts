import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { listSessionLogs } from '@kiln/shared';
import { createKiln } from './bootstrap';

describe('createKiln', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'kiln-boot-')));
    await fs.writeFile(path.join(root, 'kiln.yaml'), 'project:\n  name: demo\n');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('wires a session and writes its log on shutdown', async () => {
    const kiln = await createKiln({
      cwd: root,
      now: () => new Date(2026, 9, 19, 9, 15, 0),
    });

    expect(kiln.config.project.name).toBe('demo');
    expect(kiln.metricsLoad).toEqual({ status: 'absent' });
    expect(kiln.session.commandsRun).toBe(0);

    await kiln.shutdown();
    await kiln.shutdown();

    const logs = await listSessionLogs(path.join(root, '.kiln', 'log'));
    expect(logs.map((l) => l.name)).toEqual(['kiln_20261019_091500.log']);
    const content = await fs.readFile(logs[0].path, 'utf8');
    expect(content).toContain(`[INFO] Session ${kiln.session.sessionId} started in ${root}`);
    expect(content).toContain('[INFO] Session finished: 0 command(s), 0 error(s), 0 warning(s)');

    const metrics = JSON.parse(await fs.readFile(path.join(root, '.kiln', 'metrics.json'), 'utf8'));
    expect(metrics.total_builds).toBe(0);
  });

  it('recovers from a corrupt metrics file', async () => {
    await fs.mkdir(path.join(root, '.kiln'), { recursive: true });
    await fs.writeFile(path.join(root, '.kiln', 'metrics.json'), '[1, 2');

    const kiln = await createKiln({ cwd: root });
    await kiln.shutdown();

    expect(kiln.metricsLoad.status).toBe('corrupt');
    const entries = await fs.readdir(path.join(root, '.kiln'));
    expect(entries.some((e) => e.startsWith('metrics.json.corrupt-'))).toBe(true);
  });
});
