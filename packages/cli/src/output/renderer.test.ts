import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { BuildOutcome, CheckOutcome, CleanOutcome, TestOutcome } from '@kiln/core';
import { OutputRenderer } from './renderer';

const ANSI = /\u001b\[[0-9;]*m/g;

describe('OutputRenderer', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;

  const logged = () => logSpy.mock.calls.map((c) => String(c[0]).replace(ANSI, '')).join('\n');

  const build: BuildOutcome = {
    action: 'build',
    success: true,
    summary: 'Built release in 1.2s (4096 bytes)',
    durationMs: 1250,
    profile: 'release',
    features: ['serial', 'fb'],
    prerequisite: 'cached',
    errorCount: 0,
    warningCount: 2,
    artifact: {
      path: '/work/target/x86_64-unknown-uefi/release/ignite.efi',
      sizeBytes: 4096,
      sha256: 'ab'.repeat(32),
      durationMs: 1200,
    },
  };

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders JSON output when json mode is enabled', () => {
    const renderer = new OutputRenderer(true);
    renderer.render(build);

    expect(logSpy).toHaveBeenCalledTimes(1);
    const parsed = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(parsed).toEqual(build);
  });

  it('renders a successful build with its artifact', () => {
    new OutputRenderer(false).render(build);

    const output = logged();
    expect(output).toContain('Build (release)');
    expect(output).toContain('Features: serial, fb');
    expect(output).toContain('Prerequisite: cached');
    expect(output).toContain('Artifact: /work/target/x86_64-unknown-uefi/release/ignite.efi');
    expect(output).toContain('Size: 4.0 KiB');
    expect(output).toContain(`SHA-256: ${'ab'.repeat(32)}`);
    expect(output).toContain('2 warning(s)');
    expect(output).toContain('✔ Built release in 1.2s (4096 bytes) [1.25s]');
    expect(output).not.toContain('Failed step:');
  });

  it('renders the failing step of a failed test run', () => {
    const outcome: TestOutcome = {
      action: 'test',
      success: false,
      summary: 'Tests (unit) failed with exit code 101: 1 failed',
      durationMs: 800,
      kind: 'unit',
      parallel: false,
      passed: 2,
      failed: 1,
      errorCount: 1,
      warningCount: 0,
      failure: {
        step: 'test',
        message: 'Tests (unit) failed with exit code 101: 1 failed',
        exitCode: 101,
        errorCount: 1,
        warningCount: 0,
      },
    };
    new OutputRenderer(false).render(outcome);

    const output = logged();
    expect(output).toContain('Tests (unit, serial)');
    expect(output).toContain('Passed: 2');
    expect(output).toContain('Failed: 1');
    expect(output).toContain('✖ Tests (unit) failed with exit code 101: 1 failed [800ms]');
    expect(output).toContain('Failed step: test');
    expect(output).toContain('Exit code: 101');
    expect(output).toContain('1 error line(s), 0 warning line(s)');
  });

  it('renders check items as a table', () => {
    const outcome: CheckOutcome = {
      action: 'check',
      success: true,
      summary: 'All checks passed (1/1)',
      durationMs: 300,
      kind: 'all',
      passed: 1,
      applicable: 1,
      total: 2,
      items: [
        { name: 'Cargo Check', kind: 'static', status: 'passed', durationMs: 250 },
        {
          name: 'Clippy',
          kind: 'lint',
          status: 'not_applicable',
          durationMs: 0,
          reason: 'cargo-clippy not found',
        },
      ],
    };
    new OutputRenderer(false).render(outcome);

    const output = logged();
    expect(output).toContain('Checks (all)');
    expect(output).toContain('Cargo Check');
    expect(output).toContain('skipped (cargo-clippy not found)');
    expect(output).toContain('✔ All checks passed (1/1)');
  });

  it('lists removed paths after a clean', () => {
    const outcome: CleanOutcome = {
      action: 'clean',
      success: true,
      summary: 'Removed 2 path(s)',
      durationMs: 40,
      scope: 'full',
      removed: ['/work/target', '/work/dist'],
      metricsReset: true,
    };
    new OutputRenderer(false).render(outcome);

    const output = logged();
    expect(output).toContain('Clean (full)');
    expect(output).toContain('  - /work/target');
    expect(output).toContain('  - /work/dist');
    expect(output).toContain('Historical metrics reset.');
  });

  it('log() is suppressed in JSON mode and errors are JSON-encoded', () => {
    const renderer = new OutputRenderer(true);
    renderer.log('hello');
    renderer.error(new Error('boom'));

    expect(logSpy).not.toHaveBeenCalled();
    expect(errSpy).toHaveBeenCalledWith(JSON.stringify({ error: 'boom' }));
  });

  it('log() and error() render human-readable output when not in JSON mode', () => {
    const renderer = new OutputRenderer(false);
    renderer.log('hello');
    renderer.error('boom');

    const errored = errSpy.mock.calls.map((c) => String(c[0])).join('\n');
    expect(logged()).toContain('hello');
    expect(errored).toContain('boom');
  });
});
