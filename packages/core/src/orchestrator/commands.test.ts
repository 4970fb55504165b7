import { describe, it, expect } from 'vitest';
import path from 'path';
import { DEFAULT_CONFIG, type CheckItem } from '@kiln/shared';
import { artifactPath, buildArgs, requiredTool, selectChecks, testArgs } from './commands';
import { parseTestResults } from './test-results';

const toolchain = DEFAULT_CONFIG.toolchain;

describe('buildArgs', () => {
  it('adds profile flags', () => {
    expect(buildArgs(toolchain, 'debug')).toEqual([]);
    expect(buildArgs(toolchain, 'release')).toEqual(['--release']);
    expect(buildArgs(toolchain, 'verbose')).toEqual(['--verbose']);
  });

  it('joins features after the features flag', () => {
    expect(buildArgs(toolchain, 'release', ['serial', ' fb ', ''])).toEqual([
      '--release',
      '--features',
      'serial,fb',
    ]);
  });
});

describe('testArgs', () => {
  it('selects the test kind', () => {
    expect(testArgs(toolchain, 'all')).toEqual([]);
    expect(testArgs(toolchain, 'unit')).toEqual(['--lib']);
    expect(testArgs(toolchain, 'integration')).toEqual(['--test', '*']);
  });

  it('forces a single test thread when not parallel', () => {
    expect(testArgs(toolchain, 'unit', false)).toEqual(['--lib', '--', '--test-threads=1']);
  });
});

describe('artifactPath', () => {
  it('maps verbose builds to the debug directory', () => {
    expect(artifactPath('/p/target', toolchain, 'verbose')).toBe(
      path.join('/p/target', 'x86_64-unknown-uefi', 'debug', 'ignite.efi'),
    );
    expect(artifactPath('/p/target', toolchain, 'release')).toBe(
      path.join('/p/target', 'x86_64-unknown-uefi', 'release', 'ignite.efi'),
    );
  });
});

describe('selectChecks', () => {
  const items = toolchain.checks;

  it('picks items of one kind', () => {
    expect(selectChecks(items, 'lint', true).map((i) => i.name)).toEqual(['Clippy']);
  });

  it('includes audit and outdated in extended mode only', () => {
    expect(selectChecks(items, 'all', true).map((i) => i.name)).toEqual([
      'Cargo Check',
      'Rustfmt',
      'Clippy',
      'Audit',
      'Outdated',
    ]);
    expect(selectChecks(items, 'all', false).map((i) => i.name)).toEqual([
      'Cargo Check',
      'Rustfmt',
      'Clippy',
    ]);
  });
});

describe('requiredTool', () => {
  it('prefers the declared requirement', () => {
    const item: CheckItem = { name: 'Fmt', kind: 'format', command: 'cargo fmt', requires: 'rustfmt' };
    expect(requiredTool(item)).toBe('rustfmt');
  });

  it('falls back to the program of the command', () => {
    const item: CheckItem = { name: 'Check', kind: 'static', command: 'RUSTFLAGS=-Dwarnings cargo check' };
    expect(requiredTool(item)).toBe('cargo');
  });
});

describe('parseTestResults', () => {
  it('sums every summary line', () => {
    const output = [
      'running 3 tests',
      'test result: ok. 3 passed; 0 failed; 0 ignored; 0 measured; 0 filtered out',
      'running 2 tests',
      'test result: FAILED. 1 passed; 1 failed; 0 ignored; 0 measured; 0 filtered out',
    ].join('\n');

    expect(parseTestResults(output)).toEqual({ passed: 4, failed: 1 });
  });

  it('leaves counts undefined without a summary line', () => {
    expect(parseTestResults('compiling\nfinished')).toEqual({ passed: undefined, failed: undefined });
  });
});
