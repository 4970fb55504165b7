import { describe, it, expect } from 'vitest';
import { name, DEFAULT_CONFIG, ConfigSchema, MANIFEST_FILENAME } from './index';

describe('shared package', () => {
  it('exports name', () => {
    expect(name).toBe('@kiln/shared');
  });
});

describe('ConfigSchema', () => {
  it('describes the UEFI bootloader toolchain by default', () => {
    expect(DEFAULT_CONFIG.toolchain.build).toBe(
      'cargo build --package ignite --target x86_64-unknown-uefi',
    );
    expect(DEFAULT_CONFIG.toolchain.profileArgs).toEqual({
      debug: [],
      release: ['--release'],
      verbose: ['--verbose'],
    });
    expect(DEFAULT_CONFIG.toolchain.checks.map((c) => c.kind)).toEqual([
      'static',
      'format',
      'lint',
      'audit',
      'outdated',
    ]);
    expect(DEFAULT_CONFIG.distribution.artifact).toBe('EFI/BOOT/BOOTX64.EFI');
    expect(DEFAULT_CONFIG.orchestrator.variant).toBe('advanced');
  });

  it('fills nested defaults around partial sections', () => {
    const config = ConfigSchema.parse({
      project: { name: 'loader' },
      toolchain: { profileArgs: { release: ['--release', '--locked'] } },
    });

    expect(config.project).toEqual({
      name: 'loader',
      version: '0.4.0',
      descriptor: 'Cargo.toml',
      testsDir: 'tests',
      testExtension: '.rs',
    });
    expect(config.toolchain.profileArgs.release).toEqual(['--release', '--locked']);
    expect(config.toolchain.profileArgs.debug).toEqual([]);
    expect(config.toolchain.prerequisite?.cacheKey).toBe('target-x86_64-unknown-uefi');
  });

  it('allows the prerequisite to be disabled', () => {
    expect(ConfigSchema.parse({ toolchain: { prerequisite: null } }).toolchain.prerequisite).toBe(
      null,
    );
  });

  it('rejects cache keys that are not safe file names', () => {
    const result = ConfigSchema.safeParse({
      toolchain: { prerequisite: { cacheKey: '../escape' } },
    });
    expect(result.success).toBe(false);
  });

  it('rejects "." and ".." as cache keys but accepts dotted names', () => {
    const parse = (cacheKey: string) =>
      ConfigSchema.safeParse({ toolchain: { prerequisite: { cacheKey } } }).success;

    expect(parse('.')).toBe(false);
    expect(parse('..')).toBe(false);
    expect(parse('...')).toBe(true);
    expect(parse('.hidden')).toBe(true);
  });

  it('defaults the distribution manifest name', () => {
    expect(DEFAULT_CONFIG.distribution.manifest).toBe(MANIFEST_FILENAME);
  });

  it('rejects unknown check kinds and empty commands', () => {
    expect(
      ConfigSchema.safeParse({
        toolchain: { checks: [{ name: 'x', kind: 'style', command: 'cargo x' }] },
      }).success,
    ).toBe(false);
    expect(ConfigSchema.safeParse({ toolchain: { test: '   ' } }).success).toBe(false);
  });
});
