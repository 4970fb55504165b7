import { describe, it, expect } from 'vitest';
import { formatBytes, formatDuration } from './format';

describe('formatDuration', () => {
  it('uses milliseconds, seconds or minutes by magnitude', () => {
    expect(formatDuration(950)).toBe('950ms');
    expect(formatDuration(1250)).toBe('1.25s');
    expect(formatDuration(125_000)).toBe('2m 5s');
  });
});

describe('formatBytes', () => {
  it('scales to KiB and MiB', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(4096)).toBe('4.0 KiB');
    expect(formatBytes(3 * 1024 * 1024)).toBe('3.0 MiB');
  });
});
