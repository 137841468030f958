import { describe, expect, it } from 'vitest';

import { firstLine, formatBytes, formatClock, formatMs } from '../src/utils/format.js';

describe('formatMs', () => {
  it.each([
    [124, '124ms'],
    [3_200, '3.2s'],
    [102_000, '1m 42s'],
    [300_000, '5m'],
    [8_100_000, '2h 15m'],
    [7_200_000, '2h']
  ])('%i -> %s', (ms, expected) => {
    expect(formatMs(ms)).toBe(expected);
  });
});

describe('formatClock', () => {
  it('pads minutes and seconds', () => {
    expect(formatClock(7_400)).toBe('00:07');
    expect(formatClock(765_000)).toBe('12:45');
    expect(formatClock(-5)).toBe('00:00');
  });
});

describe('formatBytes', () => {
  it('uses binary units', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1_536)).toBe('1.5 KB');
    expect(formatBytes(3 * 1024 ** 3)).toBe('3.0 GB');
  });
});

describe('firstLine', () => {
  it('returns the first non-blank line', () => {
    expect(firstLine('\n  error: no such file\nat line 2\n')).toBe('error: no such file');
    expect(firstLine('')).toBe('');
  });
});
