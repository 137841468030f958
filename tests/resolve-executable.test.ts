import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { ToolNotFoundError } from '../src/core/errors.js';
import { resolveExecutable } from '../src/core/process/resolve-executable.js';

describe('resolveExecutable', () => {
  it('searches PATH in order', () => {
    const found = resolveExecutable('dust', {
      platform: 'linux',
      env: { PATH: '/opt/a:/opt/b' },
      isExecutable: (p) => p === '/opt/b/dust'
    });
    expect(found).toBe('/opt/b/dust');
  });

  it('tries PATHEXT extensions on Windows', () => {
    const expected = `${join('C:\\tools', 'glow')}.EXE`;
    const found = resolveExecutable('glow', {
      platform: 'win32',
      env: { PATH: 'C:\\tools', PATHEXT: '.EXE;.CMD' },
      isExecutable: (p) => p === expected
    });
    expect(found).toBe(expected);
  });

  it('resolves relative paths against cwd', () => {
    const found = resolveExecutable('./bin/tool', {
      platform: 'linux',
      cwd: '/work',
      env: {},
      isExecutable: (p) => p === '/work/bin/tool'
    });
    expect(found).toBe('/work/bin/tool');
  });

  it('throws ToolNotFoundError for a name missing from PATH', () => {
    const run = () => resolveExecutable('no-such-tool', { platform: 'linux', env: { PATH: '/opt/a' }, isExecutable: () => false });
    expect(run).toThrow(ToolNotFoundError);
    expect(run).toThrow('Tool not found: no-such-tool (not found on PATH)');
  });

  it('rejects an empty command', () => {
    expect(() => resolveExecutable('  ')).toThrow(/\(empty command\)$/);
  });

  it('finds the running node binary on disk', () => {
    expect(resolveExecutable(process.execPath)).toBe(process.execPath);
  });
});
