import { describe, expect, it } from 'vitest';

import { describeOutcome, exitCodeFor, formatStatusLine } from '../src/core/status.js';
import { INSTALL_HINT, TIMEOUT_HINT } from '../src/core/task/supervisor.js';
import type { ExecutionResult } from '../src/core/task/types.js';

function result(over: Partial<ExecutionResult>): ExecutionResult {
  return {
    state: 'succeeded',
    stdout: '',
    stderr: '',
    exitCode: 0,
    encoding: 'utf-8',
    durationMs: 1_500,
    diagnostic: null,
    output: { kind: 'plain', text: '' },
    fromCache: false,
    ...over
  };
}

describe('formatStatusLine', () => {
  it('describes success and cache hits', () => {
    expect(formatStatusLine(result({}))).toBe('✔ Completed in 1.5s');
    expect(formatStatusLine(result({ fromCache: true }))).toBe('✔ Completed in 1.5s (cached)');
  });

  it('carries the narrowing hint on timeout', () => {
    const timedOut = result({
      state: 'timed_out',
      exitCode: null,
      durationMs: 300_000,
      diagnostic: { kind: 'timed_out', message: 'Timed out after 5m (budget 5m)', hint: TIMEOUT_HINT }
    });
    expect(describeOutcome(timedOut)).toEqual({
      icon: '⏱',
      tone: 'warning',
      text: `Timed out after 5m (budget 5m). ${TIMEOUT_HINT}`
    });
  });

  it('names a missing tool with the install hint', () => {
    const missing = result({
      state: 'failed',
      exitCode: null,
      diagnostic: { kind: 'tool_not_found', message: 'Tool not found: dust', hint: INSTALL_HINT, details: { command: 'dust' } }
    });
    expect(formatStatusLine(missing)).toBe(`✖ Tool not found: dust. ${INSTALL_HINT}`);
  });

  it('quotes the first stderr line of a failed run', () => {
    const failed = result({
      state: 'failed',
      exitCode: 2,
      stderr: 'usage: dust [OPTIONS]\n  -d <depth>\n',
      diagnostic: { kind: 'process_failed', message: 'Exited with code 2' }
    });
    expect(formatStatusLine(failed)).toBe('✖ Failed with exit code 2: usage: dust [OPTIONS]');
  });

  it('falls back to the diagnostic without an exit code', () => {
    const crashed = result({
      state: 'failed',
      exitCode: null,
      diagnostic: { kind: 'process_failed', message: 'Terminated by signal SIGSEGV' }
    });
    expect(formatStatusLine(crashed)).toBe('✖ Failed: Terminated by signal SIGSEGV');
    expect(formatStatusLine(result({ state: 'cancelled', exitCode: null, durationMs: 800 }))).toBe('◼ Cancelled after 800ms');
  });
});

describe('exitCodeFor', () => {
  it('maps outcomes to shell exit codes', () => {
    expect(exitCodeFor(result({}))).toBe(0);
    expect(exitCodeFor(result({ state: 'timed_out', exitCode: null }))).toBe(124);
    expect(exitCodeFor(result({ state: 'cancelled', exitCode: null }))).toBe(130);
    expect(exitCodeFor(result({ state: 'failed', exitCode: null, diagnostic: { kind: 'tool_not_found', message: 'x' } }))).toBe(127);
    expect(exitCodeFor(result({ state: 'failed', exitCode: 3 }))).toBe(3);
    expect(exitCodeFor(result({ state: 'failed', exitCode: null }))).toBe(1);
  });
});
