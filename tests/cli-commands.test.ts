import { mkdir, mkdtemp, readdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { runCacheClearCommand, runCacheStatsCommand } from '../src/cli/commands/cache.js';
import { runEstimateCommand, type EstimateCommandOptions } from '../src/cli/commands/estimate.js';
import { runRunCommand, type RunCommandOptions } from '../src/cli/commands/run.js';
import type { CliContext } from '../src/cli/context.js';
import type { CacheReport, EstimateReport, Renderer } from '../src/cli/ui/renderer.js';
import { parseConfig } from '../src/config/loader.js';
import type { ToolRunnerConfigInput } from '../src/config/schema.js';
import type { ExecutionResult, ProgressEvent } from '../src/core/task/types.js';
import { createNullLogger } from '../src/utils/logger.js';

class RecordingRenderer implements Renderer {
  readonly started: string[] = [];
  readonly results: ExecutionResult[] = [];
  readonly estimates: EstimateReport[] = [];
  readonly stats: CacheReport[] = [];
  readonly cleared: Array<{ dir: string; removed: number }> = [];
  readonly errors: string[] = [];
  readonly warnings: string[] = [];
  readonly progressed: string[] = [];

  runStarted(_taskId: string, command: string): void {
    this.started.push(command);
  }
  progress(event: ProgressEvent): void {
    this.progressed.push(event.message);
  }
  runFinished(result: ExecutionResult): void {
    this.results.push(result);
  }
  estimate(report: EstimateReport): void {
    this.estimates.push(report);
  }
  cacheStats(report: CacheReport): void {
    this.stats.push(report);
  }
  cacheCleared(dir: string, removed: number): void {
    this.cleared.push({ dir, removed });
  }
  error(title: string): void {
    this.errors.push(title);
  }
  warn(message: string): void {
    this.warnings.push(message);
  }
}

async function context(config: ToolRunnerConfigInput = {}) {
  const cwd = await mkdtemp(join(tmpdir(), 'toolrunner-cli-'));
  const renderer = new RecordingRenderer();
  const ctx: CliContext = {
    config: parseConfig({ supervisor: { pollIntervalMs: 10 }, ...config }, 'test'),
    logger: createNullLogger(),
    renderer,
    cwd
  };
  return { ctx, renderer, cwd };
}

function runOpts(over: Partial<RunCommandOptions>): RunCommandOptions {
  return { command: 'fake', args: [], inputs: [], cache: true, probeVersion: false, html: false, ...over };
}

describe('run command', () => {
  it('rejects an empty command with exit code 2', async () => {
    const { ctx, renderer } = await context({ cache: { dir: null } });
    expect(await runRunCommand(ctx, runOpts({ command: '   ' }))).toBe(2);
    expect(renderer.errors).toEqual(['Invalid command']);
    expect(renderer.started).toEqual([]);
  });

  it('exits 127 when the tool is not installed', async () => {
    const { ctx, renderer } = await context({ cache: { dir: null } });
    const code = await runRunCommand(ctx, runOpts({ command: 'toolrunner-test-missing-tool', args: ['-d', '2'] }));

    expect(code).toBe(127);
    expect(renderer.started).toEqual(['toolrunner-test-missing-tool -d 2']);
    expect(renderer.results[0]?.diagnostic?.kind).toBe('tool_not_found');
  });

  it('scans a relative path inside the working directory', async () => {
    const { ctx, renderer, cwd } = await context({ cache: { dir: null } });
    await mkdir(join(cwd, 'sub', 'data'), { recursive: true });
    await writeFile(join(cwd, 'sub', 'data', 'a.txt'), 'hello', 'utf8');

    const code = await runRunCommand(ctx, runOpts({ command: process.execPath, args: ['-e', ''], cwd: 'sub', scan: 'data' }));

    expect(code).toBe(0);
    expect(renderer.progressed).toContain(`Scanning ${join(cwd, 'sub', 'data')}…`);
    expect(renderer.progressed.some((m) => m.startsWith('Scanned ~1 files'))).toBe(true);
  });
});

describe('estimate command', () => {
  const opts = (path: string): EstimateCommandOptions => ({ path, exclude: [] });

  it('reports the scan and its budget', async () => {
    const { ctx, renderer, cwd } = await context({ timeouts: { baseMs: 1_000 } });
    await mkdir(join(cwd, 'data'));
    await writeFile(join(cwd, 'data', 'a.txt'), 'hello', 'utf8');

    expect(await runEstimateCommand(ctx, opts('data'))).toBe(0);
    const [report] = renderer.estimates;
    expect(report?.path).toBe(join(cwd, 'data'));
    expect(report?.scan).toMatchObject({ itemCount: 1, totalBytes: 5, missing: false });
    expect(report?.estimate.timeoutMs).toBe(1_000);
  });

  it('fails on a path that does not exist', async () => {
    const { ctx, renderer } = await context();
    expect(await runEstimateCommand(ctx, opts('nowhere'))).toBe(1);
    expect(renderer.errors).toEqual(['Nothing to scan']);
  });
});

describe('cache commands', () => {
  it('counts and clears the disk tier', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'toolrunner-cli-cache-'));
    await writeFile(join(dir, `${'a'.repeat(64)}.json`), '{}', 'utf8');
    const { ctx, renderer } = await context({ cache: { dir } });

    expect(await runCacheStatsCommand(ctx)).toBe(0);
    expect(renderer.stats).toEqual([{ dir, entries: 1, bytes: 2 }]);

    expect(await runCacheClearCommand(ctx)).toBe(0);
    expect(renderer.cleared).toEqual([{ dir, removed: 1 }]);
    expect(await readdir(dir)).toEqual([]);
  });

  it('warns when no directory is configured', async () => {
    const { ctx, renderer } = await context({ cache: { dir: null } });
    expect(await runCacheStatsCommand(ctx)).toBe(0);
    expect(renderer.warnings).toHaveLength(1);
  });
});
