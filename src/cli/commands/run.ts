import { resolve } from 'node:path';

import { ZodError } from 'zod';

import { describeInputIdentity } from '../../core/cache/fingerprint.js';
import { createCommandSpec, describeCommand, type CommandSpec } from '../../core/command/spec.js';
import { ExecutionEngine, type RunOptions } from '../../core/engine.js';
import { probeToolVersion } from '../../core/process/launcher.js';
import { exitCodeFor } from '../../core/status.js';
import { installCliCancellation } from '../cancel.js';
import { createResultCache, type CliContext } from '../context.js';

export interface RunCommandOptions {
  command: string;
  args: string[];
  cwd?: string;
  timeoutMs?: number;
  encoding?: string;
  scan?: string;
  inputs: string[];
  cache: boolean;
  probeVersion: boolean;
  html: boolean;
}

/** Runs one tool under supervision and returns the process exit code to use. */
export async function runRunCommand(ctx: CliContext, opts: RunCommandOptions): Promise<number> {
  const { renderer } = ctx;

  let spec: CommandSpec;
  try {
    spec = createCommandSpec(
      {
        command: opts.command,
        args: opts.args,
        ...(opts.cwd !== undefined ? { cwd: opts.cwd } : {}),
        ...(opts.timeoutMs !== undefined ? { timeoutMs: opts.timeoutMs } : {}),
        ...(opts.encoding !== undefined ? { encoding: opts.encoding } : {})
      },
      ctx.cwd
    );
  } catch (err) {
    if (!(err instanceof ZodError)) throw err;
    renderer.error('Invalid command', err.issues.map((i) => `${i.path.join('.') || 'command'}: ${i.message}`).join('\n'));
    return 2;
  }

  const useCache = opts.cache && ctx.config.cache.enabled;
  const runOptions: RunOptions = { cache: useCache };
  // Relative paths belong to the tool's working directory, as the tool itself would read them.
  const scanPath = opts.scan !== undefined ? resolve(spec.cwd, opts.scan) : undefined;
  if (scanPath !== undefined) runOptions.scan = { path: scanPath };
  if (useCache) {
    const inputs = scanPath !== undefined ? [...opts.inputs, scanPath] : opts.inputs;
    if (inputs.length > 0) runOptions.inputIdentity = await describeInputIdentity(inputs, spec.cwd);
    if (opts.probeVersion) {
      const version = await probeToolVersion(spec.command);
      if (version) runOptions.toolVersion = version;
    }
  }

  const engine = new ExecutionEngine({
    config: ctx.config,
    cache: useCache ? createResultCache(ctx) : null,
    logger: ctx.logger
  });

  const cancellation = installCliCancellation({
    onCancel: () => renderer.warn('Cancelling… press Ctrl+C again to exit immediately'),
    forceExitGraceMs: 1_000
  });

  try {
    const handle = engine.run(spec, {
      ...runOptions,
      signal: cancellation.signal,
      onProgress: (event) => renderer.progress(event)
    });
    renderer.runStarted(handle.id, describeCommand(spec));
    const result = await engine.await(handle);
    renderer.runFinished(result, { html: opts.html });
    return exitCodeFor(result);
  } finally {
    cancellation.dispose();
  }
}
