import { Command, InvalidArgumentError } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { ToolRunnerError } from '../core/errors.js';
import { errorMessage } from '../utils/logger.js';
import { runCacheClearCommand, runCacheStatsCommand } from './commands/cache.js';
import { runEstimateCommand } from './commands/estimate.js';
import { runRunCommand } from './commands/run.js';
import { createCliContext, type CliContext, type GlobalFlags } from './context.js';
import { createRenderer } from './ui/renderer.js';

export function buildCli(): Command {
  const program = new Command();
  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('toolrunner')
    .description('Run command-line tools under supervision: encodings, timeouts, progress and cached results')
    .version(version, '-v, --version')
    .option('--verbose', 'Show debug logging')
    .option('--quiet', 'Machine-friendly output (JSON lines on stderr)')
    .option('--config <path>', 'Configuration file (default: ./toolrunner.yaml)')
    .enablePositionalOptions();

  const globalFlags = (): GlobalFlags => {
    const o = program.opts<{ verbose?: boolean; quiet?: boolean; config?: string }>();
    return { verbose: o.verbose === true, quiet: o.quiet === true, ...(o.config ? { config: o.config } : {}) };
  };

  const action = (fn: (ctx: CliContext) => Promise<number>) => async () => {
    const flags = globalFlags();
    try {
      const ctx = await createCliContext(flags);
      process.exitCode = await fn(ctx);
    } catch (err) {
      const renderer = createRenderer({ quiet: flags.quiet });
      if (err instanceof ToolRunnerError) {
        renderer.error(err.kind === 'config' ? 'Configuration error' : 'Error', err.message);
      } else {
        renderer.error('Unexpected error', errorMessage(err), 'Run with --verbose for more details.');
      }
      process.exitCode = 1;
    }
  };

  program
    .command('run')
    .description('Run a tool and print its output')
    .argument('<command>', 'Executable name or path')
    .argument('[args...]', 'Arguments passed to the tool verbatim')
    .option('--cwd <dir>', 'Working directory for the tool')
    .option('--timeout <ms>', 'Explicit budget in milliseconds (skips estimation)', parsePositiveInt)
    .option('--encoding <label>', 'Output encoding to try first (e.g. big5, gbk)')
    .option('--scan <path>', 'Pre-scan this path to size the timeout')
    .option('--input <path>', 'File whose size and mtime key the cache (repeatable)', collectRepeatable, [])
    .option('--no-cache', 'Neither read nor write cached results')
    .option('--probe-version', "Include the tool's --version output in the cache key")
    .option('--html', 'Print decorated output converted to HTML')
    .passThroughOptions()
    .action(
      async (
        command: string,
        args: string[],
        opts: {
          cwd?: string;
          timeout?: number;
          encoding?: string;
          scan?: string;
          input: string[];
          cache: boolean;
          probeVersion?: boolean;
          html?: boolean;
        }
      ) =>
        action((ctx) =>
          runRunCommand(ctx, {
            command,
            args,
            ...(opts.cwd !== undefined ? { cwd: opts.cwd } : {}),
            ...(opts.timeout !== undefined ? { timeoutMs: opts.timeout } : {}),
            ...(opts.encoding !== undefined ? { encoding: opts.encoding } : {}),
            ...(opts.scan !== undefined ? { scan: opts.scan } : {}),
            inputs: opts.input,
            cache: opts.cache,
            probeVersion: opts.probeVersion === true,
            html: opts.html === true
          })
        )()
    );

  program
    .command('estimate')
    .description('Pre-scan a path and show the timeout budget it would get')
    .argument('<path>', 'File or directory')
    .option('--exclude <glob>', 'Skip matching paths (repeatable)', collectRepeatable, [])
    .action(async (path: string, opts: { exclude: string[] }) =>
      action((ctx) => runEstimateCommand(ctx, { path, exclude: opts.exclude }))()
    );

  const cache = program.command('cache').description('Inspect or clear the on-disk result cache');
  cache
    .command('stats')
    .description('Show entry count and size')
    .action(action(runCacheStatsCommand));
  cache
    .command('clear')
    .description('Delete every cached result')
    .action(action(runCacheClearCommand));

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  await buildCli().parseAsync(argv);
}

function detectVersionSync(): string | null {
  try {
    let current = dirname(fileURLToPath(import.meta.url));
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
        if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version;
        }
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}

function collectRepeatable(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('expected a positive integer');
  return n;
}
