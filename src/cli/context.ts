import { loadConfig } from '../config/loader.js';
import type { ToolRunnerConfig } from '../config/schema.js';
import { CacheStore } from '../core/cache/store.js';
import { ResultCache } from '../core/cache/result-cache.js';
import { Logger } from '../utils/logger.js';
import { createRenderer, type Renderer } from './ui/renderer.js';

export interface GlobalFlags {
  verbose: boolean;
  quiet: boolean;
  config?: string;
}

export interface CliContext {
  config: ToolRunnerConfig;
  logger: Logger;
  renderer: Renderer;
  cwd: string;
}

export async function createCliContext(flags: GlobalFlags, cwd: string = process.cwd()): Promise<CliContext> {
  const { config } = await loadConfig({ ...(flags.config ? { path: flags.config } : {}), cwd });
  const logger = new Logger({
    level: flags.verbose ? 'debug' : config.log.level,
    json: flags.quiet || config.log.json
  });
  return { config, logger, renderer: createRenderer({ quiet: flags.quiet }), cwd };
}

/** Memory cache, backed by the disk store when a directory is configured. */
export function createResultCache(ctx: CliContext): ResultCache | null {
  const { cache } = ctx.config;
  if (!cache.enabled) return null;
  return new ResultCache({
    ttlMs: cache.ttlMs,
    maxBytes: cache.maxBytes,
    maxEntries: cache.maxEntries,
    logger: ctx.logger,
    ...(cache.dir !== null ? { store: new CacheStore(cache.dir, ctx.logger) } : {})
  });
}
