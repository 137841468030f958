import { CacheStore } from '../../core/cache/store.js';
import type { CliContext } from '../context.js';

function storeFor(ctx: CliContext): CacheStore | null {
  const dir = ctx.config.cache.dir;
  if (dir === null) {
    ctx.renderer.warn('No cache directory is configured (cache.dir is null); nothing is persisted.');
    return null;
  }
  return new CacheStore(dir, ctx.logger);
}

export async function runCacheStatsCommand(ctx: CliContext): Promise<number> {
  const store = storeFor(ctx);
  if (!store) return 0;
  const { entries, bytes } = await store.stats();
  ctx.renderer.cacheStats({ dir: store.dir, entries, bytes });
  return 0;
}

export async function runCacheClearCommand(ctx: CliContext): Promise<number> {
  const store = storeFor(ctx);
  if (!store) return 0;
  const removed = await store.clear();
  ctx.logger.info('cache cleared', { dir: store.dir, removed });
  ctx.renderer.cacheCleared(store.dir, removed);
  return 0;
}
