import type { ExecutionResult } from '../task/types.js';
import type { Logger } from '../../utils/logger.js';
import { createNullLogger, errorMessage } from '../../utils/logger.js';
import type { CacheStore } from './store.js';
import { isExpired, resultSize, type CacheEntry, type CacheStats } from './types.js';

export interface ResultCacheOptions {
  ttlMs: number;
  maxBytes: number;
  maxEntries: number;
  store?: CacheStore;
  logger?: Logger;
  now?: () => number;
}

export interface GetOrRunOptions {
  ttlMs?: number;
  /** Which results are worth keeping; defaults to successful ones only. */
  shouldStore?: (result: ExecutionResult) => boolean;
  /** Aborting it withdraws the run from deduplication; later callers start their own. */
  signal?: AbortSignal;
}

export type CacheSource = 'memory' | 'disk' | 'inflight' | 'run';

const storeSucceeded = (result: ExecutionResult) => result.state === 'succeeded';

/**
 * Fingerprint-keyed results with TTL, an LRU bound on total size and entry count, and per-key
 * in-flight deduplication. The memory map's insertion order is the recency order.
 */
export class ResultCache {
  private entries = new Map<string, CacheEntry>();
  private inflight = new Map<string, Promise<ExecutionResult>>();
  private bytes = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private logger: Logger;
  private now: () => number;

  constructor(private opts: ResultCacheOptions) {
    this.logger = opts.logger ?? createNullLogger();
    this.now = opts.now ?? Date.now;
  }

  /** Non-expired entry from memory, then disk. Refreshes recency. */
  async get(fingerprint: string): Promise<CacheEntry | undefined> {
    const found = await this.lookup(fingerprint);
    if (found) {
      this.hits += 1;
      this.logger.debug('cache hit', { fingerprint, source: found.source });
      return found.entry;
    }
    this.misses += 1;
    this.logger.debug('cache miss', { fingerprint });
    return undefined;
  }

  /**
   * Store a frozen copy of `result`. Returns the entry, or undefined when the result alone is
   * larger than `maxBytes`.
   */
  async put(fingerprint: string, result: ExecutionResult, ttlMs: number = this.opts.ttlMs): Promise<CacheEntry | undefined> {
    const sizeBytes = resultSize(result);
    if (sizeBytes > this.opts.maxBytes) {
      this.logger.debug('result too large to cache', { fingerprint, sizeBytes, maxBytes: this.opts.maxBytes });
      return undefined;
    }

    const entry: CacheEntry = Object.freeze({
      fingerprint,
      result: Object.freeze({ ...result, fromCache: false }),
      createdAt: this.now(),
      ttlMs,
      sizeBytes
    });
    this.remember(entry);

    if (this.opts.store) {
      try {
        await this.opts.store.write(entry);
      } catch (err) {
        this.logger.warn('cache write-through failed', { fingerprint, error: errorMessage(err) });
      }
    }
    return entry;
  }

  /**
   * Cached result, or the in-flight run for the same fingerprint, or a new run of `runFn`. Only
   * results accepted by `shouldStore` are kept.
   */
  async getOrRun(
    fingerprint: string,
    runFn: () => Promise<ExecutionResult>,
    opts: GetOrRunOptions = {}
  ): Promise<{ result: ExecutionResult; source: CacheSource }> {
    const running = this.inflight.get(fingerprint);
    if (running) return { result: await running, source: 'inflight' };

    const found = await this.lookup(fingerprint);
    if (found) {
      this.hits += 1;
      this.logger.debug('cache hit', { fingerprint, source: found.source });
      return { result: asCached(found.entry.result), source: found.source };
    }
    this.misses += 1;

    // A concurrent caller may have started the run while we were reading the disk tier.
    const raced = this.inflight.get(fingerprint);
    if (raced) return { result: await raced, source: 'inflight' };

    const shouldStore = opts.shouldStore ?? storeSucceeded;
    const run = (async () => {
      const result = await runFn();
      if (shouldStore(result)) await this.put(fingerprint, result, opts.ttlMs);
      return result;
    })();
    this.inflight.set(fingerprint, run);
    const withdraw = () => {
      if (this.inflight.get(fingerprint) === run) this.inflight.delete(fingerprint);
    };
    if (opts.signal?.aborted) withdraw();
    else opts.signal?.addEventListener('abort', withdraw, { once: true });
    try {
      return { result: await run, source: 'run' };
    } finally {
      opts.signal?.removeEventListener('abort', withdraw);
      withdraw();
    }
  }

  async invalidate(fingerprint: string): Promise<boolean> {
    const entry = this.entries.get(fingerprint);
    if (entry) this.forget(entry);
    if (this.opts.store) await this.opts.store.delete(fingerprint);
    return entry !== undefined;
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.bytes = 0;
    if (this.opts.store) await this.opts.store.clear();
  }

  stats(): CacheStats {
    return {
      entries: this.entries.size,
      bytes: this.bytes,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      inFlight: this.inflight.size
    };
  }

  private async lookup(fingerprint: string): Promise<{ entry: CacheEntry; source: 'memory' | 'disk' } | undefined> {
    const entry = this.entries.get(fingerprint);
    if (entry) {
      if (isExpired(entry, this.now())) {
        this.forget(entry);
        this.logger.debug('cache entry expired', { fingerprint });
      } else {
        // Re-insert to mark as most recently used.
        this.entries.delete(fingerprint);
        this.entries.set(fingerprint, entry);
        return { entry, source: 'memory' };
      }
    }

    if (!this.opts.store) return undefined;
    const fromDisk = await this.opts.store.read(fingerprint);
    if (!fromDisk) return undefined;
    this.remember(fromDisk);
    return { entry: fromDisk, source: 'disk' };
  }

  private remember(entry: CacheEntry): void {
    const previous = this.entries.get(entry.fingerprint);
    if (previous) this.forget(previous);
    this.entries.set(entry.fingerprint, entry);
    this.bytes += entry.sizeBytes;

    while (this.bytes > this.opts.maxBytes || this.entries.size > this.opts.maxEntries) {
      const oldest = this.entries.values().next();
      if (oldest.done) break;
      this.forget(oldest.value);
      this.evictions += 1;
      this.logger.debug('cache evicted', { fingerprint: oldest.value.fingerprint, sizeBytes: oldest.value.sizeBytes });
    }
  }

  private forget(entry: CacheEntry): void {
    if (this.entries.delete(entry.fingerprint)) this.bytes -= entry.sizeBytes;
  }
}

function asCached(result: ExecutionResult): ExecutionResult {
  return Object.freeze({ ...result, fromCache: true });
}
