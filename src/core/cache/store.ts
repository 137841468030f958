import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';

import { CacheCorruptionError } from '../errors.js';
import { ensureDir, isNotFound, removeFile, writeTextAtomic } from '../../utils/fs.js';
import type { Logger } from '../../utils/logger.js';
import { createNullLogger, errorMessage } from '../../utils/logger.js';
import { isFingerprint } from './fingerprint.js';
import { CacheFileSchema, resultSize, type CacheEntry, type CacheFile } from './types.js';

/**
 * Disk tier of the result cache: one `<fingerprint>.json` per entry. Unreadable entries are
 * deleted and reported as misses; expired ones are deleted on read.
 */
export class CacheStore {
  constructor(
    readonly dir: string,
    private logger: Logger = createNullLogger(),
    private now: () => number = Date.now
  ) {}

  async read(fingerprint: string): Promise<CacheEntry | undefined> {
    const path = this.pathFor(fingerprint);
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      this.logger.warn('discarding unreadable cache entry', { fingerprint, error: errorMessage(err) });
      await this.discard(fingerprint, path);
      return undefined;
    }

    let entry: CacheEntry;
    try {
      entry = parseCacheFile(fingerprint, raw);
    } catch (err) {
      if (!(err instanceof CacheCorruptionError)) throw err;
      this.logger.warn('discarding corrupt cache entry', { fingerprint, reason: err.reason });
      await this.discard(fingerprint, path);
      return undefined;
    }

    if (this.now() >= entry.createdAt + entry.ttlMs) {
      this.logger.debug('cache entry expired on disk', { fingerprint });
      await this.discard(fingerprint, path);
      return undefined;
    }
    return entry;
  }

  async write(entry: CacheEntry): Promise<void> {
    await ensureDir(this.dir);
    const file: CacheFile = {
      version: 1,
      fingerprint: entry.fingerprint,
      createdAt: entry.createdAt,
      expiresAt: entry.createdAt + entry.ttlMs,
      result: entry.result
    };
    await writeTextAtomic(this.pathFor(entry.fingerprint), `${JSON.stringify(file)}\n`);
  }

  async delete(fingerprint: string): Promise<void> {
    await removeFile(this.pathFor(fingerprint));
  }

  /** Remove every entry file; returns how many were removed. */
  async clear(): Promise<number> {
    const names = await this.entryFiles();
    for (const name of names) await removeFile(join(this.dir, name));
    return names.length;
  }

  async stats(): Promise<{ entries: number; bytes: number }> {
    let bytes = 0;
    const names = await this.entryFiles();
    for (const name of names) {
      try {
        bytes += (await stat(join(this.dir, name))).size;
      } catch (err) {
        if (!isNotFound(err)) throw err;
      }
    }
    return { entries: names.length, bytes };
  }

  /** Best-effort removal; an entry that cannot be removed stays a miss on every read. */
  private async discard(fingerprint: string, path: string): Promise<void> {
    try {
      await removeFile(path);
    } catch (err) {
      this.logger.warn('could not remove cache entry', { fingerprint, error: errorMessage(err) });
    }
  }

  private pathFor(fingerprint: string): string {
    if (!isFingerprint(fingerprint)) throw new RangeError(`not a cache fingerprint: ${fingerprint}`);
    return join(this.dir, `${fingerprint}.json`);
  }

  private async entryFiles(): Promise<string[]> {
    try {
      const names = await readdir(this.dir);
      return names.filter((n) => n.endsWith('.json') && isFingerprint(n.slice(0, -'.json'.length)));
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }
}

export function parseCacheFile(fingerprint: string, raw: string): CacheEntry {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new CacheCorruptionError(fingerprint, `invalid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = CacheFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new CacheCorruptionError(fingerprint, `schema mismatch: ${where}${issue?.message ?? 'invalid'}`);
  }
  if (parsed.data.fingerprint !== fingerprint) {
    throw new CacheCorruptionError(fingerprint, `file holds ${parsed.data.fingerprint}`);
  }

  const { result, createdAt, expiresAt } = parsed.data;
  return Object.freeze({
    fingerprint,
    result: Object.freeze(result),
    createdAt,
    ttlMs: Math.max(0, expiresAt - createdAt),
    sizeBytes: resultSize(result)
  });
}
