import { mkdir, mkdtemp, readdir, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { CacheStore, parseCacheFile } from '../src/core/cache/store.js';
import type { CacheEntry } from '../src/core/cache/types.js';
import { CacheCorruptionError } from '../src/core/errors.js';
import { ResultCache } from '../src/core/cache/result-cache.js';

const FP = '0'.repeat(63) + '1';
const OTHER = 'f'.repeat(64);

function entry(createdAt: number, ttlMs = 1_000): CacheEntry {
  return {
    fingerprint: FP,
    createdAt,
    ttlMs,
    sizeBytes: 5,
    result: {
      state: 'succeeded',
      stdout: 'hello',
      stderr: '',
      exitCode: 0,
      encoding: 'utf-8',
      durationMs: 12,
      diagnostic: null,
      output: { kind: 'plain', text: 'hello' },
      fromCache: false
    }
  };
}

async function store(now: () => number = () => 100) {
  const dir = await mkdtemp(join(tmpdir(), 'toolrunner-cache-'));
  return { dir, s: new CacheStore(dir, undefined, now) };
}

describe('CacheStore', () => {
  it('writes one JSON file per fingerprint and reads it back', async () => {
    const { dir, s } = await store();
    await s.write(entry(50));

    expect(await readdir(dir)).toEqual([`${FP}.json`]);
    const stored = JSON.parse(await readFile(join(dir, `${FP}.json`), 'utf8'));
    expect(stored).toMatchObject({ version: 1, fingerprint: FP, createdAt: 50, expiresAt: 1_050 });

    const back = await s.read(FP);
    expect(back).toMatchObject({ fingerprint: FP, createdAt: 50, ttlMs: 1_000, sizeBytes: 5 });
    expect(back?.result.stdout).toBe('hello');
  });

  it('deletes expired entries on read', async () => {
    let clock = 100;
    const { dir, s } = await store(() => clock);
    await s.write(entry(50));

    clock = 1_050;
    expect(await s.read(FP)).toBeUndefined();
    expect(await readdir(dir)).toEqual([]);
  });

  it('treats a corrupt file as a miss and removes it', async () => {
    const { dir, s } = await store();
    await writeFile(join(dir, `${FP}.json`), '{"version":1,', 'utf8');

    expect(await s.read(FP)).toBeUndefined();
    expect(await readdir(dir)).toEqual([]);
  });

  it('treats an unreadable entry as a miss', async () => {
    const { dir, s } = await store();
    await mkdir(join(dir, `${FP}.json`));

    expect(await s.read(FP)).toBeUndefined();
  });

  it('returns undefined for an absent entry', async () => {
    const { s } = await store();
    expect(await s.read(OTHER)).toBeUndefined();
  });

  it('rejects names that are not fingerprints', async () => {
    const { s } = await store();
    await expect(s.read('../escape')).rejects.toThrow(RangeError);
  });

  it('counts and clears only entry files', async () => {
    const { dir, s } = await store();
    await s.write(entry(50));
    await s.write({ ...entry(50), fingerprint: OTHER });
    await writeFile(join(dir, 'notes.txt'), 'keep', 'utf8');

    expect((await s.stats()).entries).toBe(2);
    expect(await s.clear()).toBe(2);
    expect(await readdir(dir)).toEqual(['notes.txt']);
  });

  it('reports a missing directory as empty', async () => {
    const s = new CacheStore(join(tmpdir(), 'toolrunner-cache-never-created', String(process.pid)));
    expect(await s.stats()).toEqual({ entries: 0, bytes: 0 });
  });
});

describe('parseCacheFile', () => {
  it('names what is wrong with a bad file', () => {
    expect(() => parseCacheFile(FP, 'nope')).toThrow(/invalid JSON/);
    expect(() => parseCacheFile(FP, JSON.stringify({ version: 2 }))).toThrow(/schema mismatch: version/);

    const misfiled = JSON.stringify({ version: 1, fingerprint: OTHER, createdAt: 0, expiresAt: 1, result: entry(0).result });
    expect(() => parseCacheFile(FP, misfiled)).toThrow(CacheCorruptionError);
    expect(() => parseCacheFile(FP, misfiled)).toThrow(`file holds ${OTHER}`);
  });
});

describe('ResultCache with a disk tier', () => {
  it('runs the tool when the disk entry cannot be read', async () => {
    const { dir } = await store();
    await mkdir(join(dir, `${FP}.json`));
    const c = new ResultCache({ ttlMs: 60_000, maxBytes: 1_000, maxEntries: 10, store: new CacheStore(dir, undefined, () => 100) });

    const { result, source } = await c.getOrRun(FP, async () => entry(100).result);
    expect(source).toBe('run');
    expect(result.stdout).toBe('hello');
  });

  it('serves a result written by an earlier cache instance', async () => {
    const { dir } = await store();
    const options = { ttlMs: 60_000, maxBytes: 1_000, maxEntries: 10, now: () => 100 };

    const first = new ResultCache({ ...options, store: new CacheStore(dir, undefined, () => 100) });
    await first.put(FP, entry(100).result);

    const second = new ResultCache({ ...options, store: new CacheStore(dir, undefined, () => 100) });
    const { result, source } = await second.getOrRun(FP, async () => {
      throw new Error('should not run');
    });
    expect(source).toBe('disk');
    expect(result).toMatchObject({ stdout: 'hello', fromCache: true });
  });
});
