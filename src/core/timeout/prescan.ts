import { lstat, readdir } from 'node:fs/promises';
import { join, relative } from 'node:path';
import picomatch from 'picomatch';

import { formatBytes } from '../../utils/format.js';
import { isNotFound } from '../../utils/fs.js';
import type { ScaleSignals, ScanResult } from './types.js';

export const DEFAULT_PRESCAN_TIME_BOX_MS = 30_000;

export interface PrescanOptions {
  /** Hard wall-clock limit; partial counts are returned once it is exceeded. */
  timeBoxMs?: number;
  /** Glob patterns (relative to the root) whose matches are neither counted nor descended. */
  exclude?: readonly string[];
  signal?: AbortSignal;
  now?: () => number;
}

/**
 * Count files, directories and bytes under `root` without following symlinks. Bounded by
 * `timeBoxMs`: when the box (or `signal`) fires, the walk stops and the counts gathered so far are
 * returned with `possiblyUnderestimated: true`.
 */
export async function prescan(root: string, opts: PrescanOptions = {}): Promise<ScanResult> {
  const now = opts.now ?? Date.now;
  const timeBoxMs = opts.timeBoxMs ?? DEFAULT_PRESCAN_TIME_BOX_MS;
  const isExcluded = opts.exclude && opts.exclude.length > 0 ? picomatch([...opts.exclude], { dot: true }) : null;
  const startedAt = now();

  const result: ScanResult = {
    itemCount: 0,
    totalBytes: 0,
    dirCount: 0,
    skipped: 0,
    possiblyUnderestimated: false,
    missing: false,
    elapsedMs: 0
  };

  const outOfTime = () => opts.signal?.aborted === true || now() - startedAt > timeBoxMs;

  try {
    const rootStat = await lstat(root);
    if (!rootStat.isDirectory()) {
      result.itemCount = 1;
      result.totalBytes = rootStat.size;
      result.elapsedMs = now() - startedAt;
      return result;
    }
  } catch (err) {
    if (isNotFound(err)) result.missing = true;
    else result.skipped += 1;
    result.elapsedMs = now() - startedAt;
    return result;
  }

  // Iterative depth-first walk; a pending stack keeps memory flat on deep trees.
  const pending: string[] = [root];
  walk: while (pending.length > 0) {
    if (outOfTime()) {
      result.possiblyUnderestimated = true;
      break;
    }
    const dir = pending.pop();
    if (dir === undefined) break;

    const entries = await readdir(dir, { withFileTypes: true }).catch(() => null);
    if (!entries) {
      result.skipped += 1;
      continue;
    }

    for (const entry of entries) {
      const abs = join(dir, entry.name);
      if (isExcluded && isExcluded(relative(root, abs).replaceAll('\\', '/'))) continue;

      if (entry.isDirectory()) {
        result.dirCount += 1;
        pending.push(abs);
        continue;
      }

      result.itemCount += 1;
      if (entry.isSymbolicLink()) continue;
      try {
        result.totalBytes += (await lstat(abs)).size;
      } catch {
        result.skipped += 1;
      }

      if (result.itemCount % 1000 === 0 && outOfTime()) {
        result.possiblyUnderestimated = true;
        break walk;
      }
    }
  }

  result.elapsedMs = now() - startedAt;
  return result;
}

/** "~111403 files, 2 directories, 161.3 GB"; partial counts are prefixed with "≥" instead. */
export function describeScale(signals: ScaleSignals & { dirCount?: number }): string {
  const prefix = signals.possiblyUnderestimated ? '≥' : '~';
  const parts = [`${prefix}${signals.itemCount} files`];
  if (signals.dirCount !== undefined) parts.push(`${signals.dirCount} directories`);
  parts.push(formatBytes(signals.totalBytes));
  return parts.join(', ');
}
