import { createHash } from 'node:crypto';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';

import type { CommandSpec } from '../command/spec.js';
import { isNotFound } from '../../utils/fs.js';

export interface FingerprintInput {
  spec: CommandSpec;
  /** Identity of the data the command reads; see {@link describeInputIdentity}. */
  inputIdentity?: string;
  /** Version marker of the tool binary (e.g. first line of `--version`). */
  toolVersion?: string;
}

/**
 * Deterministic key for "the same work": sha256 over a canonical JSON of the normalized spec, the
 * input identity and the tool version. The explicit timeout is left out; it changes how long we
 * wait, not what the tool produces.
 */
export function computeFingerprint(input: FingerprintInput): string {
  const { spec } = input;
  const canonical = {
    command: spec.command,
    args: [...spec.args],
    cwd: resolve(spec.cwd),
    encoding: spec.encoding?.toLowerCase() ?? null,
    env: spec.env ? Object.fromEntries(Object.entries(spec.env).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) : null,
    stdinSha256: spec.stdin !== undefined ? sha256(spec.stdin) : null,
    inputIdentity: input.inputIdentity ?? null,
    toolVersion: input.toolVersion ?? null
  };
  return sha256(stableStringify(canonical));
}

/**
 * "path|size|mtimeMs" per input path, sorted. A changed file (size or mtime) therefore changes
 * the fingerprint; a missing path is recorded as such.
 */
export async function describeInputIdentity(paths: readonly string[], baseDir: string = process.cwd()): Promise<string> {
  const parts: string[] = [];
  for (const p of [...paths].map((x) => resolve(baseDir, x)).sort()) {
    try {
      const st = await stat(p);
      parts.push(`${p}|${st.size}|${Math.trunc(st.mtimeMs)}`);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      parts.push(`${p}|missing`);
    }
  }
  return parts.join('\n');
}

export function isFingerprint(value: string): boolean {
  return /^[0-9a-f]{64}$/.test(value);
}

export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(stableClone(value));
}

function stableClone(value: unknown): unknown {
  if (value === null || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map(stableClone);
  const out: Record<string, unknown> = {};
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [k, v] of entries) out[k] = stableClone(v);
  return out;
}
