import { z } from 'zod';

import type { ExecutionResult } from '../task/types.js';

const DiagnosticSchema = z.object({
  kind: z.enum(['tool_not_found', 'launch_failed', 'process_failed', 'timed_out', 'cancelled']),
  message: z.string(),
  hint: z.string().optional(),
  details: z.record(z.unknown()).optional()
});

const TimeoutEstimateSchema = z.object({
  timeoutMs: z.number(),
  baseMs: z.number(),
  maxMs: z.number(),
  clamped: z.boolean(),
  possiblyUnderestimated: z.boolean()
});

export const ExecutionResultSchema = z.object({
  state: z.enum(['succeeded', 'failed', 'timed_out', 'cancelled']),
  stdout: z.string(),
  stderr: z.string(),
  exitCode: z.number().int().nullable(),
  encoding: z.string().nullable(),
  durationMs: z.number().nonnegative(),
  diagnostic: DiagnosticSchema.nullable(),
  output: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('plain'), text: z.string() }),
    z.object({ kind: z.literal('markup'), html: z.string() })
  ]),
  fromCache: z.boolean(),
  estimate: TimeoutEstimateSchema.optional()
}) satisfies z.ZodType<ExecutionResult>;

export const CacheFileSchema = z.object({
  version: z.literal(1),
  fingerprint: z.string(),
  createdAt: z.number(),
  expiresAt: z.number(),
  result: ExecutionResultSchema
});

export type CacheFile = z.infer<typeof CacheFileSchema>;

export interface CacheEntry {
  readonly fingerprint: string;
  readonly result: ExecutionResult;
  readonly createdAt: number;
  readonly ttlMs: number;
  readonly sizeBytes: number;
}

export interface CacheStats {
  entries: number;
  bytes: number;
  hits: number;
  misses: number;
  evictions: number;
  inFlight: number;
}

/** UTF-8 bytes of stdout, stderr and (when converted) the markup. */
export function resultSize(result: ExecutionResult): number {
  const markup = result.output.kind === 'markup' ? Buffer.byteLength(result.output.html, 'utf8') : 0;
  return Buffer.byteLength(result.stdout, 'utf8') + Buffer.byteLength(result.stderr, 'utf8') + markup;
}

export function isExpired(entry: Pick<CacheEntry, 'createdAt' | 'ttlMs'>, now: number): boolean {
  return now >= entry.createdAt + entry.ttlMs;
}
