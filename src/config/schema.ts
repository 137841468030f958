import { z } from 'zod';

import { DEFAULT_ENCODING_CANDIDATES, DEFAULT_FALLBACK_ENCODING } from '../core/encoding/negotiator.js';

const ms = z.number().int().nonnegative();
const positiveInt = z.number().int().positive();

export const TimeoutsSchema = z
  .object({
    baseMs: ms.default(300_000),
    maxMs: ms.default(1_800_000),
    perTenThousandItemsMs: ms.default(60_000),
    perGibMs: ms.default(30_000),
    /** Budget when neither an explicit timeout nor a scan is given; null disables the deadline. */
    defaultMs: positiveInt.nullable().default(300_000)
  })
  .strict();

export const ConfigSchema = z
  .object({
    timeouts: TimeoutsSchema.default({}),
    prescan: z.object({ timeBoxMs: ms.default(30_000) }).strict().default({}),
    supervisor: z
      .object({
        pollIntervalMs: positiveInt.default(1_000),
        gracePeriodMs: ms.default(5_000),
        killTimeoutMs: ms.default(2_000),
        maxConcurrentTasks: positiveInt.default(4)
      })
      .strict()
      .default({}),
    encoding: z
      .object({
        candidates: z.array(z.string().min(1)).min(1).default([...DEFAULT_ENCODING_CANDIDATES]),
        fallback: z.string().min(1).default(DEFAULT_FALLBACK_ENCODING)
      })
      .strict()
      .default({}),
    cache: z
      .object({
        enabled: z.boolean().default(true),
        ttlMs: positiveInt.default(3_600_000),
        maxBytes: positiveInt.default(64 * 1024 * 1024),
        maxEntries: positiveInt.default(256),
        /** Disk tier location, relative to the working directory; null keeps the cache in memory. */
        dir: z.string().min(1).nullable().default('.toolrunner-cache')
      })
      .strict()
      .default({}),
    process: z
      .object({ maxBufferBytes: positiveInt.default(100 * 1024 * 1024) })
      .strict()
      .default({}),
    log: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
        json: z.boolean().default(false)
      })
      .strict()
      .default({})
  })
  .strict();

export type ToolRunnerConfig = z.infer<typeof ConfigSchema>;
export type ToolRunnerConfigInput = z.input<typeof ConfigSchema>;

export function defaultConfig(): ToolRunnerConfig {
  return ConfigSchema.parse({});
}
