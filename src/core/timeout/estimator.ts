import type { ScaleSignals, TimeoutEstimate, TimeoutSettings } from './types.js';

const ITEMS_PER_STEP = 10_000;
const BYTES_PER_GIB = 1024 ** 3;

/** Used only for settings the configuration leaves out. */
export const FALLBACK_TIMEOUT_SETTINGS: TimeoutSettings = {
  baseMs: 300_000,
  maxMs: 1_800_000,
  perTenThousandItemsMs: 60_000,
  perGibMs: 30_000
};

/**
 * timeout = clamp(base + k1 * floor(items / 10k) + k2 * floor(bytes / GiB), base, max)
 *
 * Pure. Negative or non-finite signals count as zero, so the result is monotonic in each signal
 * and always within [base, max].
 */
export function estimateTimeout(
  signals: ScaleSignals,
  settings: Partial<TimeoutSettings> = {}
): TimeoutEstimate {
  const s = resolveSettings(settings);
  const itemSteps = Math.floor(nonNegative(signals.itemCount) / ITEMS_PER_STEP);
  const gibSteps = Math.floor(nonNegative(signals.totalBytes) / BYTES_PER_GIB);

  const raw = s.baseMs + s.perTenThousandItemsMs * itemSteps + s.perGibMs * gibSteps;
  const timeoutMs = Math.min(Math.max(raw, s.baseMs), s.maxMs);

  return {
    timeoutMs,
    baseMs: s.baseMs,
    maxMs: s.maxMs,
    clamped: raw > s.maxMs,
    possiblyUnderestimated: signals.possiblyUnderestimated === true
  };
}

export function resolveSettings(settings: Partial<TimeoutSettings>): TimeoutSettings {
  const baseMs = nonNegative(settings.baseMs ?? FALLBACK_TIMEOUT_SETTINGS.baseMs);
  const maxMs = Math.max(nonNegative(settings.maxMs ?? FALLBACK_TIMEOUT_SETTINGS.maxMs), baseMs);
  return {
    baseMs,
    maxMs,
    perTenThousandItemsMs: nonNegative(settings.perTenThousandItemsMs ?? FALLBACK_TIMEOUT_SETTINGS.perTenThousandItemsMs),
    perGibMs: nonNegative(settings.perGibMs ?? FALLBACK_TIMEOUT_SETTINGS.perGibMs)
  };
}

function nonNegative(n: number): number {
  return Number.isFinite(n) && n > 0 ? n : 0;
}
