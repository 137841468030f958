export interface ScaleSignals {
  itemCount: number;
  totalBytes: number;
  /** Set when the pre-scan hit its time box and the counts are partial. */
  possiblyUnderestimated?: boolean;
}

export interface ScanResult extends ScaleSignals {
  dirCount: number;
  /** Entries that could not be read (permissions, races with deletion). */
  skipped: number;
  possiblyUnderestimated: boolean;
  /** The scanned root does not exist. */
  missing: boolean;
  elapsedMs: number;
}

export interface TimeoutSettings {
  baseMs: number;
  maxMs: number;
  /** Added per full 10 000 items (k1). */
  perTenThousandItemsMs: number;
  /** Added per full GiB (k2). */
  perGibMs: number;
}

export interface TimeoutEstimate {
  timeoutMs: number;
  baseMs: number;
  maxMs: number;
  /** The raw sum exceeded `maxMs` and was cut down. */
  clamped: boolean;
  possiblyUnderestimated: boolean;
}
