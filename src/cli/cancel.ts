export type CancelSignal = 'SIGINT' | 'SIGTERM';

export interface InstalledCliCancellation {
  /** Flips on the first SIGINT/SIGTERM. */
  signal: AbortSignal;
  /** Number of cancellation triggers seen. */
  count: number;
  dispose(): void;
}

export interface CliCancellationOptions {
  /** First trigger: start a graceful shutdown. */
  onCancel?: (signal: CancelSignal) => void | Promise<void>;
  /** Second trigger: how long to let `onCancel` finish before exiting anyway. */
  forceExitGraceMs?: number;
  /** Defaults to `process.exit`. */
  exit?: (code: number) => void;
}

/**
 * Ctrl+C once cancels gracefully (the running tool gets SIGTERM, then SIGKILL); Ctrl+C twice
 * exits once `onCancel` settles or `forceExitGraceMs` passes, whichever is first.
 */
export function installCliCancellation(opts: CliCancellationOptions = {}): InstalledCliCancellation {
  const controller = new AbortController();
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  const forceExitGraceMs = opts.forceExitGraceMs ?? 1_000;

  let count = 0;
  let disposed = false;
  let cancelPromise: Promise<void> | null = null;
  let forceExitInProgress = false;

  const trigger = (signal: CancelSignal) => {
    if (disposed) return;
    count += 1;

    if (count === 1) {
      controller.abort(signal);
      if (opts.onCancel) {
        const onCancel = opts.onCancel;
        cancelPromise = Promise.resolve()
          .then(() => onCancel(signal))
          .catch((err: unknown) => {
            process.stderr.write(`cancellation handler failed: ${err instanceof Error ? err.message : String(err)}\n`);
          });
      }
      return;
    }

    if (forceExitInProgress) return;
    forceExitInProgress = true;
    // 130 = 128 + SIGINT(2), 143 = 128 + SIGTERM(15)
    const code = signal === 'SIGTERM' ? 143 : 130;
    const pending = cancelPromise;
    if (!pending) {
      exit(code);
      return;
    }
    void withTimeout(pending, forceExitGraceMs).then(() => exit(code));
  };

  const onSigint = () => trigger('SIGINT');
  const onSigterm = () => trigger('SIGTERM');

  // `on`, not `once`: the second press forces exit.
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  const dispose = () => {
    if (disposed) return;
    disposed = true;
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
  };

  return {
    get signal() {
      return controller.signal;
    },
    get count() {
      return count;
    },
    dispose
  };
}

async function withTimeout(promise: Promise<void>, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | null = null;
  try {
    await Promise.race([
      promise,
      new Promise<void>((resolve) => {
        timer = setTimeout(() => resolve(), timeoutMs);
      })
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
