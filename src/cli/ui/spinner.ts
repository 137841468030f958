import ora, { type Ora } from 'ora';

// ── TTY-Aware Spinner ───────────────────────────────────────────────────────
// Wraps `ora`. Falls back to static lines when stderr is not a terminal (CI,
// redirected output). Always writes to stderr so stdout carries tool output only.

export interface SpinnerHandle {
  update(text: string): void;
  stop(): void;
}

export type SpinnerStream = NodeJS.WritableStream & { isTTY?: boolean };

export interface SpinnerOptions {
  stream?: SpinnerStream;
  /** Static mode prints the first line only; progress updates are dropped. */
  interactive?: boolean;
}

export function startSpinner(text: string, opts: SpinnerOptions = {}): SpinnerHandle {
  const stream = opts.stream ?? process.stderr;
  const interactive = opts.interactive ?? Boolean(stream.isTTY);

  if (!interactive) {
    stream.write(`  ${text}\n`);
    return {
      update() {},
      stop() {}
    };
  }

  // `isEnabled` forces the animation even where ora would disable it (CI=1 on a local TTY).
  const spinner: Ora = ora({ text, stream, spinner: 'dots', indent: 2, isEnabled: true }).start();

  return {
    update(t: string) {
      spinner.text = t;
    },
    stop() {
      spinner.stop();
    }
  };
}
