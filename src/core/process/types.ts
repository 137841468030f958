import type { CommandSpec } from '../command/spec.js';

export type KillSignal = 'SIGTERM' | 'SIGKILL' | 'SIGINT';

export interface LaunchOptions {
  /** Per-stream cap on buffered output; exceeding it kills the process. */
  maxBufferBytes: number;
}

/** What the OS handed back once the process exited and both pipes closed. */
export interface RawProcessOutcome {
  exitCode: number | null;
  signal: string | null;
  stdout: Uint8Array;
  stderr: Uint8Array;
  /** The OS reported ENOENT at spawn time (binary vanished after the pre-flight check). */
  notFound: boolean;
  /** Output exceeded `maxBufferBytes` and the process was killed. */
  outputLimitExceeded: boolean;
  /** Spawn or I/O failure message, when the process never ran normally. */
  failureMessage: string | null;
}

export interface LaunchedProcess {
  readonly pid: number | undefined;
  /** Resolves once the OS process has exited (pipes may still be draining). */
  readonly exited: Promise<void>;
  /** Resolves after exit with the fully drained raw buffers; never rejects. */
  readonly completion: Promise<RawProcessOutcome>;
  isAlive(): boolean;
  /** Returns false when the signal could not be delivered (already dead). */
  kill(signal: KillSignal): boolean;
}

export interface Launcher {
  /**
   * Check that the executable resolves, without starting anything. Throws `ToolNotFoundError`.
   * Run before queueing or scanning so a missing tool fails at once.
   */
  preflight(spec: CommandSpec): void;
  /**
   * Start the process. Throws `ToolNotFoundError` synchronously when the executable cannot be
   * resolved; no process is created in that case.
   */
  launch(spec: CommandSpec, opts: LaunchOptions): LaunchedProcess;
}

export interface DecodedProcessOutput {
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  encoding: string;
  encodingFallback: boolean;
}
