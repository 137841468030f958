import type { RenderedOutput } from '../output/converter.js';
import type { TimeoutEstimate } from '../timeout/types.js';

export type TaskState = 'pending' | 'running' | 'succeeded' | 'failed' | 'timed_out' | 'cancelled';

export type TerminalState = Exclude<TaskState, 'pending' | 'running'>;

export const TERMINAL_STATES: readonly TerminalState[] = ['succeeded', 'failed', 'timed_out', 'cancelled'];

export function isTerminal(state: TaskState): state is TerminalState {
  return (TERMINAL_STATES as readonly TaskState[]).includes(state);
}

export type DiagnosticKind = 'tool_not_found' | 'launch_failed' | 'process_failed' | 'timed_out' | 'cancelled';

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  /** Remediation shown to the user (install hint, narrowing suggestions). */
  hint?: string;
  details?: Record<string, unknown>;
}

export interface ProgressEvent {
  taskId: string;
  /** Epoch ms; strictly increasing per task. */
  timestamp: number;
  message: string;
  elapsedMs: number;
  percent?: number;
  state: TaskState;
}

export type ProgressSink = (event: ProgressEvent) => void | Promise<void>;

/** What the supervisor reports; the channel stamps task id and timestamp. */
export interface ProgressUpdate {
  message: string;
  elapsedMs: number;
  percent?: number;
  state: TaskState;
}

export interface ProgressEmitter {
  emit(update: ProgressUpdate): void;
}

/**
 * The result envelope. Every outcome, including a missing tool, is normalized into one of these;
 * no platform exception crosses the engine boundary.
 */
export interface ExecutionResult {
  state: TerminalState;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  /** Encoding that decoded stdout; null when nothing was decoded (launch never happened). */
  encoding: string | null;
  durationMs: number;
  diagnostic: Diagnostic | null;
  /** stdout after classification: untouched text, or converted markup for decorated output. */
  output: RenderedOutput;
  fromCache: boolean;
  estimate?: TimeoutEstimate;
}

/** Supervisor output before classification and caching. */
export type SupervisedRun = Omit<ExecutionResult, 'output' | 'fromCache' | 'estimate'>;
