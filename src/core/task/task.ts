import type { CommandSpec } from '../command/spec.js';
import { InvalidTransitionError } from '../errors.js';
import type { TaskState, TerminalState } from './types.js';
import { isTerminal } from './types.js';

const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  pending: ['running', 'failed', 'cancelled'],
  running: ['succeeded', 'failed', 'timed_out', 'cancelled'],
  succeeded: [],
  failed: [],
  timed_out: [],
  cancelled: []
};

export function canTransition(from: TaskState, to: TaskState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * One supervised invocation. State only moves forward: pending → running → terminal, or
 * pending → failed/cancelled when the process never started.
 */
export class ExecutionTask {
  private _state: TaskState = 'pending';
  private _startedAt: number | null = null;
  private _pid: number | undefined;

  /** Budget in ms measured from `startedAt`; null means no deadline. */
  deadlineMs: number | null = null;

  constructor(
    readonly id: string,
    readonly spec: CommandSpec,
    readonly signal: AbortSignal
  ) {}

  get state(): TaskState {
    return this._state;
  }

  get startedAt(): number | null {
    return this._startedAt;
  }

  get pid(): number | undefined {
    return this._pid;
  }

  get cancelRequested(): boolean {
    return this.signal.aborted;
  }

  get terminal(): boolean {
    return isTerminal(this._state);
  }

  markRunning(pid: number | undefined, startedAt: number): void {
    this.transition('running');
    this._pid = pid;
    this._startedAt = startedAt;
  }

  finish(state: TerminalState): void {
    this.transition(state);
  }

  private transition(to: TaskState): void {
    if (!canTransition(this._state, to)) throw new InvalidTransitionError(this.id, this._state, to);
    this._state = to;
  }
}
