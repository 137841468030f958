import { describeCommand } from '../command/spec.js';
import { ToolNotFoundError } from '../errors.js';
import { decodeOutcome } from '../process/launcher.js';
import type { LaunchedProcess, Launcher, RawProcessOutcome } from '../process/types.js';
import { formatClock, formatMs } from '../../utils/format.js';
import type { Logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/logger.js';
import type { ExecutionTask } from './task.js';
import type { Diagnostic, ProgressEmitter, SupervisedRun, TerminalState } from './types.js';

export const TIMEOUT_HINT = 'Try: reduce depth, limit output lines, exclude large subdirectories';
export const INSTALL_HINT = 'Install it or set its path in the configuration.';

export interface SupervisorSettings {
  pollIntervalMs: number;
  gracePeriodMs: number;
  killTimeoutMs: number;
  maxBufferBytes: number;
  /** Ordered decode candidates, hint already applied. */
  encodings: readonly string[];
  fallbackEncoding: string;
}

type TerminationCause = 'cancelled' | 'timed_out';

interface Termination {
  cause: TerminationCause;
  confirmedDead: boolean;
}

/**
 * Drives one task from launch to a terminal state. The loop sleeps `pollIntervalMs` between ticks
 * and wakes early on process exit or cancellation; each tick checks, in order, exit, cancellation
 * and deadline, and emits exactly one progress event.
 */
export class TaskSupervisor {
  constructor(
    private launcher: Launcher,
    private settings: SupervisorSettings,
    private logger: Logger,
    private now: () => number = Date.now
  ) {}

  async execute(task: ExecutionTask, channel: ProgressEmitter): Promise<SupervisedRun> {
    const log = this.logger.child({ taskId: task.id });
    const t0 = this.now();

    if (task.cancelRequested) {
      task.finish('cancelled');
      channel.emit({ message: 'Cancelled before start', elapsedMs: 0, state: task.state });
      return emptyRun('cancelled', 0, { kind: 'cancelled', message: 'Cancelled before start' });
    }

    let proc: LaunchedProcess;
    try {
      proc = this.launcher.launch(task.spec, { maxBufferBytes: this.settings.maxBufferBytes });
    } catch (err) {
      task.finish('failed');
      const durationMs = this.now() - t0;
      const diagnostic = launchDiagnostic(task.spec.command, err);
      log.warn('launch failed', { command: task.spec.command, kind: diagnostic.kind, error: errorMessage(err) });
      channel.emit({ message: diagnostic.message, elapsedMs: durationMs, state: task.state });
      return emptyRun('failed', durationMs, diagnostic);
    }

    const startedAt = this.now();
    task.markRunning(proc.pid, startedAt);
    channel.emit({ message: `Started ${describeCommand(task.spec)}`, elapsedMs: 0, percent: percentOf(0, task.deadlineMs), state: task.state });

    let exited = false;
    let wake: (() => void) | null = null;
    const onWake = () => wake?.();
    void proc.exited.then(() => {
      exited = true;
      onWake();
    });
    task.signal.addEventListener('abort', onWake, { once: true });

    try {
      for (;;) {
        await new Promise<void>((resolve) => {
          if (exited || task.cancelRequested) {
            resolve();
            return;
          }
          const timer = setTimeout(() => {
            wake = null;
            resolve();
          }, this.settings.pollIntervalMs);
          wake = () => {
            clearTimeout(timer);
            wake = null;
            resolve();
          };
        });

        const elapsedMs = this.now() - startedAt;

        if (exited) {
          const outcome = await proc.completion;
          return this.finishExited(task, channel, outcome, this.now() - startedAt);
        }

        if (task.cancelRequested) {
          channel.emit({ message: 'Cancelling…', elapsedMs, percent: percentOf(elapsedMs, task.deadlineMs), state: task.state });
          const termination = await this.terminate(proc, 'cancelled', log);
          return this.finishTerminated(task, channel, proc, termination, this.now() - startedAt);
        }

        if (task.deadlineMs !== null && elapsedMs > task.deadlineMs) {
          channel.emit({ message: 'Timed out, terminating…', elapsedMs, percent: 99, state: task.state });
          const termination = await this.terminate(proc, 'timed_out', log);
          return this.finishTerminated(task, channel, proc, termination, this.now() - startedAt);
        }

        channel.emit({
          message: `Running (${formatClock(elapsedMs)})`,
          elapsedMs,
          percent: percentOf(elapsedMs, task.deadlineMs),
          state: task.state
        });
      }
    } finally {
      task.signal.removeEventListener('abort', onWake);
    }
  }

  /** SIGTERM, grace period, SIGKILL, bounded wait. Resolves whether or not the exit was confirmed. */
  private async terminate(proc: LaunchedProcess, cause: TerminationCause, log: Logger): Promise<Termination> {
    log.info('terminating process', { pid: proc.pid ?? null, cause });
    proc.kill('SIGTERM');
    if (await waitForExit(proc, this.settings.gracePeriodMs)) return { cause, confirmedDead: true };

    log.warn('process ignored SIGTERM; escalating to SIGKILL', { pid: proc.pid ?? null, graceMs: this.settings.gracePeriodMs });
    proc.kill('SIGKILL');
    if (await waitForExit(proc, this.settings.killTimeoutMs)) return { cause, confirmedDead: true };

    log.error('process did not exit after SIGKILL', { pid: proc.pid ?? null, killTimeoutMs: this.settings.killTimeoutMs });
    return { cause, confirmedDead: false };
  }

  private finishExited(task: ExecutionTask, channel: ProgressEmitter, outcome: RawProcessOutcome, durationMs: number): SupervisedRun {
    const decoded = this.decode(outcome);

    if (outcome.notFound) {
      task.finish('failed');
      const diagnostic: Diagnostic = {
        kind: 'tool_not_found',
        message: `Tool not found: ${task.spec.command}`,
        hint: INSTALL_HINT,
        details: { command: task.spec.command }
      };
      channel.emit({ message: diagnostic.message, elapsedMs: durationMs, state: task.state });
      return { ...decoded, state: 'failed', durationMs, diagnostic };
    }

    if (outcome.exitCode === 0 && outcome.failureMessage === null) {
      task.finish('succeeded');
      channel.emit({ message: 'Completed', elapsedMs: durationMs, percent: 100, state: task.state });
      return { ...decoded, state: 'succeeded', durationMs, diagnostic: null };
    }

    task.finish('failed');
    const diagnostic = failureDiagnostic(outcome, decoded.stderr);
    const message = outcome.exitCode !== null ? `Failed (exit ${outcome.exitCode})` : `Failed (${diagnostic.message})`;
    channel.emit({ message, elapsedMs: durationMs, state: task.state });
    return { ...decoded, state: 'failed', durationMs, diagnostic };
  }

  private async finishTerminated(
    task: ExecutionTask,
    channel: ProgressEmitter,
    proc: LaunchedProcess,
    termination: Termination,
    durationMs: number
  ): Promise<SupervisedRun> {
    // Pipes held open by grandchildren can delay completion past the child's exit.
    const outcome = termination.confirmedDead ? await withTimeout(proc.completion, this.settings.killTimeoutMs) : null;
    const decoded = outcome ? this.decode(outcome) : { stdout: '', stderr: '', exitCode: null, encoding: null };

    const details: Record<string, unknown> = { elapsedMs: durationMs };
    if (!termination.confirmedDead) details.orphanPid = proc.pid ?? null;

    let diagnostic: Diagnostic;
    if (termination.cause === 'timed_out') {
      const budget = task.deadlineMs ?? 0;
      details.budgetMs = budget;
      diagnostic = {
        kind: 'timed_out',
        message: `Timed out after ${formatMs(durationMs)} (budget ${formatMs(budget)})`,
        hint: TIMEOUT_HINT,
        details
      };
    } else {
      diagnostic = { kind: 'cancelled', message: `Cancelled after ${formatMs(durationMs)}`, details };
    }

    task.finish(termination.cause);
    channel.emit({ message: termination.cause === 'timed_out' ? 'Timed out' : 'Cancelled', elapsedMs: durationMs, state: task.state });
    return { ...decoded, state: termination.cause, durationMs, diagnostic };
  }

  private decode(outcome: RawProcessOutcome): Pick<SupervisedRun, 'stdout' | 'stderr' | 'exitCode' | 'encoding'> {
    const decoded = decodeOutcome(outcome, this.settings.encodings, {
      fallback: this.settings.fallbackEncoding,
      logger: this.logger
    });
    this.logger.debug('output decoded', { encoding: decoded.encoding, fallback: decoded.encodingFallback });
    return { stdout: decoded.stdout, stderr: decoded.stderr, exitCode: decoded.exitCode, encoding: decoded.encoding };
  }
}

function percentOf(elapsedMs: number, deadlineMs: number | null): number | undefined {
  if (deadlineMs === null || deadlineMs <= 0) return undefined;
  return Math.min(99, Math.floor((elapsedMs / deadlineMs) * 100));
}

export function toolNotFoundDiagnostic(err: ToolNotFoundError): Diagnostic {
  return {
    kind: 'tool_not_found',
    message: `Tool not found: ${err.command}`,
    hint: INSTALL_HINT,
    details: { command: err.command, reason: err.reason }
  };
}

function launchDiagnostic(command: string, err: unknown): Diagnostic {
  if (err instanceof ToolNotFoundError) return toolNotFoundDiagnostic(err);
  return { kind: 'launch_failed', message: errorMessage(err), details: { command } };
}

function failureDiagnostic(outcome: RawProcessOutcome, stderr: string): Diagnostic {
  if (outcome.exitCode === null && outcome.signal === null && outcome.failureMessage !== null) {
    return { kind: 'launch_failed', message: outcome.failureMessage };
  }
  if (outcome.outputLimitExceeded) {
    return {
      kind: 'process_failed',
      message: outcome.failureMessage ?? 'Output exceeded the buffer limit',
      details: { exitCode: outcome.exitCode, signal: outcome.signal, stderr }
    };
  }
  if (outcome.exitCode === null) {
    return {
      kind: 'process_failed',
      message: `Terminated by signal ${outcome.signal ?? 'unknown'}`,
      details: { signal: outcome.signal, stderr }
    };
  }
  return {
    kind: 'process_failed',
    message: `Exited with code ${outcome.exitCode}`,
    details: { exitCode: outcome.exitCode, stderr }
  };
}

function emptyRun(state: TerminalState, durationMs: number, diagnostic: Diagnostic): SupervisedRun {
  return { state, stdout: '', stderr: '', exitCode: null, encoding: null, durationMs, diagnostic };
}

async function waitForExit(proc: LaunchedProcess, timeoutMs: number): Promise<boolean> {
  if (!proc.isAlive()) return true;
  const result = await withTimeout(proc.exited.then(() => true), timeoutMs);
  return result ?? !proc.isAlive();
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T | null> {
  let timer: NodeJS.Timeout | null = null;
  try {
    return await Promise.race([
      promise,
      new Promise<null>((resolve) => {
        timer = setTimeout(() => resolve(null), timeoutMs);
      })
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
