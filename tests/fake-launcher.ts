import type { CommandSpec } from '../src/core/command/spec.js';
import { ToolNotFoundError } from '../src/core/errors.js';
import type { KillSignal, LaunchedProcess, Launcher, RawProcessOutcome } from '../src/core/process/types.js';

export interface FakeBehaviour {
  exitCode?: number;
  stdout?: string | Uint8Array;
  stderr?: string | Uint8Array;
  /** Exit on its own after this many ms; omit to run until killed. */
  runMs?: number;
  /** Exit on its own by a signal nobody sent. */
  crashSignal?: string;
  ignoreSigterm?: boolean;
  /** Never dies, even on SIGKILL. */
  unkillable?: boolean;
  /** Throw ToolNotFoundError from launch(). */
  missing?: boolean;
  /** Throw this from launch(). */
  launchError?: Error;
}

export interface KillRecord {
  pid: number;
  signal: KillSignal;
}

let nextPid = 4000;

class FakeProcess implements LaunchedProcess {
  readonly pid = nextPid++;
  readonly exited: Promise<void>;
  readonly completion: Promise<RawProcessOutcome>;
  private alive = true;
  private resolveExit: (outcome: RawProcessOutcome) => void = () => {};
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private behaviour: FakeBehaviour,
    private kills: KillRecord[]
  ) {
    this.completion = new Promise<RawProcessOutcome>((resolve) => {
      this.resolveExit = resolve;
    });
    this.exited = this.completion.then(() => undefined);
    if (behaviour.runMs !== undefined) {
      this.timer = setTimeout(() => {
        this.exit(behaviour.crashSignal ? null : behaviour.exitCode ?? 0, behaviour.crashSignal ?? null);
      }, behaviour.runMs);
    }
  }

  isAlive(): boolean {
    return this.alive;
  }

  kill(signal: KillSignal): boolean {
    if (!this.alive) return false;
    this.kills.push({ pid: this.pid, signal });
    if (this.behaviour.unkillable) return true;
    if (signal === 'SIGTERM' && this.behaviour.ignoreSigterm) return true;
    setTimeout(() => this.exit(null, signal), 1);
    return true;
  }

  private exit(exitCode: number | null, signal: string | null): void {
    if (!this.alive) return;
    this.alive = false;
    if (this.timer) clearTimeout(this.timer);
    this.resolveExit({
      exitCode,
      signal,
      stdout: toBytes(this.behaviour.stdout),
      stderr: toBytes(this.behaviour.stderr),
      notFound: false,
      outputLimitExceeded: false,
      failureMessage: null
    });
  }
}

/** In-process stand-in for the execa launcher; records launches and kill signals. */
export class FakeLauncher implements Launcher {
  readonly preflights: CommandSpec[] = [];
  readonly launches: CommandSpec[] = [];
  readonly kills: KillRecord[] = [];
  readonly processes: LaunchedProcess[] = [];

  constructor(private behave: (spec: CommandSpec) => FakeBehaviour = () => ({ runMs: 5 })) {}

  preflight(spec: CommandSpec): void {
    this.preflights.push(spec);
    if (this.behave(spec).missing) throw new ToolNotFoundError(spec.command);
  }

  launch(spec: CommandSpec): LaunchedProcess {
    const behaviour = this.behave(spec);
    if (behaviour.missing) throw new ToolNotFoundError(spec.command);
    if (behaviour.launchError) throw behaviour.launchError;
    this.launches.push(spec);
    const proc = new FakeProcess(behaviour, this.kills);
    this.processes.push(proc);
    return proc;
  }
}

function toBytes(value: string | Uint8Array | undefined): Uint8Array {
  if (value === undefined) return new Uint8Array();
  return typeof value === 'string' ? new TextEncoder().encode(value) : value;
}
