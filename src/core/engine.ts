import { computeFingerprint } from './cache/fingerprint.js';
import type { ResultCache } from './cache/result-cache.js';
import type { CommandSpec } from './command/spec.js';
import { describeCommand } from './command/spec.js';
import { ToolNotFoundError } from './errors.js';
import { resolveCandidates } from './encoding/negotiator.js';
import { renderOutput } from './output/converter.js';
import { ExecaLauncher } from './process/launcher.js';
import type { Launcher } from './process/types.js';
import { ProgressChannel } from './task/channel.js';
import { ConcurrencyLimiter } from './task/limiter.js';
import { TaskSupervisor, toolNotFoundDiagnostic } from './task/supervisor.js';
import { ExecutionTask } from './task/task.js';
import type {
  Diagnostic,
  ExecutionResult,
  ProgressEmitter,
  ProgressEvent,
  ProgressSink,
  ProgressUpdate,
  TaskState
} from './task/types.js';
import { describeScale, prescan } from './timeout/prescan.js';
import { estimateTimeout } from './timeout/estimator.js';
import type { ScaleSignals, TimeoutEstimate } from './timeout/types.js';
import type { ToolRunnerConfig } from '../config/schema.js';
import { TaskIdGenerator } from '../utils/id.js';
import type { Logger } from '../utils/logger.js';
import { createNullLogger, errorMessage } from '../utils/logger.js';

export interface EngineOptions {
  config: ToolRunnerConfig;
  launcher?: Launcher;
  /** Shared result cache; omit or pass null to run without one. */
  cache?: ResultCache | null;
  logger?: Logger;
  now?: () => number;
}

export type ScanRequest = { path: string; exclude?: readonly string[] } | ScaleSignals;

export interface RunOptions {
  onProgress?: ProgressSink;
  /** External cancellation; aborting it is the same as `handle.cancel()`. */
  signal?: AbortSignal;
  /** Pre-scan a path, or pass signals gathered elsewhere, to size the deadline. */
  scan?: ScanRequest;
  /** `false` skips cache lookup, storage and coalescing with other runs. */
  cache?: boolean;
  inputIdentity?: string;
  toolVersion?: string;
  ttlMs?: number;
}

export interface TaskHandle {
  readonly id: string;
  readonly fingerprint: string;
  /** True when this handle joined an execution another caller started. */
  readonly attached: boolean;
  readonly progress: AsyncIterable<ProgressEvent>;
  /** Never rejects. */
  readonly result: Promise<ExecutionResult>;
  cancel(): void;
}

interface Subscriber {
  readonly id: string;
  readonly channel: ProgressChannel;
  cancelled: boolean;
  settled: boolean;
  deliver(result: ExecutionResult): void;
}

/**
 * One execution shared by every handle with the same fingerprint. Progress is fanned out to each
 * subscriber's channel, which stamps it with that subscriber's id.
 */
class Flight implements ProgressEmitter {
  readonly controller = new AbortController();
  readonly subscribers = new Set<Subscriber>();
  state: TaskState = 'pending';
  done: Promise<void> = Promise.resolve();

  constructor(
    readonly taskId: string,
    readonly fingerprint: string
  ) {}

  emit(update: ProgressUpdate): void {
    this.state = update.state;
    for (const sub of this.subscribers) sub.channel.emit(update);
  }

  get active(): number {
    let n = 0;
    for (const sub of this.subscribers) if (!sub.cancelled) n += 1;
    return n;
  }
}

/**
 * Public entry point. `run()` returns a handle at once; the work (slot wait, optional pre-scan,
 * supervised process, classification, caching) happens behind it, and every outcome lands in
 * `handle.result` as an `ExecutionResult`.
 */
export class ExecutionEngine {
  private readonly config: ToolRunnerConfig;
  private readonly launcher: Launcher;
  private readonly cache: ResultCache | null;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly limiter: ConcurrencyLimiter;
  private readonly ids = new TaskIdGenerator();
  private readonly flights = new Map<string, Flight>();
  private readonly running = new Set<Flight>();

  constructor(opts: EngineOptions) {
    this.config = opts.config;
    this.logger = opts.logger ?? createNullLogger();
    this.launcher = opts.launcher ?? new ExecaLauncher(this.logger);
    this.cache = opts.cache ?? null;
    this.now = opts.now ?? Date.now;
    this.limiter = new ConcurrencyLimiter(this.config.supervisor.maxConcurrentTasks);
  }

  run(spec: CommandSpec, options: RunOptions = {}): TaskHandle {
    const id = this.ids.next(new Date(this.now()));
    const fingerprint = computeFingerprint({
      spec,
      ...(options.inputIdentity !== undefined ? { inputIdentity: options.inputIdentity } : {}),
      ...(options.toolVersion !== undefined ? { toolVersion: options.toolVersion } : {})
    });
    const channel = new ProgressChannel(id, options.onProgress, this.logger, this.now);
    const coalesce = options.cache !== false;

    let deliver: (result: ExecutionResult) => void = () => {};
    const result = new Promise<ExecutionResult>((resolve) => {
      deliver = resolve;
    });

    const subscriber: Subscriber = {
      id,
      channel,
      cancelled: false,
      settled: false,
      deliver: (r) => {
        if (subscriber.settled) return;
        subscriber.settled = true;
        channel.close();
        deliver(r);
      }
    };

    const existing = coalesce ? this.flights.get(fingerprint) : undefined;
    const flight = existing ?? new Flight(id, fingerprint);
    flight.subscribers.add(subscriber);

    if (existing) {
      this.logger.debug('attached to in-flight execution', { taskId: id, flightId: existing.taskId, fingerprint });
      channel.emit({ message: `Attached to ${existing.taskId}`, elapsedMs: 0, state: existing.state });
    } else {
      if (coalesce) this.flights.set(fingerprint, flight);
      this.start(flight, spec, options, coalesce);
    }

    const cancel = () => this.cancelSubscriber(flight, subscriber);
    if (options.signal) {
      const signal = options.signal;
      if (signal.aborted) cancel();
      else {
        signal.addEventListener('abort', cancel, { once: true });
        void result.then(() => signal.removeEventListener('abort', cancel));
      }
    }

    return { id, fingerprint, attached: existing !== undefined, progress: channel, result, cancel };
  }

  cancel(handle: TaskHandle): void {
    handle.cancel();
  }

  await(handle: TaskHandle): Promise<ExecutionResult> {
    return handle.result;
  }

  estimateTimeout(signals: ScaleSignals): TimeoutEstimate {
    return estimateTimeout(signals, this.config.timeouts);
  }

  /** Cancel every execution and wait for all of them to settle. */
  async shutdown(): Promise<void> {
    const flights = [...this.running];
    for (const flight of flights) flight.controller.abort();
    await Promise.all(flights.map((f) => f.done));
  }

  private start(flight: Flight, spec: CommandSpec, options: RunOptions, coalesce: boolean): void {
    this.running.add(flight);
    flight.done = this.execute(flight, spec, options).then((result) => {
      // Unmap before delivery: a caller resuming on its result may immediately run the same spec.
      this.running.delete(flight);
      if (coalesce && this.flights.get(flight.fingerprint) === flight) this.flights.delete(flight.fingerprint);
      for (const sub of flight.subscribers) sub.deliver(result);
    });
  }

  private async execute(flight: Flight, spec: CommandSpec, options: RunOptions): Promise<ExecutionResult> {
    const runFresh = () => this.executeFresh(flight, spec, options);
    try {
      if (!this.cache || options.cache === false || !this.config.cache.enabled) return await runFresh();

      const { result, source } = await this.cache.getOrRun(flight.fingerprint, runFresh, {
        ...(options.ttlMs !== undefined ? { ttlMs: options.ttlMs } : {}),
        shouldStore: (r) => r.state === 'succeeded',
        signal: flight.controller.signal
      });
      if (source === 'memory' || source === 'disk') {
        this.logger.info('served from cache', { taskId: flight.taskId, fingerprint: flight.fingerprint, source });
        flight.emit({ message: 'Served from cache', elapsedMs: 0, percent: 100, state: result.state });
      }
      return result;
    } catch (err) {
      this.logger.error('execution failed unexpectedly', { taskId: flight.taskId, error: errorMessage(err) });
      return internalFailure(err);
    }
  }

  private async executeFresh(flight: Flight, spec: CommandSpec, options: RunOptions): Promise<ExecutionResult> {
    const signal = flight.controller.signal;
    const task = new ExecutionTask(flight.taskId, spec, signal);
    const log = this.logger.child({ taskId: task.id });

    try {
      this.launcher.preflight(spec);
    } catch (err) {
      if (!(err instanceof ToolNotFoundError)) throw err;
      const diagnostic = toolNotFoundDiagnostic(err);
      log.warn('tool not found', { command: spec.command, reason: err.reason });
      task.finish('failed');
      flight.emit({ message: diagnostic.message, elapsedMs: 0, state: task.state });
      return Object.freeze({
        state: 'failed',
        stdout: '',
        stderr: '',
        exitCode: null,
        encoding: null,
        durationMs: 0,
        diagnostic,
        output: plain(''),
        fromCache: false
      });
    }

    if (this.limiter.running >= this.limiter.max) {
      flight.emit({ message: 'Queued', elapsedMs: 0, state: 'pending' });
    }
    const release = await this.limiter.acquire(signal);

    try {
      let estimate: TimeoutEstimate | undefined;
      if (spec.timeoutMs !== undefined) {
        task.deadlineMs = spec.timeoutMs;
      } else if (options.scan && !signal.aborted) {
        estimate = await this.estimateFromScan(flight, options.scan, signal);
        task.deadlineMs = estimate.timeoutMs;
      } else {
        task.deadlineMs = this.config.timeouts.defaultMs;
      }
      log.info('executing', { command: describeCommand(spec), cwd: spec.cwd, deadlineMs: task.deadlineMs });

      const supervisor = new TaskSupervisor(
        this.launcher,
        {
          pollIntervalMs: this.config.supervisor.pollIntervalMs,
          gracePeriodMs: this.config.supervisor.gracePeriodMs,
          killTimeoutMs: this.config.supervisor.killTimeoutMs,
          maxBufferBytes: this.config.process.maxBufferBytes,
          encodings: resolveCandidates(spec.encoding, this.config.encoding.candidates),
          fallbackEncoding: this.config.encoding.fallback
        },
        this.logger,
        this.now
      );
      const run = await supervisor.execute(task, flight);
      const output = run.state === 'succeeded' || run.state === 'failed' ? renderOutput(run.stdout, { logger: log }) : plain(run.stdout);

      log.info('finished', { state: run.state, exitCode: run.exitCode, durationMs: run.durationMs });
      return Object.freeze({ ...run, output, fromCache: false, ...(estimate ? { estimate } : {}) });
    } finally {
      release?.();
    }
  }

  private async estimateFromScan(flight: Flight, scan: ScanRequest, signal: AbortSignal): Promise<TimeoutEstimate> {
    let signals: ScaleSignals;
    if ('path' in scan) {
      flight.emit({ message: `Scanning ${scan.path}…`, elapsedMs: 0, state: 'pending' });
      const result = await prescan(scan.path, {
        timeBoxMs: this.config.prescan.timeBoxMs,
        ...(scan.exclude ? { exclude: scan.exclude } : {}),
        signal
      });
      flight.emit({ message: `Scanned ${describeScale(result)}`, elapsedMs: result.elapsedMs, state: 'pending' });
      signals = result;
    } else {
      signals = scan;
    }

    const estimate = estimateTimeout(signals, this.config.timeouts);
    this.logger.info('timeout estimated', {
      taskId: flight.taskId,
      items: signals.itemCount,
      bytes: signals.totalBytes,
      timeoutMs: estimate.timeoutMs,
      clamped: estimate.clamped,
      possiblyUnderestimated: estimate.possiblyUnderestimated
    });
    return estimate;
  }

  /**
   * Detach one handle. While other handles still want the result, this one settles at once as
   * cancelled; the last one to cancel aborts the shared process and receives its real outcome.
   */
  private cancelSubscriber(flight: Flight, sub: Subscriber): void {
    if (sub.settled || sub.cancelled) return;
    sub.cancelled = true;

    if (flight.active > 0) {
      flight.subscribers.delete(sub);
      this.logger.debug('detached cancelled handle', { taskId: sub.id, flightId: flight.taskId });
      sub.channel.emit({ message: 'Cancelled', elapsedMs: 0, state: 'cancelled' });
      sub.deliver(detachedResult());
      return;
    }

    // A cancelled flight must not be joined by later callers.
    if (this.flights.get(flight.fingerprint) === flight) this.flights.delete(flight.fingerprint);
    flight.controller.abort();
  }
}

function plain(text: string): ExecutionResult['output'] {
  return { kind: 'plain', text };
}

function detachedResult(): ExecutionResult {
  const diagnostic: Diagnostic = { kind: 'cancelled', message: 'Cancelled; the shared execution continues for other callers' };
  return Object.freeze({
    state: 'cancelled',
    stdout: '',
    stderr: '',
    exitCode: null,
    encoding: null,
    durationMs: 0,
    diagnostic,
    output: plain(''),
    fromCache: false
  });
}

function internalFailure(err: unknown): ExecutionResult {
  const diagnostic: Diagnostic = { kind: 'launch_failed', message: `Internal error: ${errorMessage(err)}` };
  return Object.freeze({
    state: 'failed',
    stdout: '',
    stderr: '',
    exitCode: null,
    encoding: null,
    durationMs: 0,
    diagnostic,
    output: plain(''),
    fromCache: false
  });
}
