import type { Logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/logger.js';
import type { ProgressEmitter, ProgressEvent, ProgressSink, ProgressUpdate } from './types.js';

class AsyncQueue<T> implements AsyncIterable<T> {
  private values: T[] = [];
  private waiters: Array<(v: IteratorResult<T>) => void> = [];
  private closed = false;

  push(v: T) {
    if (this.closed) return;
    const w = this.waiters.shift();
    if (w) w({ value: v, done: false });
    else this.values.push(v);
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    for (const w of this.waiters.splice(0)) w({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => {
        if (this.values.length > 0) {
          const [value] = this.values.splice(0, 1);
          return Promise.resolve({ value, done: false });
        }
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise<IteratorResult<T>>((resolve) => this.waiters.push(resolve));
      }
    };
  }
}

/**
 * Per-subscriber progress delivery. `emit` never waits on the consumer: events are queued for
 * iteration and chained onto the sink, so a slow or throwing sink cannot stall the supervisor.
 * Timestamps are forced strictly increasing so events keep their order even within one clock tick.
 */
export class ProgressChannel implements ProgressEmitter, AsyncIterable<ProgressEvent> {
  private queue = new AsyncQueue<ProgressEvent>();
  private delivery: Promise<void> = Promise.resolve();
  private lastTimestamp = 0;
  private closed = false;

  constructor(
    readonly taskId: string,
    private sink: ProgressSink | undefined,
    private logger: Logger,
    private now: () => number = Date.now
  ) {}

  emit(update: ProgressUpdate): void {
    if (this.closed) return;
    const timestamp = Math.max(this.now(), this.lastTimestamp + 1);
    this.lastTimestamp = timestamp;
    const event: ProgressEvent = Object.freeze({ taskId: this.taskId, timestamp, ...update });

    this.queue.push(event);
    const sink = this.sink;
    if (sink) {
      this.delivery = this.delivery
        .then(() => sink(event))
        .catch((err: unknown) => {
          this.logger.warn('progress sink failed', { taskId: this.taskId, error: errorMessage(err) });
        });
    }
  }

  close(): void {
    this.closed = true;
    this.queue.close();
  }

  /** Resolves once every event emitted so far has been handed to the sink. */
  drained(): Promise<void> {
    return this.delivery;
  }

  [Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
    return this.queue[Symbol.asyncIterator]();
  }
}
