export type ToolRunnerErrorKind =
  | 'tool_not_found'
  | 'launch_failed'
  | 'invalid_transition'
  | 'cache_corruption'
  | 'config';

export abstract class ToolRunnerError extends Error {
  abstract readonly kind: ToolRunnerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * The executable is missing or not runnable. Raised synchronously before any process exists and
 * never retried.
 */
export class ToolNotFoundError extends ToolRunnerError {
  readonly kind = 'tool_not_found';

  constructor(
    readonly command: string,
    readonly reason: string = 'not found on PATH'
  ) {
    super(`Tool not found: ${command} (${reason})`);
  }
}

export class LaunchError extends ToolRunnerError {
  readonly kind = 'launch_failed';

  constructor(
    readonly command: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to launch ${command}: ${message}`, options);
  }
}

export class InvalidTransitionError extends ToolRunnerError {
  readonly kind = 'invalid_transition';

  constructor(
    readonly taskId: string,
    readonly from: string,
    readonly to: string
  ) {
    super(`Task ${taskId}: illegal transition ${from} -> ${to}`);
  }
}

/** Raised by the disk store on unreadable entries; the cache turns it into a miss. */
export class CacheCorruptionError extends ToolRunnerError {
  readonly kind = 'cache_corruption';

  constructor(
    readonly fingerprint: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Cache entry ${fingerprint} is corrupt: ${reason}`, options);
  }
}

export class ConfigError extends ToolRunnerError {
  readonly kind = 'config';

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
  }
}
