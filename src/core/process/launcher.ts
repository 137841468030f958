import { execa, ExecaError } from 'execa';

import type { CommandSpec } from '../command/spec.js';
import { describeCommand } from '../command/spec.js';
import { LaunchError } from '../errors.js';
import { decodeWithFallback, type DecodeOptions } from '../encoding/negotiator.js';
import type { Logger } from '../../utils/logger.js';
import { createNullLogger, errorMessage } from '../../utils/logger.js';
import { resolveExecutable } from './resolve-executable.js';
import type {
  DecodedProcessOutput,
  KillSignal,
  LaunchedProcess,
  Launcher,
  LaunchOptions,
  RawProcessOutcome
} from './types.js';

/**
 * Launches tools with execa. Both pipes are buffered from spawn time, so a chatty tool can never
 * block on a full pipe while the supervisor is sleeping between polls.
 */
export class ExecaLauncher implements Launcher {
  constructor(private logger: Logger = createNullLogger()) {}

  preflight(spec: CommandSpec): void {
    this.resolve(spec);
  }

  launch(spec: CommandSpec, opts: LaunchOptions): LaunchedProcess {
    const file = this.resolve(spec);

    let subprocess: ReturnType<typeof spawn>;
    try {
      subprocess = spawn(file, spec, opts);
    } catch (err) {
      throw new LaunchError(spec.command, errorMessage(err), { cause: err });
    }

    this.logger.debug('process launched', {
      command: describeCommand(spec),
      resolved: file,
      cwd: spec.cwd,
      pid: subprocess.pid ?? null
    });

    let alive = true;
    const exitEvent = new Promise<void>((resolve) => {
      subprocess.once('exit', () => {
        alive = false;
        resolve();
      });
    });

    const completion: Promise<RawProcessOutcome> = subprocess.then(
      (result) => {
        alive = false;
        return toOutcome(result);
      },
      (err: unknown) => {
        alive = false;
        return failureOutcome(errorMessage(err));
      }
    );

    return {
      pid: subprocess.pid,
      exited: Promise.race([exitEvent, completion.then(() => undefined)]),
      completion,
      isAlive: () => alive,
      kill: (signal: KillSignal) => {
        if (!alive) return false;
        try {
          return subprocess.kill(signal);
        } catch {
          return false;
        }
      }
    };
  }

  private resolve(spec: CommandSpec): string {
    const env = spec.env ? { ...process.env, ...spec.env } : process.env;
    return resolveExecutable(spec.command, { env, cwd: spec.cwd });
  }
}

/** execa validates its options synchronously; a bad cwd or env surfaces here as a throw. */
function spawn(file: string, spec: CommandSpec, opts: LaunchOptions) {
  return execa(file, [...spec.args], {
    cwd: spec.cwd,
    env: spec.env ? { ...spec.env } : undefined,
    encoding: 'buffer',
    stdout: 'pipe',
    stderr: 'pipe',
    ...(spec.stdin !== undefined ? { input: spec.stdin } : { stdin: 'ignore' as const }),
    reject: false,
    maxBuffer: opts.maxBufferBytes,
    // Escalation is driven by the supervisor, not by execa's own timer.
    forceKillAfterDelay: false,
    windowsHide: true
  });
}

/**
 * Decode both buffers with the negotiator. stdout decides the reported encoding; stderr is
 * decoded independently against the same candidate list.
 */
export function decodeOutcome(
  outcome: RawProcessOutcome,
  candidates: readonly string[],
  opts: DecodeOptions = {}
): DecodedProcessOutput {
  const stdout = decodeWithFallback(outcome.stdout, candidates, opts);
  const stderr = decodeWithFallback(outcome.stderr, candidates, opts);
  return {
    exitCode: outcome.exitCode,
    signal: outcome.signal,
    stdout: stdout.text,
    stderr: stderr.text,
    encoding: stdout.encoding,
    encodingFallback: stdout.fallback
  };
}

interface ExecaLikeResult {
  exitCode?: number;
  signal?: string;
  stdout: unknown;
  stderr: unknown;
}

function toOutcome(result: ExecaLikeResult): RawProcessOutcome {
  const base: RawProcessOutcome = {
    exitCode: typeof result.exitCode === 'number' ? result.exitCode : null,
    signal: typeof result.signal === 'string' ? result.signal : null,
    stdout: toBytes(result.stdout),
    stderr: toBytes(result.stderr),
    notFound: false,
    outputLimitExceeded: false,
    failureMessage: null
  };
  if (!(result instanceof ExecaError)) return base;

  const spawnFailed = base.exitCode === null && base.signal === null;
  return {
    ...base,
    notFound: result.code === 'ENOENT',
    outputLimitExceeded: result.isMaxBuffer,
    failureMessage: spawnFailed || result.isMaxBuffer ? result.shortMessage : null
  };
}

function failureOutcome(message: string): RawProcessOutcome {
  return {
    exitCode: null,
    signal: null,
    stdout: new Uint8Array(),
    stderr: new Uint8Array(),
    notFound: false,
    outputLimitExceeded: false,
    failureMessage: message
  };
}

function toBytes(value: unknown): Uint8Array {
  if (value instanceof Uint8Array) return value;
  if (typeof value === 'string') return Buffer.from(value, 'utf8');
  return new Uint8Array();
}

export async function probeToolVersion(command: string, timeoutMs = 10_000): Promise<string | null> {
  let file: string;
  try {
    file = resolveExecutable(command);
  } catch {
    return null;
  }
  const result = await execa(file, ['--version'], { reject: false, timeout: timeoutMs, stdin: 'ignore' });
  if (result.failed || typeof result.stdout !== 'string') return null;
  const line = result.stdout.trim().split('\n')[0]?.trim();
  return line ? line : null;
}
