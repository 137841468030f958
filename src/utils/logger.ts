export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogWriter = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Fields merged into every record (e.g. `{ taskId }`). */
  bindings?: Record<string, unknown>;
  /** Defaults to stderr so stdout stays clean for tool output. */
  write?: LogWriter;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  get level(): LogLevel {
    return this.opts.level ?? 'info';
  }

  child(bindings: Record<string, unknown>): Logger {
    return new Logger({ ...this.opts, bindings: { ...this.opts.bindings, ...bindings } });
  }

  debug(message: string, data?: Record<string, unknown>) {
    this.log('debug', message, data);
  }
  info(message: string, data?: Record<string, unknown>) {
    this.log('info', message, data);
  }
  warn(message: string, data?: Record<string, unknown>) {
    this.log('warn', message, data);
  }
  error(message: string, data?: Record<string, unknown>) {
    this.log('error', message, data);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>) {
    if (levelRank[level] < levelRank[this.level]) return;

    const timestamp = new Date().toISOString();
    const fields = this.opts.bindings || data ? { ...this.opts.bindings, ...data } : undefined;
    const write = this.opts.write ?? ((line: string) => process.stderr.write(`${line}\n`));

    if (this.opts.json) {
      write(safeJson({ timestamp, level, message, ...fields }));
      return;
    }

    write(fields === undefined ? `${timestamp} ${level} ${message}` : `${timestamp} ${level} ${message} ${safeJson(fields)}`);
  }
}

export function createNullLogger(): Logger {
  return new Logger({ level: 'silent' });
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
