import type { ExecutionResult, ProgressEvent } from '../../core/task/types.js';
import { describeOutcome } from '../../core/status.js';
import type { ScanResult, TimeoutEstimate } from '../../core/timeout/types.js';
import { formatBytes, formatMs } from '../../utils/format.js';
import { keyValue, sectionBanner } from './format.js';
import { startSpinner, type SpinnerHandle, type SpinnerStream } from './spinner.js';
import { theme, INDENT } from './theme.js';

export interface EstimateReport {
  path: string;
  scan: ScanResult;
  estimate: TimeoutEstimate;
}

export interface CacheReport {
  dir: string;
  entries: number;
  bytes: number;
}

export interface RenderStreams {
  /** Tool output. */
  out?: NodeJS.WritableStream;
  /** Everything else: progress, status, errors. */
  err?: SpinnerStream;
  interactive?: boolean;
}

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * Single output coordinator for the CLI: InteractiveRenderer draws spinners and coloured
 * status lines, QuietRenderer emits JSON lines for scripts (--quiet). Tool stdout always goes to
 * stdout untouched.
 */
export interface Renderer {
  runStarted(taskId: string, command: string): void;
  progress(event: ProgressEvent): void;
  runFinished(result: ExecutionResult, opts: { html: boolean }): void;
  estimate(report: EstimateReport): void;
  cacheStats(report: CacheReport): void;
  cacheCleared(dir: string, removed: number): void;
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;
}

// ── Interactive Renderer ────────────────────────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private spinner: SpinnerHandle | null = null;
  private out: NodeJS.WritableStream;
  private err: SpinnerStream;

  constructor(private streams: RenderStreams = {}) {
    this.out = streams.out ?? process.stdout;
    this.err = streams.err ?? process.stderr;
  }

  private writeln(msg: string = ''): void {
    this.err.write(msg + '\n');
  }

  runStarted(taskId: string, command: string): void {
    this.spinner = startSpinner(`${theme.dim(taskId)} ${command}`, {
      stream: this.err,
      ...(this.streams.interactive !== undefined ? { interactive: this.streams.interactive } : {})
    });
  }

  progress(event: ProgressEvent): void {
    const pct = event.percent !== undefined ? theme.dim(` ${event.percent}%`) : '';
    this.spinner?.update(`${event.message}${pct}`);
  }

  runFinished(result: ExecutionResult, opts: { html: boolean }): void {
    this.spinner?.stop();
    this.spinner = null;

    const body = opts.html && result.output.kind === 'markup' ? result.output.html : result.stdout;
    if (body) this.out.write(body.endsWith('\n') ? body : `${body}\n`);
    if (result.stderr && result.state !== 'succeeded') this.err.write(result.stderr.endsWith('\n') ? result.stderr : `${result.stderr}\n`);

    const { icon, tone, text } = describeOutcome(result);
    this.writeln(`${INDENT}${theme.tone(tone)(icon)} ${text}`);
  }

  estimate(report: EstimateReport): void {
    const { scan, estimate } = report;
    this.writeln(INDENT + sectionBanner('Estimate'));
    this.writeln(keyValue('Path', report.path));
    if (scan.missing) {
      this.writeln(keyValue('Scan', theme.warning('path does not exist')));
    } else {
      const partial = scan.possiblyUnderestimated ? theme.warning(' (partial: time box reached)') : '';
      this.writeln(keyValue('Files', `${scan.itemCount}${partial}`));
      this.writeln(keyValue('Directories', String(scan.dirCount)));
      this.writeln(keyValue('Size', formatBytes(scan.totalBytes)));
      if (scan.skipped > 0) this.writeln(keyValue('Unreadable', String(scan.skipped)));
      this.writeln(keyValue('Scan time', formatMs(scan.elapsedMs)));
    }
    const clamped = estimate.clamped ? theme.dim(` (capped at ${formatMs(estimate.maxMs)})`) : '';
    this.writeln(keyValue('Budget', theme.bold(formatMs(estimate.timeoutMs)) + clamped));
  }

  cacheStats(report: CacheReport): void {
    this.writeln(INDENT + sectionBanner('Cache'));
    this.writeln(keyValue('Directory', report.dir));
    this.writeln(keyValue('Entries', String(report.entries)));
    this.writeln(keyValue('Size', formatBytes(report.bytes)));
  }

  cacheCleared(dir: string, removed: number): void {
    this.writeln(`${INDENT}${theme.check} Removed ${removed} cache ${removed === 1 ? 'entry' : 'entries'} from ${dir}`);
  }

  error(title: string, details: string, tip?: string): void {
    this.spinner?.stop();
    this.spinner = null;
    this.writeln(`${INDENT}${theme.cross} ${theme.error(title)}`);
    for (const line of details.split('\n')) this.writeln(`${INDENT}${INDENT}${line}`);
    if (tip) this.writeln(`${INDENT}${INDENT}${theme.dim(tip)}`);
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }
}

// ── Quiet Renderer (JSON lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private out: NodeJS.WritableStream;
  private err: NodeJS.WritableStream;

  constructor(streams: RenderStreams = {}) {
    this.out = streams.out ?? process.stdout;
    this.err = streams.err ?? process.stderr;
  }

  private emit(type: string, data: Record<string, unknown> = {}): void {
    this.err.write(JSON.stringify({ type, ...data }) + '\n');
  }

  runStarted(taskId: string, command: string): void {
    this.emit('run_started', { taskId, command });
  }

  progress(event: ProgressEvent): void {
    this.emit('progress', { ...event });
  }

  runFinished(result: ExecutionResult, opts: { html: boolean }): void {
    const body = opts.html && result.output.kind === 'markup' ? result.output.html : result.stdout;
    if (body) this.out.write(body);
    this.emit('result', {
      state: result.state,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      encoding: result.encoding,
      fromCache: result.fromCache,
      diagnostic: result.diagnostic,
      stderr: result.stderr
    });
  }

  estimate(report: EstimateReport): void {
    this.emit('estimate', { path: report.path, scan: report.scan, estimate: report.estimate });
  }

  cacheStats(report: CacheReport): void {
    this.emit('cache_stats', { ...report });
  }

  cacheCleared(dir: string, removed: number): void {
    this.emit('cache_cleared', { dir, removed });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, ...(tip ? { tip } : {}) });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }
}

export function createRenderer(opts: { quiet?: boolean } & RenderStreams = {}): Renderer {
  return opts.quiet ? new QuietRenderer(opts) : new InteractiveRenderer(opts);
}
