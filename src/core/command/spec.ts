import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';

export const CommandSpecSchema = z.object({
  command: z.string().trim().min(1, 'command must not be empty'),
  args: z.array(z.string()).default([]),
  cwd: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  encoding: z.string().trim().min(1).optional(),
  env: z.record(z.string()).optional(),
  stdin: z.string().optional()
});

export type CommandSpecInput = z.input<typeof CommandSpecSchema>;

/**
 * One external invocation: argv, working directory and the optional hints the engine honours.
 * Frozen by {@link createCommandSpec}; collaborators build a new spec instead of editing one.
 */
export interface CommandSpec {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  /** Explicit budget; skips timeout estimation when present. */
  readonly timeoutMs?: number;
  /** Tried first by the encoding negotiator. */
  readonly encoding?: string;
  /** Merged over the parent environment. */
  readonly env?: Readonly<Record<string, string>>;
  /** Written to the process and then closed. */
  readonly stdin?: string;
}

export function createCommandSpec(input: CommandSpecInput, baseDir: string = process.cwd()): CommandSpec {
  const parsed = CommandSpecSchema.parse(input);
  const cwd = parsed.cwd ? (isAbsolute(parsed.cwd) ? parsed.cwd : resolve(baseDir, parsed.cwd)) : resolve(baseDir);

  return Object.freeze({
    command: parsed.command,
    args: Object.freeze([...parsed.args]),
    cwd,
    ...(parsed.timeoutMs !== undefined ? { timeoutMs: parsed.timeoutMs } : {}),
    ...(parsed.encoding !== undefined ? { encoding: parsed.encoding } : {}),
    ...(parsed.env !== undefined ? { env: Object.freeze({ ...parsed.env }) } : {}),
    ...(parsed.stdin !== undefined ? { stdin: parsed.stdin } : {})
  });
}

/** "dust -d 3 /data" with POSIX-ish quoting, for logs and progress lines. */
export function describeCommand(spec: Pick<CommandSpec, 'command' | 'args'>): string {
  return [spec.command, ...spec.args].map(shellEscape).join(' ');
}

function shellEscape(v: string): string {
  if (v.length === 0) return "''";
  // Safe unquoted subset
  if (/^[a-zA-Z0-9_./:=@+-]+$/.test(v)) return v;
  return `'${v.replaceAll("'", "'\\''")}'`;
}
