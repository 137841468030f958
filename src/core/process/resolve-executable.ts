import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, extname, isAbsolute, join, resolve } from 'node:path';

import { ToolNotFoundError } from '../errors.js';

const DEFAULT_WINDOWS_PATHEXT = ['.COM', '.EXE', '.BAT', '.CMD'];

export interface ResolveExecutableOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  platform?: NodeJS.Platform;
  isExecutable?: (path: string, platform: NodeJS.Platform) => boolean;
}

/**
 * Synchronously locate `command` the way the OS would: a path (anything with a separator) must
 * point at an executable file; a bare name is searched on PATH (with PATHEXT on Windows).
 *
 * Throws {@link ToolNotFoundError} on a miss. Returns the absolute path that will be spawned.
 */
export function resolveExecutable(command: string, opts: ResolveExecutableOptions = {}): string {
  const platform = opts.platform ?? process.platform;
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const check = opts.isExecutable ?? isExecutableFile;
  const trimmed = command.trim();
  if (!trimmed) throw new ToolNotFoundError(command, 'empty command');

  const hasSeparator = trimmed.includes('/') || (platform === 'win32' && trimmed.includes('\\'));
  if (hasSeparator || isAbsolute(trimmed)) {
    const abs = isAbsolute(trimmed) ? trimmed : resolve(cwd, trimmed);
    for (const candidate of withExtensions(abs, env, platform)) {
      if (check(candidate, platform)) return candidate;
    }
    throw new ToolNotFoundError(command, `no executable file at ${abs}`);
  }

  const pathValue = env.PATH ?? env.Path ?? '';
  const dirs = pathValue
    .split(platform === 'win32' ? ';' : delimiter)
    .map((d) => d.trim())
    .filter((d) => d.length > 0);

  for (const dir of dirs) {
    for (const candidate of withExtensions(join(dir, trimmed), env, platform)) {
      if (check(candidate, platform)) return candidate;
    }
  }

  throw new ToolNotFoundError(command);
}

function withExtensions(base: string, env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string[] {
  if (platform !== 'win32' || extname(base)) return [base];
  const pathext = (env.PATHEXT ?? DEFAULT_WINDOWS_PATHEXT.join(';'))
    .split(';')
    .map((ext) => ext.trim().toUpperCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
  return [base, ...pathext.map((ext) => `${base}${ext}`)];
}

function isExecutableFile(path: string, platform: NodeJS.Platform): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    if (platform === 'win32') return true;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
