import { isAbsolute, resolve } from 'node:path';
import { YAMLParseError } from 'yaml';

import { ConfigError } from '../core/errors.js';
import { fileExists, readYaml } from '../utils/fs.js';
import type { LogLevel } from '../utils/logger.js';
import { ConfigSchema, type ToolRunnerConfig } from './schema.js';

export const CONFIG_FILE_NAME = 'toolrunner.yaml';

export interface LoadConfigOptions {
  /** Explicit file; must exist. */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: ToolRunnerConfig;
  /** File the values came from, or null when only defaults and env applied. */
  source: string | null;
}

interface NumericOverride {
  env: string;
  min: number;
  apply: (config: ToolRunnerConfig, value: number) => void;
}

const NUMERIC_OVERRIDES: NumericOverride[] = [
  { env: 'TOOLRUNNER_BASE_TIMEOUT_MS', min: 0, apply: (c, v) => (c.timeouts.baseMs = v) },
  { env: 'TOOLRUNNER_MAX_TIMEOUT_MS', min: 0, apply: (c, v) => (c.timeouts.maxMs = v) },
  { env: 'TOOLRUNNER_POLL_INTERVAL_MS', min: 10, apply: (c, v) => (c.supervisor.pollIntervalMs = v) },
  { env: 'TOOLRUNNER_GRACE_PERIOD_MS', min: 0, apply: (c, v) => (c.supervisor.gracePeriodMs = v) },
  { env: 'TOOLRUNNER_MAX_CONCURRENT_TASKS', min: 1, apply: (c, v) => (c.supervisor.maxConcurrentTasks = v) },
  { env: 'TOOLRUNNER_CACHE_TTL_MS', min: 1, apply: (c, v) => (c.cache.ttlMs = v) },
  { env: 'TOOLRUNNER_CACHE_MAX_BYTES', min: 1, apply: (c, v) => (c.cache.maxBytes = v) }
];

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Defaults, then `toolrunner.yaml` (or the explicit / `TOOLRUNNER_CONFIG` path), then
 * `TOOLRUNNER_*` environment overrides. The cache directory comes back absolute.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();

  const explicit = opts.path ?? nonEmpty(env.TOOLRUNNER_CONFIG);
  const candidate = resolve(cwd, explicit ?? CONFIG_FILE_NAME);
  let source: string | null = null;
  let raw: unknown = {};

  if (await fileExists(candidate)) {
    source = candidate;
    raw = await readConfigFile(candidate);
  } else if (explicit) {
    throw new ConfigError(`Config file not found: ${candidate}`);
  }

  const config = parseConfig(raw ?? {}, source ?? '<defaults>');
  applyEnvOverrides(config, env);
  if (config.cache.dir !== null && !isAbsolute(config.cache.dir)) config.cache.dir = resolve(cwd, config.cache.dir);
  return { config, source };
}

export function parseConfig(raw: unknown, origin: string): ToolRunnerConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration in ${origin}`, issues);
  }
  const config = parsed.data;
  if (config.timeouts.maxMs < config.timeouts.baseMs) config.timeouts.maxMs = config.timeouts.baseMs;
  return config;
}

/**
 * Non-numeric values are ignored; values below the minimum are raised to it. Mutates `config`.
 */
export function applyEnvOverrides(config: ToolRunnerConfig, env: NodeJS.ProcessEnv): void {
  for (const o of NUMERIC_OVERRIDES) {
    const raw = nonEmpty(env[o.env]);
    if (raw === undefined) continue;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) continue;
    o.apply(config, Math.max(o.min, Math.floor(parsed)));
  }
  if (config.timeouts.maxMs < config.timeouts.baseMs) config.timeouts.maxMs = config.timeouts.baseMs;

  const cacheDir = nonEmpty(env.TOOLRUNNER_CACHE_DIR);
  if (cacheDir !== undefined) config.cache.dir = cacheDir;

  const level = nonEmpty(env.TOOLRUNNER_LOG_LEVEL)?.toLowerCase();
  const known = LOG_LEVELS.find((l) => l === level);
  if (known) config.log.level = known;
}

async function readConfigFile(path: string): Promise<unknown> {
  try {
    return await readYaml(path);
  } catch (err) {
    if (err instanceof YAMLParseError) throw new ConfigError(`Config file ${path} is not valid YAML: ${err.message}`);
    throw err;
  }
}

function nonEmpty(v: string | undefined): string | undefined {
  const trimmed = v?.trim();
  return trimmed ? trimmed : undefined;
}
