export { ExecutionEngine } from './core/engine.js';
export type { EngineOptions, RunOptions, ScanRequest, TaskHandle } from './core/engine.js';
export { createCommandSpec, describeCommand, CommandSpecSchema } from './core/command/spec.js';
export type { CommandSpec, CommandSpecInput } from './core/command/spec.js';
export {
  ToolRunnerError,
  ToolNotFoundError,
  LaunchError,
  InvalidTransitionError,
  CacheCorruptionError,
  ConfigError
} from './core/errors.js';
export type { ToolRunnerErrorKind } from './core/errors.js';
export {
  decodeWithFallback,
  resolveCandidates,
  isSupportedEncoding,
  DEFAULT_ENCODING_CANDIDATES,
  DEFAULT_FALLBACK_ENCODING
} from './core/encoding/negotiator.js';
export type { DecodedText, DecodeOptions } from './core/encoding/negotiator.js';
export { ExecaLauncher, decodeOutcome, probeToolVersion } from './core/process/launcher.js';
export { resolveExecutable } from './core/process/resolve-executable.js';
export type { Launcher, LaunchedProcess, LaunchOptions, RawProcessOutcome, KillSignal } from './core/process/types.js';
export { estimateTimeout, FALLBACK_TIMEOUT_SETTINGS } from './core/timeout/estimator.js';
export { prescan, describeScale } from './core/timeout/prescan.js';
export type { ScaleSignals, ScanResult, TimeoutEstimate, TimeoutSettings } from './core/timeout/types.js';
export { ProgressChannel } from './core/task/channel.js';
export { ConcurrencyLimiter } from './core/task/limiter.js';
export { TaskSupervisor } from './core/task/supervisor.js';
export { ExecutionTask } from './core/task/task.js';
export type {
  Diagnostic,
  DiagnosticKind,
  ExecutionResult,
  ProgressEvent,
  ProgressSink,
  TaskState,
  TerminalState
} from './core/task/types.js';
export { classifyOutput, stripAnsi } from './core/output/classifier.js';
export type { OutputClassification, OutputMarker } from './core/output/classifier.js';
export { renderOutput } from './core/output/converter.js';
export type { RenderedOutput } from './core/output/converter.js';
export { computeFingerprint, describeInputIdentity } from './core/cache/fingerprint.js';
export { ResultCache } from './core/cache/result-cache.js';
export { CacheStore } from './core/cache/store.js';
export type { CacheEntry, CacheStats } from './core/cache/types.js';
export { describeOutcome, formatStatusLine, exitCodeFor } from './core/status.js';
export { loadConfig, parseConfig } from './config/loader.js';
export { ConfigSchema, defaultConfig } from './config/schema.js';
export type { ToolRunnerConfig, ToolRunnerConfigInput } from './config/schema.js';
export { Logger, createNullLogger } from './utils/logger.js';
export type { LogLevel, LoggerOptions } from './utils/logger.js';
