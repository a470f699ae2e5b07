/**
 * procward public API barrel.
 *
 * Re-exports the launcher, cancellation scopes, errors, configuration helpers and
 * the Node adapters that make up the public surface of the `procward` package.
 * @module
 */

// Adapters
export type { DefaultPathResolverOptions } from "./adapters/default-path-resolver.js";
export { DefaultPathResolver } from "./adapters/default-path-resolver.js";
export { NodeProcessSpawner } from "./adapters/node-process-spawner.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { StructuredLogger } from "./adapters/structured-logger.js";
// Config
export { envEntrySchema, killSignalSchema, launcherOptionsSchema } from "./config/config-schema.js";
// Core
export type { ParentScope } from "./core/cancellation-scope.js";
export { CancellationScope } from "./core/cancellation-scope.js";
export type { LauncherEventMap } from "./core/launcher.js";
export { Launcher } from "./core/launcher.js";
export type { LauncherState } from "./core/launcher-lifecycle.js";
export { isLauncherTransitionAllowed, LAUNCHER_STATES } from "./core/launcher-lifecycle.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
// Errors
export type { LauncherErrorCode } from "./errors.js";
export {
  AlreadyStartedError,
  CanceledError,
  ConfigError,
  ExitError,
  errorMessage,
  IncompleteTransferError,
  isCanceled,
  LauncherError,
  MissingScopeError,
  NotFoundError,
  NotStartedError,
  StdinClosedError,
  toLauncherError,
} from "./errors.js";
// Interfaces
export type { LogContext, Logger, LogLevel } from "./interfaces/logger.js";
export type { PathResolver } from "./interfaces/path-resolver.js";
export type {
  ChildHandle,
  ExitStatus,
  KillSignal,
  ProcessSpawner,
  SpawnOptions,
} from "./interfaces/process-spawner.js";
// Types
export type { LauncherOptions, ResolvedLauncherOptions } from "./types/config.js";
export {
  DEFAULT_GRACEFUL_KILL_SIGNAL,
  DEFAULT_KILL_SIGNAL,
  parseEnvEntries,
  resolveLauncherOptions,
} from "./types/config.js";
