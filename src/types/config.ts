import { DefaultPathResolver } from "../adapters/default-path-resolver.js";
import { NodeProcessSpawner } from "../adapters/node-process-spawner.js";
import { envEntrySchema, launcherOptionsSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { PathResolver } from "../interfaces/path-resolver.js";
import type { KillSignal, ProcessSpawner } from "../interfaces/process-spawner.js";
import { noopLogger } from "../utils/noop-logger.js";

/** Launcher configuration; every field is optional. */
export interface LauncherOptions {
  /** Working directory for the child (default: inherited) */
  cwd?: string;

  /** Signal sent when the scope is cancelled (default: SIGKILL, or SIGTERM with a grace period) */
  killSignal?: KillSignal;
  /** Escalate to SIGKILL if the process outlives this after the first signal (default: none) */
  killGracePeriodMs?: number;

  logger?: Logger; // default: noopLogger
  spawner?: ProcessSpawner; // default: NodeProcessSpawner
  resolver?: PathResolver; // default: DefaultPathResolver over process.env
}

export interface ResolvedLauncherOptions {
  cwd: string | undefined;
  killSignal: KillSignal;
  killGracePeriodMs: number | undefined;
  logger: Logger;
  spawner: ProcessSpawner;
  resolver: PathResolver;
}

export const DEFAULT_KILL_SIGNAL: KillSignal = "SIGKILL";
export const DEFAULT_GRACEFUL_KILL_SIGNAL: KillSignal = "SIGTERM";

export function resolveLauncherOptions(options: LauncherOptions = {}): ResolvedLauncherOptions {
  const validation = launcherOptionsSchema.safeParse(options);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const logger = options.logger ?? noopLogger;
  const graceful = options.killGracePeriodMs !== undefined;
  return {
    cwd: options.cwd,
    killSignal:
      options.killSignal ?? (graceful ? DEFAULT_GRACEFUL_KILL_SIGNAL : DEFAULT_KILL_SIGNAL),
    killGracePeriodMs: options.killGracePeriodMs,
    logger,
    spawner: options.spawner ?? new NodeProcessSpawner({ logger }),
    resolver: options.resolver ?? new DefaultPathResolver(),
  };
}

/** Turn `KEY=VALUE` entries into a child environment. Later duplicates win. */
export function parseEnvEntries(entries: readonly string[]): Record<string, string> {
  const env = new Map<string, string>();
  for (const entry of entries) {
    const validation = envEntrySchema.safeParse(entry);
    if (!validation.success) {
      throw new ConfigError(`Invalid environment entry ${JSON.stringify(entry)}`, {
        cause: validation.error,
      });
    }
    const eq = entry.indexOf("=");
    env.set(entry.slice(0, eq), entry.slice(eq + 1));
  }
  // fromEntries defines own properties, so keys like `__proto__` survive.
  return Object.fromEntries(env);
}
