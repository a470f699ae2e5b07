import type { Readable } from "node:stream";
import {
  AlreadyStartedError,
  type CanceledError,
  ExitError,
  MissingScopeError,
  NotStartedError,
} from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  ChildHandle,
  ExitStatus,
  KillSignal,
  ProcessSpawner,
} from "../interfaces/process-spawner.js";
import { type LauncherOptions, parseEnvEntries, resolveLauncherOptions } from "../types/config.js";
import { CancellationScope, type ParentScope } from "./cancellation-scope.js";
import { isLauncherTransitionAllowed, type LauncherState } from "./launcher-lifecycle.js";
import { PipeSet } from "./pipe-set.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export interface LauncherEventMap {
  spawned: { pid: number };
  exited: {
    pid: number;
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    uptimeMs: number;
  };
  canceled: { reason: CanceledError };
}

interface LauncherInit {
  file: string;
  path: string;
  env: readonly string[];
  childEnv: Record<string, string>;
  args: readonly string[];
  scope: CancellationScope;
  cwd: string | undefined;
  killSignal: KillSignal;
  killGracePeriodMs: number | undefined;
  logger: Logger;
  spawner: ProcessSpawner;
}

/**
 * Runs one external process inside a cancellation scope.
 *
 * `Launcher.create` resolves the executable and wires stdin/stdout/stderr but
 * spawns nothing. `start`/`run` spawn it with its lifetime bound to the scope:
 * once the scope is done (`cancel`, `close`, or the parent ending) the process is
 * killed and every later `start`/`run` fails with the scope's CanceledError.
 *
 * Lifecycle operations are meant for a single owner and are not serialized
 * against each other. Both output streams must be drained; a child blocked on a
 * full pipe never exits.
 */
export class Launcher extends TypedEventEmitter<LauncherEventMap> {
  private readonly file: string;
  private readonly path: string;
  private readonly env: readonly string[];
  private readonly childEnv: Record<string, string>;
  private readonly args: readonly string[];
  private readonly scope: CancellationScope;
  private readonly pipes: PipeSet;
  private readonly cwd: string | undefined;
  private readonly killSignal: KillSignal;
  private readonly killGracePeriodMs: number | undefined;
  private readonly log: Logger;
  private processLog: Logger;
  private readonly spawner: ProcessSpawner;

  private state: LauncherState = "initialized";
  private child: ChildHandle | undefined;
  private exit: Promise<ExitStatus> | undefined;
  private exitStatus: ExitStatus | undefined;
  private startedAt = 0;
  private canceledWhileRunning: CanceledError | undefined;
  private killTimer: ReturnType<typeof setTimeout> | undefined;

  private constructor(init: LauncherInit) {
    super();
    this.file = init.file;
    this.path = init.path;
    this.env = init.env;
    this.childEnv = init.childEnv;
    this.args = init.args;
    this.scope = init.scope;
    this.cwd = init.cwd;
    this.killSignal = init.killSignal;
    this.killGracePeriodMs = init.killGracePeriodMs;
    this.log = init.logger.child({ file: init.file });
    this.processLog = this.log;
    this.spawner = init.spawner;
    this.pipes = new PipeSet(this.log);

    this.scope.onCancel((reason) => this.onScopeCancelled(reason));
  }

  /**
   * Prepare, but do not spawn, `file` with exactly `env` as its environment.
   * Throws MissingScopeError, NotFoundError, ConfigError, or the CanceledError of
   * a parent that has already ended. The derived scope never outlives a failure.
   */
  static create(
    parent: ParentScope | null | undefined,
    file: string,
    env: readonly string[] = [],
    args: readonly string[] = [],
    options: LauncherOptions = {},
  ): Launcher {
    if (!parent) throw new MissingScopeError();
    const resolved = resolveLauncherOptions(options);

    const scope = CancellationScope.derive(parent);
    try {
      const path = resolved.resolver.resolve(file);
      const childEnv = parseEnvEntries(env);
      scope.throwIfCancelled();

      return new Launcher({
        file,
        path,
        env: [...env],
        childEnv,
        args: [...args],
        scope,
        cwd: resolved.cwd,
        killSignal: resolved.killSignal,
        killGracePeriodMs: resolved.killGracePeriodMs,
        logger: resolved.logger,
        spawner: resolved.spawner,
      });
    } catch (err) {
      scope.cancel(err);
      scope.dispose();
      throw err;
    }
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  getFile(): string {
    return this.file;
  }

  /** Resolved path, fixed at construction. */
  getPath(): string {
    return this.path;
  }

  /** Copy of the argument vector, without the program name. */
  getArgs(): string[] {
    return [...this.args];
  }

  /** Copy of the `KEY=VALUE` entries the launcher was created with. */
  getEnv(): string[] {
    return [...this.env];
  }

  getState(): LauncherState {
    return this.state;
  }

  getPid(): number | undefined {
    return this.child?.pid;
  }

  getExitStatus(): ExitStatus | undefined {
    return this.exitStatus ? { ...this.exitStatus } : undefined;
  }

  isStarted(): boolean {
    return this.child !== undefined;
  }

  isRunning(): boolean {
    return this.child !== undefined && this.exitStatus === undefined && !this.scope.isCancelled;
  }

  /** Child stdout; readable from construction, ends when the process does. */
  get stdout(): Readable {
    return this.pipes.stdout;
  }

  /** Child stderr; readable from construction, ends when the process does. */
  get stderr(): Readable {
    return this.pipes.stderr;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Spawn the process. Resolves once the OS has created it. */
  async start(): Promise<void> {
    this.scope.throwIfCancelled();
    if (!this.transition("starting")) throw new AlreadyStartedError();

    this.log.debug("Spawning process", { path: this.path, args: this.args.join(" ") });

    let child: ChildHandle;
    try {
      child = await this.spawner.spawn({
        path: this.path,
        args: [...this.args],
        env: { ...this.childEnv },
        cwd: this.cwd,
      });
    } catch (err) {
      this.log.warn("Spawn failed", { path: this.path, error: err });
      this.transition("terminated");
      this.pipes.abandon();
      throw err;
    }

    this.child = child;
    this.processLog = this.log.child({ pid: child.pid });
    this.startedAt = Date.now();
    this.transition("started");
    this.pipes.connect(child);
    this.exit = this.monitorExit(child);
    this.emit("spawned", { pid: child.pid });

    // Fires immediately if the scope ended while the spawn was in flight.
    this.scope.onCancel((reason) => this.terminate(child, reason));
  }

  /** Spawn the process and wait for it to exit successfully. */
  async run(): Promise<void> {
    this.scope.throwIfCancelled();
    await this.start();
    const status = await this.wait();

    if (this.canceledWhileRunning) throw this.canceledWhileRunning;
    if (status.exitCode !== 0) throw new ExitError(status.exitCode, status.signal);
  }

  /** Wait for the spawned process to exit. */
  wait(): Promise<ExitStatus> {
    if (!this.exit) return Promise.reject(new NotStartedError());
    return this.exit;
  }

  /** End the scope; kills a running process and suppresses any later spawn. */
  cancel(reason?: unknown): void {
    this.scope.cancel(reason);
  }

  /**
   * Cancel the scope and release the stdin writer. Safe to repeat. Rejects only
   * if the writer could not be released.
   */
  async close(): Promise<void> {
    this.scope.cancel();
    this.scope.dispose();
    await this.pipes.releaseWriter();
  }

  // ---------------------------------------------------------------------------
  // I/O
  // ---------------------------------------------------------------------------

  /**
   * Send the whole buffer to the child's stdin. Rejects with
   * IncompleteTransferError if the pipe goes away before every byte is handed
   * on; the delivered prefix is not retried.
   */
  async sendStdIn(data: Uint8Array | string): Promise<void> {
    this.scope.throwIfCancelled();
    const chunk = typeof data === "string" ? Buffer.from(data) : Buffer.from(data);
    if (chunk.length === 0) return;
    await this.pipes.write(chunk);
  }

  /** Signal end-of-input to the child without ending the scope. Safe to repeat. */
  async closeStdIn(): Promise<void> {
    await this.pipes.releaseWriter();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private transition(to: LauncherState): boolean {
    if (!isLauncherTransitionAllowed(this.state, to)) return false;
    this.state = to;
    return true;
  }

  private onScopeCancelled(reason: CanceledError): void {
    this.processLog.debug("Scope canceled", { state: this.state, reason });
    if (this.state === "initialized") {
      this.transition("terminated");
      this.pipes.abandon();
    }
    // The process, if any, already finished on its own.
    if (this.exitStatus) return;
    this.emit("canceled", { reason });
  }

  private terminate(child: ChildHandle, reason: CanceledError): void {
    if (this.exitStatus) return;
    this.canceledWhileRunning = reason;

    this.processLog.info("Terminating process", { signal: this.killSignal });
    child.kill(this.killSignal);

    if (this.killGracePeriodMs !== undefined && this.killSignal !== "SIGKILL") {
      this.killTimer = setTimeout(() => {
        this.killTimer = undefined;
        if (this.exitStatus) return;
        this.processLog.warn("Force-killing process", { gracePeriodMs: this.killGracePeriodMs });
        child.kill("SIGKILL");
      }, this.killGracePeriodMs);
    }
  }

  private async monitorExit(child: ChildHandle): Promise<ExitStatus> {
    const status = await child.exited;
    this.exitStatus = status;
    if (this.killTimer !== undefined) {
      clearTimeout(this.killTimer);
      this.killTimer = undefined;
    }
    this.transition("terminated");
    this.scope.dispose();

    const uptimeMs = Date.now() - this.startedAt;
    this.processLog.info("Process exited", {
      exitCode: status.exitCode,
      signal: status.signal,
      uptimeMs,
    });
    this.emit("exited", { pid: child.pid, ...status, uptimeMs });
    return { ...status };
  }
}
