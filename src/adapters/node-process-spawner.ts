import { spawn as nodeSpawn } from "node:child_process";
import type { Logger } from "../interfaces/logger.js";
import type {
  ChildHandle,
  ExitStatus,
  KillSignal,
  ProcessSpawner,
  SpawnOptions,
} from "../interfaces/process-spawner.js";
import { noopLogger } from "../utils/noop-logger.js";

/** ProcessSpawner over node:child_process with all three stdio streams piped. */
export class NodeProcessSpawner implements ProcessSpawner {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  spawn(options: SpawnOptions): Promise<ChildHandle> {
    return new Promise<ChildHandle>((resolve, reject) => {
      const child = nodeSpawn(options.path, options.args, {
        cwd: options.cwd,
        env: options.env,
      });

      // Registered before "spawn"/"error" can fire so no exit is missed.
      const exited = new Promise<ExitStatus>((resolveExit) => {
        child.once("exit", (exitCode, signal) => resolveExit({ exitCode, signal }));
      });

      const onSpawnError = (err: Error) => reject(err);
      child.once("error", onSpawnError);

      child.once("spawn", () => {
        child.off("error", onSpawnError);
        // Later errors come from kill() or pipe teardown; the handle reports them through exit.
        const log = this.logger.child({ pid: child.pid });
        child.on("error", (err) => {
          log.debug("Child process error", { error: err });
        });

        const pid = child.pid;
        if (typeof pid !== "number") {
          reject(new Error(`Failed to spawn process: ${options.path}`));
          return;
        }

        resolve({
          pid,
          stdin: child.stdin,
          stdout: child.stdout,
          stderr: child.stderr,
          exited,
          kill(signal: KillSignal = "SIGTERM") {
            try {
              child.kill(signal);
            } catch {
              // Process may already be dead
            }
          },
        });
      });
    });
  }
}
