import type { Readable, Writable } from "node:stream";

export type KillSignal = "SIGTERM" | "SIGKILL" | "SIGINT";

/** How a process ended. `exitCode` is null when a signal terminated it. */
export interface ExitStatus {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/** A spawned process with its three standard pipes. */
export interface ChildHandle {
  readonly pid: number;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** Resolves when the process exits. */
  readonly exited: Promise<ExitStatus>;
  kill(signal?: KillSignal): void;
}

export interface SpawnOptions {
  /** Resolved executable path. */
  path: string;
  /** Arguments, excluding the program name. */
  args: string[];
  /** The complete child environment. */
  env: Record<string, string>;
  cwd?: string;
}

export interface ProcessSpawner {
  /** Resolves once the OS has created the process; spawn failures reject verbatim. */
  spawn(options: SpawnOptions): Promise<ChildHandle>;
}
