import { PassThrough, pipeline } from "node:stream";
import { finished } from "node:stream/promises";
import { IncompleteTransferError, StdinClosedError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ChildHandle } from "../interfaces/process-spawner.js";

/** Error codes that mean the pipe is already gone rather than that releasing it failed. */
const TORN_DOWN_CODES: ReadonlySet<string> = new Set([
  "ERR_STREAM_PREMATURE_CLOSE",
  "ERR_STREAM_DESTROYED",
  "EPIPE",
]);

/**
 * The three standard streams of a launcher, created before the process exists.
 *
 * Callers hold the stdout/stderr readers from construction on. `connect` splices
 * the child's pipes in once it has been spawned; anything written to stdin
 * beforehand is buffered and delivered then.
 */
export class PipeSet {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  private connected = false;
  /** Rejecters of writes whose callback has not run yet. */
  private readonly pendingWrites = new Set<(cause: unknown) => void>();

  constructor(private readonly logger: Logger) {
    // A broken pipe must never surface as an unhandled 'error' event.
    for (const [name, stream] of this.streams()) {
      stream.on("error", (err) => {
        this.logger.debug("Pipe closed with error", { stream: name, error: err });
      });
    }
    // A destroyed PassThrough never calls back a write it is holding for a reader.
    this.stdin.once("close", () => {
      for (const fail of this.pendingWrites) fail(new StdinClosedError());
      this.pendingWrites.clear();
    });
  }

  get isConnected(): boolean {
    return this.connected;
  }

  connect(child: ChildHandle): void {
    if (this.connected) return;
    this.connected = true;
    const log = this.logger.child({ pid: child.pid });
    pipeline(this.stdin, child.stdin, this.onPipelineDone("stdin", log));
    pipeline(child.stdout, this.stdout, this.onPipelineDone("stdout", log));
    pipeline(child.stderr, this.stderr, this.onPipelineDone("stderr", log));
  }

  /**
   * Write the whole chunk. Resolves once it has been handed on to the child's pipe
   * (or buffered for it), waiting out backpressure. A chunk that is accepted but
   * lost to pipe teardown, or still pending when the writer closes, rejects with
   * IncompleteTransferError.
   */
  write(chunk: Uint8Array): Promise<void> {
    if (!this.stdin.writable) return Promise.reject(new StdinClosedError());
    return new Promise<void>((resolve, reject) => {
      const fail = (cause: unknown) => reject(new IncompleteTransferError({ cause }));
      this.pendingWrites.add(fail);
      this.stdin.write(chunk, (err) => {
        this.pendingWrites.delete(fail);
        if (err) {
          fail(err);
        } else {
          resolve();
        }
      });
    });
  }

  /** End the stdin writer and wait until the child's pipe has taken everything. */
  async releaseWriter(): Promise<void> {
    const writer = this.stdin;
    if (writer.destroyed || writer.writableEnded) return;

    if (!this.connected) {
      writer.destroy();
      return;
    }

    writer.end();
    try {
      await finished(writer, { readable: false });
    } catch (err) {
      if (!isTornDown(err)) throw err;
    }
  }

  /**
   * No process will ever be attached: readers see end-of-stream, the writer is
   * destroyed so buffered and later writes reject instead of waiting forever.
   */
  abandon(): void {
    if (this.connected) return;
    this.stdin.destroy();
    this.stdout.end();
    this.stderr.end();
  }

  private streams(): [string, PassThrough][] {
    return [
      ["stdin", this.stdin],
      ["stdout", this.stdout],
      ["stderr", this.stderr],
    ];
  }

  private onPipelineDone(stream: string, log: Logger): (err: NodeJS.ErrnoException | null) => void {
    return (err) => {
      if (err && !isTornDown(err)) {
        log.warn("Pipe failed", { stream, error: err });
      } else if (err) {
        log.debug("Pipe torn down", { stream, code: err.code });
      }
    };
  }
}

function isTornDown(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    TORN_DOWN_CODES.has(err.code)
  );
}
