#!/usr/bin/env node
import { constants } from "node:os";
import { finished } from "node:stream/promises";
import { StructuredLogger } from "../adapters/structured-logger.js";
import { CancellationScope } from "../core/cancellation-scope.js";
import { Launcher } from "../core/launcher.js";
import { CanceledError, ConfigError, ExitError, errorMessage, NotFoundError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { buildChildEnv, type CliConfig, parseCliArgs, USAGE } from "./cli-args.js";

// ── Exit codes ─────────────────────────────────────────────────────────────

const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;
const EXIT_TIMEOUT = 124;
const EXIT_NOT_FOUND = 127;
const EXIT_CANCELED = 130;

function exitCodeFor(err: unknown): number {
  if (err instanceof ExitError) {
    if (err.exitCode !== null) return err.exitCode;
    const signalNumber = Object.entries(constants.signals).find(([name]) => name === err.signal);
    return signalNumber ? 128 + signalNumber[1] : EXIT_FAILURE;
  }
  if (err instanceof CanceledError) return err.timedOut ? EXIT_TIMEOUT : EXIT_CANCELED;
  if (err instanceof NotFoundError) return EXIT_NOT_FOUND;
  if (err instanceof ConfigError) return EXIT_USAGE;
  return EXIT_FAILURE;
}

// ── Stdin forwarding ───────────────────────────────────────────────────────

async function forwardStdin(launcher: Launcher): Promise<void> {
  for await (const chunk of process.stdin) {
    await launcher.sendStdIn(typeof chunk === "string" ? chunk : Buffer.from(chunk));
  }
  await launcher.closeStdIn();
}

// ── Main ───────────────────────────────────────────────────────────────────

async function run(config: CliConfig, logger: Logger): Promise<number> {
  const root = new AbortController();
  const scope =
    config.timeoutMs !== undefined
      ? CancellationScope.withTimeout(root.signal, config.timeoutMs)
      : CancellationScope.derive(root.signal);

  const launcher = Launcher.create(
    scope,
    config.file,
    buildChildEnv(config, process.env),
    config.args,
    { cwd: config.cwd, killGracePeriodMs: config.graceMs, logger },
  );

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info("Received signal, cancelling", { signal });
      root.abort(new Error(`received ${signal}`));
    });
  }

  launcher.stdout.pipe(process.stdout, { end: false });
  launcher.stderr.pipe(process.stderr, { end: false });
  const drained = Promise.all([finished(launcher.stdout), finished(launcher.stderr)]).catch(
    (err: unknown) => {
      logger.debug("Output pipe closed with error", { error: err });
    },
  );

  // Input read before the spawn completes is buffered for the child.
  forwardStdin(launcher).catch((err: unknown) => {
    logger.debug("Stopped forwarding stdin", { error: err });
  });

  try {
    await launcher.run();
    return 0;
  } finally {
    await drained;
    scope.dispose();
  }
}

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (parsed.kind === "help") {
    console.log(USAGE);
    process.exit(0);
  }
  if (parsed.kind === "error") {
    console.error(`procward: ${parsed.message}\nRun with --help for usage.`);
    process.exit(EXIT_USAGE);
  }

  const logger = new StructuredLogger({
    component: "procward",
    level: parsed.config.verbose ? "debug" : "warn",
  });

  try {
    process.exit(await run(parsed.config, logger));
  } catch (err) {
    if (!(err instanceof ExitError) && !(err instanceof CanceledError)) {
      console.error(`procward: ${errorMessage(err)}`);
    }
    process.exit(exitCodeFor(err));
  }
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
