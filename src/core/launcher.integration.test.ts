import type { Readable } from "node:stream";
import { afterEach, describe, expect, it } from "vitest";
import { CanceledError, ExitError, NotFoundError } from "../errors.js";
import { Launcher } from "./launcher.js";

const isWindows = process.platform === "win32";

async function collect(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) chunks.push(Buffer.from(chunk));
  return Buffer.concat(chunks).toString();
}

describe.skipIf(isWindows)("Launcher with real processes", () => {
  const parent = new AbortController();
  const launchers: Launcher[] = [];

  function create(file: string, env: string[] = [], args: string[] = []): Launcher {
    const launcher = Launcher.create(parent.signal, file, env, args);
    launchers.push(launcher);
    return launcher;
  }

  afterEach(async () => {
    await Promise.all(launchers.splice(0).map((launcher) => launcher.close()));
  });

  it("reads a process's output and stops it on cancel", async () => {
    const launcher = create("echo", [], ["foo"]);
    const output = collect(launcher.stdout);

    await launcher.start();
    expect(launcher.isStarted()).toBe(true);

    expect(await output).toBe("foo\n");
    launcher.cancel();
    expect(launcher.isRunning()).toBe(false);
  });

  it("delivers stdin across several sends", async () => {
    const launcher = create("sh", [], ["-c", 'read line; printf %s "$line"']);
    const output = collect(launcher.stdout);

    await launcher.start();
    for (const part of ["foo", " ", "bar", "\n"]) {
      await launcher.sendStdIn(part);
    }

    expect(await output).toBe("foo bar");
    await expect(launcher.wait()).resolves.toEqual({ exitCode: 0, signal: null });
  });

  it("lets the child see end-of-input without cancelling it", async () => {
    const launcher = create("wc", [], ["-c"]);
    const output = collect(launcher.stdout);

    await launcher.start();
    await launcher.sendStdIn("abcd");
    await launcher.closeStdIn();

    expect((await output).trim()).toBe("4");
    await expect(launcher.wait()).resolves.toEqual({ exitCode: 0, signal: null });
  });

  it("runs to completion", async () => {
    const launcher = create("echo", [], ["done"]);
    launcher.stdout.resume();

    await launcher.run();

    expect(launcher.isStarted()).toBe(true);
    expect(launcher.isRunning()).toBe(false);
  });

  it("refuses to run after cancel", async () => {
    const launcher = create("echo", [], ["never"]);
    launcher.cancel();

    await expect(launcher.run()).rejects.toBeInstanceOf(CanceledError);
    expect(launcher.isStarted()).toBe(false);
  });

  it("passes exactly the given environment", async () => {
    const launcher = create("sh", ["XYZ=ABC"], ["-c", 'printf "%s|%s" "$XYZ" "$HOME"']);
    const output = collect(launcher.stdout);

    await launcher.run();

    expect(await output).toBe("ABC|");
  });

  it("reports a non-zero exit", async () => {
    const launcher = create("sh", [], ["-c", "exit 3"]);

    const err = await launcher.run().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExitError);
    expect(err instanceof ExitError && err.exitCode).toBe(3);
  });

  it("kills a long-running process", async () => {
    const launcher = create("sleep", [], ["30"]);
    await launcher.start();

    launcher.cancel();

    await expect(launcher.wait()).resolves.toEqual({ exitCode: null, signal: "SIGKILL" });
  });

  it("fails to resolve an unknown program", () => {
    expect(() => Launcher.create(parent.signal, "zzzUnknownzzz")).toThrow(NotFoundError);
  });
});
