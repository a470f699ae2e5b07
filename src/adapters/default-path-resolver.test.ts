import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NotFoundError } from "../errors.js";
import { DefaultPathResolver } from "./default-path-resolver.js";

describe.skipIf(process.platform === "win32")("DefaultPathResolver", () => {
  let root: string;
  let binA: string;
  let binB: string;

  function tool(dir: string, name: string, mode = 0o755): string {
    const file = join(dir, name);
    writeFileSync(file, "#!/bin/sh\nexit 0\n");
    chmodSync(file, mode);
    return file;
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "procward-path-"));
    binA = join(root, "a");
    binB = join(root, "b");
    mkdirSync(binA);
    mkdirSync(binB);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("finds a host executable on the process PATH", () => {
    const resolved = new DefaultPathResolver().resolve("sh");
    expect(resolved.endsWith("/sh")).toBe(true);
  });

  it("returns the first match in PATH order", () => {
    const first = tool(binA, "mytool");
    tool(binB, "mytool");

    const resolver = new DefaultPathResolver({ env: { PATH: `${binA}:${binB}` } });

    expect(resolver.resolve("mytool")).toBe(first);
  });

  it("skips files without the execute permission", () => {
    tool(binA, "mytool", 0o644);
    const second = tool(binB, "mytool");

    const resolver = new DefaultPathResolver({ env: { PATH: `${binA}:${binB}` } });

    expect(resolver.resolve("mytool")).toBe(second);
  });

  it("skips directories that share the name", () => {
    mkdirSync(join(binA, "mytool"));
    const second = tool(binB, "mytool");

    const resolver = new DefaultPathResolver({ env: { PATH: `${binA}:${binB}` } });

    expect(resolver.resolve("mytool")).toBe(second);
  });

  it("ignores empty and relative PATH entries", () => {
    const found = tool(binB, "mytool");

    const resolver = new DefaultPathResolver({ env: { PATH: `::relative/dir:${binB}` } });

    expect(resolver.resolve("mytool")).toBe(found);
  });

  it("checks names containing a separator directly", () => {
    const direct = tool(binA, "direct");

    const resolver = new DefaultPathResolver({ env: { PATH: binB } });

    expect(resolver.resolve(direct)).toBe(direct);
  });

  it("throws NotFoundError for an unknown name", () => {
    const resolver = new DefaultPathResolver({ env: { PATH: `${binA}:${binB}` } });

    expect(() => resolver.resolve("zzzUnknownzzz")).toThrow(NotFoundError);
  });

  it("throws NotFoundError when PATH is unset", () => {
    tool(binA, "mytool");
    const resolver = new DefaultPathResolver({ env: {} });

    expect(() => resolver.resolve("mytool")).toThrow(NotFoundError);
  });

  it("throws NotFoundError for an explicit path that is not executable", () => {
    const plain = tool(binA, "plain", 0o644);
    const resolver = new DefaultPathResolver({ env: { PATH: binA } });

    expect(() => resolver.resolve(plain)).toThrow(NotFoundError);
  });

  it("throws NotFoundError for an empty name", () => {
    expect(() => new DefaultPathResolver().resolve("")).toThrow(NotFoundError);
  });

  it("records the requested file on the error", () => {
    const resolver = new DefaultPathResolver({ env: { PATH: binA } });
    try {
      resolver.resolve("zzzUnknownzzz");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(NotFoundError);
      expect(err instanceof NotFoundError && err.file).toBe("zzzUnknownzzz");
    }
  });
});
