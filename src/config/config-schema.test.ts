import { describe, expect, it } from "vitest";
import { DefaultPathResolver } from "../adapters/default-path-resolver.js";
import { NodeProcessSpawner } from "../adapters/node-process-spawner.js";
import { ConfigError } from "../errors.js";
import { MockProcessSpawner } from "../testing/mock-process-spawner.js";
import {
  DEFAULT_KILL_SIGNAL,
  parseEnvEntries,
  resolveLauncherOptions,
} from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";

describe("launcher options validation", () => {
  it("applies defaults for omitted fields", () => {
    const options = resolveLauncherOptions();

    expect(options.cwd).toBeUndefined();
    expect(options.killSignal).toBe(DEFAULT_KILL_SIGNAL);
    expect(options.killGracePeriodMs).toBeUndefined();
    expect(options.logger).toBe(noopLogger);
    expect(options.spawner).toBeInstanceOf(NodeProcessSpawner);
    expect(options.resolver).toBeInstanceOf(DefaultPathResolver);
  });

  it("defaults to SIGTERM when a grace period is configured", () => {
    const options = resolveLauncherOptions({ killGracePeriodMs: 250 });

    expect(options.killSignal).toBe("SIGTERM");
    expect(options.killGracePeriodMs).toBe(250);
  });

  it("keeps an explicit kill signal", () => {
    expect(resolveLauncherOptions({ killSignal: "SIGINT" }).killSignal).toBe("SIGINT");
  });

  it("keeps injected collaborators", () => {
    const spawner = new MockProcessSpawner();
    expect(resolveLauncherOptions({ spawner }).spawner).toBe(spawner);
  });

  it("rejects zero or negative grace periods", () => {
    expect(() => resolveLauncherOptions({ killGracePeriodMs: 0 })).toThrow(
      "Invalid configuration",
    );
    expect(() => resolveLauncherOptions({ killGracePeriodMs: -5 })).toThrow(ConfigError);
  });

  it("rejects non-integer grace periods", () => {
    expect(() => resolveLauncherOptions({ killGracePeriodMs: 1.5 })).toThrow(
      "Invalid configuration",
    );
  });

  it("rejects an empty working directory", () => {
    expect(() => resolveLauncherOptions({ cwd: "" })).toThrow("Invalid configuration");
  });
});

describe("parseEnvEntries", () => {
  it("splits entries at the first equals sign", () => {
    expect(parseEnvEntries(["XYZ=ABC", "EXPR=a=b", "EMPTY="])).toEqual({
      XYZ: "ABC",
      EXPR: "a=b",
      EMPTY: "",
    });
  });

  it("lets later duplicates win", () => {
    expect(parseEnvEntries(["K=1", "K=2"])).toEqual({ K: "2" });
  });

  it("keeps keys that collide with Object.prototype as plain variables", () => {
    const env = parseEnvEntries(["__proto__=x", "constructor=y", "A=1"]);

    expect(Object.keys(env)).toEqual(["__proto__", "constructor", "A"]);
    expect(Object.getOwnPropertyDescriptor(env, "__proto__")?.value).toBe("x");
    expect(Object.getPrototypeOf(env)).toBe(Object.prototype);
  });

  it("returns an empty environment for no entries", () => {
    expect(parseEnvEntries([])).toEqual({});
  });

  it("rejects entries without a key or separator", () => {
    expect(() => parseEnvEntries(["NOSEPARATOR"])).toThrow(ConfigError);
    expect(() => parseEnvEntries(["=value"])).toThrow(ConfigError);
  });

  it("rejects NUL bytes", () => {
    expect(() => parseEnvEntries(["K=a\0b"])).toThrow('Invalid environment entry "K=a\\u0000b"');
  });
});
