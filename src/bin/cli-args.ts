import { z } from "zod";
import { envEntrySchema } from "../config/config-schema.js";

export interface CliConfig {
  file: string;
  args: string[];
  env: string[];
  inheritEnv: boolean;
  cwd?: string;
  timeoutMs?: number;
  graceMs?: number;
  verbose: boolean;
}

export type ParsedCli =
  | { kind: "run"; config: CliConfig }
  | { kind: "help" }
  | { kind: "error"; message: string };

export const USAGE = `
  procward — run one command under a cancellation scope

  Usage: procward [options] -- <file> [args...]

  Options:
    --timeout <ms>         Cancel the command after <ms> milliseconds (exit 124)
    --env KEY=VALUE        Add an environment entry (repeatable)
    --inherit-env          Start from this process's environment
    --cwd <dir>            Working directory for the command
    --grace <ms>           Send SIGTERM first, SIGKILL after <ms>
    --verbose, -v          Debug logging to stderr
    --help, -h             Show this help
`;

const millis = z.coerce.number().int().positive();

/** Parse argv without the node binary and script path. */
export function parseCliArgs(argv: readonly string[]): ParsedCli {
  const config: Omit<CliConfig, "file" | "args"> = {
    env: [],
    inheritEnv: false,
    verbose: false,
  };

  let i = 0;
  const value = (): string | undefined => {
    const next = argv[i + 1];
    if (next === undefined || next === "--") return undefined;
    i++;
    return next;
  };

  for (; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--") {
      i++;
      break;
    }
    if (!arg.startsWith("-")) break;

    switch (arg) {
      case "--timeout":
      case "--grace": {
        const raw = value();
        if (raw === undefined) return { kind: "error", message: `${arg} requires a value` };
        const parsed = millis.safeParse(raw);
        if (!parsed.success) {
          return { kind: "error", message: `${arg} requires a positive integer, got "${raw}"` };
        }
        if (arg === "--timeout") config.timeoutMs = parsed.data;
        else config.graceMs = parsed.data;
        break;
      }
      case "--env": {
        const raw = value();
        if (raw === undefined) return { kind: "error", message: "--env requires KEY=VALUE" };
        if (!envEntrySchema.safeParse(raw).success) {
          return { kind: "error", message: `--env requires KEY=VALUE, got "${raw}"` };
        }
        config.env.push(raw);
        break;
      }
      case "--inherit-env":
        config.inheritEnv = true;
        break;
      case "--cwd": {
        const raw = value();
        if (raw === undefined || raw === "") {
          return { kind: "error", message: "--cwd requires a directory" };
        }
        config.cwd = raw;
        break;
      }
      case "--verbose":
      case "-v":
        config.verbose = true;
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      default:
        return { kind: "error", message: `Unknown option: ${arg}` };
    }
  }

  const [file, ...args] = argv.slice(i);
  if (file === undefined || file === "") return { kind: "error", message: "missing command" };
  return { kind: "run", config: { ...config, file, args } };
}

/** Environment entries for the child: optionally the inherited ones, then the explicit ones. */
export function buildChildEnv(config: CliConfig, inherited: NodeJS.ProcessEnv): string[] {
  const entries: string[] = [];
  if (config.inheritEnv) {
    for (const [key, val] of Object.entries(inherited)) {
      if (val !== undefined && key !== "" && !key.includes("=")) entries.push(`${key}=${val}`);
    }
  }
  return [...entries, ...config.env];
}
