import { accessSync, constants, statSync } from "node:fs";
import { delimiter, isAbsolute, join, resolve as resolvePath, sep } from "node:path";
import { NotFoundError } from "../errors.js";
import type { PathResolver } from "../interfaces/path-resolver.js";

export interface DefaultPathResolverOptions {
  /** Environment whose PATH (and PATHEXT on Windows) is searched. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

/**
 * PATH search following the host shell's rules: a name containing a separator
 * is checked as given, anything else is looked up directory by directory.
 */
export class DefaultPathResolver implements PathResolver {
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform = process.platform;

  constructor(options: DefaultPathResolverOptions = {}) {
    this.env = options.env ?? process.env;
  }

  resolve(file: string): string {
    if (file === "") throw new NotFoundError(file);

    if (this.hasSeparator(file)) {
      const found = this.findExecutable(isAbsolute(file) ? file : resolvePath(file));
      if (found) return found;
      throw new NotFoundError(file);
    }

    for (const dir of this.searchPath()) {
      const found = this.findExecutable(join(dir, file));
      if (found) return found;
    }
    throw new NotFoundError(file);
  }

  private hasSeparator(file: string): boolean {
    return file.includes("/") || (this.platform === "win32" && file.includes(sep));
  }

  private searchPath(): string[] {
    const raw = this.platform === "win32" ? (this.env.PATH ?? this.env.Path) : this.env.PATH;
    return (raw ?? "").split(delimiter).filter((dir) => dir !== "" && isAbsolute(dir));
  }

  private findExecutable(candidate: string): string | undefined {
    if (this.platform !== "win32") {
      return isExecutableFile(candidate, constants.X_OK) ? candidate : undefined;
    }
    for (const ext of ["", ...this.windowsExtensions()]) {
      const withExt = candidate + ext;
      if (isExecutableFile(withExt, constants.F_OK)) return withExt;
    }
    return undefined;
  }

  private windowsExtensions(): string[] {
    const raw = this.env.PATHEXT ?? ".COM;.EXE;.BAT;.CMD";
    return raw.split(";").filter((ext) => ext !== "");
  }
}

function isExecutableFile(candidate: string, mode: number): boolean {
  try {
    if (!statSync(candidate).isFile()) return false;
    accessSync(candidate, mode);
    return true;
  } catch {
    // Missing, unreadable, or not executable
    return false;
  }
}
