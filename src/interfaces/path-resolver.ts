/**
 * Executable lookup.
 * @module
 */

/** Resolves a logical executable name to an invocable path; throws NotFoundError on failure. */
export interface PathResolver {
  resolve(file: string): string;
}
