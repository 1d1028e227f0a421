/**
 * buildfile-resolution.ts: locate the build file for a CLI invocation.
 *
 * Precedence:
 *   1. `--file <path>` (absolute or relative to cwd)
 *   2. `$GRAPHBUILD_FILE`
 *   3. the nearest `build.kdl` in cwd or any parent directory
 */

import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { BuildError } from "./errors.js";

export const BUILD_FILE_NAME = "build.kdl";
export const BUILD_FILE_ENV = "GRAPHBUILD_FILE";

export type ResolveBuildFileOptions = {
  cwd: string;
  /** Explicit path from `--file`. */
  file?: string;
  env?: Record<string, string | undefined>;
  /** Directory the upward search stops at (inclusive). Defaults to the filesystem root. */
  stopAt?: string;
};

/** Thrown when no build file can be found. */
export class BuildFileResolutionError extends BuildError {
  readonly searchedLocations: string[];

  constructor(message: string, searchedLocations: string[]) {
    super(message, "build_file");
    this.name = "BuildFileResolutionError";
    this.searchedLocations = searchedLocations;
  }
}

function explicit(cwd: string, ref: string, origin: string): string {
  const path = resolve(cwd, ref);
  if (existsSync(path)) return path;
  throw new BuildFileResolutionError(`Build file not found: ${path} (from ${origin})`, [path]);
}

export function resolveBuildFile(opts: ResolveBuildFileOptions): string {
  const { cwd } = opts;

  if (opts.file) return explicit(cwd, opts.file, "--file");

  const fromEnv = (opts.env ?? process.env)[BUILD_FILE_ENV];
  if (fromEnv) return explicit(cwd, fromEnv, BUILD_FILE_ENV);

  const searched: string[] = [];
  const stopAt = opts.stopAt ? resolve(opts.stopAt) : undefined;
  let dir = resolve(cwd);
  while (true) {
    const candidate = join(dir, BUILD_FILE_NAME);
    searched.push(candidate);
    if (existsSync(candidate)) return candidate;

    const parent = dirname(dir);
    if (parent === dir || dir === stopAt) break;
    dir = parent;
  }

  throw new BuildFileResolutionError(
    `No ${BUILD_FILE_NAME} found in ${resolve(cwd)} or any parent directory.\n` +
    `Pass --file <path> or set ${BUILD_FILE_ENV}.`,
    searched,
  );
}
