/**
 * Artifact Stager: filesystem side effects run as leaf actions.
 *
 * `ensurePresent` guards prerequisite downloads so they happen only when the
 * file is missing; `stage` replaces stale artifacts at a destination with the
 * latest build outputs.
 */

import { access, cp, mkdir, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Call `fetch` only if `path` does not exist. Returns whether it was called.
 */
export async function ensurePresent(path: string, fetch: () => Promise<void> | void): Promise<boolean> {
  if (await pathExists(path)) return false;
  await fetch();
  return true;
}

// ---------------------------------------------------------------------------
// Staging
// ---------------------------------------------------------------------------

/** Compile a `*` / `?` wildcard (comma-separated alternatives) to a basename matcher. */
export function wildcardMatcher(pattern: string): (name: string) => boolean {
  const alternatives = pattern
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean)
    .map((p) => {
      const body = p.replace(/[.+^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*").replace(/\?/g, ".");
      return new RegExp(`^${body}$`);
    });
  return (name) => alternatives.some((re) => re.test(name));
}

export type StageOptions = {
  /** Wildcard of additional stale files to delete from the destination. */
  clean?: string;
};

export type StageResult = {
  removed: string[];
  copied: string[];
};

/**
 * Copy `outputs` into `destination` after deleting what they would replace:
 * entries with the same basenames plus entries matching `clean`. Every output
 * must exist before anything is deleted.
 */
export async function stage(outputs: readonly string[], destination: string, opts: StageOptions = {}): Promise<StageResult> {
  for (const output of outputs) {
    if (!(await pathExists(output))) {
      throw new Error(`Cannot stage "${output}": file does not exist`);
    }
  }

  await mkdir(destination, { recursive: true });

  const names = new Set(outputs.map((o) => basename(o)));
  // Outputs already sitting in the destination are kept, not replaced.
  const inPlace = new Set(outputs.map((o) => resolve(o)));
  const matchesClean = opts.clean ? wildcardMatcher(opts.clean) : () => false;
  const removed: string[] = [];
  for (const entry of (await readdir(destination)).sort()) {
    if (names.has(entry) || matchesClean(entry)) {
      const target = join(destination, entry);
      if (inPlace.has(resolve(target))) continue;
      await rm(target, { recursive: true, force: true });
      removed.push(target);
    }
  }

  const copied: string[] = [];
  for (const output of outputs) {
    const target = join(destination, basename(output));
    if (resolve(output) !== resolve(target)) {
      const isDir = (await stat(output)).isDirectory();
      await cp(output, target, { recursive: isDir });
    }
    copied.push(target);
  }

  return { removed, copied };
}

// ---------------------------------------------------------------------------
// Leaf operations
// ---------------------------------------------------------------------------

export type DownloadOptions = {
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
};

/**
 * Retrieve `url` into `dest`. The body lands in a temporary file beside the
 * destination and is renamed into place once complete.
 */
export async function download(url: string, dest: string, opts: DownloadOptions = {}): Promise<void> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const response = await fetchImpl(url, { signal: opts.signal });
  if (!response.ok) {
    throw new Error(`Download of ${url} failed: HTTP ${response.status} ${response.statusText}`.trimEnd());
  }

  await mkdir(dirname(dest), { recursive: true });
  const partial = `${dest}.part-${process.pid}`;
  try {
    await writeFile(partial, Buffer.from(await response.arrayBuffer()));
    await rename(partial, dest);
  } finally {
    await rm(partial, { force: true });
  }
}

export async function removePath(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

export async function makeDirectory(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}
