/**
 * Text rendering of task graphs for `graphbuild show`, by piping DOT through
 * the external `graph-easy` program.
 */

import { defaultProcessRunner, type ProcessInvocation, type ProcessRunner } from "./process-runner.js";

export type GraphEasyFormat = "ascii" | "boxart";

const GRAPH_EASY = "graph-easy";
const VERSION_TIMEOUT_MS = 5_000;
const RENDER_TIMEOUT_MS = 30_000;

function invocation(args: string[], timeoutMs: number, input?: string): ProcessInvocation {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return { executable: GRAPH_EASY, args, cwd: process.cwd(), env, timeoutMs, input };
}

/**
 * Whether `graph-easy` can be started. Its exit status is ignored: some
 * versions exit non-zero for `--version`.
 */
export async function hasGraphEasy(runner: ProcessRunner = defaultProcessRunner): Promise<boolean> {
  const result = await runner(invocation(["--version"], VERSION_TIMEOUT_MS));
  return result.spawnError === undefined;
}

/** Render `dot` as text drawing in the given format. */
export async function runGraphEasy(
  dot: string,
  format: GraphEasyFormat,
  runner: ProcessRunner = defaultProcessRunner,
): Promise<string> {
  if (format !== "ascii" && format !== "boxart") {
    throw new Error(`Invalid graph-easy format: ${String(format)}`);
  }
  const result = await runner(invocation(["--from=dot", `--as=${format}`], RENDER_TIMEOUT_MS, dot));
  if (result.spawnError !== undefined) {
    throw new Error(`graph-easy failed: ${result.spawnError}`);
  }
  if (result.timedOut) {
    throw new Error(`graph-easy failed: timed out after ${RENDER_TIMEOUT_MS}ms`);
  }
  if (result.exitCode !== 0) {
    const reason = result.stderr.trim() || `exit ${result.exitCode ?? result.signal ?? "unknown"}`;
    throw new Error(`graph-easy failed: ${reason}`);
  }
  return result.stdout;
}
