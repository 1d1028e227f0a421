/**
 * Subprocess execution for `exec` actions.
 *
 * Programs run without a shell: the executable and argument list are passed
 * through as given. Output is captured in full and surfaced verbatim on
 * failure. There is no default timeout.
 */

import { spawn } from "node:child_process";

export type ProcessInvocation = {
  executable: string;
  args: string[];
  cwd: string;
  /** Complete environment for the child; nothing else is inherited. */
  env: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Written to the child's stdin, which is closed afterwards. */
  input?: string;
};

export type ProcessResult = {
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  cancelled: boolean;
  /** Set when the program could not be started (ENOENT, EACCES, ...). */
  spawnError?: string;
};

/** Runs one subprocess to completion. Injectable for tests. */
export type ProcessRunner = (invocation: ProcessInvocation) => Promise<ProcessResult>;

/** Delay between SIGTERM and SIGKILL when a child is terminated. */
export const KILL_GRACE_MS = 5_000;

export const defaultProcessRunner: ProcessRunner = (invocation) => {
  const startTime = Date.now();

  if (invocation.signal?.aborted) {
    return Promise.resolve({
      exitCode: null,
      signal: null,
      stdout: "",
      stderr: "",
      durationMs: 0,
      timedOut: false,
      cancelled: true,
    });
  }

  return new Promise((resolve) => {
    const child = spawn(invocation.executable, invocation.args, {
      cwd: invocation.cwd,
      env: invocation.env,
      stdio: ["pipe", "pipe", "pipe"],
      windowsHide: true,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    // EPIPE when the child exits without reading its input; the exit status reports it.
    child.stdin.on("error", () => undefined);
    child.stdin.end(invocation.input ?? "");

    let settled = false;
    let timedOut = false;
    let cancelled = false;
    let timeoutTimer: ReturnType<typeof setTimeout> | undefined;
    let killTimer: ReturnType<typeof setTimeout> | undefined;

    const terminate = () => {
      if (child.exitCode !== null || child.signalCode !== null) return;
      child.kill("SIGTERM");
      killTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) child.kill("SIGKILL");
      }, KILL_GRACE_MS);
      killTimer.unref();
    };

    const onAbort = () => {
      cancelled = true;
      terminate();
    };
    invocation.signal?.addEventListener("abort", onAbort, { once: true });

    if (invocation.timeoutMs !== undefined && invocation.timeoutMs > 0) {
      timeoutTimer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, invocation.timeoutMs);
    }

    const finish = (result: Pick<ProcessResult, "exitCode" | "signal" | "spawnError">) => {
      if (settled) return;
      settled = true;
      if (timeoutTimer) clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
      invocation.signal?.removeEventListener("abort", onAbort);
      resolve({
        ...result,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        durationMs: Date.now() - startTime,
        timedOut,
        cancelled,
      });
    };

    child.on("error", (err) => {
      finish({ exitCode: null, signal: null, spawnError: err.message });
    });
    child.on("close", (code, signal) => {
      finish({ exitCode: code, signal: signal ?? null });
    });
  });
};
