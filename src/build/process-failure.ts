/**
 * Subprocess failure diagnostics: best-effort digest extraction.
 *
 * Classifies a finished {@link ProcessResult} and condenses its output into a
 * one-line digest, with extra parsing for common test runners.
 */

import { SubprocessFailure } from "./errors.js";
import type { ProcessResult } from "./process-runner.js";
import type { ProcessFailureClass } from "./types.js";
export type { ProcessFailureClass };

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/** Failure class of a finished process, or undefined if it succeeded. */
export function classifyResult(result: ProcessResult): ProcessFailureClass | undefined {
  if (result.cancelled) return "cancelled";
  if (result.timedOut) return "timeout";
  if (result.spawnError !== undefined) return "spawn_error";
  if (result.exitCode !== 0) return "exit_nonzero";
  return undefined;
}

// ---------------------------------------------------------------------------
// Tail extraction helper
// ---------------------------------------------------------------------------

const TAIL_LINES = 30;
const TAIL_MAX_CHARS = 4096;

/**
 * Extract the last N lines of output, capped at a maximum character count.
 */
export function extractTail(text: string, maxLines = TAIL_LINES, maxChars = TAIL_MAX_CHARS): string {
  if (!text) return "";
  const lines = text.replace(/\n$/, "").split("\n");
  const tail = lines.slice(-maxLines).join("\n");
  if (tail.length <= maxChars) return tail;
  return tail.slice(-maxChars);
}

/** Render an argv for display, quoting arguments that contain whitespace. */
export function formatCommand(executable: string, args: readonly string[]): string {
  return [executable, ...args]
    .map((part) => (/[\s"']/.test(part) || part === "" ? JSON.stringify(part) : part))
    .join(" ");
}

// ---------------------------------------------------------------------------
// Test runner output
// ---------------------------------------------------------------------------

/** Whether a command looks like a test runner invocation. */
export function isTestRunnerCommand(command: string): boolean {
  return /\b(?:pytest|nosetests|vitest|jest|mocha)\b/i.test(command) ||
    /\bnpm\s+(?:run\s+)?test\b/i.test(command) ||
    /\b(?:mvn|ant|gradle)\b.*\btest\b/i.test(command) ||
    /(?:-m\s+(?:nose|unittest)\b|\bsetup\.py\s+test\b)/.test(command);
}

const FAILING_CHECK_PATTERNS: readonly RegExp[] = [
  // unittest / nose: "FAIL: test_name (module.Class)"
  /^\s*(?:FAIL|ERROR):\s+(\S.*?)\s*$/m,
  // pytest: "FAILED tests/test_x.py::test_name - AssertionError"
  /^\s*FAILED\s+(\S+)/m,
  // Vitest: "FAIL  src/foo.test.ts > suite > test name"
  /^\s*(?:FAIL|×|✘)\s+(.+?)\s*$/m,
  // Jest: "● Suite › Test name"
  /^\s*●\s+(.+?)\s*$/m,
  // TAP: "not ok 1 - test description"
  /^\s*not ok\s+\d+\s*[-–]\s*(.+?)\s*$/m,
];

/**
 * Try to extract the name of the first failing check from combined output.
 */
export function extractFirstFailingCheck(stdout: string, stderr: string): string | undefined {
  const combined = stdout + "\n" + stderr;
  for (const pattern of FAILING_CHECK_PATTERNS) {
    const match = combined.match(pattern);
    if (match?.[1]) {
      return match[1].trim().slice(0, 200);
    }
  }
  return undefined;
}

const TEST_SUMMARY_PATTERNS: readonly RegExp[] = [
  // Jest: "Tests:  X failed, Y passed, Z total"
  /Tests:\s+(\d+\s+failed.*?)$/m,
  // unittest: "FAILED (failures=2, errors=1)"
  /^(FAILED \((?:failures|errors)=.*?\))\s*$/m,
  // pytest: "=== 2 failed, 10 passed in 1.2s ==="
  /^=+\s*(\d+\s+failed.*?)\s*=+\s*$/m,
  // Maven: "Tests run: 10, Failures: 2, Errors: 0, Skipped: 0"
  /(Tests run:\s*\d+,\s*Failures:\s*[1-9]\d*.*?)$/m,
  // Generic "X failing" or "X failed"
  /(\d+\s+(?:failing|failed)(?:\s+tests?)?)/mi,
];

/**
 * Extract a concise summary line from test runner output.
 */
export function extractTestSummary(stdout: string, stderr: string): string | undefined {
  const combined = stdout + "\n" + stderr;
  for (const pattern of TEST_SUMMARY_PATTERNS) {
    const match = combined.match(pattern);
    if (match?.[1]) {
      return match[1].trim().slice(0, 200);
    }
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Digest
// ---------------------------------------------------------------------------

/**
 * Build a concise one-line digest for a subprocess failure.
 * Uses test-runner parsing when applicable, falls back to generic.
 */
export function buildDigest(opts: {
  command: string;
  failureClass: ProcessFailureClass;
  exitCode?: number | null;
  signal?: string | null;
  spawnError?: string;
  stdout: string;
  stderr: string;
}): string {
  const { command, failureClass, exitCode, signal, spawnError, stdout, stderr } = opts;

  if (failureClass === "cancelled") {
    return `Cancelled: ${command.slice(0, 80)}`;
  }

  if (failureClass === "timeout") {
    return `Timed out: ${command.slice(0, 80)}`;
  }

  if (failureClass === "spawn_error") {
    const firstLine = (spawnError ?? stderr).split("\n").find((l) => l.trim()) ?? "unknown error";
    return `Spawn error: ${firstLine.trim().slice(0, 120)}`;
  }

  if (isTestRunnerCommand(command)) {
    const summary = extractTestSummary(stdout, stderr);
    if (summary) return summary;
  }

  const stderrFirstLine = stderr.split("\n").find((l) => l.trim());
  if (stderrFirstLine) {
    return stderrFirstLine.trim().slice(0, 150);
  }

  const stdoutFirstLine = stdout.split("\n").find((l) => l.trim());
  if (stdoutFirstLine) {
    return stdoutFirstLine.trim().slice(0, 150);
  }

  if (signal) return `Killed by signal: ${signal}`;
  return `Exit code ${exitCode ?? "unknown"}`;
}

/** Wrap a failed process result in a {@link SubprocessFailure}. */
export function toSubprocessFailure(
  command: string,
  failureClass: ProcessFailureClass,
  result: ProcessResult,
  logsPath?: string,
): SubprocessFailure {
  return new SubprocessFailure({
    message: buildDigest({
      command,
      failureClass,
      exitCode: result.exitCode,
      signal: result.signal,
      spawnError: result.spawnError,
      stdout: result.stdout,
      stderr: result.stderr,
    }),
    command,
    failureClass,
    exitCode: result.exitCode,
    signal: result.signal,
    stdout: result.stdout,
    stderr: result.stderr,
    logsPath,
  });
}
