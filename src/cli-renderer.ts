/**
 * CLI Renderer: terminal output for graphbuild runs.
 *
 * Provides:
 * - Box-drawing banner with correct alignment
 * - Spinner with elapsed timer for running tasks
 * - Run and failure summaries
 * - Markdown rendering for test failure reports
 */

import { marked } from "marked";
import { markedTerminal } from "marked-terminal";
import type { BuildStatus, FailureSummary, TaskRecord } from "./build/types.js";

// ---------------------------------------------------------------------------
// ANSI helpers
// ---------------------------------------------------------------------------

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
} as const;

// ---------------------------------------------------------------------------
// Markdown rendering
// ---------------------------------------------------------------------------

marked.use(markedTerminal());

/**
 * Render a markdown string to ANSI-formatted terminal output.
 * Falls back to raw text if rendering fails.
 */
export function renderMarkdown(text: string): string {
  try {
    const rendered = marked.parse(text);
    if (typeof rendered === "string") {
      // marked-terminal can emit very loose spacing around lists.
      return rendered.replace(/\n{3,}/g, "\n\n").trimEnd();
    }
    return text;
  } catch (_err) {
    return text;
  }
}

// ---------------------------------------------------------------------------
// Banner
// ---------------------------------------------------------------------------

/**
 * Render the startup banner with consistent box-drawing alignment.
 * All rows have identical visible width regardless of content.
 */
export function renderBanner(opts: {
  name: string;
  file: string;
  targets: string[];
  taskCount: number;
  dryRun?: boolean;
}): string {
  const innerWidth = 52;

  // Pad to exactly innerWidth visible characters, truncating with an ellipsis.
  const pad = (text: string): string => {
    const truncated = text.length > innerWidth
      ? text.slice(0, innerWidth - 1) + "…"
      : text;
    return truncated + " ".repeat(Math.max(0, innerWidth - truncated.length));
  };

  const top     = `┌${"─".repeat(innerWidth + 2)}┐`;
  const bottom  = `└${"─".repeat(innerWidth + 2)}┘`;
  const divider = `├${"─".repeat(innerWidth + 2)}┤`;
  const row = (visible: string) => `│ ${pad(visible)} │`;

  const lines = [
    "",
    `  ${top}`,
    `  ${row(opts.dryRun ? `${opts.name} (dry run)` : opts.name)}`,
    `  ${divider}`,
    `  ${row(`File:    ${opts.file}`)}`,
    `  ${row(`Targets: ${opts.targets.join(", ")}`)}`,
    `  ${row(`Tasks:   ${opts.taskCount}`)}`,
    `  ${bottom}`,
    "",
  ];

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Spinner
// ---------------------------------------------------------------------------

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export type SpinnerStatus = "success" | "fail";

/**
 * A terminal spinner with elapsed time display.
 * Writes to stdout using ANSI cursor control for in-place updates.
 */
export class Spinner {
  private _frame = 0;
  private _interval: ReturnType<typeof setInterval> | null = null;
  private _startTime = 0;
  private _message = "";

  isRunning(): boolean {
    return this._interval !== null;
  }

  start(message: string): void {
    this._message = message;
    this._startTime = Date.now();
    this._frame = 0;

    this._render();

    this._interval = setInterval(() => {
      this._frame = (this._frame + 1) % SPINNER_FRAMES.length;
      this._render();
    }, 80);
  }

  private _render(): void {
    const elapsed = formatDuration(Date.now() - this._startTime);
    const spinner = SPINNER_FRAMES[this._frame];
    process.stdout.write(
      `\r  ${ANSI.cyan}${spinner}${ANSI.reset} ${this._message} ${ANSI.dim}${elapsed}${ANSI.reset}`,
    );
  }

  /** Stop the spinner and write the completion status. */
  stop(status: SpinnerStatus, detail?: string): void {
    if (this._interval) {
      clearInterval(this._interval);
      this._interval = null;
    }

    const elapsed = formatDuration(Date.now() - this._startTime);

    process.stdout.write("\r\x1b[K");

    if (status === "success") {
      process.stdout.write(
        `  ${ANSI.green}✔${ANSI.reset} ${this._message} ${ANSI.dim}${elapsed}${ANSI.reset}\n`,
      );
    } else {
      const reason = detail ? `${ANSI.dim}: ${detail}${ANSI.reset}` : "";
      process.stdout.write(
        `  ${ANSI.red}✘${ANSI.reset} ${this._message} ${ANSI.dim}${elapsed}${ANSI.reset}${reason}\n`,
      );
    }
  }

  /**
   * Leave the current task on its own line, marked as in progress, and
   * stop animating. Used when a task calls into another one.
   */
  suspend(): void {
    if (this._interval) {
      clearInterval(this._interval);
      this._interval = null;
    }
    process.stdout.write(`\r\x1b[K  ${ANSI.cyan}▸${ANSI.reset} ${this._message}\n`);
  }

  /** Print a line above the spinner without breaking the animation. */
  log(line: string): void {
    if (!this._interval) {
      process.stdout.write(line + "\n");
      return;
    }
    process.stdout.write(`\r\x1b[K${line}\n`);
    this._render();
  }
}

/** Line for a task that did not run. */
export function renderSkipped(task: string, reason?: string): string {
  const detail = reason ? ` ${ANSI.dim}(${reason})${ANSI.reset}` : "";
  return `  ${ANSI.yellow}○${ANSI.reset} ${task}${detail}`;
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

/** Count records per state, in a fixed order, omitting zeros. */
export function countStates(tasks: readonly TaskRecord[]): string {
  const order = ["succeeded", "failed", "skipped", "pending"] as const;
  const parts: string[] = [];
  for (const state of order) {
    const count = tasks.filter((t) => t.state === state).length;
    if (count > 0) parts.push(`${count} ${state}`);
  }
  return parts.length > 0 ? parts.join(", ") : "no tasks";
}

/**
 * Format a build completion summary.
 */
export function renderSummary(opts: {
  status: BuildStatus;
  tasks: readonly TaskRecord[];
  elapsedMs: number;
  logsRoot?: string;
}): string {
  const statusIcon = opts.status === "success"
    ? `${ANSI.green}✔ success${ANSI.reset}`
    : opts.status === "cancelled"
    ? `${ANSI.yellow}⊘ cancelled${ANSI.reset}`
    : `${ANSI.red}✘ fail${ANSI.reset}`;

  const ran = opts.tasks
    .filter((t) => t.state === "succeeded" || t.state === "failed")
    .map((t) => t.key)
    .join(` ${ANSI.dim}→${ANSI.reset} `);

  const lines = [
    "",
    `  Status: ${statusIcon}`,
    `  Time:   ${ANSI.dim}${formatDuration(opts.elapsedMs)}${ANSI.reset}`,
    `  Tasks:  ${countStates(opts.tasks)}`,
  ];
  if (ran) lines.push(`  Ran:    ${ran}`);
  if (opts.logsRoot) lines.push(`  Logs:   ${ANSI.dim}${opts.logsRoot}${ANSI.reset}`);

  return lines.join("\n");
}

const OUTPUT_TAIL_LINES = 10;

/**
 * Render a build failure summary block for the end-of-run output.
 */
export function renderFailureSummary(summary: FailureSummary): string {
  const lines = [
    "",
    `  ${ANSI.red}${ANSI.bold}Failure Summary${ANSI.reset}`,
    `  ${ANSI.dim}${"─".repeat(40)}${ANSI.reset}`,
    `  Task:     ${ANSI.bold}${summary.task}${ANSI.reset}`,
    `  Class:    ${summary.failureClass}`,
    `  Error:    ${summary.digest}`,
  ];

  if (summary.command) {
    lines.push(`  Command:  ${ANSI.dim}${summary.command}${ANSI.reset}`);
  }
  if (summary.firstFailingCheck) {
    lines.push(`  Check:    ${summary.firstFailingCheck}`);
  }
  if (summary.logsPath) {
    lines.push(`  Logs:     ${ANSI.dim}${summary.logsPath}${ANSI.reset}`);
  }

  const tail = summary.stderrTail || summary.stdoutTail;
  if (tail) {
    lines.push("", `  ${ANSI.dim}Output (last ${OUTPUT_TAIL_LINES} lines):${ANSI.reset}`);
    for (const line of tail.split("\n").slice(-OUTPUT_TAIL_LINES)) {
      lines.push(`    ${ANSI.dim}${line}${ANSI.reset}`);
    }
  }

  return lines.join("\n");
}

/** Markdown report listing failing test cases as `suite::name` bullets. */
export function testFailuresMarkdown(failingCases: readonly string[]): string {
  const items = failingCases.map((c) => `- \`${c}\``);
  return [`### Failing tests (${failingCases.length})`, "", ...items].join("\n");
}

/**
 * Format milliseconds into a human-readable duration.
 */
export function formatDuration(ms: number): string {
  const secs = Math.floor(ms / 1000);
  if (secs < 60) return `${secs}s`;
  const mins = Math.floor(secs / 60);
  const remainSecs = secs % 60;
  if (mins < 60) return `${mins}m ${remainSecs}s`;
  const hours = Math.floor(mins / 60);
  const remainMins = mins % 60;
  return `${hours}h ${remainMins}m ${remainSecs}s`;
}
