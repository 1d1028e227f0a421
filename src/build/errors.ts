/**
 * Build error taxonomy.
 *
 * Every error the orchestrator raises extends {@link BuildError} and carries a
 * stable `code` so callers (and the CLI) can branch without string matching.
 */

import type { FailedCase } from "./test-results.js";
import type { Diagnostic, ProcessFailureClass } from "./types.js";

export type BuildErrorCode =
  | "missing_property"
  | "condition_evaluation"
  | "condition_syntax"
  | "subprocess_failure"
  | "cyclic_dependency"
  | "aggregate_test_failure"
  | "test_results"
  | "build_file"
  | "unknown_task"
  | "validation";

export class BuildError extends Error {
  readonly code: BuildErrorCode;

  constructor(message: string, code: BuildErrorCode) {
    super(message);
    this.name = "BuildError";
    this.code = code;
  }
}

/** A required property is absent (substitution, `require`, or explicit lookup). */
export class MissingPropertyError extends BuildError {
  readonly property: string;

  constructor(property: string, context?: string) {
    super(
      context
        ? `Property "${property}" is not set (${context})`
        : `Property "${property}" is not set`,
      "missing_property",
    );
    this.name = "MissingPropertyError";
    this.property = property;
  }
}

/** A predicate referenced a platform fact that is unknown or unavailable. */
export class ConditionEvaluationError extends BuildError {
  readonly predicate: string;

  constructor(predicate: string, message: string) {
    super(`${predicate}: ${message}`, "condition_evaluation");
    this.name = "ConditionEvaluationError";
    this.predicate = predicate;
  }
}

/** A condition expression does not parse. */
export class ConditionSyntaxError extends BuildError {
  readonly source: string;
  readonly column: number;

  constructor(source: string, column: number, detail: string) {
    super(`invalid condition "${source}" at column ${column}: ${detail}`, "condition_syntax");
    this.name = "ConditionSyntaxError";
    this.source = source;
    this.column = column;
  }
}

/** An external tool exited non-zero, could not be spawned, or timed out. */
export class SubprocessFailure extends BuildError {
  readonly command: string;
  readonly failureClass: ProcessFailureClass;
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly stdout: string;
  readonly stderr: string;
  /** Directory holding the captured output, when logs are kept. */
  readonly logsPath?: string;

  constructor(opts: {
    message: string;
    command: string;
    failureClass: ProcessFailureClass;
    exitCode: number | null;
    signal: string | null;
    stdout: string;
    stderr: string;
    logsPath?: string;
  }) {
    super(opts.message, "subprocess_failure");
    this.name = "SubprocessFailure";
    this.command = opts.command;
    this.failureClass = opts.failureClass;
    this.exitCode = opts.exitCode;
    this.signal = opts.signal;
    this.stdout = opts.stdout;
    this.stderr = opts.stderr;
    this.logsPath = opts.logsPath;
  }
}

export class CyclicDependencyError extends BuildError {
  /** The offending path, first and last element equal. */
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Cyclic dependency: ${cycle.join(" -> ")}`, "cyclic_dependency");
    this.name = "CyclicDependencyError";
    this.cycle = cycle;
  }
}

/** One or more test suites reported failing or erroring cases. */
export class AggregateTestFailure extends BuildError {
  readonly failures: FailedCase[];

  constructor(message: string, failures: FailedCase[]) {
    super(message, "aggregate_test_failure");
    this.name = "AggregateTestFailure";
    this.failures = failures;
  }
}

/** A test result document exists but cannot be read as one. */
export class TestResultFormatError extends BuildError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Malformed test results in ${path}: ${message}`, "test_results");
    this.name = "TestResultFormatError";
    this.path = path;
  }
}

/** The build file could not be parsed or converted. */
export class BuildFileError extends BuildError {
  readonly line?: number;
  readonly col?: number;

  constructor(message: string, position?: { line: number; col: number }) {
    super(
      position ? `Build file error at ${position.line}:${position.col}: ${message}` : `Build file error: ${message}`,
      "build_file",
    );
    this.name = "BuildFileError";
    this.line = position?.line;
    this.col = position?.col;
  }
}

export class UnknownTaskError extends BuildError {
  readonly task: string;

  constructor(task: string, known: string[] = []) {
    const hint = known.length > 0 ? ` Known tasks: ${known.join(", ")}` : "";
    super(`Unknown task "${task}".${hint}`, "unknown_task");
    this.name = "UnknownTaskError";
    this.task = task;
  }
}

/** The task graph has error-severity diagnostics. */
export class BuildValidationError extends BuildError {
  readonly diagnostics: readonly Diagnostic[];

  constructor(diagnostics: readonly Diagnostic[]) {
    const msg = diagnostics.map((d) => `  [${d.rule}] ${d.message}`).join("\n");
    super(`Build validation failed:\n${msg}`, "validation");
    this.name = "BuildValidationError";
    this.diagnostics = diagnostics;
  }
}

/** Describe any thrown value for a failure digest. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
