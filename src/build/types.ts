/**
 * Core types for the build orchestrator: task definitions, run records and
 * events.
 */

import type { Condition } from "./conditions.js";

// ---------------------------------------------------------------------------
// Task definitions
// ---------------------------------------------------------------------------

export type TaskState = "pending" | "running" | "succeeded" | "failed" | "skipped";

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set(["succeeded", "failed", "skipped"]);

type ActionBase = {
  /** Evaluated immediately before the action; false skips it. */
  when?: Condition;
};

export type ExecAction = ActionBase & {
  kind: "exec";
  executable: string;
  args: string[];
  cwd?: string;
  env: Record<string, string>;
  /** Milliseconds. Overrides the build-wide timeout. */
  timeoutMs?: number;
};

export type CallAction = ActionBase & {
  kind: "call";
  task: string;
  params: Record<string, string>;
};

export type FetchAction = ActionBase & {
  kind: "fetch";
  url: string;
  dest: string;
};

export type StageAction = ActionBase & {
  kind: "stage";
  outputs: string[];
  to: string;
  /** Wildcard of stale files to remove from the destination. */
  clean?: string;
};

export type DeleteAction = ActionBase & { kind: "delete"; path: string };

export type MkdirAction = ActionBase & { kind: "mkdir"; path: string };

export type CheckTestsAction = ActionBase & {
  kind: "check-tests";
  suites: string[];
  /** Where condensed failure reports are written. */
  resultsDir?: string;
};

export type EchoAction = ActionBase & { kind: "echo"; message: string };

export type TaskAction =
  | ExecAction
  | CallAction
  | FetchAction
  | StageAction
  | DeleteAction
  | MkdirAction
  | CheckTestsAction
  | EchoAction;

export type TaskDefinition = {
  id: string;
  description?: string;
  depends: string[];
  /** Property that must be set for the task to run. */
  if?: string;
  /** Property that must be unset for the task to run. */
  unless?: string;
  when?: Condition;
  failOnError: boolean;
  actions: TaskAction[];
};

/** Platform lookup table: alias id -> platform tag -> concrete task id. */
export type AliasDefinition = {
  id: string;
  description?: string;
  variants: Record<string, string>;
  otherwise?: string;
};

// ---------------------------------------------------------------------------
// Run records
// ---------------------------------------------------------------------------

export type ProcessFailureClass = "exit_nonzero" | "timeout" | "spawn_error" | "cancelled";

export type TaskFailureClass = ProcessFailureClass | "dependency_failed" | "test_failure" | "error";

export type TaskFailure = {
  failureClass: TaskFailureClass;
  digest: string;
  command?: string;
  exitCode?: number | null;
  signal?: string | null;
  stdoutTail?: string;
  stderrTail?: string;
  /** Directory holding stdout.log, stderr.log and meta.json. */
  logsPath?: string;
  firstFailingCheck?: string;
  /** Failing test case names, for `check-tests` failures. */
  failingCases?: string[];
};

export type TaskRecord = {
  /** Invocation key: task id plus call params. */
  key: string;
  taskId: string;
  params: Record<string, string>;
  state: TaskState;
  startedAt?: string;
  finishedAt?: string;
  durationMs?: number;
  skipReason?: string;
  failure?: TaskFailure;
  /** Failed, but declared `failonerror=false`. */
  tolerated?: boolean;
};

export type BuildStatus = "success" | "fail" | "cancelled";

export type FailureSummary = {
  task: string;
  failureClass: TaskFailureClass;
  digest: string;
  command?: string;
  stdoutTail?: string;
  stderrTail?: string;
  logsPath?: string;
  firstFailingCheck?: string;
  failingCases?: string[];
};

export type BuildResult = {
  status: BuildStatus;
  targets: string[];
  tasks: TaskRecord[];
  failureSummary?: FailureSummary;
  durationMs: number;
};

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type BuildEventKind =
  | "build_started"
  | "build_completed"
  | "build_failed"
  | "build_cancelled"
  | "task_started"
  | "task_completed"
  | "task_skipped"
  | "task_failed"
  | "process_started"
  | "process_completed"
  | "echo"
  | "warning"
  | "tests_checked";

export type BuildEvent = {
  kind: BuildEventKind;
  timestamp: string;
  data: Record<string, unknown>;
};

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export type Severity = "error" | "warning" | "info";

export type Diagnostic = {
  rule: string;
  severity: Severity;
  message: string;
  task_id?: string;
  fix?: string;
};
