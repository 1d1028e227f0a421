/**
 * Build Executor: runs tasks strictly sequentially, each invocation at most
 * once per run.
 *
 * An invocation is a task id plus the scoped params it was called with.
 * Its record moves pending -> running -> succeeded | failed | skipped; a
 * terminal record is returned as-is on every later request. Interrupted
 * invocations (cancellation, or a fail-fast halt before they started) stay
 * pending.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { BuildDefinition } from "./buildfile-types.js";
import { describeCondition, evaluateCondition, type ConditionEnv } from "./conditions.js";
import {
  AggregateTestFailure,
  BuildError,
  CyclicDependencyError,
  SubprocessFailure,
  UnknownTaskError,
  describeError,
} from "./errors.js";
import { TaskGraph, type AliasResolution } from "./graph.js";
import { resolveProperties } from "./loader.js";
import { detectPlatform, platformTag, type PlatformFacts } from "./platform.js";
import {
  classifyResult,
  extractFirstFailingCheck,
  extractTail,
  formatCommand,
  isTestRunnerCommand,
  toSubprocessFailure,
} from "./process-failure.js";
import { defaultProcessRunner, type ProcessRunner } from "./process-runner.js";
import type { PropertyStore } from "./properties.js";
import { download, ensurePresent, makeDirectory, removePath, stage } from "./stager.js";
import { checkAllSuites, writeFailureReport } from "./test-results.js";
import {
  TERMINAL_STATES,
  type BuildEvent,
  type BuildEventKind,
  type BuildResult,
  type ExecAction,
  type FailureSummary,
  type TaskAction,
  type TaskDefinition,
  type TaskFailure,
  type TaskRecord,
} from "./types.js";
import { validateOrRaise } from "./validator.js";

export type Downloader = (url: string, dest: string, signal?: AbortSignal) => Promise<void>;

export type ExecutorConfig = {
  graph: TaskGraph;
  /** Resolved, frozen property store. */
  properties: PropertyStore;
  basedir: string;
  platform?: PlatformFacts;
  /** Root for per-invocation logs; none are written when unset. */
  logsRoot?: string;
  /** Stop the whole build at the first unrecovered failure. Defaults to true. */
  failFast?: boolean;
  /** Build-wide subprocess timeout in milliseconds; `exec timeout=` overrides it. */
  timeoutMs?: number;
  /** Evaluate guards and walk the graph, but perform no side effects. */
  dryRun?: boolean;
  runner?: ProcessRunner;
  download?: Downloader;
  exists?: (path: string) => boolean;
  onEvent?: (event: BuildEvent) => void;
  abortSignal?: AbortSignal;
};

/** Memoization key: the task id, plus sorted params when there are any. */
export function invocationKey(taskId: string, params: Record<string, string> = {}): string {
  const entries = Object.entries(params).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (entries.length === 0) return taskId;
  return `${taskId}(${entries.map(([k, v]) => `${k}=${v}`).join(",")})`;
}

/** One-line description of an action, after property substitution. */
export function describeAction(action: TaskAction, sub: (text: string) => string = (t) => t): string {
  switch (action.kind) {
    case "exec":
      return `exec ${formatCommand(sub(action.executable), action.args.map(sub))}`;
    case "call": {
      const params = Object.entries(action.params).map(([k, v]) => `${k}=${sub(v)}`);
      return `call ${action.task}${params.length > 0 ? ` (${params.join(", ")})` : ""}`;
    }
    case "fetch":
      return `fetch ${sub(action.url)} -> ${sub(action.dest)}`;
    case "stage":
      return `stage ${action.outputs.map(sub).join(", ")} -> ${sub(action.to)}${action.clean ? ` (clean ${sub(action.clean)})` : ""}`;
    case "delete":
      return `delete ${sub(action.path)}`;
    case "mkdir":
      return `mkdir ${sub(action.path)}`;
    case "check-tests":
      return `check-tests ${action.suites.map(sub).join(", ")}`;
    case "echo":
      return `echo ${sub(action.message)}`;
  }
}

/** Why a body stopped early without failing. */
type Interrupted = "interrupted";

function safeDirName(key: string): string {
  return key.replace(/[^A-Za-z0-9._=-]+/g, "_");
}

function failureFromError(err: unknown): TaskFailure {
  if (err instanceof SubprocessFailure) {
    return {
      failureClass: err.failureClass,
      digest: err.message,
      command: err.command,
      exitCode: err.exitCode,
      signal: err.signal,
      stdoutTail: extractTail(err.stdout),
      stderrTail: extractTail(err.stderr),
      logsPath: err.logsPath,
      firstFailingCheck: isTestRunnerCommand(err.command) ? extractFirstFailingCheck(err.stdout, err.stderr) : undefined,
    };
  }
  if (err instanceof AggregateTestFailure) {
    return {
      failureClass: "test_failure",
      digest: err.message,
      failingCases: err.failures.map((f) => `${f.suite}::${f.name}`),
      firstFailingCheck: err.failures[0]?.name,
    };
  }
  return { failureClass: "error", digest: describeError(err) };
}

export class BuildExecutor {
  readonly graph: TaskGraph;
  readonly aliases: AliasResolution;
  readonly platform: PlatformFacts;

  private _config: ExecutorConfig;
  private _records = new Map<string, TaskRecord>();
  private _stack: string[] = [];
  private _halted = false;
  private _firstFailure?: TaskRecord;
  private _execCounters = new Map<string, number>();

  constructor(config: ExecutorConfig) {
    this._config = config;
    this.graph = config.graph;
    this.platform = config.platform ?? detectPlatform();
    this.aliases = this.graph.resolveAliases(platformTag(this.platform));
  }

  /** Records in first-seen order. */
  get records(): TaskRecord[] {
    return [...this._records.values()];
  }

  record(taskId: string, params: Record<string, string> = {}): TaskRecord | undefined {
    return this._records.get(invocationKey(taskId, params));
  }

  /** A fail-fast failure stopped the build. */
  get halted(): boolean {
    return this._halted;
  }

  get cancelled(): boolean {
    return this._config.abortSignal?.aborted ?? false;
  }

  /** The first failure that was not tolerated by `failonerror=false`. */
  get firstFailure(): TaskRecord | undefined {
    return this._firstFailure;
  }

  private get failFast(): boolean {
    return this._config.failFast ?? true;
  }

  private emit(kind: BuildEventKind, data: Record<string, unknown> = {}): void {
    this._config.onEvent?.({ kind, timestamp: new Date().toISOString(), data });
  }

  /**
   * Register pending records for `targets` and their dependencies. Call
   * targets get their records when called, since their params are not
   * known up front.
   */
  prime(targets: readonly string[]): void {
    for (const id of this.graph.planOrder(targets, this.aliases, false)) {
      this.ensureRecord(id, {});
    }
  }

  private ensureRecord(taskId: string, params: Record<string, string>): TaskRecord {
    const key = invocationKey(taskId, params);
    let record = this._records.get(key);
    if (!record) {
      record = { key, taskId, params: { ...params }, state: "pending" };
      this._records.set(key, record);
    }
    return record;
  }

  /**
   * Run a task (or alias) and everything it depends on. Returns the
   * invocation's record; a pending record means the run was interrupted
   * before or while it ran.
   *
   * @throws UnknownTaskError if `name` is not declared
   * @throws CyclicDependencyError on re-entry into a running invocation
   */
  async runTask(name: string, params: Record<string, string> = {}): Promise<TaskRecord> {
    if (!this.graph.has(name)) throw new UnknownTaskError(name, this.graph.ids());
    return this.invoke(name, params);
  }

  private async invoke(id: string, params: Record<string, string>): Promise<TaskRecord> {
    const concrete = this.graph.resolveId(id, this.aliases);
    if (concrete === undefined) {
      const record = this.ensureRecord(id, {});
      if (record.state === "pending") {
        record.state = "skipped";
        record.skipReason = `alias "${id}" has no task for platform "${platformTag(this.platform)}"`;
        this.emit("task_skipped", { task: id, key: record.key, reason: record.skipReason });
      }
      return record;
    }

    const record = this.ensureRecord(concrete, params);
    if (TERMINAL_STATES.has(record.state)) return record;
    if (record.state === "running") {
      const start = this._stack.indexOf(record.key);
      throw new CyclicDependencyError([...this._stack.slice(start), record.key]);
    }
    if (this.cancelled || this._halted) return record;

    const task = this.graph.task(concrete);
    const { properties } = this._config;
    return Object.keys(params).length > 0
      ? properties.withScope(params, () => this.execute(task, record))
      : this.execute(task, record);
  }

  private conditionEnv(): ConditionEnv {
    return {
      platform: this.platform,
      properties: this._config.properties,
      basedir: this._config.basedir,
      exists: this._config.exists,
    };
  }

  /** Reason the guard blocks the task, or undefined when it may run. */
  private guardBlocks(task: TaskDefinition): string | undefined {
    const props = this._config.properties;
    if (task.if !== undefined) {
      const name = props.substitute(task.if);
      if (!props.has(name)) return `property "${name}" is not set`;
    }
    if (task.unless !== undefined) {
      const name = props.substitute(task.unless);
      if (props.has(name)) return `property "${name}" is set`;
    }
    if (task.when && !evaluateCondition(task.when, this.conditionEnv())) {
      return `condition ${describeCondition(task.when)} is false`;
    }
    return undefined;
  }

  private async execute(task: TaskDefinition, record: TaskRecord): Promise<TaskRecord> {
    let skipReason: string | undefined;
    try {
      skipReason = this.guardBlocks(task);
    } catch (err) {
      return this.fail(task, record, failureFromError(err));
    }
    if (skipReason !== undefined) {
      record.state = "skipped";
      record.skipReason = skipReason;
      this.emit("task_skipped", { task: task.id, key: record.key, reason: skipReason });
      return record;
    }

    record.state = "running";
    this._stack.push(record.key);
    try {
      for (const dep of task.depends) {
        const depRecord = await this.invoke(dep, {});
        if (depRecord.state === "pending") {
          record.state = "pending";
          return record;
        }
        if (depRecord.state === "failed" && !depRecord.tolerated) {
          return this.fail(task, record, {
            failureClass: "dependency_failed",
            digest: `dependency "${dep}" failed`,
          });
        }
      }

      const startTime = Date.now();
      record.startedAt = new Date(startTime).toISOString();
      this.emit("task_started", { task: task.id, key: record.key, params: record.params });

      let outcome: Interrupted | undefined;
      try {
        outcome = await this.runBody(task, record);
      } catch (err) {
        if (err instanceof CyclicDependencyError) throw err;
        // An action aborted by cancellation is interrupted, not failed.
        if (!this.cancelled) {
          this.finishTimings(record, startTime);
          return this.fail(task, record, failureFromError(err));
        }
        outcome = "interrupted";
      }

      if (outcome === "interrupted") {
        record.state = "pending";
        record.startedAt = undefined;
        return record;
      }

      this.finishTimings(record, startTime);
      record.state = "succeeded";
      this.emit("task_completed", { task: task.id, key: record.key, durationMs: record.durationMs });
      return record;
    } finally {
      this._stack.pop();
    }
  }

  private finishTimings(record: TaskRecord, startTime: number): void {
    const now = Date.now();
    record.finishedAt = new Date(now).toISOString();
    record.durationMs = now - startTime;
  }

  private fail(task: TaskDefinition, record: TaskRecord, failure: TaskFailure): TaskRecord {
    record.state = "failed";
    record.failure = failure;
    record.tolerated = !task.failOnError;
    if (task.failOnError) {
      this._firstFailure ??= record;
      if (this.failFast) this._halted = true;
    }
    this.emit("task_failed", {
      task: task.id,
      key: record.key,
      failureClass: failure.failureClass,
      digest: failure.digest,
      tolerated: record.tolerated,
    });
    return record;
  }

  private async runBody(task: TaskDefinition, record: TaskRecord): Promise<Interrupted | undefined> {
    const props = this._config.properties;
    for (const action of task.actions) {
      if (this.cancelled) return "interrupted";
      if (action.when && !evaluateCondition(action.when, this.conditionEnv())) continue;

      if (action.kind === "call") {
        const params: Record<string, string> = {};
        for (const [key, value] of Object.entries(action.params)) params[key] = props.substitute(value);
        const callee = await this.invoke(action.task, params);
        if (callee.state === "pending") return "interrupted";
        if (callee.state === "failed" && !callee.tolerated) {
          throw new BuildError(`called task "${callee.key}" failed: ${callee.failure?.digest ?? "unknown error"}`, "subprocess_failure");
        }
        continue;
      }

      if (this._config.dryRun) {
        this.emit("echo", { task: task.id, message: describeAction(action, (t) => props.substitute(t)), dryRun: true });
        continue;
      }

      const outcome = await this.runAction(task, record, action);
      if (outcome === "interrupted") return outcome;
    }
    return undefined;
  }

  private path(text: string): string {
    return resolve(this._config.basedir, this._config.properties.substitute(text));
  }

  private async runAction(task: TaskDefinition, record: TaskRecord, action: Exclude<TaskAction, { kind: "call" }>): Promise<Interrupted | undefined> {
    const props = this._config.properties;
    switch (action.kind) {
      case "exec":
        return this.runExec(task, record, action);
      case "fetch": {
        const url = props.substitute(action.url);
        const dest = this.path(action.dest);
        const fetcher = this._config.download ?? ((u: string, d: string, signal?: AbortSignal) => download(u, d, { signal }));
        await ensurePresent(dest, () => fetcher(url, dest, this._config.abortSignal));
        return undefined;
      }
      case "stage":
        await stage(action.outputs.map((o) => this.path(o)), this.path(action.to), {
          clean: action.clean !== undefined ? props.substitute(action.clean) : undefined,
        });
        return undefined;
      case "delete":
        await removePath(this.path(action.path));
        return undefined;
      case "mkdir":
        await makeDirectory(this.path(action.path));
        return undefined;
      case "check-tests": {
        const outcome = await checkAllSuites(action.suites.map((s) => this.path(s)));
        for (const missing of outcome.missing) {
          this.emit("warning", { task: task.id, message: `No test results at ${missing}` });
        }
        if (action.resultsDir !== undefined) {
          const dir = this.path(action.resultsDir);
          for (const report of outcome.reports) {
            if (report.failures.length > 0) await writeFailureReport(report, dir);
          }
        }
        this.emit("tests_checked", {
          task: task.id,
          ok: outcome.ok,
          suites: outcome.reports.length,
          failures: outcome.failures.length,
          missing: outcome.missing,
        });
        if (!outcome.ok) {
          throw new AggregateTestFailure(outcome.message ?? "test failures", outcome.failures);
        }
        return undefined;
      }
      case "echo":
        this.emit("echo", { task: task.id, message: props.substitute(action.message) });
        return undefined;
    }
  }

  private async runExec(task: TaskDefinition, record: TaskRecord, action: ExecAction): Promise<Interrupted | undefined> {
    const props = this._config.properties;
    const executable = props.substitute(action.executable);
    const args = action.args.map((a) => props.substitute(a));
    const cwd = this.path(action.cwd ?? ".");
    const env: Record<string, string> = { ...props.environment };
    for (const [key, value] of Object.entries(action.env)) env[key] = props.substitute(value);
    const command = formatCommand(executable, args);

    const runner = this._config.runner ?? defaultProcessRunner;
    this.emit("process_started", { task: task.id, command, cwd });
    const result = await runner({
      executable,
      args,
      cwd,
      env,
      timeoutMs: action.timeoutMs ?? this._config.timeoutMs,
      signal: this._config.abortSignal,
    });
    const failureClass = classifyResult(result);
    this.emit("process_completed", {
      task: task.id,
      command,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      failureClass,
    });

    const logsPath = await this.writeExecLogs(record, { command, cwd, failureClass }, result);

    if (failureClass === "cancelled") return "interrupted";
    if (failureClass !== undefined) throw toSubprocessFailure(command, failureClass, result, logsPath);
    return undefined;
  }

  private async writeExecLogs(
    record: TaskRecord,
    meta: { command: string; cwd: string; failureClass?: string },
    result: { stdout: string; stderr: string; exitCode: number | null; signal: string | null; durationMs: number },
  ): Promise<string | undefined> {
    const { logsRoot } = this._config;
    if (!logsRoot) return undefined;

    const execNum = (this._execCounters.get(record.key) ?? 0) + 1;
    this._execCounters.set(record.key, execNum);
    const dir = join(logsRoot, safeDirName(record.key), `exec-${execNum}`);
    try {
      await mkdir(dir, { recursive: true });
      await writeFile(join(dir, "stdout.log"), result.stdout, "utf-8");
      await writeFile(join(dir, "stderr.log"), result.stderr, "utf-8");
      await writeFile(join(dir, "meta.json"), JSON.stringify({
        task: record.taskId,
        params: record.params,
        command: meta.command,
        cwd: meta.cwd,
        exitCode: result.exitCode,
        signal: result.signal,
        failureClass: meta.failureClass ?? null,
        durationMs: result.durationMs,
        exec: execNum,
        timestamp: new Date().toISOString(),
      }, null, 2), "utf-8");
    } catch (err) {
      this.emit("warning", { task: record.taskId, message: `Could not write logs to ${dir}: ${describeError(err)}` });
      return undefined;
    }
    return dir;
  }
}

// ---------------------------------------------------------------------------
// Build runner
// ---------------------------------------------------------------------------

export type BuildConfig = {
  build: BuildDefinition;
  /** Tasks to run in order; defaults to the build's default task. */
  targets?: string[];
  /** User properties; they win over every build file declaration. */
  properties?: Record<string, string>;
  environment?: Record<string, string | undefined>;
  platform?: PlatformFacts;
  logsRoot?: string;
  failFast?: boolean;
  timeoutMs?: number;
  dryRun?: boolean;
  runner?: ProcessRunner;
  download?: Downloader;
  exists?: (path: string) => boolean;
  onEvent?: (event: BuildEvent) => void;
  abortSignal?: AbortSignal;
};

function summarize(record: TaskRecord): FailureSummary | undefined {
  if (!record.failure) return undefined;
  const f = record.failure;
  return {
    task: record.key,
    failureClass: f.failureClass,
    digest: f.digest,
    command: f.command,
    stdoutTail: f.stdoutTail,
    stderrTail: f.stderrTail,
    logsPath: f.logsPath,
    firstFailingCheck: f.firstFailingCheck,
    failingCases: f.failingCases,
  };
}

export function resolveTargets(build: BuildDefinition, targets: readonly string[] | undefined): string[] {
  if (targets && targets.length > 0) return [...targets];
  if (build.defaultTask !== undefined) return [build.defaultTask];
  throw new BuildError("No task given and the build file declares no default task", "unknown_task");
}

/**
 * Validate, resolve properties, and run the requested targets.
 *
 * Definition problems (cycles, unknown ids, missing required properties)
 * throw before anything runs; task failures are reported in the result.
 */
export async function runBuild(config: BuildConfig): Promise<BuildResult> {
  const { build } = config;
  const emit = (kind: BuildEventKind, data: Record<string, unknown> = {}) =>
    config.onEvent?.({ kind, timestamp: new Date().toISOString(), data });

  const diagnostics = validateOrRaise(build);
  for (const d of diagnostics) {
    if (d.severity === "warning") emit("warning", { message: d.message, rule: d.rule, task: d.task_id });
  }

  const graph = new TaskGraph(build.tasks, build.aliases);
  const targets = resolveTargets(build, config.targets);
  for (const target of targets) {
    if (!graph.has(target)) throw new UnknownTaskError(target, graph.ids());
  }

  const platform = config.platform ?? detectPlatform();
  const properties = resolveProperties(build, {
    properties: config.properties,
    environment: config.environment,
    platform,
    exists: config.exists,
  });

  const executor = new BuildExecutor({
    graph,
    properties,
    basedir: build.basedir,
    platform,
    logsRoot: config.logsRoot,
    failFast: config.failFast,
    timeoutMs: config.timeoutMs,
    dryRun: config.dryRun,
    runner: config.runner,
    download: config.download,
    exists: config.exists,
    onEvent: config.onEvent,
    abortSignal: config.abortSignal,
  });
  executor.prime(targets);

  const startTime = Date.now();
  emit("build_started", { name: build.name, targets, dryRun: config.dryRun ?? false });

  for (const target of targets) {
    if (executor.halted || executor.cancelled) break;
    await executor.runTask(target);
  }

  const tasks = executor.records;
  // The first failure recorded is the root cause: dependents and callers fail after it.
  const failed = executor.firstFailure;
  const status = executor.cancelled ? "cancelled" : executor.firstFailure ? "fail" : "success";
  const result: BuildResult = {
    status,
    targets,
    tasks,
    failureSummary: status === "fail" && failed ? summarize(failed) : undefined,
    durationMs: Date.now() - startTime,
  };

  if (config.logsRoot) {
    await mkdir(config.logsRoot, { recursive: true });
    await writeFile(join(config.logsRoot, "build-result.json"), JSON.stringify(result, null, 2) + "\n", "utf-8");
  }

  if (status === "success") {
    emit("build_completed", { name: build.name, durationMs: result.durationMs });
  } else if (status === "cancelled") {
    emit("build_cancelled", { name: build.name, pending: tasks.filter((t) => t.state === "pending").map((t) => t.key) });
  } else {
    emit("build_failed", { name: build.name, task: result.failureSummary?.task, error: result.failureSummary?.digest });
  }

  return result;
}
