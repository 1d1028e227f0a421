#!/usr/bin/env node
/**
 * graphbuild CLI: run and inspect task-graph build files.
 *
 * Usage:
 *   graphbuild run [task...] [options]
 *   graphbuild validate
 *   graphbuild list
 *   graphbuild plan [task...]
 *   graphbuild show [--format ascii|boxart|dot|auto]
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";

import {
  BuildError,
  BuildValidationError,
  TaskGraph,
  detectPlatform,
  describeError,
  graphToDot,
  loadBuildFile,
  platformTag,
  resolveBuildFile,
  resolveTargets,
  runBuild,
  validate,
  validateOrRaise,
} from "./build/index.js";
import type { BuildDefinition, BuildEvent, BuildResult, Diagnostic } from "./build/index.js";
import { hasGraphEasy, runGraphEasy } from "./build/graph-easy.js";
import {
  Spinner,
  formatDuration,
  renderBanner,
  renderFailureSummary,
  renderMarkdown,
  renderSkipped,
  renderSummary,
  testFailuresMarkdown,
} from "./cli-renderer.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function usage(): never {
  console.log(`
graphbuild: task-graph build orchestrator

Usage:
  graphbuild run [task...] [options]   Run tasks (default: the build's default task)
  graphbuild validate                  Validate the build file
  graphbuild list                      List tasks and aliases
  graphbuild plan [task...]            Print the execution order without running
  graphbuild show [options]            Visualize the task graph

Options:
  --file <path>          Build file (default: nearest build.kdl, or $GRAPHBUILD_FILE)
  -D name=value          Set a property; wins over the build file's declarations
  --keep-going           Keep running independent tasks after a failure
  --timeout <seconds>    Kill any subprocess that runs longer than this
  --logs <dir>           Logs directory (default: .graphbuild/logs)
  --dry-run              Evaluate guards and walk the graph without side effects
  --verbose              Show detailed event output

Show options:
  --format <fmt>         Output format: ascii | boxart | dot (default: auto)
                         "auto" uses boxart if graph-easy is found, else dot
`.trim());
  process.exit(1);
}

export type CliArgs = {
  command?: string;
  /** Positionals after the command: task names. */
  tasks: string[];
  options: Record<string, string | boolean>;
  /** `-D name=value` user properties, last one wins. */
  properties: Record<string, string>;
};

const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(["keep-going", "verbose", "dry-run", "help"]);

function parseDefine(text: string): [string, string] {
  const eq = text.indexOf("=");
  if (eq <= 0) throw new Error(`Invalid property definition "-D${text}": expected name=value`);
  return [text.slice(0, eq), text.slice(eq + 1)];
}

export function parseArgs(argv: string[]): CliArgs {
  const options: Record<string, string | boolean> = {};
  const properties: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-D") {
      const next = argv[i + 1];
      if (next === undefined) throw new Error("Missing name=value after -D");
      const [name, value] = parseDefine(next);
      properties[name] = value;
      i++;
    } else if (arg.startsWith("-D")) {
      const [name, value] = parseDefine(arg.slice(2));
      properties[name] = value;
    } else if (arg.startsWith("--")) {
      const key = arg.slice(2);
      if (BOOLEAN_FLAGS.has(key)) {
        options[key] = true;
        continue;
      }
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("-")) throw new Error(`Missing value for --${key}`);
      options[key] = next;
      i++;
    } else {
      positional.push(arg);
    }
  }

  return { command: positional[0], tasks: positional.slice(1), options, properties };
}

function option(args: CliArgs, key: string): string | undefined {
  const value = args.options[key];
  return typeof value === "string" ? value : undefined;
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`Invalid --timeout value: "${raw}". Expected a positive number of seconds`);
  }
  return Math.round(seconds * 1000);
}

function severityIcon(severity: Diagnostic["severity"]): string {
  switch (severity) {
    case "error": return "❌";
    case "warning": return "⚠️ ";
    case "info": return "ℹ️ ";
  }
}

function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  for (const d of diagnostics) {
    const location = d.task_id ? ` (task: ${d.task_id})` : "";
    console.log(`${severityIcon(d.severity)} [${d.rule}]${location}: ${d.message}`);
    if (d.fix) console.log(`   Fix: ${d.fix}`);
  }
}

async function loadFromArgs(args: CliArgs): Promise<{ path: string; build: BuildDefinition }> {
  const path = resolveBuildFile({ cwd: process.cwd(), file: option(args, "file") });
  return { path, build: await loadBuildFile(path) };
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export async function cmdValidate(args: CliArgs): Promise<number> {
  const { path, build } = await loadFromArgs(args);
  const diagnostics = validate(build);
  const errors = diagnostics.filter((d) => d.severity === "error");
  const warnings = diagnostics.filter((d) => d.severity === "warning");

  if (diagnostics.length === 0) {
    console.log(`✅ ${path}: valid (${build.tasks.length} tasks, ${build.aliases.length} aliases)`);
    console.log(`   Default: ${build.defaultTask ?? "(none)"}`);
    return 0;
  }

  printDiagnostics(diagnostics);
  console.log();
  console.log(`${errors.length} error(s), ${warnings.length} warning(s)`);
  return errors.length > 0 ? 1 : 0;
}

export async function cmdList(args: CliArgs): Promise<number> {
  const { build } = await loadFromArgs(args);
  const width = Math.max(4, ...build.tasks.map((t) => t.id.length), ...build.aliases.map((a) => a.id.length)) + 2;

  console.log(build.description ? `${build.name}: ${build.description}` : build.name);
  console.log();
  console.log("Tasks:");
  for (const task of build.tasks) {
    const marker = task.id === build.defaultTask ? "*" : " ";
    console.log(` ${marker} ${task.id.padEnd(width)}${task.description ?? ""}`.trimEnd());
  }
  if (build.aliases.length > 0) {
    console.log();
    console.log("Aliases:");
    for (const alias of build.aliases) {
      const variants = Object.entries(alias.variants).map(([tag, target]) => `${tag}=${target}`);
      if (alias.otherwise !== undefined) variants.push(`otherwise=${alias.otherwise}`);
      const marker = alias.id === build.defaultTask ? "*" : " ";
      console.log(` ${marker} ${alias.id.padEnd(width)}${variants.join(", ")}`);
    }
  }
  return 0;
}

export async function cmdPlan(args: CliArgs): Promise<number> {
  const { build } = await loadFromArgs(args);
  validateOrRaise(build);
  const graph = new TaskGraph(build.tasks, build.aliases);
  const targets = resolveTargets(build, args.tasks);
  const tag = platformTag(detectPlatform());
  const order = graph.planOrder(targets, graph.resolveAliases(tag));

  console.log(`Plan for ${targets.join(", ")} (platform: ${tag}):`);
  order.forEach((id, i) => {
    const task = graph.task(id);
    const guards: string[] = [];
    if (task.if !== undefined) guards.push(`if ${task.if}`);
    if (task.unless !== undefined) guards.push(`unless ${task.unless}`);
    if (task.when !== undefined) guards.push("when");
    const suffix = guards.length > 0 ? `  [${guards.join(", ")}]` : "";
    console.log(`  ${String(i + 1).padStart(2)}. ${id}${suffix}`);
  });
  console.log();
  console.log("Guards are evaluated at run time; guarded tasks may be skipped.");
  return 0;
}

type ShowFormat = "ascii" | "boxart" | "dot" | "auto";

function isShowFormat(value: string): value is ShowFormat {
  return value === "ascii" || value === "boxart" || value === "dot" || value === "auto";
}

export async function cmdShow(args: CliArgs): Promise<number> {
  const { build } = await loadFromArgs(args);
  const graph = new TaskGraph(build.tasks, build.aliases);
  const dot = graphToDot(graph, { name: build.name, defaultTask: build.defaultTask });

  const rawFormat = option(args, "format") ?? "auto";
  if (!isShowFormat(rawFormat)) {
    console.error(`Invalid --format value: "${rawFormat}". Must be one of: ascii, boxart, dot, auto`);
    return 1;
  }

  let format = rawFormat;
  if (format === "dot") {
    process.stdout.write(dot);
    return 0;
  }

  const graphEasyAvailable = await hasGraphEasy();
  if (format === "auto") {
    format = graphEasyAvailable ? "boxart" : "dot";
    if (format === "dot") {
      process.stdout.write(dot);
      return 0;
    }
  }

  if (!graphEasyAvailable) {
    console.error(
      "Error: graph-easy is not installed. Install it or use --format dot.\n" +
      "  brew: brew install graph-easy\n" +
      "  apt: sudo apt install libgraph-easy-perl",
    );
    return 1;
  }

  process.stdout.write(await runGraphEasy(dot, format));
  return 0;
}

function eventText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/** Event handler that drives the spinner for one run. */
function createRunReporter(verbose: boolean): { onEvent: (event: BuildEvent) => void; finish: () => void } {
  const spinner = new Spinner();
  let spinnerTask: string | null = null;

  const onEvent = (event: BuildEvent): void => {
    const d = event.data;
    if (verbose) {
      const icons: Partial<Record<BuildEvent["kind"], string>> = {
        build_started: "🚀",
        task_started: "▶️ ",
        task_completed: "✅",
        task_skipped: "⏭️ ",
        task_failed: "💥",
        process_started: "⚙️ ",
        build_completed: "🏁",
        build_failed: "❌",
        build_cancelled: "⊘",
      };
      const icon = icons[event.kind] ?? "·";
      console.log(`  ${icon} ${event.kind.padEnd(20)} ${JSON.stringify(d)}`);
      return;
    }

    switch (event.kind) {
      case "task_started": {
        if (spinnerTask !== null && spinner.isRunning()) spinner.suspend();
        spinnerTask = eventText(d.key);
        spinner.start(spinnerTask);
        break;
      }
      case "task_completed": {
        const key = eventText(d.key);
        if (spinnerTask === key && spinner.isRunning()) {
          spinner.stop("success");
          spinnerTask = null;
        } else {
          console.log(`  ✔ ${key}`);
        }
        break;
      }
      case "task_skipped":
        spinner.log(renderSkipped(eventText(d.key), eventText(d.reason) || undefined));
        break;
      case "task_failed": {
        const key = eventText(d.key);
        const digest = eventText(d.digest);
        const detail = d.tolerated === true ? `${digest} (ignored: failonerror=false)` : digest;
        if (spinnerTask === key && spinner.isRunning()) {
          spinner.stop("fail", detail);
          spinnerTask = null;
        } else {
          spinner.log(`  ✘ ${key}${detail ? `: ${detail}` : ""}`);
        }
        break;
      }
      case "echo":
        spinner.log(`    ${d.dryRun === true ? "would " : ""}${eventText(d.message)}`);
        break;
      case "warning":
        spinner.log(`  ⚠️  ${eventText(d.message)}`);
        break;
      case "build_cancelled":
        if (spinnerTask !== null && spinner.isRunning()) {
          spinner.stop("fail", "cancelled");
          spinnerTask = null;
        }
        console.log("\n  ⚠️  Build cancelled");
        break;
    }
  };

  const finish = (): void => {
    if (spinnerTask !== null && spinner.isRunning()) spinner.stop("fail");
  };

  return { onEvent, finish };
}

function printResult(result: BuildResult, logsRoot: string): void {
  console.log(renderSummary({
    status: result.status,
    tasks: result.tasks,
    elapsedMs: result.durationMs,
    logsRoot,
  }));

  const summary = result.failureSummary;
  if (!summary) return;
  console.log(renderFailureSummary(summary));
  if (summary.failingCases && summary.failingCases.length > 0) {
    console.log();
    console.log(renderMarkdown(testFailuresMarkdown(summary.failingCases)));
  }
}

export async function cmdRun(args: CliArgs): Promise<number> {
  const { path, build } = await loadFromArgs(args);
  const logsRoot = resolve(option(args, "logs") ?? ".graphbuild/logs");
  const verbose = args.options.verbose === true;
  const dryRun = args.options["dry-run"] === true;
  const timeoutMs = parseTimeout(option(args, "timeout"));
  const targets = resolveTargets(build, args.tasks);

  console.log(renderBanner({
    name: build.name,
    file: path,
    targets,
    taskCount: build.tasks.length,
    dryRun,
  }));

  // Cooperative cancellation
  const abortController = new AbortController();
  const onSignal = () => {
    abortController.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const reporter = createRunReporter(verbose);
  let result: BuildResult;
  try {
    result = await runBuild({
      build,
      targets,
      properties: args.properties,
      logsRoot: dryRun ? undefined : logsRoot,
      failFast: args.options["keep-going"] !== true,
      timeoutMs,
      dryRun,
      onEvent: reporter.onEvent,
      abortSignal: abortController.signal,
    });
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    reporter.finish();
  }

  printResult(result, logsRoot);

  if (result.status === "cancelled") return 130;
  if (result.status === "fail") return 1;
  if (!verbose) console.log(`\n  🏁 Build completed (${formatDuration(result.durationMs)})`);
  return 0;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  if (args.options.help === true) usage();

  try {
    switch (args.command) {
      case "run":
        return await cmdRun(args);
      case "validate":
        return await cmdValidate(args);
      case "list":
        return await cmdList(args);
      case "plan":
        return await cmdPlan(args);
      case "show":
        return await cmdShow(args);
      default:
        usage();
    }
  } catch (err) {
    if (err instanceof BuildValidationError) {
      printDiagnostics(err.diagnostics);
      console.error(`\n${err.diagnostics.length} error(s)`);
      return 1;
    }
    if (err instanceof BuildError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

const isDirectRun = process.argv[1] != null
  && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isDirectRun) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(`Fatal: ${describeError(err)}`);
      process.exit(1);
    },
  );
}
