/**
 * Build definition validation and linting.
 */

import type { BuildDefinition } from "./buildfile-types.js";
import { BuildValidationError, CyclicDependencyError } from "./errors.js";
import { TaskGraph } from "./graph.js";
import { KNOWN_FAMILIES } from "./platform.js";
import type { Diagnostic, Severity } from "./types.js";

function diag(
  rule: string,
  severity: Severity,
  message: string,
  opts?: { task_id?: string; fix?: string },
): Diagnostic {
  return { rule, severity, message, ...opts };
}

/**
 * Run all built-in lint rules. Returns a list of diagnostics.
 */
export function validate(build: BuildDefinition): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const graph = new TaskGraph(build.tasks, build.aliases);

  // unique_id: tasks and aliases share one namespace
  const seen = new Set<string>();
  for (const id of [...build.tasks.map((t) => t.id), ...build.aliases.map((a) => a.id)]) {
    if (seen.has(id)) {
      diagnostics.push(diag("unique_id", "error", `Id "${id}" is declared more than once.`, {
        task_id: id,
        fix: "Rename one of the tasks or aliases",
      }));
    }
    seen.add(id);
  }

  // default_task_exists
  if (build.defaultTask !== undefined && !graph.has(build.defaultTask)) {
    diagnostics.push(diag("default_task_exists", "error", `Default task "${build.defaultTask}" does not exist.`));
  }

  for (const task of build.tasks) {
    // dependency_exists
    for (const dep of task.depends) {
      if (!graph.has(dep)) {
        diagnostics.push(diag("dependency_exists", "error", `Task "${task.id}" depends on unknown task "${dep}".`, {
          task_id: task.id,
        }));
      }
    }

    // duplicate_dependency
    const deps = new Set<string>();
    for (const dep of task.depends) {
      if (deps.has(dep)) {
        diagnostics.push(diag("duplicate_dependency", "warning", `Task "${task.id}" lists dependency "${dep}" more than once.`, {
          task_id: task.id,
        }));
      }
      deps.add(dep);
    }

    // call_target_exists
    for (const action of task.actions) {
      if (action.kind === "call" && !graph.has(action.task)) {
        diagnostics.push(diag("call_target_exists", "error", `Task "${task.id}" calls unknown task "${action.task}".`, {
          task_id: task.id,
        }));
      }
    }

    // guard_conflict
    if (task.if !== undefined && task.if === task.unless) {
      diagnostics.push(diag("guard_conflict", "warning",
        `Task "${task.id}" uses "${task.if}" as both if and unless; it can never run.`,
        { task_id: task.id },
      ));
    }

    // empty_task
    if (task.actions.length === 0 && task.depends.length === 0) {
      diagnostics.push(diag("empty_task", "warning", `Task "${task.id}" has no dependencies and no actions.`, {
        task_id: task.id,
      }));
    }
  }

  for (const alias of build.aliases) {
    // alias_target_exists
    const targets = [...Object.values(alias.variants), ...(alias.otherwise ? [alias.otherwise] : [])];
    for (const target of targets) {
      if (!graph.has(target)) {
        diagnostics.push(diag("alias_target_exists", "error", `Alias "${alias.id}" points to unknown task "${target}".`, {
          task_id: alias.id,
        }));
      }
    }

    // alias_platform_known
    for (const tag of Object.keys(alias.variants)) {
      if (!KNOWN_FAMILIES.has(tag)) {
        diagnostics.push(diag("alias_platform_known", "warning",
          `Alias "${alias.id}" has a variant for unknown platform "${tag}"; it can never be selected.`,
          { task_id: alias.id, fix: `Use one of: ${[...KNOWN_FAMILIES].join(", ")}` },
        ));
      }
    }

    // alias_fallback
    if (!alias.otherwise) {
      diagnostics.push(diag("alias_fallback", "info",
        `Alias "${alias.id}" has no otherwise; on platforms without a variant it does nothing.`,
        { task_id: alias.id },
      ));
    }
  }

  // acyclic
  const cycle = graph.findCycle();
  if (cycle) {
    diagnostics.push(diag("acyclic", "error", `Cyclic dependency: ${cycle.join(" -> ")}`, { task_id: cycle[0] }));
  }

  return diagnostics;
}

/**
 * Validate and throw on error-severity diagnostics. A cycle is reported as
 * {@link CyclicDependencyError}; anything else as {@link BuildValidationError}.
 */
export function validateOrRaise(build: BuildDefinition): Diagnostic[] {
  const diagnostics = validate(build);
  const errors = diagnostics.filter((d) => d.severity === "error");
  if (errors.some((d) => d.rule === "acyclic")) {
    const cycle = new TaskGraph(build.tasks, build.aliases).findCycle();
    if (cycle) throw new CyclicDependencyError(cycle);
  }
  if (errors.length > 0) {
    throw new BuildValidationError(errors);
  }
  return diagnostics;
}
