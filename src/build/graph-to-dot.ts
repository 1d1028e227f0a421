/**
 * Serialize a {@link TaskGraph} to DOT for `graph-easy`, `dot`, or any other
 * DOT consumer.
 *
 * Tasks are boxes and platform aliases diamonds. Dependency edges are solid,
 * `call` edges dashed, and alias edges carry the platform tag they apply to.
 */

import type { TaskGraph } from "./graph.js";

/** Escape a string for use as a DOT id or attribute value. */
function dotEscape(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/** Build a DOT attribute list string like `[shape="box", label="foo"]`. */
function attrList(attrs: Record<string, string | undefined>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(attrs)) {
    if (value !== undefined) parts.push(`${key}=${dotEscape(value)}`);
  }
  return parts.length > 0 ? ` [${parts.join(", ")}]` : "";
}

export type GraphToDotOptions = {
  name?: string;
  /** Highlight this task as the default target. */
  defaultTask?: string;
};

export function graphToDot(graph: TaskGraph, opts: GraphToDotOptions = {}): string {
  const lines: string[] = [];
  const indent = "  ";

  lines.push(`digraph ${dotEscape(opts.name ?? "build")} {`);
  lines.push(`${indent}rankdir="TB";`);
  lines.push("");

  for (const task of graph.tasks) {
    lines.push(`${indent}${dotEscape(task.id)}${attrList({
      shape: "box",
      style: task.id === opts.defaultTask ? "bold" : undefined,
    })};`);
  }
  for (const alias of graph.aliases) {
    lines.push(`${indent}${dotEscape(alias.id)}${attrList({ shape: "diamond" })};`);
  }
  lines.push("");

  for (const task of graph.tasks) {
    for (const dep of task.depends) {
      lines.push(`${indent}${dotEscape(task.id)} -> ${dotEscape(dep)};`);
    }
    for (const action of task.actions) {
      if (action.kind !== "call") continue;
      lines.push(`${indent}${dotEscape(task.id)} -> ${dotEscape(action.task)}${attrList({ style: "dashed", label: "call" })};`);
    }
  }
  for (const alias of graph.aliases) {
    for (const [tag, target] of Object.entries(alias.variants)) {
      lines.push(`${indent}${dotEscape(alias.id)} -> ${dotEscape(target)}${attrList({ label: tag })};`);
    }
    if (alias.otherwise !== undefined) {
      lines.push(`${indent}${dotEscape(alias.id)} -> ${dotEscape(alias.otherwise)}${attrList({ label: "otherwise" })};`);
    }
  }

  lines.push("}");
  return lines.join("\n") + "\n";
}
