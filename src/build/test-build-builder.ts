/**
 * Test-only helpers for building task definitions and builds inline.
 */

import type { BuildDefinition } from "./buildfile-types.js";
import type { ProcessInvocation, ProcessResult, ProcessRunner } from "./process-runner.js";
import type { AliasDefinition, TaskAction, TaskDefinition } from "./types.js";

export function task(id: string, fields: Partial<Omit<TaskDefinition, "id">> = {}): TaskDefinition {
  return {
    id,
    depends: [],
    failOnError: true,
    actions: [],
    ...fields,
  };
}

export function alias(id: string, variants: Record<string, string>, otherwise?: string): AliasDefinition {
  return { id, variants, otherwise };
}

export function exec(executable: string, ...args: string[]): TaskAction {
  return { kind: "exec", executable, args, env: {} };
}

export function call(target: string, params: Record<string, string> = {}): TaskAction {
  return { kind: "call", task: target, params };
}

export function build(fields: Partial<BuildDefinition> & { tasks: TaskDefinition[] }): BuildDefinition {
  return {
    name: "test",
    basedir: "/work",
    declarations: [],
    requires: [],
    aliases: [],
    ...fields,
  };
}

export function okResult(overrides: Partial<ProcessResult> = {}): ProcessResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: "",
    stderr: "",
    durationMs: 1,
    timedOut: false,
    cancelled: false,
    ...overrides,
  };
}

/**
 * A fake process runner that records every invocation. `respond` picks the
 * result per command line (`executable args...`); the default succeeds.
 */
export function fakeRunner(
  respond: (commandLine: string, invocation: ProcessInvocation) => ProcessResult | Promise<ProcessResult> = () => okResult(),
): ProcessRunner & { calls: ProcessInvocation[]; commandLines: string[] } {
  const calls: ProcessInvocation[] = [];
  const commandLines: string[] = [];
  const runner = async (invocation: ProcessInvocation): Promise<ProcessResult> => {
    const line = [invocation.executable, ...invocation.args].join(" ");
    calls.push(invocation);
    commandLines.push(line);
    return respond(line, invocation);
  };
  return Object.assign(runner, { calls, commandLines });
}
