/**
 * Task Graph: tasks and platform aliases sharing one id namespace.
 *
 * Edges are dependencies plus `call` targets, in declaration order. An alias
 * node has an edge to every concrete task it can delegate to.
 */

import { UnknownTaskError } from "./errors.js";
import type { PlatformTag } from "./platform.js";
import type { AliasDefinition, TaskDefinition } from "./types.js";

/** Resolved alias table: alias id -> concrete task id (or undefined when no variant applies). */
export type AliasResolution = ReadonlyMap<string, string | undefined>;

export class TaskGraph {
  private _tasks = new Map<string, TaskDefinition>();
  private _aliases = new Map<string, AliasDefinition>();

  /** Later duplicates are ignored; the validator reports them. */
  constructor(tasks: readonly TaskDefinition[], aliases: readonly AliasDefinition[] = []) {
    for (const task of tasks) {
      if (!this._tasks.has(task.id)) this._tasks.set(task.id, task);
    }
    for (const alias of aliases) {
      if (!this._aliases.has(alias.id) && !this._tasks.has(alias.id)) this._aliases.set(alias.id, alias);
    }
  }

  get tasks(): TaskDefinition[] {
    return [...this._tasks.values()];
  }

  get aliases(): AliasDefinition[] {
    return [...this._aliases.values()];
  }

  /** All ids in the namespace, tasks first. */
  ids(): string[] {
    return [...this._tasks.keys(), ...this._aliases.keys()];
  }

  has(id: string): boolean {
    return this._tasks.has(id) || this._aliases.has(id);
  }

  isAlias(id: string): boolean {
    return this._aliases.has(id);
  }

  getTask(id: string): TaskDefinition | undefined {
    return this._tasks.get(id);
  }

  getAlias(id: string): AliasDefinition | undefined {
    return this._aliases.get(id);
  }

  /** @throws UnknownTaskError */
  task(id: string): TaskDefinition {
    const task = this._tasks.get(id);
    if (!task) throw new UnknownTaskError(id, this.ids());
    return task;
  }

  /**
   * Resolve every alias against one platform tag: the exact variant, then
   * the `unix` variant on any non-windows host, then `otherwise`, else
   * undefined.
   */
  resolveAliases(tag: PlatformTag): AliasResolution {
    const table = new Map<string, string | undefined>();
    for (const alias of this._aliases.values()) {
      const family = tag !== "windows" ? alias.variants.unix : undefined;
      table.set(alias.id, alias.variants[tag] ?? family ?? alias.otherwise);
    }
    return table;
  }

  /** Outgoing edges of a node: dependencies then call targets, or an alias's candidates. */
  successors(id: string): string[] {
    const alias = this._aliases.get(id);
    if (alias) {
      const targets = Object.values(alias.variants);
      if (alias.otherwise) targets.push(alias.otherwise);
      return [...new Set(targets)];
    }
    const task = this._tasks.get(id);
    if (!task) return [];
    const calls = task.actions.flatMap((a) => (a.kind === "call" ? [a.task] : []));
    return [...task.depends, ...calls];
  }

  /**
   * Find a cycle over dependency and call edges. Returns the cycle path with
   * the first node repeated at the end, or undefined.
   */
  findCycle(): string[] | undefined {
    const visiting = new Set<string>();
    const visited = new Set<string>();
    const stack: string[] = [];

    const visit = (node: string): string[] | undefined => {
      if (visiting.has(node)) {
        return [...stack.slice(stack.indexOf(node)), node];
      }
      if (visited.has(node) || !this.has(node)) return undefined;
      visiting.add(node);
      stack.push(node);
      for (const next of this.successors(node)) {
        const cycle = visit(next);
        if (cycle) return cycle;
      }
      stack.pop();
      visiting.delete(node);
      visited.add(node);
      return undefined;
    };

    for (const id of this.ids()) {
      const cycle = visit(id);
      if (cycle) return cycle;
    }
    return undefined;
  }

  /**
   * Static execution order for `targets`: each task after its dependencies
   * and the tasks it calls, each at most once. Guards are not evaluated, so
   * this is an upper bound on what a run executes. With `includeCalls`
   * false only dependency edges are followed.
   */
  planOrder(targets: readonly string[], aliases?: AliasResolution, includeCalls = true): string[] {
    const order: string[] = [];
    const seen = new Set<string>();

    const visit = (id: string) => {
      const concrete = this.resolveId(id, aliases);
      if (concrete === undefined || seen.has(concrete)) return;
      seen.add(concrete);
      const task = this.task(concrete);
      for (const dep of task.depends) visit(dep);
      if (includeCalls) {
        for (const action of task.actions) {
          if (action.kind === "call") visit(action.task);
        }
      }
      order.push(concrete);
    };

    for (const target of targets) visit(target);
    return order;
  }

  /**
   * Map an id to a concrete task id. Aliases go through `aliases` when given,
   * and resolve to undefined when no variant applies.
   */
  resolveId(id: string, aliases?: AliasResolution): string | undefined {
    if (this._tasks.has(id)) return id;
    if (!this._aliases.has(id)) throw new UnknownTaskError(id, this.ids());
    if (!aliases) {
      throw new Error(`Alias "${id}" cannot be resolved without a platform`);
    }
    const target = aliases.get(id);
    return target === undefined ? undefined : this.resolveId(target, aliases);
  }
}
