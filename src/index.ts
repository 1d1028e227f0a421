/**
 * graphbuild: a task-graph build orchestrator.
 *
 * Resolves properties once, validates the task graph, then runs the
 * requested tasks sequentially with memoized invocations.
 *
 * @module graphbuild
 */

export * from "./build/index.js";
