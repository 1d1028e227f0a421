import { describe, it, expect } from "vitest";
import { TaskGraph } from "./graph.js";
import { UnknownTaskError } from "./errors.js";
import { alias, call, exec, task } from "./test-build-builder.js";

function sampleGraph(): TaskGraph {
  return new TaskGraph(
    [
      task("external-dependencies"),
      task("compile", { depends: ["external-dependencies"] }),
      task("test-java", { depends: ["compile"] }),
      task("test-python", { depends: ["compile"], actions: [call("run-suite", { suite: "io" })] }),
      task("run-suite", { actions: [exec("python", "-m", "pytest")] }),
      task("test-mac"),
      task("test-linux"),
      task("test", { depends: ["test-java", "test-python", "platform-test"] }),
    ],
    [alias("platform-test", { mac: "test-mac", linux: "test-linux" })],
  );
}

describe("TaskGraph", () => {
  it("shares one namespace between tasks and aliases", () => {
    const graph = sampleGraph();
    expect(graph.has("compile")).toBe(true);
    expect(graph.has("platform-test")).toBe(true);
    expect(graph.isAlias("platform-test")).toBe(true);
    expect(graph.ids().slice(-1)).toEqual(["platform-test"]);
  });

  it("keeps the first of duplicate ids", () => {
    const graph = new TaskGraph([task("a", { description: "first" }), task("a", { description: "second" })]);
    expect(graph.task("a").description).toBe("first");
    expect(graph.tasks).toHaveLength(1);
  });

  it("throws UnknownTaskError listing known ids", () => {
    expect(() => new TaskGraph([task("a")]).task("b")).toThrow('Unknown task "b". Known tasks: a');
    expect(() => new TaskGraph([task("a")]).task("b")).toThrow(UnknownTaskError);
  });

  it("resolves aliases to the variant, then otherwise", () => {
    const graph = new TaskGraph(
      [task("x"), task("y")],
      [alias("both", { mac: "x" }, "y"), alias("maconly", { mac: "x" })],
    );
    expect(Object.fromEntries(graph.resolveAliases("mac"))).toEqual({ both: "x", maconly: "x" });
    expect(Object.fromEntries(graph.resolveAliases("windows"))).toEqual({ both: "y", maconly: undefined });
  });

  it("falls back to the unix variant on mac and linux only", () => {
    const graph = new TaskGraph(
      [task("pkg-unix"), task("pkg-linux"), task("pkg-win"), task("pkg-any")],
      [
        alias("package", { unix: "pkg-unix", windows: "pkg-win" }),
        alias("native", { linux: "pkg-linux", unix: "pkg-unix" }, "pkg-any"),
      ],
    );
    expect(Object.fromEntries(graph.resolveAliases("linux"))).toEqual({ package: "pkg-unix", native: "pkg-linux" });
    expect(Object.fromEntries(graph.resolveAliases("mac"))).toEqual({ package: "pkg-unix", native: "pkg-unix" });
    expect(Object.fromEntries(graph.resolveAliases("windows"))).toEqual({ package: "pkg-win", native: "pkg-any" });
  });

  it("lists dependencies then call targets as successors", () => {
    const graph = sampleGraph();
    expect(graph.successors("test-python")).toEqual(["compile", "run-suite"]);
    expect(graph.successors("platform-test")).toEqual(["test-mac", "test-linux"]);
    expect(graph.successors("nope")).toEqual([]);
  });
});

describe("findCycle", () => {
  it("returns undefined for an acyclic graph", () => {
    expect(sampleGraph().findCycle()).toBeUndefined();
  });

  it("finds dependency cycles with the first node repeated", () => {
    const graph = new TaskGraph([
      task("a", { depends: ["b"] }),
      task("b", { depends: ["c"] }),
      task("c", { depends: ["a"] }),
    ]);
    expect(graph.findCycle()).toEqual(["a", "b", "c", "a"]);
  });

  it("follows call edges and aliases", () => {
    const graph = new TaskGraph(
      [task("a", { actions: [call("plat")] }), task("b", { depends: ["a"] })],
      [alias("plat", { linux: "b" })],
    );
    expect(graph.findCycle()).toEqual(["a", "plat", "b", "a"]);
  });

  it("detects self-dependency", () => {
    expect(new TaskGraph([task("a", { depends: ["a"] })]).findCycle()).toEqual(["a", "a"]);
  });
});

describe("planOrder", () => {
  it("orders each task after its dependencies, once each", () => {
    const graph = sampleGraph();
    const order = graph.planOrder(["test"], graph.resolveAliases("mac"));
    expect(order).toEqual([
      "external-dependencies",
      "compile",
      "test-java",
      "run-suite",
      "test-python",
      "test-mac",
      "test",
    ]);
  });

  it("can ignore call edges", () => {
    const graph = sampleGraph();
    expect(graph.planOrder(["test-python"], undefined, false)).toEqual([
      "external-dependencies",
      "compile",
      "test-python",
    ]);
  });

  it("drops aliases without a variant for the platform", () => {
    const graph = sampleGraph();
    expect(graph.planOrder(["platform-test"], graph.resolveAliases("windows"))).toEqual([]);
  });

  it("requires an alias table to resolve aliases", () => {
    expect(() => sampleGraph().planOrder(["platform-test"])).toThrow(
      'Alias "platform-test" cannot be resolved without a platform',
    );
  });
});
