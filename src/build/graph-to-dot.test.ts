import { describe, it, expect } from "vitest";
import { graphToDot } from "./graph-to-dot.js";
import { TaskGraph } from "./graph.js";
import { alias, call, task } from "./test-build-builder.js";

describe("graphToDot", () => {
  it("renders tasks, aliases and their edges", () => {
    const graph = new TaskGraph(
      [
        task("compile"),
        task("test", { depends: ["compile"], actions: [call("run-suite", { suite: "io" })] }),
        task("run-suite"),
        task("test-mac"),
      ],
      [alias("platform-test", { mac: "test-mac" }, "test")],
    );

    expect(graphToDot(graph, { name: "demo", defaultTask: "test" })).toBe([
      'digraph "demo" {',
      '  rankdir="TB";',
      "",
      '  "compile" [shape="box"];',
      '  "test" [shape="box", style="bold"];',
      '  "run-suite" [shape="box"];',
      '  "test-mac" [shape="box"];',
      '  "platform-test" [shape="diamond"];',
      "",
      '  "test" -> "compile";',
      '  "test" -> "run-suite" [style="dashed", label="call"];',
      '  "platform-test" -> "test-mac" [label="mac"];',
      '  "platform-test" -> "test" [label="otherwise"];',
      "}",
      "",
    ].join("\n"));
  });

  it("escapes quotes in ids", () => {
    const dot = graphToDot(new TaskGraph([task('say "hi"')]));
    expect(dot).toContain('  "say \\"hi\\"" [shape="box"];');
    expect(dot.startsWith('digraph "build" {')).toBe(true);
  });
});
