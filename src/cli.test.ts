import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdtemp, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { cmdList, cmdPlan, cmdShow, cmdValidate, main, parseArgs } from "./cli.js";
import { detectPlatform, platformTag } from "./build/index.js";

const graphEasy = vi.hoisted(() => ({ available: false }));

vi.mock("./build/graph-easy.js", () => ({
  hasGraphEasy: vi.fn(async () => graphEasy.available),
  runGraphEasy: vi.fn(async (_dot: string, format: string) => `<${format} drawing>\n`),
}));

const stripAnsi = (s: string) => s.replace(/\x1b\[[0-9;]*m/g, "");

const DEMO = `
build "demo" default="all" {
  task "hello" description="Say hello" {
    echo "hello" "world"
  }
  task "greet" if="with.greeting" {
    echo "hi there"
  }
  task "all" depends="hello, greet" {
    echo "done"
  }
}
`;

// ---------------------------------------------------------------------------
// parseArgs
// ---------------------------------------------------------------------------

describe("parseArgs", () => {
  it("splits the command, tasks, options and properties", () => {
    expect(parseArgs(["run", "build", "test", "--keep-going", "--logs", "out", "-D", "python=python3", "-Dci=1"])).toEqual({
      command: "run",
      tasks: ["build", "test"],
      options: { "keep-going": true, logs: "out" },
      properties: { python: "python3", ci: "1" },
    });
  });

  it("keeps everything after the first = in a property value", () => {
    expect(parseArgs(["run", "-Dflags=-O2=x"]).properties).toEqual({ flags: "-O2=x" });
  });

  it("lets the last definition win", () => {
    expect(parseArgs(["-Da=1", "-Da=2"]).properties).toEqual({ a: "2" });
  });

  it("rejects malformed definitions and missing values", () => {
    expect(() => parseArgs(["-Dnovalue"])).toThrow('Invalid property definition "-Dnovalue": expected name=value');
    expect(() => parseArgs(["-D"])).toThrow("Missing name=value after -D");
    expect(() => parseArgs(["run", "--logs"])).toThrow("Missing value for --logs");
    expect(() => parseArgs(["run", "--timeout", "--verbose"])).toThrow("Missing value for --timeout");
  });
});

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

describe("commands", () => {
  let dir: string;
  let file: string;
  let logSpy: MockInstance;
  let errorSpy: MockInstance;
  let writeSpy: MockInstance;

  const logged = () => stripAnsi(logSpy.mock.calls.map((c) => c.map(String).join(" ")).join("\n"));
  const errors = () => errorSpy.mock.calls.map((c) => c.map(String).join(" ")).join("\n");
  const written = () => stripAnsi(writeSpy.mock.calls.map((c) => String(c[0])).join(""));

  async function buildFile(source: string, name = "build.kdl"): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, source);
    return path;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "graphbuild-cli-test-"));
    file = await buildFile(DEMO);
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    writeSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    graphEasy.available = false;
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    writeSpy.mockRestore();
    await rm(dir, { recursive: true, force: true });
  });

  describe("validate", () => {
    it("reports a valid build", async () => {
      expect(await cmdValidate(parseArgs(["validate", "--file", file]))).toBe(0);
      expect(logged()).toBe(`✅ ${file}: valid (3 tasks, 0 aliases)\n   Default: all`);
    });

    it("prints diagnostics and fails on errors", async () => {
      const bad = await buildFile('build "bad" {\n  task "a" depends="nope" { echo "x" }\n}\n', "bad.kdl");
      expect(await cmdValidate(parseArgs(["validate", "--file", bad]))).toBe(1);
      expect(logged().split("\n")).toEqual([
        '❌ [dependency_exists] (task: a): Task "a" depends on unknown task "nope".',
        "",
        "1 error(s), 0 warning(s)",
      ]);
    });
  });

  describe("list", () => {
    it("marks the default task and shows descriptions", async () => {
      expect(await cmdList(parseArgs(["list", "--file", file]))).toBe(0);
      expect(logged().split("\n")).toEqual([
        "demo",
        "",
        "Tasks:",
        "   hello  Say hello",
        "   greet",
        " * all",
      ]);
    });

    it("lists aliases with their variants", async () => {
      const withAlias = await buildFile(
        'build "pkg" {\n  task "pkg-mac" { echo "m" }\n  task "pkg-any" { echo "a" }\n' +
        '  alias "package" {\n    platform "mac" task="pkg-mac"\n    otherwise task="pkg-any"\n  }\n}\n',
        "alias.kdl",
      );
      expect(await cmdList(parseArgs(["list", "--file", withAlias]))).toBe(0);
      expect(logged().split("\n").slice(-2)).toEqual(["Aliases:", "   package  mac=pkg-mac, otherwise=pkg-any"]);
    });
  });

  describe("plan", () => {
    it("prints the execution order with guards", async () => {
      expect(await cmdPlan(parseArgs(["plan", "--file", file]))).toBe(0);
      expect(logged().split("\n")).toEqual([
        `Plan for all (platform: ${platformTag(detectPlatform())}):`,
        "   1. hello",
        "   2. greet  [if with.greeting]",
        "   3. all",
        "",
        "Guards are evaluated at run time; guarded tasks may be skipped.",
      ]);
    });
  });

  describe("show", () => {
    it("writes DOT", async () => {
      expect(await cmdShow(parseArgs(["show", "--file", file, "--format", "dot"]))).toBe(0);
      const dot = written();
      expect(dot.startsWith('digraph "demo" {\n')).toBe(true);
      expect(dot).toContain('  "all" [shape="box", style="bold"];\n');
      expect(dot).toContain('  "all" -> "greet";\n');
    });

    it("falls back to DOT in auto mode without graph-easy", async () => {
      expect(await cmdShow(parseArgs(["show", "--file", file]))).toBe(0);
      expect(written().startsWith('digraph "demo" {')).toBe(true);
    });

    it("uses boxart in auto mode when graph-easy is available", async () => {
      graphEasy.available = true;
      expect(await cmdShow(parseArgs(["show", "--file", file]))).toBe(0);
      expect(written()).toBe("<boxart drawing>\n");
    });

    it("fails for ascii without graph-easy", async () => {
      expect(await cmdShow(parseArgs(["show", "--file", file, "--format", "ascii"]))).toBe(1);
      expect(errors()).toContain("graph-easy is not installed");
    });

    it("rejects unknown formats", async () => {
      expect(await cmdShow(parseArgs(["show", "--file", file, "--format", "svg"]))).toBe(1);
      expect(errors()).toBe('Invalid --format value: "svg". Must be one of: ascii, boxart, dot, auto');
    });
  });

  describe("run", () => {
    it("runs the default task and writes the build result", async () => {
      const logs = join(dir, "logs");
      expect(await main(["run", "--file", file, "--logs", logs])).toBe(0);

      expect(written()).toContain("    hello world\n");
      expect(written()).toContain('  ○ greet (property "with.greeting" is not set)\n');
      expect(logged()).toContain("Tasks:  2 succeeded, 1 skipped");
      expect(logged()).toContain("🏁 Build completed");

      const result = JSON.parse(await readFile(join(logs, "build-result.json"), "utf-8"));
      expect(result.status).toBe("success");
      expect(result.targets).toEqual(["all"]);
    });

    it("passes -D properties to guards", async () => {
      expect(await main(["run", "--file", file, "--logs", join(dir, "logs"), "-Dwith.greeting=1"])).toBe(0);
      expect(written()).toContain("    hi there\n");
      expect(logged()).toContain("Tasks:  3 succeeded");
    });

    it("describes actions in a dry run", async () => {
      expect(await main(["run", "hello", "--file", file, "--dry-run"])).toBe(0);
      expect(written()).toContain("    would echo hello world\n");
      expect(logged()).toContain("demo (dry run)");
    });

    it("exits 1 and lists failing tests", async () => {
      await mkdir(join(dir, "results"));
      await writeFile(
        join(dir, "results", "seg.json"),
        JSON.stringify({ suite: "seg", cases: [{ name: "test_fill", status: "failure" }] }),
      );
      const failing = await buildFile('build "t" default="check" {\n  task "check" { check-tests "results/seg.json" }\n}\n', "t.kdl");

      expect(await main(["run", "--file", failing, "--logs", join(dir, "logs")])).toBe(1);
      const out = logged();
      expect(out).toContain("  Task:     check");
      expect(out).toContain("  Class:    test_failure");
      expect(out).toContain("  Error:    1 failing test case(s) in 1 suite(s): seg::test_fill");
      expect(out).toContain("Failing tests (1)");
      expect(out).not.toContain("Build completed");
    });
  });

  describe("main", () => {
    it("reports unknown tasks", async () => {
      expect(await main(["run", "nope", "--file", file])).toBe(1);
      expect(errors()).toBe('Error: Unknown task "nope". Known tasks: hello, greet, all');
    });

    it("reports a missing build file", async () => {
      const missing = join(dir, "missing.kdl");
      expect(await main(["validate", "--file", missing])).toBe(1);
      expect(errors()).toBe(`Error: Build file not found: ${missing} (from --file)`);
    });

    it("prints validation diagnostics when running an invalid build", async () => {
      const bad = await buildFile('build "bad" {\n  task "a" depends="nope" { echo "x" }\n}\n', "bad.kdl");
      expect(await main(["run", "a", "--file", bad])).toBe(1);
      expect(logged()).toContain('❌ [dependency_exists] (task: a): Task "a" depends on unknown task "nope".');
      expect(errors()).toBe("\n1 error(s)");
    });

    it("reports cycles as errors", async () => {
      const cyclic = await buildFile(
        'build "c" {\n  task "a" depends="b" { echo "a" }\n  task "b" depends="a" { echo "b" }\n}\n',
        "cyclic.kdl",
      );
      expect(await main(["run", "a", "--file", cyclic])).toBe(1);
      expect(errors()).toMatch(/^Error: Cyclic dependency: /);
    });

    it("prints usage and exits for an unknown command", async () => {
      const exitSpy = vi.spyOn(process, "exit").mockImplementation((code) => {
        throw new Error(`exit ${String(code)}`);
      });
      try {
        await expect(main(["frobnicate"])).rejects.toThrow("exit 1");
        expect(logged()).toContain("graphbuild run [task...] [options]");
      } finally {
        exitSpy.mockRestore();
      }
    });
  });
});
