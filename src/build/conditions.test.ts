import { describe, it, expect } from "vitest";
import {
  all,
  any,
  describeCondition,
  equals,
  evaluateCondition,
  fileExists,
  isSet,
  not,
  osArch,
  osFamily,
  parseCondition,
  type ConditionEnv,
} from "./conditions.js";
import { ConditionEvaluationError, ConditionSyntaxError } from "./errors.js";
import { PropertyStore } from "./properties.js";

function env(overrides: Partial<ConditionEnv> = {}, props: Record<string, string> = {}): ConditionEnv {
  const properties = new PropertyStore({});
  for (const [k, v] of Object.entries(props)) properties.set(k, v);
  return {
    platform: { platform: "darwin", arch: "arm64" },
    properties,
    basedir: "/work",
    exists: () => false,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

describe("parseCondition", () => {
  it("parses predicates into the same AST as the builders", () => {
    expect(parseCondition("osFamily('mac')")).toEqual(osFamily("mac"));
    expect(parseCondition('equals("${a}", "b")')).toEqual(equals("${a}", "b"));
  });

  it("gives && higher precedence than ||", () => {
    expect(parseCondition("isSet('a') || isSet('b') && isSet('c')")).toEqual(
      any(isSet("a"), all(isSet("b"), isSet("c"))),
    );
  });

  it("flattens chains and honors parentheses", () => {
    expect(parseCondition("(osFamily('mac') || osFamily('linux')) && !fileExists('lib/x.jar')")).toEqual(
      all(any(osFamily("mac"), osFamily("linux")), not(fileExists("lib/x.jar"))),
    );
    expect(parseCondition("true && false && true")).toEqual(
      all({ kind: "literal", value: true }, { kind: "literal", value: false }, { kind: "literal", value: true }),
    );
  });

  it("treats an empty expression as true", () => {
    expect(parseCondition("   ")).toEqual({ kind: "literal", value: true });
  });

  it("unescapes quoted strings", () => {
    expect(parseCondition("equals('it\\'s', 'x')")).toEqual(equals("it's", "x"));
  });

  it("reports unknown predicates with their column", () => {
    expect(() => parseCondition("isSet('a') && onMoon('x')")).toThrow(
      'invalid condition "isSet(\'a\') && onMoon(\'x\')" at column 15: unknown predicate "onMoon" (expected one of: osFamily, osArch, fileExists, isSet, equals)',
    );
  });

  it("reports arity mismatches", () => {
    expect(() => parseCondition("equals('a')")).toThrow("equals takes 2 argument(s), got 1");
  });

  it("reports unterminated strings and stray characters", () => {
    expect(() => parseCondition("osFamily('mac")).toThrow(ConditionSyntaxError);
    expect(() => parseCondition("isSet('a') & isSet('b')")).toThrow("unexpected character '&'");
  });

  it("reports trailing tokens", () => {
    expect(() => parseCondition("true)")).toThrow('at column 5: unexpected ")"');
  });

  it("reports a missing closing parenthesis", () => {
    expect(() => parseCondition("(true")).toThrow("expected rparen, got end of input");
  });
});

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

describe("evaluateCondition", () => {
  it("evaluates platform predicates", () => {
    const e = env();
    expect(evaluateCondition(osFamily("unix"), e)).toBe(true);
    expect(evaluateCondition(osFamily("windows"), e)).toBe(false);
    expect(evaluateCondition(osArch("aarch64"), e)).toBe(true);
  });

  it("substitutes properties inside arguments", () => {
    const e = env({}, { family: "mac", a: "x" });
    expect(evaluateCondition(osFamily("${family}"), e)).toBe(true);
    expect(evaluateCondition(equals("${a}", "x"), e)).toBe(true);
    expect(evaluateCondition(isSet("a"), e)).toBe(true);
    expect(evaluateCondition(isSet("b"), e)).toBe(false);
  });

  it("resolves fileExists against basedir and re-probes every time", () => {
    const probes: string[] = [];
    let present = false;
    const e = env({
      exists: (path) => {
        probes.push(path);
        return present;
      },
    }, { lib: "lib" });

    const cond = fileExists("${lib}/prokaryote.jar");
    expect(evaluateCondition(cond, e)).toBe(false);
    present = true;
    expect(evaluateCondition(cond, e)).toBe(true);
    expect(probes).toEqual(["/work/lib/prokaryote.jar", "/work/lib/prokaryote.jar"]);
  });

  it("keeps absolute fileExists paths", () => {
    const probes: string[] = [];
    const e = env({
      exists: (path) => {
        probes.push(path);
        return true;
      },
    });
    evaluateCondition(fileExists("/opt/tool"), e);
    expect(probes).toEqual(["/opt/tool"]);
  });

  it("short-circuits and/or", () => {
    const e = env();
    // The unknown family would throw if evaluated.
    expect(evaluateCondition(any(osFamily("mac"), osFamily("plan9")), e)).toBe(true);
    expect(evaluateCondition(all(osFamily("windows"), osFamily("plan9")), e)).toBe(false);
  });

  it("raises ConditionEvaluationError for an unknown family", () => {
    expect(() => evaluateCondition(osFamily("plan9"), env())).toThrow(ConditionEvaluationError);
  });

  it("raises when the host does not report a fact", () => {
    expect(() => evaluateCondition(osArch("x64"), env({ platform: { platform: "linux" } }))).toThrow(
      "host architecture is not available",
    );
  });
});

describe("describeCondition", () => {
  it("renders conditions back to expression syntax", () => {
    const cond = all(any(osFamily("mac"), osFamily("linux")), not(fileExists("lib/x.jar")));
    expect(describeCondition(cond)).toBe("(osFamily('mac') || osFamily('linux')) && !fileExists('lib/x.jar')");
  });

  it("parenthesizes negated groups and escapes quotes", () => {
    expect(describeCondition(not(all(isSet("a"), equals("it's", "b"))))).toBe(
      "!(isSet('a') && equals('it\\'s', 'b'))",
    );
  });

  it("round-trips through the parser", () => {
    const source = "osArch('x64') || !isSet('skip') && equals('a', 'b')";
    expect(describeCondition(parseCondition(source))).toBe(
      "osArch('x64') || (!isSet('skip') && equals('a', 'b'))",
    );
  });
});
