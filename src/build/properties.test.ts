import { describe, it, expect } from "vitest";
import { PropertyStore } from "./properties.js";
import { MissingPropertyError } from "./errors.js";

describe("PropertyStore writes", () => {
  it("set overwrites", () => {
    const store = new PropertyStore({});
    store.set("a", "1");
    store.set("a", "2");
    expect(store.get("a")).toBe("2");
  });

  it("setIfAbsent keeps the first writer", () => {
    const store = new PropertyStore({});
    expect(store.setIfAbsent("compiler", "msvc")).toBe(true);
    expect(store.setIfAbsent("compiler", "gcc")).toBe(false);
    expect(store.get("compiler")).toBe("msvc");
  });

  it("setFromEnvironment copies only present variables", () => {
    const store = new PropertyStore({ JAVA_HOME: "/opt/jdk", EMPTY: undefined });
    expect(store.setFromEnvironment("java.home", "JAVA_HOME")).toBe(true);
    expect(store.setFromEnvironment("empty", "EMPTY")).toBe(false);
    expect(store.setFromEnvironment("missing", "NOPE")).toBe(false);
    expect(store.get("java.home")).toBe("/opt/jdk");
    expect(store.has("empty")).toBe(false);
  });

  it("snapshots the environment at construction", () => {
    const env: Record<string, string | undefined> = { A: "1" };
    const store = new PropertyStore(env);
    env.A = "2";
    expect(store.environment.A).toBe("1");
  });

  it("rejects writes after freeze", () => {
    const store = new PropertyStore({});
    store.set("a", "1");
    store.freeze();
    expect(store.frozen).toBe(true);
    expect(() => store.set("b", "2")).toThrow(
      'Property store is frozen; cannot write "b" after the resolution phase',
    );
    expect(() => store.setIfAbsent("a", "3")).toThrow(/frozen/);
  });
});

describe("PropertyStore lookups", () => {
  it("treats an absent property as unset", () => {
    const store = new PropertyStore({});
    expect(store.get("nope")).toBeUndefined();
    expect(store.has("nope")).toBe(false);
  });

  it("require throws MissingPropertyError with context", () => {
    const store = new PropertyStore({});
    expect(() => store.require("python", "set it with -Dpython=...")).toThrow(
      'Property "python" is not set (set it with -Dpython=...)',
    );
    try {
      store.require("python");
    } catch (err) {
      expect(err).toBeInstanceOf(MissingPropertyError);
      expect(err).toMatchObject({ code: "missing_property", property: "python" });
    }
  });
});

describe("PropertyStore.substitute", () => {
  const store = new PropertyStore({});
  store.set("src", "src/main");
  store.set("out", "${src}/out");

  it("expands references", () => {
    expect(store.substitute("${src}/java")).toBe("src/main/java");
  });

  it("does not expand recursively", () => {
    expect(store.substitute("${out}")).toBe("${src}/out");
  });

  it("uses inline defaults for absent names", () => {
    expect(store.substitute("${python:-python3} -V")).toBe("python3 -V");
    expect(store.substitute("${src:-ignored}")).toBe("src/main");
  });

  it("allows an empty inline default", () => {
    expect(store.substitute("a${flags:-}b")).toBe("ab");
  });

  it("escapes $${ as a literal ${", () => {
    expect(store.substitute("echo $${HOME}")).toBe("echo ${HOME}");
  });

  it("throws for an absent name without a default", () => {
    expect(() => store.substitute("run ${missing}")).toThrow(
      'Property "missing" is not set (referenced in "run ${missing}")',
    );
  });

  it("leaves text without references untouched", () => {
    expect(store.substitute("plain $text")).toBe("plain $text");
  });
});

describe("PropertyStore.withScope", () => {
  it("shadows base properties and releases the binding", async () => {
    const store = new PropertyStore({});
    store.set("suite", "base");
    store.freeze();

    const seen = await store.withScope({ suite: "test_io" }, async () => {
      expect(store.scopeDepth).toBe(1);
      return store.substitute("run ${suite}");
    });

    expect(seen).toBe("run test_io");
    expect(store.get("suite")).toBe("base");
    expect(store.scopeDepth).toBe(0);
  });

  it("nests scopes with the innermost winning", async () => {
    const store = new PropertyStore({});
    await store.withScope({ a: "outer", b: "outer" }, async () => {
      await store.withScope({ a: "inner" }, async () => {
        expect(store.snapshot()).toEqual({ a: "inner", b: "outer" });
      });
      expect(store.get("a")).toBe("outer");
    });
    expect(store.has("a")).toBe(false);
  });

  it("releases the scope when fn throws", async () => {
    const store = new PropertyStore({});
    await expect(
      store.withScope({ a: "1" }, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(store.scopeDepth).toBe(0);
    expect(store.has("a")).toBe(false);
  });

  it("detects out-of-order release", async () => {
    const store = new PropertyStore({});
    let releaseInner: () => void = () => {};
    const innerGate = new Promise<void>((resolve) => {
      releaseInner = resolve;
    });

    // The inner scope outlives the outer one.
    let inner: Promise<void> = Promise.resolve();
    const outer = store.withScope({ a: "outer" }, async () => {
      inner = store.withScope({ b: "inner" }, () => innerGate);
    });

    await expect(outer).rejects.toThrow("Property scope released out of order (reentrant call?)");
    releaseInner();
    await inner;
  });
});
