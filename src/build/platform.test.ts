import { describe, it, expect } from "vitest";
import { isArch, isFamily, normalizeArch, platformTag } from "./platform.js";
import { ConditionEvaluationError } from "./errors.js";

const mac = { platform: "darwin", arch: "arm64" };
const linux = { platform: "linux", arch: "x64" };
const windows = { platform: "win32", arch: "x64" };

describe("platformTag", () => {
  it("maps node platforms to tags", () => {
    expect(platformTag(windows)).toBe("windows");
    expect(platformTag(mac)).toBe("mac");
    expect(platformTag(linux)).toBe("linux");
    expect(platformTag({ platform: "freebsd" })).toBe("unix");
  });

  it("throws when the host does not report a platform", () => {
    expect(() => platformTag({})).toThrow(ConditionEvaluationError);
  });
});

describe("isFamily", () => {
  it("treats mac and linux as unix", () => {
    expect(isFamily(mac, "unix")).toBe(true);
    expect(isFamily(linux, "unix")).toBe(true);
    expect(isFamily(windows, "unix")).toBe(false);
  });

  it("matches exact families case-insensitively", () => {
    expect(isFamily(mac, "Mac")).toBe(true);
    expect(isFamily(mac, "linux")).toBe(false);
    expect(isFamily(windows, "WINDOWS")).toBe(true);
  });

  it("rejects unknown family names", () => {
    expect(() => isFamily(mac, "beos")).toThrow(
      'osFamily(beos): unknown OS family "beos" (expected one of: windows, mac, unix, linux)',
    );
  });

  it("rejects a missing platform fact", () => {
    expect(() => isFamily({ arch: "x64" }, "unix")).toThrow(
      "osFamily(unix): host operating system is not available",
    );
  });
});

describe("architectures", () => {
  it("normalizes aliases", () => {
    expect(normalizeArch("x86_64")).toBe("x64");
    expect(normalizeArch("AMD64")).toBe("x64");
    expect(normalizeArch("aarch64")).toBe("arm64");
    expect(normalizeArch("i386")).toBe("ia32");
    expect(normalizeArch("sparc")).toBeUndefined();
  });

  it("compares through aliases", () => {
    expect(isArch(linux, "amd64")).toBe(true);
    expect(isArch(mac, "aarch64")).toBe(true);
    expect(isArch(mac, "x86_64")).toBe(false);
  });

  it("rejects unknown names and missing facts", () => {
    expect(() => isArch(linux, "sparc")).toThrow('osArch(sparc): unknown architecture "sparc"');
    expect(() => isArch({ platform: "linux" }, "x64")).toThrow(
      "osArch(x64): host architecture is not available",
    );
  });
});
