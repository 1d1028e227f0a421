/**
 * Host platform facts used by conditions and alias resolution.
 *
 * Facts are plain data so tests can describe any host; {@link detectPlatform}
 * reads the real one.
 */

import { release } from "node:os";
import { ConditionEvaluationError } from "./errors.js";

/** Raw platform facts. Missing fields mean the host did not report them. */
export type PlatformFacts = {
  /** Node-style platform id (`win32`, `darwin`, `linux`, ...). */
  platform?: string;
  /** Node-style architecture id (`x64`, `arm64`, ...). */
  arch?: string;
  release?: string;
};

/** The single tag an alias table is keyed by. */
export type PlatformTag = "windows" | "mac" | "linux" | "unix";

export const KNOWN_FAMILIES: ReadonlySet<string> = new Set(["windows", "mac", "unix", "linux"]);

const NODE_ARCHES: ReadonlySet<string> = new Set([
  "arm", "arm64", "ia32", "loong64", "mips", "mipsel", "ppc", "ppc64", "riscv64", "s390", "s390x", "x64",
]);

const ARCH_ALIASES: Record<string, string> = {
  x86_64: "x64",
  amd64: "x64",
  aarch64: "arm64",
  x86: "ia32",
  i386: "ia32",
  i686: "ia32",
};

export function detectPlatform(): PlatformFacts {
  return { platform: process.platform, arch: process.arch, release: release() };
}

function requirePlatform(facts: PlatformFacts, predicate: string): string {
  if (!facts.platform) {
    throw new ConditionEvaluationError(predicate, "host operating system is not available");
  }
  return facts.platform;
}

export function platformTag(facts: PlatformFacts): PlatformTag {
  const platform = requirePlatform(facts, "platformTag");
  if (platform === "win32") return "windows";
  if (platform === "darwin") return "mac";
  if (platform === "linux") return "linux";
  return "unix";
}

/**
 * Family membership. Families overlap: a mac or linux host is also `unix`.
 */
export function isFamily(facts: PlatformFacts, family: string): boolean {
  const predicate = `osFamily(${family})`;
  const name = family.toLowerCase();
  if (!KNOWN_FAMILIES.has(name)) {
    throw new ConditionEvaluationError(
      predicate,
      `unknown OS family "${family}" (expected one of: ${[...KNOWN_FAMILIES].join(", ")})`,
    );
  }
  const platform = requirePlatform(facts, predicate);
  switch (name) {
    case "windows": return platform === "win32";
    case "mac": return platform === "darwin";
    case "linux": return platform === "linux";
    default: return platform !== "win32";
  }
}

/** Normalize an architecture name to the Node id, or undefined if unknown. */
export function normalizeArch(name: string): string | undefined {
  const lower = name.toLowerCase();
  if (NODE_ARCHES.has(lower)) return lower;
  return ARCH_ALIASES[lower];
}

export function isArch(facts: PlatformFacts, name: string): boolean {
  const predicate = `osArch(${name})`;
  const wanted = normalizeArch(name);
  if (!wanted) {
    throw new ConditionEvaluationError(predicate, `unknown architecture "${name}"`);
  }
  if (!facts.arch) {
    throw new ConditionEvaluationError(predicate, "host architecture is not available");
  }
  return (normalizeArch(facts.arch) ?? facts.arch) === wanted;
}
