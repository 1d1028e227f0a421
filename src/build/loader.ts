/**
 * Build file loading and the property resolution phase.
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parseBuildFile } from "./buildfile-parser.js";
import type { BuildDefinition } from "./buildfile-types.js";
import { evaluateCondition, type ConditionEnv } from "./conditions.js";
import { detectPlatform, normalizeArch, platformTag, type PlatformFacts } from "./platform.js";
import { PropertyStore } from "./properties.js";

/** Read and parse a build file. Relative paths inside it resolve against its directory. */
export async function loadBuildFile(path: string): Promise<BuildDefinition> {
  const absolute = resolve(path);
  const source = await readFile(absolute, "utf-8");
  return parseBuildFile(source, { dir: dirname(absolute), source: absolute });
}

export type ResolveOptions = {
  /** User properties (`-Dname=value`); they win over every declaration. */
  properties?: Record<string, string>;
  environment?: Record<string, string | undefined>;
  platform?: PlatformFacts;
  exists?: (path: string) => boolean;
};

/**
 * Run the resolution phase and return a frozen store.
 *
 * Order: built-ins, user properties, declarations in file order (first
 * writer wins), `require` checks, freeze.
 */
export function resolveProperties(build: BuildDefinition, opts: ResolveOptions = {}): PropertyStore {
  const platform = opts.platform ?? detectPlatform();
  const store = new PropertyStore(opts.environment ?? process.env);

  store.set("basedir", build.basedir);
  store.set("build.name", build.name);
  if (platform.platform) {
    store.set("os.family", platformTag(platform));
    store.set("os.name", platform.platform);
  }
  if (platform.arch) {
    store.set("os.arch", normalizeArch(platform.arch) ?? platform.arch);
  }

  for (const [name, value] of Object.entries(opts.properties ?? {})) {
    store.set(name, value);
  }

  const env: ConditionEnv = { platform, properties: store, basedir: build.basedir, exists: opts.exists };

  for (const decl of build.declarations) {
    switch (decl.kind) {
      case "value":
        if (store.has(decl.name)) break;
        if (decl.when && !evaluateCondition(decl.when, env)) break;
        store.setIfAbsent(decl.name, store.substitute(decl.value));
        break;
      case "env":
        if (store.has(decl.name)) break;
        if (decl.when && !evaluateCondition(decl.when, env)) break;
        if (!store.setFromEnvironment(decl.name, decl.env) && decl.default !== undefined) {
          store.setIfAbsent(decl.name, store.substitute(decl.default));
        }
        break;
      case "variants": {
        if (store.has(decl.name)) break;
        const chosen = decl.variants.find((v) => evaluateCondition(v.when, env))?.value ?? decl.otherwise;
        if (chosen !== undefined) store.setIfAbsent(decl.name, store.substitute(chosen));
        break;
      }
      case "environment":
        for (const [key, value] of Object.entries(store.environment)) {
          store.setIfAbsent(`${decl.prefix}.${key}`, value);
        }
        break;
    }
  }

  for (const required of build.requires) {
    store.require(required.name, required.message);
  }

  store.freeze();
  return store;
}
