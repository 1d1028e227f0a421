/**
 * Property Store: build-wide string properties.
 *
 * Lifecycle: created at build start with a snapshot of the process
 * environment, written during the resolution phase, frozen before any task
 * runs. Call-scoped bindings layer on top of the frozen base and disappear
 * when the call returns.
 */

import { MissingPropertyError } from "./errors.js";

const REFERENCE_RE = /\$\$\{|\$\{([^}:]+)(?::-([^}]*))?\}/g;

export class PropertyStore {
  private _values = new Map<string, string>();
  private _scopes: Array<Map<string, string>> = [];
  private _frozen = false;

  /** Environment captured at construction; subprocesses inherit it. */
  readonly environment: Readonly<Record<string, string>>;

  constructor(environment: Record<string, string | undefined> = process.env) {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(environment)) {
      if (value !== undefined) env[key] = value;
    }
    this.environment = Object.freeze(env);
  }

  get frozen(): boolean {
    return this._frozen;
  }

  /** Number of active call scopes. */
  get scopeDepth(): number {
    return this._scopes.length;
  }

  /** End the resolution phase. */
  freeze(): void {
    this._frozen = true;
  }

  private assertWritable(name: string): void {
    if (this._frozen) {
      throw new Error(`Property store is frozen; cannot write "${name}" after the resolution phase`);
    }
  }

  /** Unconditional write. */
  set(name: string, value: string): void {
    this.assertWritable(name);
    this._values.set(name, value);
  }

  /** First writer wins. Returns true if the value was bound. */
  setIfAbsent(name: string, value: string): boolean {
    this.assertWritable(name);
    if (this._values.has(name)) return false;
    this._values.set(name, value);
    return true;
  }

  /** Bind from the captured environment if the variable is present and the property unset. */
  setFromEnvironment(name: string, envKey: string): boolean {
    const value = this.environment[envKey];
    if (value === undefined) return false;
    return this.setIfAbsent(name, value);
  }

  get(name: string): string | undefined {
    for (let i = this._scopes.length - 1; i >= 0; i--) {
      const value = this._scopes[i].get(name);
      if (value !== undefined) return value;
    }
    return this._values.get(name);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  require(name: string, context?: string): string {
    const value = this.get(name);
    if (value === undefined) throw new MissingPropertyError(name, context);
    return value;
  }

  /**
   * Expand `${name}` references. `${name:-fallback}` supplies a default and
   * `$${` yields a literal `${`.
   */
  substitute(text: string): string {
    return text.replace(REFERENCE_RE, (match: string, name: string | undefined, fallback: string | undefined) => {
      if (match === "$${" || name === undefined) return "${";
      const key = name.trim();
      const value = this.get(key);
      if (value !== undefined) return value;
      if (fallback !== undefined) return fallback;
      throw new MissingPropertyError(key, `referenced in "${text}"`);
    });
  }

  /**
   * Run `fn` with extra bindings that shadow the base store. The scope is
   * released on every exit path.
   */
  async withScope<T>(bindings: Record<string, string>, fn: () => Promise<T>): Promise<T> {
    const scope = new Map(Object.entries(bindings));
    this._scopes.push(scope);
    try {
      return await fn();
    } finally {
      const top = this._scopes[this._scopes.length - 1];
      if (top !== scope) {
        // Sequential execution means scopes always unwind LIFO.
        throw new Error("Property scope released out of order (reentrant call?)");
      }
      this._scopes.pop();
    }
  }

  /** All visible properties, scoped bindings included. */
  snapshot(): Record<string, string> {
    const out: Record<string, string> = Object.fromEntries(this._values);
    for (const scope of this._scopes) {
      for (const [key, value] of scope) out[key] = value;
    }
    return out;
  }
}
