/**
 * Condition Expression Language.
 *
 * Boolean expressions over platform and filesystem facts, used by property
 * variants, task guards and per-action `when` clauses:
 *
 *   osFamily('mac') && !fileExists('${lib.dir}/prokaryote.jar')
 *
 * Evaluation is a pure function of the current platform facts, properties
 * and filesystem. Nothing is cached: the filesystem may change between two
 * evaluations in the same run.
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { ConditionSyntaxError } from "./errors.js";
import { isArch, isFamily, type PlatformFacts } from "./platform.js";
import type { PropertyStore } from "./properties.js";

// ---------------------------------------------------------------------------
// AST
// ---------------------------------------------------------------------------

export type Condition =
  | { kind: "literal"; value: boolean }
  | { kind: "and"; operands: Condition[] }
  | { kind: "or"; operands: Condition[] }
  | { kind: "not"; operand: Condition }
  | { kind: "osFamily"; name: string }
  | { kind: "osArch"; name: string }
  | { kind: "fileExists"; path: string }
  | { kind: "isSet"; property: string }
  | { kind: "equals"; left: string; right: string };

export const all = (...operands: Condition[]): Condition => ({ kind: "and", operands });
export const any = (...operands: Condition[]): Condition => ({ kind: "or", operands });
export const not = (operand: Condition): Condition => ({ kind: "not", operand });
export const osFamily = (name: string): Condition => ({ kind: "osFamily", name });
export const osArch = (name: string): Condition => ({ kind: "osArch", name });
export const fileExists = (path: string): Condition => ({ kind: "fileExists", path });
export const isSet = (property: string): Condition => ({ kind: "isSet", property });
export const equals = (left: string, right: string): Condition => ({ kind: "equals", left, right });

const PREDICATES: Record<string, { arity: number; build: (args: string[]) => Condition }> = {
  osFamily: { arity: 1, build: ([name]) => osFamily(name) },
  osArch: { arity: 1, build: ([name]) => osArch(name) },
  fileExists: { arity: 1, build: ([path]) => fileExists(path) },
  isSet: { arity: 1, build: ([property]) => isSet(property) },
  equals: { arity: 2, build: ([left, right]) => equals(left, right) },
};

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

type TokenKind = "and" | "or" | "not" | "lparen" | "rparen" | "comma" | "string" | "ident" | "eof";

type Token = { kind: TokenKind; value: string; col: number };

function syntaxError(source: string, col: number, message: string): ConditionSyntaxError {
  return new ConditionSyntaxError(source, col, message);
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    const col = i + 1;

    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === "&" && source[i + 1] === "&") {
      tokens.push({ kind: "and", value: "&&", col });
      i += 2;
      continue;
    }
    if (ch === "|" && source[i + 1] === "|") {
      tokens.push({ kind: "or", value: "||", col });
      i += 2;
      continue;
    }
    if (ch === "!") {
      tokens.push({ kind: "not", value: "!", col });
      i++;
      continue;
    }
    if (ch === "(" || ch === ")" || ch === ",") {
      tokens.push({ kind: ch === "(" ? "lparen" : ch === ")" ? "rparen" : "comma", value: ch, col });
      i++;
      continue;
    }
    if (ch === "'" || ch === '"') {
      const quote = ch;
      i++;
      let out = "";
      while (i < source.length && source[i] !== quote) {
        if (source[i] === "\\" && i + 1 < source.length) {
          out += source[i + 1];
          i += 2;
        } else {
          out += source[i++];
        }
      }
      if (source[i] !== quote) throw syntaxError(source, col, "unterminated string");
      i++;
      tokens.push({ kind: "string", value: out, col });
      continue;
    }
    if (/[A-Za-z_]/.test(ch)) {
      let ident = "";
      while (i < source.length && /[A-Za-z0-9_]/.test(source[i])) ident += source[i++];
      tokens.push({ kind: "ident", value: ident, col });
      continue;
    }

    throw syntaxError(source, col, `unexpected character '${ch}'`);
  }

  tokens.push({ kind: "eof", value: "", col: source.length + 1 });
  return tokens;
}

class ConditionParser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parse(): Condition {
    const expr = this.parseOr();
    const tok = this.peek();
    if (tok.kind !== "eof") throw syntaxError(this.source, tok.col, `unexpected "${tok.value}"`);
    return expr;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private next(): Token {
    return this.tokens[this.pos++];
  }

  private expect(kind: TokenKind): Token {
    const tok = this.next();
    if (tok.kind !== kind) {
      throw syntaxError(this.source, tok.col, `expected ${kind}, got ${tok.kind === "eof" ? "end of input" : `"${tok.value}"`}`);
    }
    return tok;
  }

  private parseOr(): Condition {
    const operands = [this.parseAnd()];
    while (this.peek().kind === "or") {
      this.next();
      operands.push(this.parseAnd());
    }
    return operands.length === 1 ? operands[0] : any(...operands);
  }

  private parseAnd(): Condition {
    const operands = [this.parseUnary()];
    while (this.peek().kind === "and") {
      this.next();
      operands.push(this.parseUnary());
    }
    return operands.length === 1 ? operands[0] : all(...operands);
  }

  private parseUnary(): Condition {
    if (this.peek().kind === "not") {
      this.next();
      return not(this.parseUnary());
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Condition {
    const tok = this.next();
    if (tok.kind === "lparen") {
      const inner = this.parseOr();
      this.expect("rparen");
      return inner;
    }
    if (tok.kind !== "ident") {
      throw syntaxError(this.source, tok.col, tok.kind === "eof" ? "unexpected end of input" : `unexpected "${tok.value}"`);
    }
    if (tok.value === "true" || tok.value === "false") {
      return { kind: "literal", value: tok.value === "true" };
    }

    const predicate = PREDICATES[tok.value];
    if (!predicate) {
      throw syntaxError(
        this.source,
        tok.col,
        `unknown predicate "${tok.value}" (expected one of: ${Object.keys(PREDICATES).join(", ")})`,
      );
    }

    this.expect("lparen");
    const args: string[] = [];
    if (this.peek().kind !== "rparen") {
      args.push(this.expect("string").value);
      while (this.peek().kind === "comma") {
        this.next();
        args.push(this.expect("string").value);
      }
    }
    this.expect("rparen");

    if (args.length !== predicate.arity) {
      throw syntaxError(this.source, tok.col, `${tok.value} takes ${predicate.arity} argument(s), got ${args.length}`);
    }
    return predicate.build(args);
  }
}

export function parseCondition(source: string): Condition {
  if (!source.trim()) return { kind: "literal", value: true };
  return new ConditionParser(source, tokenize(source)).parse();
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

export type ConditionEnv = {
  platform: PlatformFacts;
  properties: PropertyStore;
  /** Base for relative `fileExists` paths. */
  basedir: string;
  /** Filesystem probe; defaults to `existsSync`. */
  exists?: (path: string) => boolean;
};

export function evaluateCondition(condition: Condition, env: ConditionEnv): boolean {
  const sub = (text: string) => env.properties.substitute(text);

  switch (condition.kind) {
    case "literal":
      return condition.value;
    case "and":
      return condition.operands.every((c) => evaluateCondition(c, env));
    case "or":
      return condition.operands.some((c) => evaluateCondition(c, env));
    case "not":
      return !evaluateCondition(condition.operand, env);
    case "osFamily":
      return isFamily(env.platform, sub(condition.name));
    case "osArch":
      return isArch(env.platform, sub(condition.name));
    case "fileExists": {
      const probe = env.exists ?? existsSync;
      return probe(resolve(env.basedir, sub(condition.path)));
    }
    case "isSet":
      return env.properties.has(sub(condition.property));
    case "equals":
      return sub(condition.left) === sub(condition.right);
  }
}

function quote(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

/** Render a condition back to expression syntax. */
export function describeCondition(condition: Condition): string {
  switch (condition.kind) {
    case "literal":
      return String(condition.value);
    case "and":
    case "or": {
      const op = condition.kind === "and" ? " && " : " || ";
      return condition.operands
        .map((c) => (c.kind === "and" || c.kind === "or" ? `(${describeCondition(c)})` : describeCondition(c)))
        .join(op);
    }
    case "not": {
      const inner = describeCondition(condition.operand);
      return condition.operand.kind === "and" || condition.operand.kind === "or" ? `!(${inner})` : `!${inner}`;
    }
    case "osFamily":
      return `osFamily(${quote(condition.name)})`;
    case "osArch":
      return `osArch(${quote(condition.name)})`;
    case "fileExists":
      return `fileExists(${quote(condition.path)})`;
    case "isSet":
      return `isSet(${quote(condition.property)})`;
    case "equals":
      return `equals(${quote(condition.left)}, ${quote(condition.right)})`;
  }
}
