/**
 * Build file parser: a KDL subset converted to a {@link BuildDefinition}.
 *
 *   build "demo" default="build" {
 *     property "python" env="PYTHON" default="python3"
 *     property "installer" {
 *       variant "dmg" when="osFamily('mac')"
 *       otherwise "none"
 *     }
 *     alias "package" {
 *       platform "mac" task="package-mac"
 *       otherwise task="package-none"
 *     }
 *     task "compile" depends="prepare" {
 *       exec "${python}" "setup.py" "build_ext" cwd="src"
 *     }
 *   }
 */

import { resolve } from "node:path";
import type {
  BuildDefinition,
  PropertyDeclaration,
  RequiredProperty,
  VariantDeclaration,
} from "./buildfile-types.js";
import { parseCondition, type Condition } from "./conditions.js";
import { BuildError, BuildFileError } from "./errors.js";
import type { AliasDefinition, TaskAction, TaskDefinition } from "./types.js";

type Scalar = string | number | boolean;

type TokenKind = "ident" | "string" | "number" | "boolean" | "lbrace" | "rbrace" | "equals" | "newline" | "eof";

type Token = {
  kind: TokenKind;
  value: string;
  line: number;
  col: number;
};

type KdlNode = {
  name: string;
  args: Scalar[];
  props: Record<string, Scalar>;
  children: KdlNode[];
  line: number;
  col: number;
};

function tokenize(source: string): Token[] {
  const text = source;
  const tokens: Token[] = [];

  let i = 0;
  let line = 1;
  let col = 1;

  const peek = () => text[i];
  const at = (n: number) => text[i + n];
  const advance = (): string => {
    const ch = text[i++];
    if (ch === "\n") {
      line++;
      col = 1;
    } else {
      col++;
    }
    return ch;
  };

  while (i < text.length) {
    const ch = peek();

    // Line comments: // until end of line
    if (ch === "/" && at(1) === "/") {
      while (i < text.length && peek() !== "\n") advance();
      continue;
    }

    // Block comments: /* ... */
    if (ch === "/" && at(1) === "*") {
      const startLine = line;
      const startCol = col;
      advance();
      advance();
      let closed = false;
      while (i < text.length) {
        if (peek() === "*" && at(1) === "/") {
          advance();
          advance();
          closed = true;
          break;
        }
        advance();
      }
      if (!closed) throw new BuildFileError("unterminated block comment", { line: startLine, col: startCol });
      continue;
    }
    // Line continuation
    if (ch === "\\" && (at(1) === "\n" || (at(1) === "\r" && at(2) === "\n"))) {
      advance();
      if (peek() === "\r") advance();
      advance();
      continue;
    }
    if (ch === " " || ch === "\t" || ch === "\r") {
      advance();
      continue;
    }
    if (ch === "\n" || ch === ";") {
      tokens.push({ kind: "newline", value: "\n", line, col });
      advance();
      continue;
    }
    if (ch === "{") {
      tokens.push({ kind: "lbrace", value: "{", line, col });
      advance();
      continue;
    }
    if (ch === "}") {
      tokens.push({ kind: "rbrace", value: "}", line, col });
      advance();
      continue;
    }
    if (ch === "=") {
      tokens.push({ kind: "equals", value: "=", line, col });
      advance();
      continue;
    }

    if (ch === '"') {
      const startLine = line;
      const startCol = col;
      advance();
      let out = "";
      while (i < text.length && peek() !== '"') {
        if (peek() === "\\") {
          advance();
          const esc = advance();
          if (esc === "n") out += "\n";
          else if (esc === "t") out += "\t";
          else out += esc;
        } else {
          out += advance();
        }
      }
      if (peek() !== '"') {
        throw new BuildFileError("unterminated string", { line: startLine, col: startCol });
      }
      advance();
      tokens.push({ kind: "string", value: out, line: startLine, col: startCol });
      continue;
    }

    if (/[0-9-]/.test(ch)) {
      const startLine = line;
      const startCol = col;
      let num = advance();
      while (i < text.length && /[0-9.]/.test(peek())) num += advance();
      if (/^-?[0-9]+(\.[0-9]+)?$/.test(num)) {
        tokens.push({ kind: "number", value: num, line: startLine, col: startCol });
        continue;
      }
      throw new BuildFileError(`invalid number "${num}"`, { line: startLine, col: startCol });
    }

    if (/[A-Za-z_]/.test(ch)) {
      const startLine = line;
      const startCol = col;
      let ident = advance();
      while (i < text.length && /[A-Za-z0-9_.-]/.test(peek())) ident += advance();
      if (ident === "true" || ident === "false") {
        tokens.push({ kind: "boolean", value: ident, line: startLine, col: startCol });
      } else {
        tokens.push({ kind: "ident", value: ident, line: startLine, col: startCol });
      }
      continue;
    }

    throw new BuildFileError(`unexpected character '${ch}'`, { line, col });
  }

  tokens.push({ kind: "eof", value: "", line, col });
  return tokens;
}

class Parser {
  private readonly tokens: Token[];
  private pos = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
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
      throw new BuildFileError(`expected ${kind}, got ${tok.kind} "${tok.value}"`, tok);
    }
    return tok;
  }

  private match(kind: TokenKind): boolean {
    if (this.peek().kind !== kind) return false;
    this.pos++;
    return true;
  }

  private skipNewlines(): void {
    while (this.match("newline")) {
      // consume blank lines and separators
    }
  }

  parseNodes(untilRbrace = false): KdlNode[] {
    const nodes: KdlNode[] = [];

    while (true) {
      this.skipNewlines();

      const tok = this.peek();
      if (tok.kind === "eof") {
        if (untilRbrace) throw new BuildFileError("unexpected end of file; missing '}'", tok);
        break;
      }
      if (tok.kind === "rbrace") {
        if (!untilRbrace) throw new BuildFileError("unexpected '}'", tok);
        break;
      }

      nodes.push(this.parseNode());
    }

    return nodes;
  }

  private parseScalar(tok: Token): Scalar {
    if (tok.kind === "string") return tok.value;
    if (tok.kind === "number") return tok.value.includes(".") ? Number.parseFloat(tok.value) : Number.parseInt(tok.value, 10);
    if (tok.kind === "boolean") return tok.value === "true";
    if (tok.kind === "ident") return tok.value;
    throw new BuildFileError(`expected a value, got ${tok.kind === "eof" ? "end of file" : `"${tok.value}"`}`, tok);
  }

  private parseNode(): KdlNode {
    const nameTok = this.expect("ident");
    const args: Scalar[] = [];
    const props: Record<string, Scalar> = {};

    while (true) {
      const tok = this.peek();
      if (tok.kind === "newline" || tok.kind === "lbrace" || tok.kind === "rbrace" || tok.kind === "eof") {
        break;
      }

      if (tok.kind === "ident" && this.tokens[this.pos + 1]?.kind === "equals") {
        const key = this.next().value;
        this.expect("equals");
        if (key in props) throw new BuildFileError(`duplicate property "${key}" on "${nameTok.value}"`, tok);
        props[key] = this.parseScalar(this.next());
        continue;
      }

      args.push(this.parseScalar(this.next()));
    }

    const children: KdlNode[] = [];
    if (this.match("lbrace")) {
      children.push(...this.parseNodes(true));
      this.expect("rbrace");
    }

    return { name: nameTok.value, args, props, children, line: nameTok.line, col: nameTok.col };
  }
}

// ---------------------------------------------------------------------------
// Node accessors
// ---------------------------------------------------------------------------

function text(value: Scalar): string {
  return typeof value === "string" ? value : String(value);
}

function argText(node: KdlNode, index: number, fieldName: string): string {
  const value = node.args[index];
  if (value === undefined) {
    throw new BuildFileError(`"${node.name}" requires ${fieldName}`, node);
  }
  return text(value);
}

function propText(node: KdlNode, key: string): string | undefined {
  const value = node.props[key];
  return value === undefined ? undefined : text(value);
}

function requireProp(node: KdlNode, key: string, what: string): string {
  const value = propText(node, key);
  if (value === undefined) throw new BuildFileError(`${what} requires ${key}="..."`, node);
  return value;
}

function propBoolean(node: KdlNode, key: string): boolean | undefined {
  const value = node.props[key];
  if (value === undefined) return undefined;
  if (typeof value === "boolean") return value;
  if (value === "true" || value === "false") return value === "true";
  throw new BuildFileError(`"${key}" on "${node.name}" must be true or false, got ${JSON.stringify(value)}`, node);
}

function checkProps(node: KdlNode, allowed: readonly string[]): void {
  for (const key of Object.keys(node.props)) {
    if (!allowed.includes(key)) {
      throw new BuildFileError(
        `unknown property "${key}" on "${node.name}" (allowed: ${allowed.length > 0 ? allowed.join(", ") : "none"})`,
        node,
      );
    }
  }
}

function conditionProp(node: KdlNode, key: string): Condition | undefined {
  const source = propText(node, key);
  if (source === undefined) return undefined;
  try {
    return parseCondition(source);
  } catch (err) {
    if (err instanceof BuildError) throw new BuildFileError(err.message, node);
    throw err;
  }
}

function csv(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value.split(",").map((s) => s.trim()).filter(Boolean);
}

const DURATION_UNITS: Record<string, number> = { ms: 1, s: 1_000, m: 60_000, h: 3_600_000 };

/** Parse a timeout: a bare number of seconds, or a number with ms/s/m/h. */
export function parseDuration(value: Scalar, node?: KdlNode): number {
  const raw = text(value).trim();
  const match = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h)?$/.exec(raw);
  if (!match) {
    throw new BuildFileError(`invalid duration "${raw}" (expected e.g. 90, 30s, 10m)`, node);
  }
  return Math.round(Number.parseFloat(match[1]) * DURATION_UNITS[match[2] ?? "s"]);
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

function parseProperty(node: KdlNode): PropertyDeclaration {
  checkProps(node, ["value", "env", "default", "when"]);
  const name = argText(node, 0, "a property name");
  const when = conditionProp(node, "when");
  const value = propText(node, "value");
  const env = propText(node, "env");

  if (node.children.length > 0) {
    if (value !== undefined || env !== undefined || when !== undefined) {
      throw new BuildFileError(`property "${name}" mixes variants with value=, env= or when=`, node);
    }
    const decl: VariantDeclaration = { kind: "variants", name, variants: [] };
    for (const child of node.children) {
      if (child.name === "variant") {
        checkProps(child, ["when"]);
        const condition = conditionProp(child, "when");
        if (!condition) throw new BuildFileError(`variant of "${name}" requires when="..."`, child);
        decl.variants.push({ value: argText(child, 0, "a value"), when: condition });
      } else if (child.name === "otherwise") {
        checkProps(child, []);
        if (decl.otherwise !== undefined) throw new BuildFileError(`property "${name}" has more than one otherwise`, child);
        decl.otherwise = argText(child, 0, "a value");
      } else {
        throw new BuildFileError(`unexpected "${child.name}" in property "${name}" (expected variant or otherwise)`, child);
      }
    }
    return decl;
  }

  if (env !== undefined) {
    if (value !== undefined) throw new BuildFileError(`property "${name}" has both value= and env=`, node);
    return { kind: "env", name, env, default: propText(node, "default"), when };
  }
  if (value === undefined) {
    throw new BuildFileError(`property "${name}" requires value=, env= or variant children`, node);
  }
  if (propText(node, "default") !== undefined) {
    throw new BuildFileError(`property "${name}": default= only applies with env=`, node);
  }
  return { kind: "value", name, value, when };
}

function parseAlias(node: KdlNode): AliasDefinition {
  checkProps(node, ["description"]);
  const id = argText(node, 0, "an alias id");
  const alias: AliasDefinition = { id, description: propText(node, "description"), variants: {} };

  for (const child of node.children) {
    if (child.name === "platform") {
      checkProps(child, ["task"]);
      const tag = argText(child, 0, "a platform tag");
      if (tag in alias.variants) throw new BuildFileError(`alias "${id}" lists platform "${tag}" twice`, child);
      alias.variants[tag] = requireProp(child, "task", `platform "${tag}" of alias "${id}"`);
    } else if (child.name === "otherwise") {
      checkProps(child, ["task"]);
      alias.otherwise = requireProp(child, "task", `otherwise of alias "${id}"`);
    } else {
      throw new BuildFileError(`unexpected "${child.name}" in alias "${id}" (expected platform or otherwise)`, child);
    }
  }
  return alias;
}

function parseExec(node: KdlNode): TaskAction {
  checkProps(node, ["cwd", "timeout", "when"]);
  const executable = argText(node, 0, "an executable");
  const args = node.args.slice(1).map(text);
  const env: Record<string, string> = {};

  for (const child of node.children) {
    if (child.name === "arg" || child.name === "args") {
      checkProps(child, []);
      args.push(...child.args.map(text));
    } else if (child.name === "env") {
      checkProps(child, ["value"]);
      env[argText(child, 0, "a variable name")] = requireProp(child, "value", `env "${text(child.args[0])}"`);
    } else {
      throw new BuildFileError(`unexpected "${child.name}" in exec (expected arg or env)`, child);
    }
  }

  const timeout = node.props.timeout;
  return {
    kind: "exec",
    executable,
    args,
    cwd: propText(node, "cwd"),
    env,
    ...(timeout !== undefined ? { timeoutMs: parseDuration(timeout, node) } : {}),
    when: conditionProp(node, "when"),
  };
}

function parseAction(node: KdlNode): TaskAction {
  switch (node.name) {
    case "exec":
      return parseExec(node);
    case "call": {
      checkProps(node, ["when"]);
      const params: Record<string, string> = {};
      for (const child of node.children) {
        if (child.name !== "param") {
          throw new BuildFileError(`unexpected "${child.name}" in call (expected param)`, child);
        }
        checkProps(child, ["value"]);
        params[argText(child, 0, "a parameter name")] = requireProp(child, "value", `param "${text(child.args[0])}"`);
      }
      return { kind: "call", task: argText(node, 0, "a task id"), params, when: conditionProp(node, "when") };
    }
    case "fetch":
      checkProps(node, ["url", "dest", "when"]);
      return {
        kind: "fetch",
        url: requireProp(node, "url", "fetch"),
        dest: requireProp(node, "dest", "fetch"),
        when: conditionProp(node, "when"),
      };
    case "stage": {
      checkProps(node, ["to", "clean", "when"]);
      const outputs = node.args.map(text);
      for (const child of node.children) {
        if (child.name !== "from") throw new BuildFileError(`unexpected "${child.name}" in stage (expected from)`, child);
        checkProps(child, []);
        outputs.push(...child.args.map(text));
      }
      if (outputs.length === 0) throw new BuildFileError("stage requires at least one output", node);
      return {
        kind: "stage",
        outputs,
        to: requireProp(node, "to", "stage"),
        clean: propText(node, "clean"),
        when: conditionProp(node, "when"),
      };
    }
    case "delete":
      checkProps(node, ["when"]);
      return { kind: "delete", path: argText(node, 0, "a path"), when: conditionProp(node, "when") };
    case "mkdir":
      checkProps(node, ["when"]);
      return { kind: "mkdir", path: argText(node, 0, "a path"), when: conditionProp(node, "when") };
    case "check-tests": {
      checkProps(node, ["results-dir", "when"]);
      const suites = node.args.map(text);
      for (const child of node.children) {
        if (child.name !== "suite") throw new BuildFileError(`unexpected "${child.name}" in check-tests (expected suite)`, child);
        checkProps(child, []);
        suites.push(...child.args.map(text));
      }
      if (suites.length === 0) throw new BuildFileError("check-tests requires at least one suite", node);
      return { kind: "check-tests", suites, resultsDir: propText(node, "results-dir"), when: conditionProp(node, "when") };
    }
    case "echo":
      checkProps(node, ["when"]);
      return { kind: "echo", message: node.args.map(text).join(" "), when: conditionProp(node, "when") };
    default:
      throw new BuildFileError(
        `unknown action "${node.name}" (expected exec, call, fetch, stage, delete, mkdir, check-tests or echo)`,
        node,
      );
  }
}

function parseTask(node: KdlNode): TaskDefinition {
  checkProps(node, ["depends", "if", "unless", "when", "failonerror", "description"]);
  return {
    id: argText(node, 0, "a task id"),
    description: propText(node, "description"),
    depends: csv(propText(node, "depends")),
    if: propText(node, "if"),
    unless: propText(node, "unless"),
    when: conditionProp(node, "when"),
    failOnError: propBoolean(node, "failonerror") ?? true,
    actions: node.children.map(parseAction),
  };
}

export type ParseOptions = {
  /** Directory the build file lives in; `basedir=` resolves against it. */
  dir?: string;
  /** Path recorded as the definition's source. */
  source?: string;
};

export function parseBuildFile(source: string, opts: ParseOptions = {}): BuildDefinition {
  const nodes = new Parser(tokenize(source)).parseNodes(false);

  if (nodes.length !== 1 || nodes[0].name !== "build") {
    const offender = nodes.length > 1 ? nodes[1] : nodes[0];
    throw new BuildFileError('expected a single root node: build "name" { ... }', offender);
  }
  const root = nodes[0];
  checkProps(root, ["default", "basedir", "description"]);

  const dir = opts.dir ?? process.cwd();
  const build: BuildDefinition = {
    name: argText(root, 0, "a build name"),
    description: propText(root, "description"),
    defaultTask: propText(root, "default"),
    basedir: resolve(dir, propText(root, "basedir") ?? "."),
    source: opts.source,
    declarations: [],
    requires: [],
    tasks: [],
    aliases: [],
  };

  for (const child of root.children) {
    switch (child.name) {
      case "description":
        build.description = argText(child, 0, "text");
        break;
      case "property":
        build.declarations.push(parseProperty(child));
        break;
      case "environment":
        checkProps(child, ["prefix"]);
        build.declarations.push({ kind: "environment", prefix: propText(child, "prefix") ?? "env" });
        break;
      case "require": {
        checkProps(child, ["message"]);
        const required: RequiredProperty = { name: argText(child, 0, "a property name"), message: propText(child, "message") };
        build.requires.push(required);
        break;
      }
      case "alias":
        build.aliases.push(parseAlias(child));
        break;
      case "task":
        build.tasks.push(parseTask(child));
        break;
      default:
        throw new BuildFileError(
          `unknown node "${child.name}" (expected description, property, environment, require, alias or task)`,
          child,
        );
    }
  }

  return build;
}
