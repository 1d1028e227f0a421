import type { Condition } from "./conditions.js";
import type { AliasDefinition, TaskDefinition } from "./types.js";

/** `property "name" value="..." [when="..."]` */
export type ValueDeclaration = {
  kind: "value";
  name: string;
  value: string;
  when?: Condition;
};

/** `property "name" env="VAR" [default="..."]` */
export type EnvDeclaration = {
  kind: "env";
  name: string;
  env: string;
  default?: string;
  when?: Condition;
};

/** `property "name" { variant "a" when="..."; otherwise "b" }` */
export type VariantDeclaration = {
  kind: "variants";
  name: string;
  variants: Array<{ value: string; when: Condition }>;
  otherwise?: string;
};

/** `environment prefix="env"` binds every environment variable as `env.NAME`. */
export type EnvironmentDeclaration = {
  kind: "environment";
  prefix: string;
};

export type PropertyDeclaration = ValueDeclaration | EnvDeclaration | VariantDeclaration | EnvironmentDeclaration;

export type RequiredProperty = {
  name: string;
  message?: string;
};

export type BuildDefinition = {
  name: string;
  description?: string;
  defaultTask?: string;
  /** Directory relative paths resolve against. */
  basedir: string;
  /** Path of the build file this was loaded from, if any. */
  source?: string;
  declarations: PropertyDeclaration[];
  requires: RequiredProperty[];
  tasks: TaskDefinition[];
  aliases: AliasDefinition[];
};
