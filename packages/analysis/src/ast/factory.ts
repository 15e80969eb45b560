/**
 * Tree builders for host adapters and tests.
 *
 * Every call returns a fresh node object; reuse a node in two places only when
 * the same syntax really appears once.
 */

import type { HostPrimitive } from "../host/primitives.js";
import type {
  Argument,
  AssignmentStatement,
  AttributeExpression,
  AugmentedAssignmentStatement,
  BinaryExpression,
  BinaryOperator,
  CallExpression,
  ClassDefinition,
  ConstantExpression,
  DictExpression,
  Expression,
  ExpressionStatement,
  ForStatement,
  FromImportStatement,
  FunctionDefinition,
  IfStatement,
  ImportAlias,
  ImportStatement,
  ListExpression,
  ModuleNode,
  NameExpression,
  Parameter,
  PassStatement,
  ReturnStatement,
  SourceLocation,
  Statement,
  SubscriptExpression,
  TupleExpression,
  WhileStatement,
} from "./nodes.js";

export function moduleNode(body: readonly Statement[]): ModuleNode {
  return { kind: "module", body };
}

export function name(id: string, loc?: SourceLocation): NameExpression {
  return loc ? { kind: "name", id, loc } : { kind: "name", id };
}

export function constant(value: HostPrimitive): ConstantExpression {
  return { kind: "constant", value };
}

export function attribute(target: Expression, member: string): AttributeExpression {
  return { kind: "attribute", target, name: member };
}

/** Positional arguments as expressions; keyword arguments as `[name, value]` pairs. */
export function call(
  func: Expression,
  args: readonly (Expression | readonly [string, Expression])[] = [],
): CallExpression {
  const mapped: Argument[] = args.map((arg) =>
    isKeyword(arg) ? { name: arg[0], value: arg[1] } : { name: null, value: arg },
  );
  return { kind: "call", func, args: mapped };
}

function isKeyword(arg: Expression | readonly [string, Expression]): arg is readonly [string, Expression] {
  return Array.isArray(arg);
}

export function list(elements: readonly Expression[]): ListExpression {
  return { kind: "list", elements };
}

export function tuple(elements: readonly Expression[]): TupleExpression {
  return { kind: "tuple", elements };
}

export function dict(entries: readonly (readonly [Expression, Expression])[]): DictExpression {
  return { kind: "dict", entries: entries.map(([key, value]) => ({ key, value })) };
}

export function binary(op: BinaryOperator, left: Expression, right: Expression): BinaryExpression {
  return { kind: "binary", op, left, right };
}

export function subscript(target: Expression, index: Expression): SubscriptExpression {
  return { kind: "subscript", target, index };
}

export function exprStmt(expression: Expression): ExpressionStatement {
  return { kind: "expression", expression };
}

export function assign(target: Expression | string, value: Expression, loc?: SourceLocation): AssignmentStatement {
  const targets = [typeof target === "string" ? name(target, loc) : target];
  return loc ? { kind: "assign", targets, value, loc } : { kind: "assign", targets, value };
}

export function augAssign(target: Expression, op: BinaryOperator, value: Expression): AugmentedAssignmentStatement {
  return { kind: "augAssign", target, op, value };
}

export function param(paramName: string, defaultValue: Expression | null = null): Parameter {
  return { name: paramName, defaultValue };
}

export function functionDef(
  fnName: string,
  parameters: readonly (Parameter | string)[],
  body: readonly Statement[],
  decorators: readonly Expression[] = [],
): FunctionDefinition {
  return {
    kind: "functionDef",
    name: fnName,
    parameters: parameters.map((p) => (typeof p === "string" ? param(p) : p)),
    body,
    decorators,
  };
}

export function classDef(className: string, bases: readonly Expression[], body: readonly Statement[]): ClassDefinition {
  return { kind: "classDef", name: className, bases, body };
}

export function ret(value: Expression | null = null): ReturnStatement {
  return { kind: "return", value };
}

export function ifStmt(test: Expression, body: readonly Statement[], orelse: readonly Statement[] = []): IfStatement {
  return { kind: "if", test, body, orelse };
}

export function forStmt(target: Expression, iter: Expression, body: readonly Statement[]): ForStatement {
  return { kind: "for", target, iter, body, orelse: [] };
}

export function whileStmt(test: Expression, body: readonly Statement[]): WhileStatement {
  return { kind: "while", test, body, orelse: [] };
}

function alias(spec: string): ImportAlias {
  const [importName = spec, asName] = spec.split(/\s+as\s+/);
  return { name: importName, asName: asName ?? null };
}

/** `importStmt("os.path", "numpy as np")` */
export function importStmt(...names: readonly string[]): ImportStatement {
  return { kind: "import", names: names.map(alias) };
}

/** `fromImport("..pkg.mod", "a", "b as c")`; leading dots set the level. */
export function fromImport(modulePath: string, ...names: readonly string[]): FromImportStatement {
  const level = /^\.*/.exec(modulePath)?.[0].length ?? 0;
  return { kind: "fromImport", module: modulePath.slice(level), level, names: names.map(alias) };
}

export function pass(): PassStatement {
  return { kind: "pass" };
}
