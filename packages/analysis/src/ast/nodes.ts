/**
 * Structural node contract for parsed modules.
 *
 * The engine does not parse. A host adapter converts its parser's tree into
 * these shapes (or builds them with `ast/factory.ts`). Node identity matters:
 * the engine memoizes per-node values, so a tree must not share one node
 * object between two positions.
 */

import type { HostPrimitive } from "../host/primitives.js";

export interface SourceLocation {
  /** 1-based line */
  readonly line: number;
  /** 1-based column */
  readonly column: number;
}

interface NodeBase {
  readonly loc?: SourceLocation;
}

// =============================================================================
// Expressions
// =============================================================================

export interface NameExpression extends NodeBase {
  readonly kind: "name";
  readonly id: string;
}

export interface ConstantExpression extends NodeBase {
  readonly kind: "constant";
  readonly value: HostPrimitive;
}

export interface AttributeExpression extends NodeBase {
  readonly kind: "attribute";
  readonly target: Expression;
  readonly name: string;
}

export interface Argument {
  /** Keyword name, or null for a positional argument. */
  readonly name: string | null;
  readonly value: Expression;
}

export interface CallExpression extends NodeBase {
  readonly kind: "call";
  readonly func: Expression;
  readonly args: readonly Argument[];
}

export interface ListExpression extends NodeBase {
  readonly kind: "list";
  readonly elements: readonly Expression[];
}

export interface TupleExpression extends NodeBase {
  readonly kind: "tuple";
  readonly elements: readonly Expression[];
}

export interface DictExpression extends NodeBase {
  readonly kind: "dict";
  readonly entries: readonly { readonly key: Expression; readonly value: Expression }[];
}

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "//"
  | "%"
  | "**"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "in"
  | "not in"
  | "is"
  | "is not"
  | "and"
  | "or";

export interface BinaryExpression extends NodeBase {
  readonly kind: "binary";
  readonly op: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface SubscriptExpression extends NodeBase {
  readonly kind: "subscript";
  readonly target: Expression;
  readonly index: Expression;
}

export type Expression =
  | NameExpression
  | ConstantExpression
  | AttributeExpression
  | CallExpression
  | ListExpression
  | TupleExpression
  | DictExpression
  | BinaryExpression
  | SubscriptExpression;

// =============================================================================
// Statements
// =============================================================================

export interface ExpressionStatement extends NodeBase {
  readonly kind: "expression";
  readonly expression: Expression;
}

export interface AssignmentStatement extends NodeBase {
  readonly kind: "assign";
  readonly targets: readonly Expression[];
  readonly value: Expression;
}

export interface AugmentedAssignmentStatement extends NodeBase {
  readonly kind: "augAssign";
  readonly target: Expression;
  readonly op: BinaryOperator;
  readonly value: Expression;
}

export interface Parameter {
  readonly name: string;
  readonly defaultValue: Expression | null;
  readonly loc?: SourceLocation;
}

export interface FunctionDefinition extends NodeBase {
  readonly kind: "functionDef";
  readonly name: string;
  readonly parameters: readonly Parameter[];
  readonly body: readonly Statement[];
  readonly decorators: readonly Expression[];
}

export interface ClassDefinition extends NodeBase {
  readonly kind: "classDef";
  readonly name: string;
  readonly bases: readonly Expression[];
  readonly body: readonly Statement[];
}

export interface ReturnStatement extends NodeBase {
  readonly kind: "return";
  readonly value: Expression | null;
}

export interface IfStatement extends NodeBase {
  readonly kind: "if";
  readonly test: Expression;
  readonly body: readonly Statement[];
  readonly orelse: readonly Statement[];
}

export interface ForStatement extends NodeBase {
  readonly kind: "for";
  readonly target: Expression;
  readonly iter: Expression;
  readonly body: readonly Statement[];
  readonly orelse: readonly Statement[];
}

export interface WhileStatement extends NodeBase {
  readonly kind: "while";
  readonly test: Expression;
  readonly body: readonly Statement[];
  readonly orelse: readonly Statement[];
}

export interface ImportAlias {
  readonly name: string;
  readonly asName: string | null;
}

export interface ImportStatement extends NodeBase {
  readonly kind: "import";
  readonly names: readonly ImportAlias[];
}

export interface FromImportStatement extends NodeBase {
  readonly kind: "fromImport";
  /** Dotted module path without the leading dots. */
  readonly module: string;
  /** Number of leading dots (0 for absolute imports). */
  readonly level: number;
  /** A single `*` alias means a star import. */
  readonly names: readonly ImportAlias[];
}

export interface PassStatement extends NodeBase {
  readonly kind: "pass";
}

export type Statement =
  | ExpressionStatement
  | AssignmentStatement
  | AugmentedAssignmentStatement
  | FunctionDefinition
  | ClassDefinition
  | ReturnStatement
  | IfStatement
  | ForStatement
  | WhileStatement
  | ImportStatement
  | FromImportStatement
  | PassStatement;

export interface ModuleNode extends NodeBase {
  readonly kind: "module";
  readonly body: readonly Statement[];
}

/** Nodes an analysis unit can be bound to. */
export type ScopeNode = ModuleNode | FunctionDefinition | ClassDefinition;

export type Node = Expression | Statement | ModuleNode;
