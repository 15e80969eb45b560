/**
 * Namespace: one inferred value.
 *
 * Every variant (builtin class, user function, module, constant, ...) extends
 * this base and overrides the operations it supports. The defaults describe a
 * value that supports nothing: every query answers with the empty set.
 */

import type { AnalysisUnit } from "../analysis/analysis-unit.js";
import type { BinaryOperator, Node } from "../ast/nodes.js";
import type { HostModuleContext } from "../host/types.js";
import type { HostPrimitive } from "../host/primitives.js";
import type { SpecializationInfo } from "../specializations/types.js";
import { NamespaceSet } from "./namespace-set.js";

export type MemberType =
  | "class"
  | "instance"
  | "constant"
  | "function"
  | "method"
  | "property"
  | "module"
  | "iterator"
  | "multiple"
  | "unknown";

/**
 * Capability of values that hold sub-modules: builtin modules, user modules
 * and aggregates of them. The import resolver descends through it.
 */
export interface ModuleValue {
  readonly name: string;
  getChildPackage(context: HostModuleContext, name: string): Namespace | undefined;
  getChildrenPackages(context: HostModuleContext): readonly (readonly [string, Namespace])[];
  containsMember(context: HostModuleContext, name: string): boolean;
  /** Installs an override under a qualified name (`func`, `Class.method`). Replaces any earlier one. */
  specialize(qualifiedName: string, info: SpecializationInfo): void;
  getSpecialization(qualifiedName: string): SpecializationInfo | undefined;
}

export abstract class Namespace {
  #selfSet: NamespaceSet | undefined;

  abstract readonly memberType: MemberType;
  abstract readonly name: string;

  get description(): string {
    return this.name;
  }

  get doc(): string | undefined {
    return undefined;
  }

  /** Singleton set holding this value. */
  get selfSet(): NamespaceSet {
    return (this.#selfSet ??= NamespaceSet.of(this));
  }

  getMember(_node: Node, _unit: AnalysisUnit, _name: string): NamespaceSet {
    return NamespaceSet.EMPTY;
  }

  setMember(_node: Node, _unit: AnalysisUnit, _name: string, _value: NamespaceSet): void {}

  call(
    _node: Node,
    _unit: AnalysisUnit,
    _args: readonly NamespaceSet[],
    _argNames: readonly (string | null)[],
  ): NamespaceSet {
    return NamespaceSet.EMPTY;
  }

  /** Iterator objects produced by `iter(value)`. */
  getIterator(_node: Node, _unit: AnalysisUnit): NamespaceSet {
    return NamespaceSet.EMPTY;
  }

  /** Element values produced by `for x in value`. */
  getEnumeratorTypes(_node: Node, _unit: AnalysisUnit): NamespaceSet {
    return NamespaceSet.EMPTY;
  }

  getIndex(_node: Node, _unit: AnalysisUnit, _index: NamespaceSet): NamespaceSet {
    return NamespaceSet.EMPTY;
  }

  binaryOperation(_node: Node, _unit: AnalysisUnit, _op: BinaryOperator, _right: NamespaceSet): NamespaceSet {
    return NamespaceSet.EMPTY;
  }

  /** The literal this value stands for, or undefined when it is not a constant. */
  getConstantValue(): HostPrimitive | undefined {
    return undefined;
  }

  /** Statically known members, without registering any dependency. */
  getAllMembers(_context: HostModuleContext): ReadonlyMap<string, NamespaceSet> {
    return new Map();
  }

  /** Values produced by constructing this value: the instance for classes, itself otherwise. */
  instanceSet(): NamespaceSet {
    return this.selfSet;
  }

  asModule(): ModuleValue | undefined {
    return undefined;
  }

  toString(): string {
    return `${this.memberType}:${this.description}`;
  }
}

/** Placeholder for values the engine knows exist but cannot describe. */
export class UnknownNamespace extends Namespace {
  readonly memberType = "unknown";

  constructor(readonly name: string) {
    super();
  }
}
