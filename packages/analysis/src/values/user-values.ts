/**
 * Values created by analyzing user code: classes, their instances, functions
 * and methods bound to an instance.
 */

import { AnalysisUnit } from "../analysis/analysis-unit.js";
import { ClassScope, FunctionScope, type Scope } from "../analysis/scope.js";
import { VariableDef } from "../analysis/variable-def.js";
import type { BinaryOperator, ClassDefinition, FunctionDefinition, Node } from "../ast/nodes.js";
import type { HostModuleContext } from "../host/types.js";
import type { AnalysisSession } from "../session.js";
import type { SpecializationInfo } from "../specializations/types.js";
import { isComparison } from "./builtin-values.js";
import type { ModuleInfo } from "./module-info.js";
import { Namespace, type MemberType } from "./namespace.js";
import { NamespaceSet } from "./namespace-set.js";
import { invokeSpecialization } from "./specialized.js";

const OPERATOR_METHODS: Partial<Record<BinaryOperator, string>> = {
  "+": "__add__",
  "-": "__sub__",
  "*": "__mul__",
  "/": "__truediv__",
  "//": "__floordiv__",
  "%": "__mod__",
  "**": "__pow__",
};

/** Dotted path of nested class names down to (and including) `name`. */
function qualify(scope: Scope, name: string): string {
  const parts = [name];
  for (const outer of scope.enumerateTowardsGlobal()) {
    if (outer instanceof ClassScope) parts.unshift(outer.classInfo.name);
  }
  return parts.join(".");
}

// =============================================================================
// Classes
// =============================================================================

export class ClassInfo extends Namespace {
  readonly memberType: MemberType = "class";
  readonly scope: ClassScope;
  readonly unit: AnalysisUnit;
  /** Base class values, kept as a variable so subclasses track changes to them. */
  readonly bases = new VariableDef();
  readonly qualifiedName: string;
  #instance: InstanceInfo | undefined;

  constructor(
    readonly node: ClassDefinition,
    readonly declaringScope: Scope,
    readonly declaringModule: ModuleInfo,
    readonly session: AnalysisSession,
  ) {
    super();
    this.qualifiedName = qualify(declaringScope, node.name);
    this.scope = new ClassScope(this, declaringScope);
    this.unit = new AnalysisUnit(this.scope, node, session);
  }

  get name(): string {
    return this.node.name;
  }

  get instance(): InstanceInfo {
    return (this.#instance ??= new InstanceInfo(this));
  }

  instanceSet(): NamespaceSet {
    return this.instance.selfSet;
  }

  /** Own members first; bases only when the class body does not define the name. */
  getMember(node: Node, unit: AnalysisUnit, name: string): NamespaceSet {
    const own = this.scope.createVariable(name).getTypes(unit);
    if (!own.isEmpty) return own;
    return this.bases.getTypes(unit).flatMap((base) => base.getMember(node, unit, name), this.session.limits.maxSetSize);
  }

  setMember(node: Node, unit: AnalysisUnit, name: string, value: NamespaceSet): void {
    const variable = this.scope.createVariable(name);
    variable.addTypes(unit, value);
    variable.addAssignment(unit.projectEntry, node.loc);
  }

  call(node: Node, unit: AnalysisUnit, args: readonly NamespaceSet[], argNames: readonly (string | null)[]): NamespaceSet {
    const instance = this.instance;
    for (const init of this.getMember(node, unit, "__init__")) {
      if (init instanceof FunctionInfo) {
        init.call(node, unit, [instance.selfSet, ...args], [null, ...argNames]);
      } else {
        init.call(node, unit, args, argNames);
      }
    }
    return instance.selfSet;
  }

  /** This class followed by its bases, depth first, each once. */
  mro(unit: AnalysisUnit): Namespace[] {
    const order: Namespace[] = [];
    const visit = (value: Namespace): void => {
      if (order.includes(value)) return;
      order.push(value);
      if (value instanceof ClassInfo) {
        for (const base of value.bases.getTypes(unit)) visit(base);
      }
    };
    visit(this);
    return order;
  }

  getAllMembers(_context: HostModuleContext): ReadonlyMap<string, NamespaceSet> {
    const members = new Map<string, NamespaceSet>();
    for (const [name, variable] of this.scope.variables) {
      if (variable.isDefined) members.set(name, variable.types);
    }
    return members;
  }
}

export class InstanceInfo extends Namespace {
  readonly memberType: MemberType = "instance";
  readonly attributes = new Map<string, VariableDef>();
  readonly #boundMethods = new Map<FunctionInfo, BoundMethodInfo>();

  constructor(readonly classInfo: ClassInfo) {
    super();
  }

  get name(): string {
    return this.classInfo.name;
  }

  get description(): string {
    return `${this.classInfo.name} instance`;
  }

  attribute(name: string): VariableDef {
    let variable = this.attributes.get(name);
    if (!variable) {
      variable = new VariableDef();
      this.attributes.set(name, variable);
    }
    return variable;
  }

  getMember(node: Node, unit: AnalysisUnit, name: string): NamespaceSet {
    const own = this.attribute(name).getTypes(unit);
    const fromClass = this.classInfo.getMember(node, unit, name).flatMap((member) => this.bind(member));
    return own.union(fromClass, this.classInfo.session.limits.maxSetSize);
  }

  setMember(node: Node, unit: AnalysisUnit, name: string, value: NamespaceSet): void {
    const variable = this.attribute(name);
    variable.addTypes(unit, value);
    variable.addAssignment(unit.projectEntry, node.loc);
  }

  bind(member: Namespace): NamespaceSet {
    if (!(member instanceof FunctionInfo)) return member.selfSet;
    let bound = this.#boundMethods.get(member);
    if (!bound) {
      bound = new BoundMethodInfo(member, this);
      this.#boundMethods.set(member, bound);
    }
    return bound.selfSet;
  }

  getIndex(node: Node, unit: AnalysisUnit, index: NamespaceSet): NamespaceSet {
    return this.#callDunder(node, unit, "__getitem__", [index]);
  }

  getEnumeratorTypes(node: Node, unit: AnalysisUnit): NamespaceSet {
    const { maxSetSize } = this.classInfo.session.limits;
    return this.#callDunder(node, unit, "__iter__", []).flatMap((iterator) => {
      if (iterator === this) return this.#callDunder(node, unit, "__next__", []);
      return iterator.getEnumeratorTypes(node, unit);
    }, maxSetSize);
  }

  binaryOperation(node: Node, unit: AnalysisUnit, op: BinaryOperator, right: NamespaceSet): NamespaceSet {
    if (isComparison(op)) {
      return this.classInfo.session.universe.builtinClass("bool").instanceSet();
    }
    const method = OPERATOR_METHODS[op];
    return method ? this.#callDunder(node, unit, method, [right]) : NamespaceSet.EMPTY;
  }

  getAllMembers(context: HostModuleContext): ReadonlyMap<string, NamespaceSet> {
    const members = new Map(this.classInfo.getAllMembers(context));
    for (const [name, variable] of this.attributes) {
      if (variable.isDefined) members.set(name, variable.types);
    }
    return members;
  }

  #callDunder(node: Node, unit: AnalysisUnit, name: string, args: readonly NamespaceSet[]): NamespaceSet {
    const { maxSetSize } = this.classInfo.session.limits;
    const argNames = args.map(() => null);
    return this.getMember(node, unit, name).flatMap((method) => method.call(node, unit, args, argNames), maxSetSize);
  }
}

// =============================================================================
// Functions
// =============================================================================

export class FunctionInfo extends Namespace {
  readonly memberType: MemberType = "function";
  readonly scope: FunctionScope;
  readonly unit: AnalysisUnit;
  readonly parameters: readonly VariableDef[];
  readonly returnValue = new VariableDef();
  readonly qualifiedName: string;

  constructor(
    readonly node: FunctionDefinition,
    readonly declaringScope: Scope,
    readonly declaringModule: ModuleInfo,
    readonly session: AnalysisSession,
  ) {
    super();
    this.qualifiedName = qualify(declaringScope, node.name);
    this.scope = new FunctionScope(this, declaringScope);
    this.unit = new AnalysisUnit(this.scope, node, session);
    this.parameters = node.parameters.map((parameter) => this.scope.createVariable(parameter.name));
  }

  get name(): string {
    return this.node.name;
  }

  get description(): string {
    return `def ${this.qualifiedName}(${this.node.parameters.map((p) => p.name).join(", ")})`;
  }

  /** Override registered for `<module>.<qualifiedName>`, looked up at call time. */
  get specialization(): SpecializationInfo | undefined {
    return this.declaringModule.getSpecialization(this.qualifiedName);
  }

  /** Whether the body should be scheduled at all. */
  get isAnalyzed(): boolean {
    return this.specialization?.analyze ?? true;
  }

  call(node: Node, unit: AnalysisUnit, args: readonly NamespaceSet[], argNames: readonly (string | null)[]): NamespaceSet {
    const info = this.specialization;
    if (!info) return this.callGeneric(unit, args, argNames);
    return invokeSpecialization(info, { node, unit, args, argNames, session: this.session }, () =>
      this.callGeneric(unit, args, argNames),
    );
  }

  /** Binds arguments to parameters and reads the return value. */
  callGeneric(unit: AnalysisUnit, args: readonly NamespaceSet[], argNames: readonly (string | null)[]): NamespaceSet {
    let changed = false;
    args.forEach((value, index) => {
      const keyword = argNames[index] ?? null;
      const position = keyword === null ? index : this.node.parameters.findIndex((p) => p.name === keyword);
      const parameter = this.parameters[position];
      if (parameter && parameter.addTypes(unit, value)) changed = true;
    });
    if (changed) this.unit.enqueue();
    return this.returnValue.getTypes(unit);
  }
}

export class BoundMethodInfo extends Namespace {
  readonly memberType: MemberType = "method";

  constructor(
    readonly fn: FunctionInfo,
    readonly instance: Namespace,
  ) {
    super();
  }

  get name(): string {
    return this.fn.name;
  }

  get description(): string {
    return `bound ${this.fn.description}`;
  }

  call(node: Node, unit: AnalysisUnit, args: readonly NamespaceSet[], argNames: readonly (string | null)[]): NamespaceSet {
    return this.fn.call(node, unit, [this.instance.selfSet, ...args], [null, ...argNames]);
  }
}

export function isClassInfo(value: Namespace): value is ClassInfo {
  return value instanceof ClassInfo;
}

export function isFunctionInfo(value: Namespace): value is FunctionInfo {
  return value instanceof FunctionInfo;
}
