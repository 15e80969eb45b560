/**
 * Namespaces backed by host objects: builtin classes and their instances,
 * constants, functions, method descriptors, properties and reflectable
 * containers. Builtin modules live in `builtin-module.ts`; the list, tuple and
 * object class flavours in `sequence.ts`.
 */

import type { AnalysisUnit } from "../analysis/analysis-unit.js";
import type { BinaryOperator, Node } from "../ast/nodes.js";
import { AsciiString, Complex, ELLIPSIS, type HostPrimitive } from "../host/primitives.js";
import type {
  BuiltinTypeId,
  HostFunction,
  HostMemberContainer,
  HostMethodDescriptor,
  HostModuleContext,
  HostProperty,
  HostType,
} from "../host/types.js";
import type { AnalysisSession } from "../session.js";
import { Namespace, type MemberType } from "./namespace.js";
import { NamespaceSet } from "./namespace-set.js";
import { isSpecialized } from "./specialized.js";

const COMPARISON_OPERATORS: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>([
  "==",
  "!=",
  "<",
  "<=",
  ">",
  ">=",
  "in",
  "not in",
  "is",
  "is not",
]);

export function isComparison(op: BinaryOperator): boolean {
  return COMPARISON_OPERATORS.has(op);
}

// =============================================================================
// Classes
// =============================================================================

export class BuiltinClassInfo extends Namespace {
  readonly memberType = "class";
  #instance: BuiltinInstanceInfo | undefined;
  readonly #hostMembers = new Map<string, NamespaceSet>();

  constructor(
    readonly type: HostType,
    readonly session: AnalysisSession,
  ) {
    super();
  }

  get name(): string {
    return this.type.name;
  }

  get doc(): string | undefined {
    return this.type.doc;
  }

  get typeId(): BuiltinTypeId {
    return this.type.typeId;
  }

  get instance(): BuiltinInstanceInfo {
    return (this.#instance ??= this.makeInstance());
  }

  protected makeInstance(): BuiltinInstanceInfo {
    return new BuiltinInstanceInfo(this);
  }

  instanceSet(): NamespaceSet {
    return this.instance.selfSet;
  }

  getMember(_node: Node, _unit: AnalysisUnit, name: string): NamespaceSet {
    return this.getHostMember(name);
  }

  /**
   * Member values from the host type, with any override registered for
   * `<declaringModule>.<Type>.<name>` applied.
   */
  getHostMember(name: string): NamespaceSet {
    let values = this.#hostMembers.get(name);
    if (!values) {
      const member = this.type.getMember(this.session.defaultContext, name);
      values = member === undefined ? NamespaceSet.EMPTY : this.session.universe.valueSetOf(member);
      this.#hostMembers.set(name, values);
    }
    return this.session.specializations.applyTo(values, this.type.declaringModule, `${this.type.name}.${name}`);
  }

  call(node: Node, unit: AnalysisUnit, args: readonly NamespaceSet[], argNames: readonly (string | null)[]): NamespaceSet {
    let result = this.instanceSet();
    // Overridden constructors run; plain host ones add nothing beyond the instance.
    for (const ctor of this.getHostMember("__new__").ofType(isSpecialized)) {
      result = result.union(ctor.call(node, unit, args, argNames), this.session.limits.maxSetSize);
    }
    for (const init of this.getHostMember("__init__").ofType(isSpecialized)) {
      init.call(node, unit, args, argNames);
    }
    return result;
  }

  getIndex(_node: Node, _unit: AnalysisUnit, index: NamespaceSet): NamespaceSet {
    const indexTypes = index.ofType(isBuiltinClass);
    if (indexTypes.length === 0) return NamespaceSet.EMPTY;
    const generic = this.session.universe.makeGenericType(this, ...indexTypes);
    return generic ? generic.selfSet : NamespaceSet.EMPTY;
  }

  getAllMembers(context: HostModuleContext): ReadonlyMap<string, NamespaceSet> {
    const members = new Map<string, NamespaceSet>();
    for (const name of this.type.getMemberNames(context)) {
      members.set(name, this.getHostMember(name));
    }
    return members;
  }
}

export function isBuiltinClass(value: Namespace): value is BuiltinClassInfo {
  return value instanceof BuiltinClassInfo;
}

/**
 * `object`: adds `object.__new__(cls)`, which produces instances of whatever
 * classes `cls` holds.
 */
export class ObjectBuiltinClassInfo extends BuiltinClassInfo {
  #newFunction: ObjectNewFunction | undefined;

  getMember(node: Node, unit: AnalysisUnit, name: string): NamespaceSet {
    if (name === "__new__") return (this.#newFunction ??= new ObjectNewFunction(this)).selfSet;
    return super.getMember(node, unit, name);
  }
}

class ObjectNewFunction extends Namespace {
  readonly memberType: MemberType = "function";

  constructor(readonly owner: ObjectBuiltinClassInfo) {
    super();
  }

  get name(): string {
    return "__new__";
  }

  call(_node: Node, _unit: AnalysisUnit, args: readonly NamespaceSet[]): NamespaceSet {
    const [classes] = args;
    if (!classes) return this.owner.instanceSet();
    return classes.flatMap((value) => value.instanceSet(), this.owner.session.limits.maxSetSize);
  }
}

// =============================================================================
// Instances and constants
// =============================================================================

export class BuiltinInstanceInfo extends Namespace {
  readonly memberType: MemberType = "instance";

  constructor(readonly classInfo: BuiltinClassInfo) {
    super();
  }

  get name(): string {
    return this.classInfo.name;
  }

  get doc(): string | undefined {
    return this.classInfo.doc;
  }

  protected get session(): AnalysisSession {
    return this.classInfo.session;
  }

  getMember(_node: Node, _unit: AnalysisUnit, name: string): NamespaceSet {
    return this.classInfo
      .getHostMember(name)
      .flatMap((member) => (member instanceof BuiltinPropertyInfo ? member.valueSet : member.selfSet));
  }

  getEnumeratorTypes(_node: Node, _unit: AnalysisUnit): NamespaceSet {
    return this.#elementTypes();
  }

  getIndex(_node: Node, _unit: AnalysisUnit, _index: NamespaceSet): NamespaceSet {
    return this.#elementTypes();
  }

  binaryOperation(_node: Node, _unit: AnalysisUnit, op: BinaryOperator, _right: NamespaceSet): NamespaceSet {
    const { universe, languageVersion } = this.session;
    if (isComparison(op)) return universe.builtinClass("bool").instanceSet();
    if (op === "/" && languageVersion === "3" && this.classInfo.typeId === "int") {
      return universe.builtinClass("float").instanceSet();
    }
    return this.classInfo.instanceSet();
  }

  getAllMembers(context: HostModuleContext): ReadonlyMap<string, NamespaceSet> {
    return this.classInfo.getAllMembers(context);
  }

  #elementTypes(): NamespaceSet {
    const { universe, languageVersion } = this.session;
    switch (this.classInfo.typeId) {
      case "str":
        return this.classInfo.instanceSet();
      case "bytes":
        return languageVersion === "3" ? universe.builtinClass("int").instanceSet() : this.classInfo.instanceSet();
      default:
        return NamespaceSet.EMPTY;
    }
  }
}

export class ConstantInfo extends BuiltinInstanceInfo {
  readonly memberType: MemberType = "constant";

  constructor(
    classInfo: BuiltinClassInfo,
    readonly value: HostPrimitive,
  ) {
    super(classInfo);
  }

  get description(): string {
    return formatConstant(this.value);
  }

  getConstantValue(): HostPrimitive {
    return this.value;
  }
}

export function formatConstant(value: HostPrimitive): string {
  if (value === null) return "None";
  if (value === ELLIPSIS) return "Ellipsis";
  if (value instanceof AsciiString) return `b${JSON.stringify(value.text)}`;
  if (value instanceof Complex) return value.toString();
  switch (typeof value) {
    case "boolean":
      return value ? "True" : "False";
    case "string":
      return JSON.stringify(value);
    default:
      return String(value);
  }
}

// =============================================================================
// Callables and descriptors
// =============================================================================

function returnSet(session: AnalysisSession, fn: HostFunction): NamespaceSet {
  const { universe, limits } = session;
  return NamespaceSet.from(
    fn.returnTypes.map((type) => universe.getInstance(type)),
    limits.maxSetSize,
  );
}

export class BuiltinFunctionInfo extends Namespace {
  readonly memberType: MemberType = "function";
  #returns: NamespaceSet | undefined;

  constructor(
    readonly fn: HostFunction,
    readonly session: AnalysisSession,
  ) {
    super();
  }

  get name(): string {
    return this.fn.name;
  }

  get doc(): string | undefined {
    return this.fn.doc;
  }

  get declaringModule(): string {
    return this.fn.declaringModule;
  }

  call(): NamespaceSet {
    return (this.#returns ??= returnSet(this.session, this.fn));
  }
}

export class BuiltinMethodInfo extends Namespace {
  readonly memberType: MemberType = "method";
  #returns: NamespaceSet | undefined;

  constructor(
    readonly descriptor: HostMethodDescriptor,
    readonly session: AnalysisSession,
  ) {
    super();
  }

  get name(): string {
    return this.descriptor.name;
  }

  get doc(): string | undefined {
    return this.descriptor.function.doc;
  }

  call(): NamespaceSet {
    return (this.#returns ??= returnSet(this.session, this.descriptor.function));
  }
}

export class BuiltinPropertyInfo extends Namespace {
  readonly memberType: MemberType = "property";

  constructor(
    readonly property: HostProperty,
    readonly session: AnalysisSession,
  ) {
    super();
  }

  get name(): string {
    return this.property.name;
  }

  get doc(): string | undefined {
    return this.property.doc;
  }

  /** Value read through an instance. */
  get valueSet(): NamespaceSet {
    const { type } = this.property;
    return type ? this.session.universe.getInstance(type).selfSet : NamespaceSet.EMPTY;
  }
}

/** A host object that exposes members but is neither a module nor a type. */
export class ReflectedNamespace extends Namespace {
  readonly memberType: MemberType = "unknown";

  constructor(
    readonly container: HostMemberContainer,
    readonly session: AnalysisSession,
  ) {
    super();
  }

  get name(): string {
    return this.container.name ?? "<reflected>";
  }

  getMember(_node: Node, _unit: AnalysisUnit, name: string): NamespaceSet {
    const member = this.container.getMember(this.session.defaultContext, name);
    return member === undefined ? NamespaceSet.EMPTY : this.session.universe.valueSetOf(member);
  }

  getAllMembers(context: HostModuleContext): ReadonlyMap<string, NamespaceSet> {
    const members = new Map<string, NamespaceSet>();
    for (const name of this.container.getMemberNames(context)) {
      const member = this.container.getMember(context, name);
      if (member !== undefined) members.set(name, this.session.universe.valueSetOf(member));
    }
    return members;
  }
}
