import type { AnalysisUnit } from "../analysis/analysis-unit.js";
import type { Node } from "../ast/nodes.js";
import type { HostModuleContext } from "../host/types.js";
import type { AnalysisSession } from "../session.js";
import type { SpecializationInfo } from "../specializations/types.js";
import { Namespace, type MemberType, type ModuleValue } from "./namespace.js";
import { NamespaceSet } from "./namespace-set.js";

/**
 * One name that may be bound to any of several values (platform-dependent
 * modules, overloads). Behaves as the union of its members.
 */
export class MultipleMemberInfo extends Namespace implements ModuleValue {
  readonly #children = new Map<string, Namespace>();

  constructor(
    readonly members: readonly Namespace[],
    readonly session: AnalysisSession,
  ) {
    super();
  }

  /**
   * Canonical form for a list of alternatives: nothing for none, the value
   * itself for one, an aggregate otherwise.
   */
  static create(members: readonly Namespace[], session: AnalysisSession): Namespace | undefined {
    const unique = [...new Set(members)];
    if (unique.length <= 1) return unique[0];
    return new MultipleMemberInfo(unique, session);
  }

  get memberType(): MemberType {
    const [first, ...rest] = this.members;
    if (!first) return "unknown";
    return rest.every((member) => member.memberType === first.memberType) ? first.memberType : "multiple";
  }

  get name(): string {
    return this.members[0]?.name ?? "";
  }

  get description(): string {
    return this.members.map((member) => member.description).join(" | ");
  }

  get doc(): string | undefined {
    const docs = this.members.map((member) => member.doc).filter((doc): doc is string => !!doc);
    return docs.length > 0 ? [...new Set(docs)].join("\n\n") : undefined;
  }

  #union(fn: (member: Namespace) => NamespaceSet): NamespaceSet {
    const { maxSetSize } = this.session.limits;
    return NamespaceSet.unionAll(this.members.map(fn), maxSetSize);
  }

  getMember(node: Node, unit: AnalysisUnit, name: string): NamespaceSet {
    return this.#union((member) => member.getMember(node, unit, name));
  }

  setMember(node: Node, unit: AnalysisUnit, name: string, value: NamespaceSet): void {
    for (const member of this.members) member.setMember(node, unit, name, value);
  }

  call(node: Node, unit: AnalysisUnit, args: readonly NamespaceSet[], argNames: readonly (string | null)[]): NamespaceSet {
    return this.#union((member) => member.call(node, unit, args, argNames));
  }

  getIterator(node: Node, unit: AnalysisUnit): NamespaceSet {
    return this.#union((member) => member.getIterator(node, unit));
  }

  getEnumeratorTypes(node: Node, unit: AnalysisUnit): NamespaceSet {
    return this.#union((member) => member.getEnumeratorTypes(node, unit));
  }

  getIndex(node: Node, unit: AnalysisUnit, index: NamespaceSet): NamespaceSet {
    return this.#union((member) => member.getIndex(node, unit, index));
  }

  instanceSet(): NamespaceSet {
    return this.#union((member) => member.instanceSet());
  }

  getAllMembers(context: HostModuleContext): ReadonlyMap<string, NamespaceSet> {
    const { maxSetSize } = this.session.limits;
    const members = new Map<string, NamespaceSet>();
    for (const member of this.members) {
      for (const [name, values] of member.getAllMembers(context)) {
        members.set(name, (members.get(name) ?? NamespaceSet.EMPTY).union(values, maxSetSize));
      }
    }
    return members;
  }

  // ---------------------------------------------------------------------------
  // Module capability: present when any alternative is a module.
  // ---------------------------------------------------------------------------

  asModule(): ModuleValue | undefined {
    return this.#modules().length > 0 ? this : undefined;
  }

  #modules(): ModuleValue[] {
    const modules: ModuleValue[] = [];
    for (const member of this.members) {
      const module = member.asModule();
      if (module) modules.push(module);
    }
    return modules;
  }

  /** Resolves `name` in every module alternative; memoized so repeated lookups share one aggregate. */
  getChildPackage(context: HostModuleContext, name: string): Namespace | undefined {
    const cached = this.#children.get(name);
    if (cached) return cached;
    const resolved: Namespace[] = [];
    for (const module of this.#modules()) {
      const child = module.getChildPackage(context, name);
      if (child) resolved.push(child);
    }
    const child = MultipleMemberInfo.create(resolved, this.session);
    if (child) this.#children.set(name, child);
    return child;
  }

  getChildrenPackages(context: HostModuleContext): readonly (readonly [string, Namespace])[] {
    const names = new Set<string>();
    for (const module of this.#modules()) {
      for (const [name] of module.getChildrenPackages(context)) names.add(name);
    }
    const children: [string, Namespace][] = [];
    for (const name of names) {
      const child = this.getChildPackage(context, name);
      if (child) children.push([name, child]);
    }
    return children;
  }

  containsMember(context: HostModuleContext, name: string): boolean {
    return this.#modules().some((module) => module.containsMember(context, name));
  }

  specialize(qualifiedName: string, info: SpecializationInfo): void {
    for (const module of this.#modules()) module.specialize(qualifiedName, info);
  }

  getSpecialization(qualifiedName: string): SpecializationInfo | undefined {
    for (const module of this.#modules()) {
      const info = module.getSpecialization(qualifiedName);
      if (info) return info;
    }
    return undefined;
  }
}
