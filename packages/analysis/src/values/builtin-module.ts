import type { AnalysisUnit } from "../analysis/analysis-unit.js";
import type { Node } from "../ast/nodes.js";
import type { HostModule, HostModuleContext } from "../host/types.js";
import type { AnalysisSession } from "../session.js";
import type { SpecializationInfo } from "../specializations/types.js";
import { Namespace, type MemberType, type ModuleValue } from "./namespace.js";
import { NamespaceSet } from "./namespace-set.js";

/** A module supplied by the host interpreter. */
export class BuiltinModule extends Namespace implements ModuleValue {
  readonly memberType: MemberType = "module";
  readonly #members = new Map<string, NamespaceSet>();
  readonly #specializations = new Map<string, SpecializationInfo>();

  constructor(
    readonly module: HostModule,
    readonly session: AnalysisSession,
  ) {
    super();
  }

  get name(): string {
    return this.module.name;
  }

  get doc(): string | undefined {
    return this.module.doc;
  }

  get description(): string {
    return `built-in module ${this.name}`;
  }

  getMember(_node: Node, _unit: AnalysisUnit, name: string): NamespaceSet {
    const values = this.getModuleMember(name);
    if (!values.isEmpty) return values;
    const child = this.getChildPackage(this.session.defaultContext, name);
    return child ? child.selfSet : NamespaceSet.EMPTY;
  }

  /** Host member values with any override for `<module>.<name>` applied. */
  getModuleMember(name: string): NamespaceSet {
    let values = this.#members.get(name);
    if (!values) {
      const member = this.module.getMember(this.session.defaultContext, name);
      values = member === undefined ? NamespaceSet.EMPTY : this.session.universe.valueSetOf(member);
      this.#members.set(name, values);
    }
    const info = this.#specializations.get(name);
    return info ? values.flatMap((value) => this.session.universe.specialize(value, info).selfSet) : values;
  }

  getChildPackage(context: HostModuleContext, name: string): Namespace | undefined {
    const member = this.module.getMember(context, name);
    if (member !== undefined) {
      const value = this.session.universe.valueOf(member);
      if (value?.asModule()) return value;
    }
    return this.session.modules.getLoaded(`${this.name}.${name}`)?.module ?? undefined;
  }

  getChildrenPackages(context: HostModuleContext): readonly (readonly [string, Namespace])[] {
    const children: [string, Namespace][] = [];
    for (const name of this.module.getMemberNames(context)) {
      const member = this.module.getMember(context, name);
      if (member === undefined) continue;
      const value = this.session.universe.valueOf(member);
      if (value?.asModule()) children.push([name, value]);
    }
    return children;
  }

  containsMember(context: HostModuleContext, name: string): boolean {
    return this.module.getMember(context, name) !== undefined;
  }

  getAllMembers(context: HostModuleContext): ReadonlyMap<string, NamespaceSet> {
    const members = new Map<string, NamespaceSet>();
    for (const name of this.module.getMemberNames(context)) {
      members.set(name, this.getModuleMember(name));
    }
    return members;
  }

  specialize(qualifiedName: string, info: SpecializationInfo): void {
    this.#specializations.set(qualifiedName, info);
  }

  getSpecialization(qualifiedName: string): SpecializationInfo | undefined {
    return this.#specializations.get(qualifiedName);
  }

  get specializationCount(): number {
    return this.#specializations.size;
  }

  asModule(): ModuleValue {
    return this;
  }
}
