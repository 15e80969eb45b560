import type { AnalysisUnit } from "../analysis/analysis-unit.js";
import { ModuleScope } from "../analysis/scope.js";
import type { Node } from "../ast/nodes.js";
import type { HostModuleContext } from "../host/types.js";
import type { ProjectEntry } from "../modules/project-entry.js";
import type { AnalysisSession } from "../session.js";
import type { SpecializationInfo } from "../specializations/types.js";
import { Namespace, type MemberType, type ModuleValue } from "./namespace.js";
import { NamespaceSet } from "./namespace-set.js";

/** A user module: the namespace of one analyzed source file. */
export class ModuleInfo extends Namespace implements ModuleValue {
  readonly memberType: MemberType = "module";
  readonly scope: ModuleScope;
  readonly #specializations = new Map<string, SpecializationInfo>();

  constructor(
    readonly name: string,
    readonly projectEntry: ProjectEntry,
    readonly context: HostModuleContext,
    readonly session: AnalysisSession,
  ) {
    super();
    this.scope = new ModuleScope(this);
  }

  get description(): string {
    return `module ${this.name}`;
  }

  /**
   * Reading a member registers `unit` on the variable even when it does not
   * exist yet, so a later assignment re-runs the reader. Names that are not
   * variables fall back to sub-modules (`pkg.sub`).
   */
  getMember(_node: Node, unit: AnalysisUnit, name: string): NamespaceSet {
    const types = this.scope.createVariable(name).getTypes(unit);
    if (!types.isEmpty) return types;
    const child = this.getChildPackage(this.context, name);
    return child ? child.selfSet : NamespaceSet.EMPTY;
  }

  setMember(node: Node, unit: AnalysisUnit, name: string, value: NamespaceSet): void {
    const variable = this.scope.createVariable(name);
    variable.addTypes(unit, value);
    variable.addAssignment(unit.projectEntry, node.loc);
  }

  getChildPackage(_context: HostModuleContext, name: string): Namespace | undefined {
    return this.session.modules.get(`${this.name}.${name}`)?.module ?? undefined;
  }

  getChildrenPackages(_context: HostModuleContext): readonly (readonly [string, Namespace])[] {
    const prefix = `${this.name}.`;
    const children: [string, Namespace][] = [];
    for (const [name, reference] of this.session.modules.entries()) {
      if (!name.startsWith(prefix)) continue;
      const rest = name.slice(prefix.length);
      if (rest.includes(".") || !reference.module) continue;
      children.push([rest, reference.module]);
    }
    return children;
  }

  containsMember(_context: HostModuleContext, name: string): boolean {
    return this.scope.getVariable(name)?.isDefined ?? false;
  }

  getAllMembers(_context: HostModuleContext): ReadonlyMap<string, NamespaceSet> {
    const members = new Map<string, NamespaceSet>();
    for (const [name, variable] of this.scope.variables) {
      if (variable.isDefined) members.set(name, variable.types);
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

  /** Drops every inferred value; returns the units that had read any of them. */
  clear(): Set<AnalysisUnit> {
    return this.scope.clear();
  }
}
