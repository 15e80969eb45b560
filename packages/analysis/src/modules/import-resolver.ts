/**
 * Dotted-name resolution for import statements.
 *
 * Intermediate results come in three shapes: a host module (member lookup),
 * an engine module value (child-package descent) and a host aggregate of
 * alternatives (each resolved on its own, then recombined).
 */

import type { AnalysisUnit } from "../analysis/analysis-unit.js";
import { isHostObject } from "../host/probe.js";
import type { HostModule, HostMultipleMembers, HostValue } from "../host/types.js";
import type { AnalysisSession } from "../session.js";
import { debug } from "../shared/debug.js";
import { MultipleMemberInfo } from "../values/multiple-member.js";
import { Namespace } from "../values/namespace.js";
import type { ProjectEntry } from "./project-entry.js";

export class ImportResolver {
  /** Per aggregate and remaining path, so repeated imports share one value. */
  #aggregates = new WeakMap<HostMultipleMembers, Map<string, Namespace | undefined>>();

  constructor(readonly session: AnalysisSession) {}

  /**
   * A module from the host. A leading empty segment (`.x`) is a relative
   * name and never a builtin. With `bottom`, `a.b.c` yields `c` (or `a` when
   * the walk fails); without it, `a`.
   */
  importBuiltinModule(name: string, bottom = true): Namespace | undefined {
    const names = name.split(".");
    const [head] = names;
    if (!head) return undefined;

    const module = this.session.interpreter.importModule(head);
    if (!module) return undefined;
    if (bottom && names.length > 1) {
      const resolved = this.#fromHostModule(module, names, 1);
      if (resolved) return resolved;
    }
    return this.session.universe.getBuiltinModule(module);
  }

  /** Resolves `names[index..]` starting from `member`. */
  importFromMember(member: HostValue | Namespace | undefined, names: readonly string[], index: number): Namespace | undefined {
    if (member === undefined) return undefined;
    if (member instanceof Namespace) return this.#fromNamespace(member, names, index);

    if (index >= names.length) {
      const value = this.session.universe.valueOf(member);
      return value?.asModule() ? value : undefined;
    }
    if (!isHostObject(member)) return undefined;
    switch (member.hostKind) {
      case "module":
        return this.#fromHostModule(member, names, index);
      case "multiple":
        return this.#fromAggregate(member, names, index);
      default:
        return undefined;
    }
  }

  /**
   * The module bound to `name`, project modules first. Misses leave `unit`
   * registered on the name so a later `addModule` re-runs it.
   */
  resolveModule(name: string, unit?: AnalysisUnit): Namespace | undefined {
    const { modules } = this.session;
    const reference = modules.getLoaded(name);
    if (reference?.module) {
      if (unit) reference.addReference(unit);
      return reference.module;
    }

    const resolved = this.#resolveDotted(name);
    if (resolved) return resolved;

    if (unit) modules.addReference(name, unit);
    debug.imports("resolve.miss", { name });
    return undefined;
  }

  /**
   * Absolute module name for `from <dots><name> import ...`, or undefined
   * when the dots climb above the top-level package.
   */
  absoluteName(name: string, level: number, entry: ProjectEntry): string | undefined {
    if (level === 0) return name;
    const moduleName = entry.moduleName;
    if (!moduleName) return undefined;

    const parts = moduleName.split(".");
    // a package's own name is its first level
    const drop = entry.isPackage ? level - 1 : level;
    if (drop >= parts.length) return undefined;
    const base = parts.slice(0, parts.length - drop);
    if (name) base.push(name);
    return base.join(".");
  }

  clear(): void {
    this.#aggregates = new WeakMap();
  }

  /** `a.b.c` through the longest loaded prefix, then child packages. */
  #resolveDotted(name: string): Namespace | undefined {
    const names = name.split(".");
    if (names.length < 2) return undefined;
    for (let split = names.length - 1; split > 0; split--) {
      const head = this.session.modules.getLoaded(names.slice(0, split).join("."))?.module;
      if (!head) continue;
      return this.#fromNamespace(head, names, split);
    }
    return undefined;
  }

  #fromNamespace(value: Namespace, names: readonly string[], index: number): Namespace | undefined {
    const { defaultContext } = this.session;
    let current: Namespace | undefined = value;
    for (let i = index; current && i < names.length; i++) {
      const segment = names[i];
      const module = current.asModule();
      current = segment === undefined || !module ? undefined : module.getChildPackage(defaultContext, segment);
    }
    return current;
  }

  #fromHostModule(module: HostModule, names: readonly string[], index: number): Namespace | undefined {
    const segment = names[index];
    if (segment === undefined) return undefined;
    return this.importFromMember(module.getMember(this.session.defaultContext, segment), names, index + 1);
  }

  #fromAggregate(aggregate: HostMultipleMembers, names: readonly string[], index: number): Namespace | undefined {
    let byPath = this.#aggregates.get(aggregate);
    if (!byPath) {
      byPath = new Map();
      this.#aggregates.set(aggregate, byPath);
    }
    const key = names.slice(index).join(".");
    if (byPath.has(key)) return byPath.get(key);

    const resolved: Namespace[] = [];
    for (const alternative of aggregate.members) {
      const value = this.importFromMember(alternative, names, index);
      if (value) resolved.push(value);
    }
    const result = MultipleMemberInfo.create(resolved, this.session);
    byPath.set(key, result);
    debug.imports("resolve.aggregate", { path: names.join("."), alternatives: aggregate.members.length, resolved: resolved.length });
    return result;
  }
}
