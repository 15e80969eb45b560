/**
 * SpecializationRegistry: call overrides per (module, function).
 *
 * Registration installs on the target module when it is loaded and always
 * appends to a replay log. `replay()` runs when a module is bound, so
 * overrides registered before their module appears still take effect.
 * Installed tables are keyed by qualified name; replaying never duplicates.
 */

import type { AnalysisSession } from "../session.js";
import { AnalysisError, AnalysisErrorCode } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import type { Namespace, ModuleValue } from "../values/namespace.js";
import type { NamespaceSet } from "../values/namespace-set.js";
import type { CallHook, SpecializationFn, SpecializationInfo } from "./types.js";

interface ResolvedTarget {
  /** Registry name of the module that receives the override. */
  readonly moduleName: string;
  readonly module: ModuleValue;
  readonly qualifiedName: string;
}

export class SpecializationRegistry {
  /** Raw module name → function name → latest registration. */
  readonly #log = new Map<string, Map<string, SpecializationInfo>>();

  constructor(readonly session: AnalysisSession) {}

  register(moduleName: string, name: string, override: SpecializationFn, analyze = true): SpecializationInfo {
    const info: SpecializationInfo = { moduleName, name, override, analyze };
    let entries = this.#log.get(moduleName);
    if (!entries) {
      entries = new Map();
      this.#log.set(moduleName, entries);
    }
    entries.set(name, info);

    const target = this.#resolve(info);
    if (target) this.#install(target, info);
    else debug.specialize("register.pending", { module: moduleName, name });
    return info;
  }

  /**
   * Override returning instances of `returnType` (`module.Type`). The type is
   * looked up at call time; while its module is missing the call falls back
   * to generic inference.
   */
  registerReturning(moduleName: string, name: string, returnType: string): SpecializationInfo {
    const lastDot = returnType.lastIndexOf(".");
    if (lastDot <= 0 || lastDot === returnType.length - 1) {
      throw new AnalysisError(
        `Expected module.Type for return type, got '${returnType}'`,
        AnalysisErrorCode.MALFORMED_SPECIALIZATION_TARGET,
        { returnType },
      );
    }
    const typeModule = returnType.slice(0, lastDot);
    const typeName = returnType.slice(lastDot + 1);

    return this.register(moduleName, name, ({ node, unit, session }) => {
      const module = session.modules.getLoaded(typeModule)?.module;
      if (!module) return null;
      return module.getMember(node, unit, typeName).flatMap((value) => value.instanceSet(), session.limits.maxSetSize);
    });
  }

  /** Runs `hook` on every call; inference proceeds as if no override existed. */
  registerCallHook(moduleName: string, name: string, hook: CallHook): SpecializationInfo {
    return this.register(moduleName, name, (call) => {
      hook(call);
      return null;
    });
  }

  /** Installs every logged override whose target is `moduleName`. */
  replay(moduleName: string, module: Namespace): void {
    const value = module.asModule();
    if (!value) return;
    for (const info of this.entries()) {
      if (info.moduleName === moduleName) {
        this.#install({ moduleName, module: value, qualifiedName: info.name }, info);
        continue;
      }
      const lastDot = info.moduleName.lastIndexOf(".");
      if (lastDot === -1 || info.moduleName.slice(0, lastDot) !== moduleName) continue;
      // `pkg.Class` targets `pkg` only while no module is called `pkg.Class`
      if (this.#module(info.moduleName)) continue;
      const qualifiedName = `${info.moduleName.slice(lastDot + 1)}.${info.name}`;
      this.#install({ moduleName, module: value, qualifiedName }, info);
    }
  }

  /** Re-installs the whole log; used after the value universe is rebuilt. */
  reapplyAll(): void {
    for (const entries of this.#log.values()) {
      for (const info of entries.values()) {
        const target = this.#resolve(info);
        if (target) this.#install(target, info);
      }
    }
  }

  /**
   * `values` with the override for `<moduleName>.<qualifiedName>` applied,
   * if one is installed. Used for members of builtin types.
   */
  applyTo(values: NamespaceSet, moduleName: string, qualifiedName: string): NamespaceSet {
    if (values.isEmpty) return values;
    const info = this.session.modules.get(moduleName)?.module?.asModule()?.getSpecialization(qualifiedName);
    if (!info) return values;
    const { universe } = this.session;
    return values.flatMap((value) => universe.specialize(value, info).selfSet);
  }

  /** Logged registrations, in registration order per module. */
  *entries(): Generator<SpecializationInfo> {
    for (const entries of this.#log.values()) yield* entries.values();
  }

  get size(): number {
    let size = 0;
    for (const entries of this.#log.values()) size += entries.size;
    return size;
  }

  /**
   * The exact module when it is loaded; otherwise the prefix up to the last
   * dot, with the remainder folded into the qualified name
   * (`decimal.Decimal` + `__new__` → `decimal` / `Decimal.__new__`).
   */
  #resolve(info: SpecializationInfo): ResolvedTarget | undefined {
    const exact = this.#module(info.moduleName);
    if (exact) return { moduleName: info.moduleName, module: exact, qualifiedName: info.name };

    const lastDot = info.moduleName.lastIndexOf(".");
    if (lastDot === -1) return undefined;
    const prefix = info.moduleName.slice(0, lastDot);
    const owner = this.#module(prefix);
    if (!owner) return undefined;
    return { moduleName: prefix, module: owner, qualifiedName: `${info.moduleName.slice(lastDot + 1)}.${info.name}` };
  }

  /** Bound modules only; registration never triggers a load. */
  #module(name: string): ModuleValue | undefined {
    return this.session.modules.get(name)?.module?.asModule();
  }

  #install(target: ResolvedTarget, info: SpecializationInfo): void {
    if (target.module.getSpecialization(target.qualifiedName) === info) return;
    target.module.specialize(target.qualifiedName, info);
    debug.specialize("install", { module: target.moduleName, name: target.qualifiedName, analyze: info.analyze });
  }
}
