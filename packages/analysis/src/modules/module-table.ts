/**
 * Name → ModuleReference index.
 *
 * Seeded from the host's module list; builtin modules are imported lazily on
 * first use. Project modules are bound by `AnalysisSession.addModule` and
 * survive `reInit`.
 */

import type { AnalysisUnit } from "../analysis/analysis-unit.js";
import type { AnalysisSession } from "../session.js";
import { debug } from "../shared/debug.js";
import type { Namespace } from "../values/namespace.js";
import { ModuleReference } from "./module-reference.js";

export class ModuleTable {
  readonly #modules = new Map<string, ModuleReference>();
  readonly #projectNames = new Set<string>();

  constructor(readonly session: AnalysisSession) {
    this.reInit();
  }

  /** Rebuilds builtin references from the host's current module list. */
  reInit(): void {
    for (const [name, reference] of this.#modules) {
      if (this.#projectNames.has(name)) continue;
      if (reference.references.size > 0) {
        // keep waiting units; the name may still be imported later
        reference.reset();
        continue;
      }
      this.#modules.delete(name);
    }
    for (const name of this.session.interpreter.getModuleNames()) {
      if (!this.#modules.has(name)) this.#modules.set(name, new ModuleReference(name));
    }
    debug.modules("table.reinit", { count: this.#modules.size });
  }

  /** Reference without triggering a load. */
  get(name: string): ModuleReference | undefined {
    return this.#modules.get(name);
  }

  /**
   * Reference with a load attempted. Builtin modules are imported from the
   * host on first request; undefined when nothing by that name exists.
   */
  getLoaded(name: string): ModuleReference | undefined {
    const existing = this.#modules.get(name);
    if (existing?.isLoaded) return existing;

    const hostModule = this.session.interpreter.importModule(name);
    if (hostModule) {
      const reference = existing ?? new ModuleReference(name);
      this.#modules.set(name, reference);
      this.#fill(reference, this.session.universe.getBuiltinModule(hostModule));
      return reference;
    }
    if (existing?.isValid) {
      existing.fill(null);
      debug.modules("load.empty", { name });
      return existing;
    }
    return undefined;
  }

  isProjectModule(name: string): boolean {
    return this.#projectNames.has(name);
  }

  /** Binds a project module; returns units that were waiting for the name. */
  bindProject(name: string, module: Namespace): AnalysisUnit[] {
    let reference = this.#modules.get(name);
    if (!reference) {
      reference = new ModuleReference(name);
      this.#modules.set(name, reference);
    }
    this.#projectNames.add(name);
    this.#fill(reference, module);
    return reference.takeReferences();
  }

  /** Unbinds `name` if it is still bound to `module`. */
  unbindProject(name: string, module: Namespace): boolean {
    const reference = this.#modules.get(name);
    if (!reference || reference.module !== module) return false;
    this.#modules.delete(name);
    this.#projectNames.delete(name);
    debug.modules("unbind", { name });
    return true;
  }

  /** Remembers that `unit` asked for `name`, creating an invalid placeholder if needed. */
  addReference(name: string, unit: AnalysisUnit): void {
    let reference = this.#modules.get(name);
    if (!reference) {
      reference = new ModuleReference(name, { valid: false });
      this.#modules.set(name, reference);
    }
    reference.addReference(unit);
  }

  entries(): IterableIterator<[string, ModuleReference]> {
    return this.#modules.entries();
  }

  get size(): number {
    return this.#modules.size;
  }

  #fill(reference: ModuleReference, module: Namespace): void {
    reference.fill(module);
    debug.modules("bind", { name: reference.name, kind: module.memberType });
    this.session.specializations.replay(reference.name, module);
  }
}
