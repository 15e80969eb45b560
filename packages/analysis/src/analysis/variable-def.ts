import type { SourceLocation } from "../ast/nodes.js";
import { NamespaceSet } from "../values/namespace-set.js";
import type { AnalysisUnit } from "./analysis-unit.js";

/** Whatever owns a source location: a project entry or a resource file entry. */
export interface LocationOwner {
  readonly moduleName: string | null;
  readonly filePath: string | null;
}

export interface LocatedReference {
  readonly owner: LocationOwner;
  readonly location: SourceLocation;
}

/**
 * Everything ever assigned to one name in one scope.
 *
 * Types only grow. Growth re-enqueues every unit that has read the variable,
 * which is what drives the scheduler towards a fixed point.
 */
export class VariableDef {
  #types = NamespaceSet.EMPTY;
  readonly #dependents = new Set<AnalysisUnit>();
  readonly #assignments = new LocationList();
  readonly #references = new LocationList();

  /** Current types, without registering a reader. */
  get types(): NamespaceSet {
    return this.#types;
  }

  get dependents(): ReadonlySet<AnalysisUnit> {
    return this.#dependents;
  }

  get assignments(): readonly LocatedReference[] {
    return this.#assignments.items;
  }

  get references(): readonly LocatedReference[] {
    return this.#references.items;
  }

  /** True once anything was assigned or the name was declared by an assignment. */
  get isDefined(): boolean {
    return !this.#types.isEmpty || this.#assignments.items.length > 0;
  }

  /** Current types; `unit` is re-enqueued whenever they grow. */
  getTypes(unit: AnalysisUnit): NamespaceSet {
    this.addDependency(unit);
    return this.#types;
  }

  addDependency(unit: AnalysisUnit): void {
    if (!unit.forEval) this.#dependents.add(unit);
  }

  /** Joins `types` in; returns whether the set changed. */
  addTypes(unit: AnalysisUnit, types: NamespaceSet): boolean {
    const next = this.#types.union(types, unit.session.limits.maxSetSize);
    if (next === this.#types || next.equals(this.#types)) return false;
    this.#types = next;
    for (const dependent of this.#dependents) {
      dependent.enqueue();
    }
    return true;
  }

  addAssignment(owner: LocationOwner, location: SourceLocation | undefined): void {
    if (location) this.#assignments.add(owner, location);
  }

  addReference(owner: LocationOwner, location: SourceLocation | undefined): void {
    if (location) this.#references.add(owner, location);
  }

  /** Forgets everything; returns the readers so the caller can re-enqueue them. */
  clear(): AnalysisUnit[] {
    const readers = [...this.#dependents];
    this.#types = NamespaceSet.EMPTY;
    this.#dependents.clear();
    this.#assignments.clear();
    this.#references.clear();
    return readers;
  }
}

class LocationList {
  readonly items: LocatedReference[] = [];
  readonly #seen = new Map<LocationOwner, Set<string>>();

  add(owner: LocationOwner, location: SourceLocation): void {
    let keys = this.#seen.get(owner);
    if (!keys) {
      keys = new Set();
      this.#seen.set(owner, keys);
    }
    const key = `${location.line}:${location.column}`;
    if (keys.has(key)) return;
    keys.add(key);
    this.items.push({ owner, location });
  }

  clear(): void {
    this.items.length = 0;
    this.#seen.clear();
  }
}
