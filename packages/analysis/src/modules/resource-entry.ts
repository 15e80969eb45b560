/**
 * ResourceProjectEntry: a non-code file (a UI markup file, for instance)
 * whose named objects become attributes of the instance that loads it.
 *
 * The engine does not read resource files. The caller parses them and hands
 * the result to `update()`.
 */

import type { LocationOwner } from "../analysis/variable-def.js";
import type { SourceLocation } from "../ast/nodes.js";
import { debug } from "../shared/debug.js";
import type { ProjectEntry } from "./project-entry.js";

export interface ResourceNamedObject {
  /** Declared type as `module.Type`. */
  readonly typeName: string;
  readonly location: SourceLocation;
}

export interface ResourceAnalysis {
  readonly namedObjects: ReadonlyMap<string, ResourceNamedObject>;
  /** Handler method name → where the resource refers to it. */
  readonly eventHandlers: ReadonlyMap<string, SourceLocation>;
}

const EMPTY_ANALYSIS: ResourceAnalysis = { namedObjects: new Map(), eventHandlers: new Map() };

export class ResourceProjectEntry implements LocationOwner {
  readonly moduleName = null;
  #analysis: ResourceAnalysis = EMPTY_ANALYSIS;
  #version = 0;
  #removed = false;
  /** Entries whose classes loaded this resource. */
  readonly #dependents = new Set<ProjectEntry>();

  constructor(
    readonly filePath: string,
    readonly cookie: unknown,
  ) {}

  get analysis(): ResourceAnalysis {
    return this.#analysis;
  }

  get version(): number {
    return this.#version;
  }

  get isRemoved(): boolean {
    return this.#removed;
  }

  get dependents(): ReadonlySet<ProjectEntry> {
    return this.#dependents;
  }

  addDependency(entry: ProjectEntry): void {
    if (!this.#removed) this.#dependents.add(entry);
  }

  /** Replaces the parsed content; every dependent entry is analyzed again. */
  update(analysis: ResourceAnalysis): void {
    this.#analysis = analysis;
    this.#version++;
    this.#reanalyzeDependents();
  }

  removedFromProject(): void {
    if (this.#removed) return;
    this.#removed = true;
    this.#analysis = EMPTY_ANALYSIS;
    this.#reanalyzeDependents();
    this.#dependents.clear();
  }

  #reanalyzeDependents(): void {
    for (const entry of this.#dependents) {
      if (entry.isRemoved) continue;
      debug.modules("resource.dependent", { resource: this.filePath, entry: entry.moduleName });
      entry.reset();
      entry.analyze();
    }
  }
}
