import type { ScopeNode } from "../ast/nodes.js";
import type { ProjectEntry } from "../modules/project-entry.js";
import type { AnalysisSession } from "../session.js";
import type { ModuleInfo } from "../values/module-info.js";
import type { Scope } from "./scope.js";
import { StatementWalker } from "./walker.js";

/**
 * One re-evaluable piece of work: a scope and the node whose body runs in it.
 *
 * Units with a null node only evaluate expressions (`ProjectEntry.evaluate`);
 * they never enter the queue and never register as readers.
 */
export class AnalysisUnit {
  readonly #generation: number;

  constructor(
    readonly scope: Scope,
    readonly node: ScopeNode | null,
    readonly session: AnalysisSession,
    readonly forEval = false,
  ) {
    this.#generation = scope.globalScope.generation;
  }

  get declaringModule(): ModuleInfo {
    return this.scope.globalScope.module;
  }

  get projectEntry(): ProjectEntry {
    return this.declaringModule.projectEntry;
  }

  /** True once the owning module was cleared or removed after this unit was created. */
  get isStale(): boolean {
    return this.#generation !== this.scope.globalScope.generation || this.projectEntry.isRemoved;
  }

  enqueue(front = false): void {
    if (this.node === null || this.forEval || this.isStale) return;
    if (front) this.session.queue.pushFront(this);
    else this.session.queue.pushBack(this);
  }

  analyze(): void {
    if (this.node === null) return;
    new StatementWalker(this).walkBody(this.node.body);
  }

  toString(): string {
    const kind = this.node?.kind ?? "eval";
    return `${kind}:${this.scope.name}`;
  }
}
