/**
 * ProjectEntry: one source module in the analyzed program.
 *
 * Owns the module namespace and its tree. `analyze()` only enqueues work;
 * `AnalysisSession.analyzeQueuedEntries()` runs it, so several entries can be
 * updated and analyzed as one group.
 */

import { AnalysisUnit } from "../analysis/analysis-unit.js";
import { ExpressionEvaluator } from "../analysis/evaluator.js";
import type { VariableDef } from "../analysis/variable-def.js";
import type { Expression, ModuleNode } from "../ast/nodes.js";
import type { AnalysisSession } from "../session.js";
import { debug } from "../shared/debug.js";
import { ModuleInfo } from "../values/module-info.js";
import { NamespaceSet } from "../values/namespace-set.js";

export class ProjectEntry {
  readonly moduleInfo: ModuleInfo;
  #tree: ModuleNode | undefined;
  #unit: AnalysisUnit | undefined;
  #version = 0;
  #analyzedVersion = -1;
  #removed = false;
  readonly #evalUnit: AnalysisUnit;

  constructor(
    readonly session: AnalysisSession,
    readonly moduleName: string | null,
    readonly filePath: string | null,
    readonly cookie: unknown,
  ) {
    this.moduleInfo = new ModuleInfo(moduleName ?? "", this, session.interpreter.createModuleContext(), session);
    this.#evalUnit = new AnalysisUnit(this.moduleInfo.scope, null, session, true);
  }

  get tree(): ModuleNode | undefined {
    return this.#tree;
  }

  /** Bumped by every `updateTree`. */
  get version(): number {
    return this.#version;
  }

  /** Version of the tree last handed to the scheduler, or -1. */
  get analysisVersion(): number {
    return this.#analyzedVersion;
  }

  get isRemoved(): boolean {
    return this.#removed;
  }

  /** `__init__` modules resolve relative imports against themselves. */
  get isPackage(): boolean {
    return this.filePath !== null && /(^|[\\/])__init__\.pyw?$/.test(this.filePath);
  }

  updateTree(tree: ModuleNode): void {
    this.#tree = tree;
    this.#version++;
  }

  /**
   * Enqueues the module body. A tree that was analyzed before is replaced:
   * the module's inferred state is dropped and its readers re-enqueued.
   */
  analyze(): void {
    const tree = this.#tree;
    if (!tree || this.#removed) return;
    if (this.#version === this.#analyzedVersion) return;

    if (this.#unit) {
      this.#enqueueAll(this.moduleInfo.clear());
    }
    this.#unit = new AnalysisUnit(this.moduleInfo.scope, tree, this.session);
    this.#analyzedVersion = this.#version;
    debug.modules("entry.analyze", { name: this.moduleName, version: this.#version });
    this.#unit.enqueue();
  }

  /** Drops inferred state while keeping the tree; the next `analyze()` starts over. */
  reset(): void {
    this.#enqueueAll(this.moduleInfo.clear());
    this.#unit = undefined;
    this.#analyzedVersion = -1;
  }

  removedFromProject(): void {
    if (this.#removed) return;
    this.#removed = true;
    this.#enqueueAll(this.moduleInfo.clear());
    this.#unit = undefined;
  }

  getVariable(name: string): VariableDef | undefined {
    return this.moduleInfo.scope.getVariable(name);
  }

  getTypesOf(name: string): NamespaceSet {
    return this.getVariable(name)?.types ?? NamespaceSet.EMPTY;
  }

  /** Evaluates an expression against the module scope without recording dependencies. */
  evaluate(expression: Expression): NamespaceSet {
    return new ExpressionEvaluator(this.#evalUnit).evaluate(expression);
  }

  #enqueueAll(units: Iterable<AnalysisUnit>): void {
    for (const unit of units) {
      if (unit.projectEntry !== this) unit.enqueue();
    }
  }
}
