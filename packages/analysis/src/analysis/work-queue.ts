import type { Node } from "../ast/nodes.js";
import type { AnalysisUnit } from "./analysis-unit.js";
import type { Scope } from "./scope.js";

/**
 * Double-ended queue of analysis units, deduplicated by (scope, node).
 * Pushing a pair that is already queued leaves the queue unchanged, unless the
 * queued unit went stale: a cleared module reuses its scope and often its
 * tree, so the fresh unit takes the stale one's slot.
 */
export class WorkQueue {
  #items: (AnalysisUnit | undefined)[] = [];
  #head = 0;
  #count = 0;
  readonly #queued = new Map<Scope, Map<Node | null, AnalysisUnit>>();

  get size(): number {
    return this.#count;
  }

  get isEmpty(): boolean {
    return this.#count === 0;
  }

  has(unit: AnalysisUnit): boolean {
    const queued = this.#queued.get(unit.scope)?.get(unit.node);
    return queued !== undefined && !queued.isStale;
  }

  pushBack(unit: AnalysisUnit): boolean {
    if (!this.#mark(unit)) return false;
    this.#items.push(unit);
    this.#count++;
    return true;
  }

  /** Newly discovered definitions go first so callers see their results sooner. */
  pushFront(unit: AnalysisUnit): boolean {
    if (!this.#mark(unit)) return false;
    if (this.#head > 0) {
      this.#head--;
      this.#items[this.#head] = unit;
    } else {
      this.#items.unshift(unit);
    }
    this.#count++;
    return true;
  }

  popFront(): AnalysisUnit | undefined {
    while (this.#head < this.#items.length) {
      const unit = this.#items[this.#head];
      this.#items[this.#head] = undefined;
      this.#head++;
      if (unit) {
        this.#count--;
        this.#unmark(unit);
        this.#compact();
        return unit;
      }
    }
    this.#compact();
    return undefined;
  }

  clear(): void {
    this.#items = [];
    this.#head = 0;
    this.#count = 0;
    this.#queued.clear();
  }

  #mark(unit: AnalysisUnit): boolean {
    let nodes = this.#queued.get(unit.scope);
    if (!nodes) {
      nodes = new Map();
      this.#queued.set(unit.scope, nodes);
    }
    const queued = nodes.get(unit.node);
    if (queued && !queued.isStale) return false;
    if (queued) this.#drop(queued);
    nodes.set(unit.node, unit);
    return true;
  }

  #unmark(unit: AnalysisUnit): void {
    const nodes = this.#queued.get(unit.scope);
    if (nodes?.get(unit.node) !== unit) return;
    nodes.delete(unit.node);
    if (nodes.size === 0) this.#queued.delete(unit.scope);
  }

  #drop(unit: AnalysisUnit): void {
    const index = this.#items.indexOf(unit, this.#head);
    if (index === -1) return;
    this.#items[index] = undefined;
    this.#count--;
  }

  #compact(): void {
    if (this.#head === this.#items.length) {
      this.#items = [];
      this.#head = 0;
    } else if (this.#head > 1024 && this.#head * 2 > this.#items.length) {
      this.#items = this.#items.slice(this.#head);
      this.#head = 0;
    }
  }
}
