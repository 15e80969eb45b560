/**
 * NamespaceSet: the join-semilattice of inferred values.
 *
 * Immutable and deduplicated by identity. Namespaces are canonical (the value
 * cache hands out one object per host object, and engine-created values are
 * memoized per node), so identity equality is value equality.
 *
 * Growth is bounded: a union whose result would exceed `limit` members
 * returns `TOP`, and `TOP` absorbs every later union. Cardinality of a union
 * does not depend on operand order, so the cap keeps union commutative and
 * associative.
 */

import type { Namespace } from "./namespace.js";

export class NamespaceSet implements Iterable<Namespace> {
  static readonly EMPTY: NamespaceSet = new NamespaceSet(new Set(), false);

  /** "Could be anything": the result of exceeding the size cap. */
  static readonly TOP: NamespaceSet = new NamespaceSet(new Set(), true);

  readonly #members: ReadonlySet<Namespace>;
  readonly isTop: boolean;

  private constructor(members: ReadonlySet<Namespace>, isTop: boolean) {
    this.#members = members;
    this.isTop = isTop;
  }

  static of(...values: readonly Namespace[]): NamespaceSet {
    return NamespaceSet.from(values);
  }

  static from(values: Iterable<Namespace>, limit = Infinity): NamespaceSet {
    const members = new Set(values);
    if (members.size === 0) return NamespaceSet.EMPTY;
    if (members.size > limit) return NamespaceSet.TOP;
    return new NamespaceSet(members, false);
  }

  static unionAll(sets: Iterable<NamespaceSet>, limit = Infinity): NamespaceSet {
    let result = NamespaceSet.EMPTY;
    for (const set of sets) {
      result = result.union(set, limit);
      if (result.isTop) return result;
    }
    return result;
  }

  /** Enumerable member count; TOP reports 0. */
  get size(): number {
    return this.#members.size;
  }

  get isEmpty(): boolean {
    return !this.isTop && this.#members.size === 0;
  }

  has(value: Namespace): boolean {
    return this.#members.has(value);
  }

  add(value: Namespace, limit = Infinity): NamespaceSet {
    if (this.isTop || this.#members.has(value)) return this;
    return this.union(value.selfSet, limit);
  }

  union(other: NamespaceSet, limit = Infinity): NamespaceSet {
    if (this.isTop || other.isTop) return NamespaceSet.TOP;
    if (other.#members.size === 0) return this.#capped(limit);
    if (this.#members.size === 0) return other.#capped(limit);
    if (this.isSupersetOf(other)) return this.#capped(limit);
    if (other.isSupersetOf(this)) return other.#capped(limit);

    const merged = new Set(this.#members);
    for (const value of other.#members) merged.add(value);
    if (merged.size > limit) return NamespaceSet.TOP;
    return new NamespaceSet(merged, false);
  }

  isSupersetOf(other: NamespaceSet): boolean {
    if (this.isTop) return true;
    if (other.isTop) return false;
    if (other.#members.size > this.#members.size) return false;
    for (const value of other.#members) {
      if (!this.#members.has(value)) return false;
    }
    return true;
  }

  equals(other: NamespaceSet): boolean {
    if (this === other) return true;
    if (this.isTop !== other.isTop) return false;
    return this.#members.size === other.#members.size && this.isSupersetOf(other);
  }

  /** Members narrowed by a type guard (`set.ofType(isClassValue)`). */
  ofType<T extends Namespace>(guard: (value: Namespace) => value is T): T[] {
    const result: T[] = [];
    for (const value of this.#members) {
      if (guard(value)) result.push(value);
    }
    return result;
  }

  /** Union of `fn` over every member. */
  flatMap(fn: (value: Namespace) => NamespaceSet, limit = Infinity): NamespaceSet {
    if (this.isTop) return NamespaceSet.TOP;
    let result = NamespaceSet.EMPTY;
    for (const value of this.#members) {
      result = result.union(fn(value), limit);
      if (result.isTop) break;
    }
    return result;
  }

  toArray(): Namespace[] {
    return [...this.#members];
  }

  [Symbol.iterator](): Iterator<Namespace> {
    return this.#members[Symbol.iterator]();
  }

  toString(): string {
    if (this.isTop) return "{*}";
    return `{${[...this.#members].map((m) => m.description).join(", ")}}`;
  }

  #capped(limit: number): NamespaceSet {
    return this.#members.size > limit ? NamespaceSet.TOP : this;
  }
}
