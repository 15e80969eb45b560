/**
 * Single-flight memo table for host-object → namespace construction.
 *
 * Before a factory runs, the key is bound to `null`. A nested lookup of the
 * same key while the factory is still running (a type whose members refer
 * back to the type) observes `null` and must tolerate it; the factory is
 * never run twice for one key.
 */

import { debug } from "../shared/debug.js";

export class ValueCache<V> {
  readonly #entries = new Map<unknown, V | null>();

  /** Keys are host objects or primitives; `Map` identity semantics apply. */
  getCached(key: unknown, factory: () => V): V | null {
    const existing = this.#entries.get(key);
    if (existing !== undefined) return existing;
    if (this.#entries.has(key)) {
      debug.values("cache.reentrant", { key: describeKey(key) });
      return null;
    }

    this.#entries.set(key, null);
    let value: V;
    try {
      value = factory();
    } catch (error) {
      this.#entries.delete(key);
      throw error;
    }
    this.#entries.set(key, value);
    return value;
  }

  isPending(key: unknown): boolean {
    return this.#entries.get(key) === null;
  }

  get size(): number {
    return this.#entries.size;
  }

  clear(): void {
    this.#entries.clear();
  }
}

function describeKey(key: unknown): string {
  if (typeof key === "object" && key !== null && "name" in key && typeof key.name === "string") {
    return key.name;
  }
  return String(key);
}
