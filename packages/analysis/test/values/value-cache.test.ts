import { describe, test, expect, vi } from "vitest";
import { ValueCache } from "../../src/values/value-cache.js";

describe("ValueCache", () => {
  test("runs the factory once per key", () => {
    const cache = new ValueCache<string>();
    const factory = vi.fn(() => "built");
    expect(cache.getCached("key", factory)).toBe("built");
    expect(cache.getCached("key", factory)).toBe("built");
    expect(factory).toHaveBeenCalledTimes(1);
    expect(cache.size).toBe(1);
  });

  test("keys by identity", () => {
    const cache = new ValueCache<number>();
    const first = {};
    const second = {};
    cache.getCached(first, () => 1);
    expect(cache.getCached(second, () => 2)).toBe(2);
    expect(cache.getCached(first, () => 3)).toBe(1);
  });

  test("a nested lookup of a pending key observes null", () => {
    const cache = new ValueCache<string>();
    const inner = vi.fn(() => "inner");
    let observed: string | null | undefined;
    let pending = false;

    const value = cache.getCached("type", () => {
      pending = cache.isPending("type");
      observed = cache.getCached("type", inner);
      return "outer";
    });

    expect(value).toBe("outer");
    expect(observed).toBeNull();
    expect(pending).toBe(true);
    expect(inner).not.toHaveBeenCalled();
    expect(cache.isPending("type")).toBe(false);
  });

  test("a throwing factory leaves the key retryable", () => {
    const cache = new ValueCache<string>();
    expect(() =>
      cache.getCached("key", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(cache.isPending("key")).toBe(false);
    expect(cache.size).toBe(0);
    expect(cache.getCached("key", () => "second")).toBe("second");
  });

  test("clear forgets every entry", () => {
    const cache = new ValueCache<string>();
    cache.getCached("key", () => "first");
    cache.clear();
    expect(cache.getCached("key", () => "second")).toBe("second");
  });
});
