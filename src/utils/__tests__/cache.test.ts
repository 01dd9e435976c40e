import { describe, it, expect } from "vitest";
import { TTLCache } from "../cache";
import { PayloadStore } from "../cbStore";

function clock(start = 1_000) {
  let t = start;
  return { now: () => t, advance: (ms: number) => (t += ms) };
}

describe("TTLCache", () => {
  it("expires entries after their TTL", () => {
    const c = clock();
    const cache = new TTLCache<boolean>(60_000, c.now);
    cache.set("a", true);
    c.advance(59_999);
    expect(cache.get("a")).toBe(true);
    c.advance(1);
    expect(cache.get("a")).toBeUndefined();
  });

  it("drops expired entries that are never read again", () => {
    const c = clock();
    const cache = new TTLCache<boolean>(1_000, c.now);
    cache.set("-10:1", true);
    cache.set("-10:2", false);
    c.advance(1_000);
    cache.set("-10:3", true);
    expect(cache.size).toBe(1);
    expect(cache.get("-10:3")).toBe(true);
  });

  it("computes once within the TTL", async () => {
    const cache = new TTLCache<number>(1_000, clock().now);
    let calls = 0;
    const load = async () => ++calls;
    expect(await cache.with("k", load)).toBe(1);
    expect(await cache.with("k", load)).toBe(1);
    cache.delete("k");
    expect(await cache.with("k", load)).toBe(2);
  });
});

describe("PayloadStore", () => {
  it("hands a payload out once", () => {
    const store = new PayloadStore<{ q: string }>();
    const id = store.put({ q: "why?" });
    expect(id.length).toBeLessThanOrEqual(16);
    expect(store.take(id)).toEqual({ q: "why?" });
    expect(store.take(id)).toBeNull();
  });

  it("forgets payloads after the TTL", () => {
    const c = clock();
    const store = new PayloadStore<string>(5 * 60 * 1000, c.now);
    const id = store.put("late");
    c.advance(5 * 60 * 1000);
    expect(store.take(id)).toBeNull();
    expect(store.size).toBe(0);
  });
});
