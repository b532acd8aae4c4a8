import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ResultCache, fingerprintFor } from "./resultCache.js";

function createClock(start = 1_000): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

describe("fingerprintFor", () => {
  it("should differ per handler for the same input", () => {
    assert.notEqual(fingerprintFor("fix the bug", "DEBUGGER"), fingerprintFor("fix the bug", "PATCHER"));
  });

  it("should be stable for the same pair", () => {
    const fp = fingerprintFor("fix the bug", "DEBUGGER");

    assert.equal(fp, fingerprintFor("fix the bug", "DEBUGGER"));
    assert.match(fp, /^[0-9a-f]{64}$/);
  });
});

describe("ResultCache", () => {
  it("should return a stored value and count the hit", () => {
    const cache = new ResultCache<string>({ capacity: 10, ttlMs: 1_000 });

    cache.put("k1", "v1");

    assert.deepEqual(cache.get("k1"), { hit: true, value: "v1" });
    assert.deepEqual(cache.get("k2"), { hit: false });
    assert.deepEqual(cache.stats(), {
      size: 1,
      capacity: 10,
      hits: 1,
      misses: 1,
      evictions: 0,
      hitRate: 0.5,
    });
  });

  it("should expire entries after their ttl", () => {
    const clock = createClock();
    const cache = new ResultCache<string>({ capacity: 10, ttlMs: 100 }, clock.now);

    cache.put("k1", "v1");
    clock.advance(99);
    assert.equal(cache.get("k1").hit, true);

    clock.advance(1);
    assert.equal(cache.get("k1").hit, false);
    assert.equal(cache.stats().size, 0);
  });

  it("should honour a per-entry ttl", () => {
    const clock = createClock();
    const cache = new ResultCache<string>({ capacity: 10, ttlMs: 100 }, clock.now);

    cache.put("short", "v", 10);
    cache.put("long", "v");
    clock.advance(50);

    assert.equal(cache.get("short").hit, false);
    assert.equal(cache.get("long").hit, true);
  });

  it("should evict the least recently used entry when full", () => {
    const cache = new ResultCache<number>({ capacity: 2, ttlMs: 1_000 });

    cache.put("a", 1);
    cache.put("b", 2);
    cache.get("a");
    cache.put("c", 3);

    assert.equal(cache.get("b").hit, false);
    assert.equal(cache.get("a").hit, true);
    assert.equal(cache.get("c").hit, true);
    assert.equal(cache.stats().evictions, 1);
  });

  it("should overwrite without evicting", () => {
    const cache = new ResultCache<number>({ capacity: 2, ttlMs: 1_000 });

    cache.put("a", 1);
    cache.put("a", 2);

    assert.deepEqual(cache.get("a"), { hit: true, value: 2 });
    assert.equal(cache.stats().size, 1);
    assert.equal(cache.stats().evictions, 0);
  });

  it("should prune expired entries", () => {
    const clock = createClock();
    const cache = new ResultCache<string>({ capacity: 10, ttlMs: 100 }, clock.now);

    cache.put("a", "x", 10);
    cache.put("b", "x", 10);
    cache.put("c", "x");
    clock.advance(10);

    assert.equal(cache.prune(), 2);
    assert.equal(cache.stats().size, 1);
  });

  it("should delete and clear entries", () => {
    const cache = new ResultCache<string>({ capacity: 10, ttlMs: 100 });
    cache.put("a", "x");
    cache.put("b", "x");

    assert.equal(cache.delete("a"), true);
    assert.equal(cache.delete("a"), false);
    cache.clear();
    assert.equal(cache.stats().size, 0);
  });
});
