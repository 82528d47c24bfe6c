import { describe, expect, it } from "vitest";
import { ManualClock, memoryCache } from "../testing/fakes.js";

describe("SqliteCacheStore", () => {
  it("stores, overwrites and deletes JSON values", async () => {
    const cache = memoryCache();

    await expect(cache.get("k")).resolves.toBeUndefined();
    await cache.set("k", { n: 1 });
    await cache.set("k", { n: 2, tags: ["a"] });
    await expect(cache.get("k")).resolves.toEqual({ n: 2, tags: ["a"] });

    await expect(cache.delete("k")).resolves.toBe(true);
    await expect(cache.delete("k")).resolves.toBe(false);
    await expect(cache.get("k")).resolves.toBeUndefined();
  });

  it("grants a lease to one owner until it expires", async () => {
    const clock = new ManualClock();
    const cache = memoryCache(clock.now);

    await expect(cache.acquireLease("k", "a", 1_000)).resolves.toBe(true);
    await expect(cache.acquireLease("k", "b", 1_000)).resolves.toBe(false);
    await expect(cache.acquireLease("k", "a", 1_000)).resolves.toBe(true);

    clock.advance(999);
    await expect(cache.acquireLease("k", "b", 1_000)).resolves.toBe(false);

    clock.advance(1);
    await expect(cache.acquireLease("k", "b", 1_000)).resolves.toBe(true);
  });

  it("releases a lease only for its owner", async () => {
    const cache = memoryCache();

    await cache.acquireLease("k", "a", 60_000);
    await cache.releaseLease("k", "b");
    await expect(cache.acquireLease("k", "b", 60_000)).resolves.toBe(false);

    await cache.releaseLease("k", "a");
    await expect(cache.acquireLease("k", "b", 60_000)).resolves.toBe(true);
  });
});
