import { ResultCache } from "../result-cache";

describe("ResultCache", () => {
  it("shares entries between argument objects with the same content", () => {
    const cache = new ResultCache<string>({ enabled: true });
    cache.set("scope", { a: 1, b: [1, 2], c: undefined }, "hit");

    expect(cache.get("scope", { b: [1, 2], a: 1 })).toBe("hit");
    expect(cache.get("scope", { a: 1, b: [2, 1] })).toBeUndefined();
    expect(cache.get("other", { a: 1, b: [1, 2] })).toBeUndefined();
  });

  it("computes once per key", async () => {
    const cache = new ResultCache<number>({ enabled: true });
    const compute = jest.fn(async () => 42);

    await cache.getOrCompute("scope", { a: 1 }, compute);
    const value = await cache.getOrCompute("scope", { a: 1 }, compute);

    expect(value).toBe(42);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("stores nothing when disabled", async () => {
    const cache = new ResultCache<number>({ enabled: false });
    const compute = jest.fn(async () => 7);

    await cache.getOrCompute("scope", {}, compute);
    await cache.getOrCompute("scope", {}, compute);

    expect(compute).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });

  it("evicts the oldest entry past the limit", () => {
    const cache = new ResultCache<string>({ enabled: true, maxEntries: 2 });
    cache.set("scope", 1, "one");
    cache.set("scope", 2, "two");
    cache.set("scope", 3, "three");

    expect(cache.size).toBe(2);
    expect(cache.get("scope", 1)).toBeUndefined();
    expect(cache.get("scope", 3)).toBe("three");
  });

  it("does not keep a failed computation", async () => {
    const cache = new ResultCache<number>({ enabled: true });

    await expect(
      cache.getOrCompute("scope", {}, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(cache.size).toBe(0);
  });

  it("empties on clear", () => {
    const cache = new ResultCache<number>({ enabled: true });
    cache.set("scope", {}, 1);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
