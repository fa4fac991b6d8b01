import { describe, it, expect, vi } from "vitest";
import { CacheStore } from "../src/services/cache/store";
import { MemoryCacheBackend } from "../src/services/cache/memory";
import type { CacheBackend } from "../src/services/cache/backend";

const options = { failureThreshold: 3, cooldownMs: 1000, timeoutMs: 50 };

/** A reachable cache that answers pings with false and errors on data calls. */
class DegradedBackend implements CacheBackend {
  readonly name = "degraded";
  get = vi.fn(async (_key: string): Promise<string | null> => {
    throw new Error("connection reset");
  });
  set = vi.fn(async (_key: string, _value: string, _ttlSeconds: number): Promise<void> => {
    throw new Error("connection reset");
  });
  setIfAbsent = vi.fn(async (_key: string, _value: string, _ttlMs: number) => false);
  deleteIfEquals = vi.fn(async (_key: string, _value: string) => false);
  del = vi.fn(async (_key: string) => false);
  incrementWindow = vi.fn(async (_key: string, _windowMs: number) => 1);
  ping = vi.fn(async () => false);
}

describe("CacheStore", () => {
  it("should round-trip values through a healthy backend", async () => {
    const store = new CacheStore(new MemoryCacheBackend(), options);
    expect(await store.get("k")).toBeUndefined();
    expect(await store.set("k", "v", 60)).toBe(true);
    expect(await store.get("k")).toBe("v");
    expect(await store.delete("k")).toBe(true);
    expect(await store.get("k")).toBeUndefined();
    expect(await store.health()).toBe(true);
    expect(store.capability().state).toBe("available");
  });

  it("should hand out a lock once and release it only for the owner", async () => {
    const store = new CacheStore(new MemoryCacheBackend(), options);
    expect(await store.acquireLock("lock:k", "owner", 1000)).toBe("acquired");
    expect(await store.acquireLock("lock:k", "other", 1000)).toBe("held");
    await store.releaseLock("lock:k", "other");
    expect(await store.get("lock:k")).toBe("owner");
    await store.releaseLock("lock:k", "owner");
    expect(await store.acquireLock("lock:k", "other", 1000)).toBe("acquired");
  });

  it("should count window increments", async () => {
    const store = new CacheStore(new MemoryCacheBackend(), options);
    expect(await store.incrementWindow("w", 60_000)).toBe(1);
    expect(await store.incrementWindow("w", 60_000)).toBe(2);
  });

  it("should treat a false ping as a failure and open the circuit", async () => {
    const backend = new DegradedBackend();
    const store = new CacheStore(backend, options);

    expect(await store.health()).toBe(false);
    expect(store.capability().state).toBe("degraded");
    expect(await store.health()).toBe(false);
    expect(await store.health()).toBe(false);
    expect(store.capability()).toMatchObject({ state: "unavailable", circuit: "OPEN" });

    expect(await store.get("k")).toBeUndefined();
    expect(backend.get).not.toHaveBeenCalled();
  });

  it("should absorb backend errors as misses and skipped writes", async () => {
    const backend = new DegradedBackend();
    const store = new CacheStore(backend, options);

    await expect(store.get("k")).resolves.toBeUndefined();
    await expect(store.set("k", "v", 60)).resolves.toBe(false);
    expect(backend.get).toHaveBeenCalledTimes(1);
    expect(backend.set).toHaveBeenCalledTimes(1);
  });

  it("should treat a hanging backend call as a timeout", async () => {
    const backend = new DegradedBackend();
    backend.get.mockImplementationOnce(() => new Promise<string | null>(() => undefined));
    const store = new CacheStore(backend, { ...options, timeoutMs: 20 });

    expect(await store.get("k")).toBeUndefined();
    expect(store.capability().consecutiveFailures).toBe(1);
  });

  it("should report unavailable forever without a backend", async () => {
    const store = new CacheStore(null, options);
    expect(store.capability().state).toBe("unavailable");
    expect(store.backendName).toBe("none");
    expect(await store.set("k", "v", 60)).toBe(false);
    expect(await store.get("k")).toBeUndefined();
    expect(await store.acquireLock("lock:k", "t", 100)).toBe("unavailable");
    expect(await store.incrementWindow("w", 1000)).toBeUndefined();
    expect(await store.health()).toBe(false);
  });
});
