import { describe, it, expect, vi, beforeEach } from "vitest";
import { SingleFlightCoordinator } from "../src/services/resilience/singleFlight";
import { CacheStore } from "../src/services/cache/store";
import { MemoryCacheBackend } from "../src/services/cache/memory";

const storeOptions = { failureThreshold: 3, cooldownMs: 1000, timeoutMs: 100 };

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

describe("SingleFlightCoordinator", () => {
  let cache: CacheStore;

  beforeEach(() => {
    cache = new CacheStore(new MemoryCacheBackend(), storeOptions);
  });

  it("should run one task for concurrent callers and share its result", async () => {
    const flights = new SingleFlightCoordinator<string>(cache, { timeoutMs: 1000, pollIntervalMs: 5 });
    const run = vi.fn(async () => {
      await sleep(20);
      return "list";
    });
    const task = { run, fallback: () => "mock", peek: async () => undefined };

    const results = await Promise.all(Array.from({ length: 5 }, () => flights.execute("k", task)));

    expect(run).toHaveBeenCalledTimes(1);
    expect(results.map((r) => r.value)).toEqual(["list", "list", "list", "list", "list"]);
    expect(results.filter((r) => !r.shared)).toHaveLength(1);
    expect(flights.inflightCount()).toBe(0);
  });

  it("should release the distributed lock after the leader finishes", async () => {
    const flights = new SingleFlightCoordinator<string>(cache, { timeoutMs: 1000, pollIntervalMs: 5 });
    await flights.execute("k", { run: async () => "v", fallback: () => "mock", peek: async () => undefined });
    expect(await cache.get("lock:k")).toBeUndefined();
  });

  it("should force-release a slow leader and hand out the fallback", async () => {
    const flights = new SingleFlightCoordinator<string>(cache, { timeoutMs: 30, pollIntervalMs: 5 });
    let finish: (value: string) => void = () => undefined;
    const signals: AbortSignal[] = [];
    const run = (signal: AbortSignal) => {
      signals.push(signal);
      return new Promise<string>((resolve) => (finish = resolve));
    };
    const task = { run, fallback: () => "mock", peek: async () => undefined };

    const [leader, follower] = await Promise.all([flights.execute("k", task), flights.execute("k", task)]);

    expect(leader).toEqual({ value: "mock", forced: true, shared: false });
    expect(follower).toEqual({ value: "mock", forced: true, shared: true });
    expect(signals.map((signal) => signal.aborted)).toEqual([true]);
    finish("late");
  });

  it("should wait for a result published by another process holding the lock", async () => {
    await cache.acquireLock("lock:k", "other-process", 1000);
    const flights = new SingleFlightCoordinator<string>(cache, { timeoutMs: 1000, pollIntervalMs: 5 });
    let published: string | undefined;
    setTimeout(() => (published = "remote-list"), 20);
    const run = vi.fn(async () => "local");

    const result = await flights.execute("k", { run, fallback: () => "mock", peek: async () => published });

    expect(result).toEqual({ value: "remote-list", forced: false, shared: true });
    expect(run).not.toHaveBeenCalled();
  });

  it("should take over when the remote holder goes away without a result", async () => {
    await cache.acquireLock("lock:k", "other-process", 1000);
    const flights = new SingleFlightCoordinator<string>(cache, { timeoutMs: 1000, pollIntervalMs: 5 });
    setTimeout(() => {
      void cache.releaseLock("lock:k", "other-process");
    }, 20);
    const run = vi.fn(async () => "local");

    const result = await flights.execute("k", { run, fallback: () => "mock", peek: async () => undefined });

    expect(result).toEqual({ value: "local", forced: false, shared: false });
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("should fall back when the remote holder outlives the deadline", async () => {
    await cache.acquireLock("lock:k", "other-process", 5000);
    const flights = new SingleFlightCoordinator<string>(cache, { timeoutMs: 40, pollIntervalMs: 5 });
    const run = vi.fn(async () => "local");

    const result = await flights.execute("k", { run, fallback: () => "mock", peek: async () => undefined });

    expect(result).toEqual({ value: "mock", forced: true, shared: true });
    expect(run).not.toHaveBeenCalled();
  });

  it("should keep process-local exclusion when the cache is unavailable", async () => {
    const flights = new SingleFlightCoordinator<string>(new CacheStore(null, storeOptions), {
      timeoutMs: 1000,
      pollIntervalMs: 5
    });
    const run = vi.fn(async () => {
      await sleep(10);
      return "list";
    });
    const task = { run, fallback: () => "mock", peek: async () => undefined };

    const results = await Promise.all([flights.execute("k", task), flights.execute("k", task)]);

    expect(run).toHaveBeenCalledTimes(1);
    expect(results.map((r) => r.value)).toEqual(["list", "list"]);
  });

  it("should propagate a leader failure to every waiter", async () => {
    const flights = new SingleFlightCoordinator<string>(cache, { timeoutMs: 1000, pollIntervalMs: 5 });
    const task = {
      run: async (): Promise<string> => {
        await sleep(5);
        throw new Error("leader broke");
      },
      fallback: () => "mock",
      peek: async () => undefined
    };

    const results = await Promise.allSettled([flights.execute("k", task), flights.execute("k", task)]);
    expect(results.map((r) => r.status)).toEqual(["rejected", "rejected"]);
  });
});
