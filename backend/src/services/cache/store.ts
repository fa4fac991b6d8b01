import type { CacheBackend } from "./backend";
import { CircuitBreaker, type CapabilityStatus } from "../resilience/circuitBreaker";
import { cacheOperationsCounter } from "../../config/metrics";
import { componentLogger, type Logger } from "../../config/logger";
import { DependencyTimeoutError, DependencyUnavailableError, errorMessage } from "../../errors";

export interface CacheStoreOptions {
  failureThreshold: number;
  cooldownMs: number;
  timeoutMs: number;
  now?: () => number;
  logger?: Logger;
}

export type LockResult = "acquired" | "held" | "unavailable";

const UNAVAILABLE: CapabilityStatus = {
  state: "unavailable",
  circuit: "OPEN",
  consecutiveFailures: 0,
  since: 0
};

/**
 * Optional cache behind a circuit breaker. Nothing here throws: failures,
 * timeouts and short-circuits all read as a miss or a skipped write.
 */
export class CacheStore {
  private readonly breaker: CircuitBreaker | null;
  private readonly log: Logger;

  constructor(private readonly backend: CacheBackend | null, options: CacheStoreOptions) {
    this.log = options.logger ?? componentLogger("cache");
    this.breaker = backend
      ? new CircuitBreaker("cache", {
          failureThreshold: options.failureThreshold,
          cooldownMs: options.cooldownMs,
          timeoutMs: options.timeoutMs,
          now: options.now,
          logger: this.log
        })
      : null;
  }

  get backendName(): string {
    return this.backend?.name ?? "none";
  }

  capability(): CapabilityStatus {
    return this.breaker ? this.breaker.capability() : UNAVAILABLE;
  }

  async get(key: string): Promise<string | undefined> {
    const value = await this.call("get", (b) => b.get(key));
    if (value === undefined) return;
    cacheOperationsCounter.labels("get", value === null ? "miss" : "hit").inc();
    return value ?? undefined;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const ok = await this.call("set", async (b) => {
      await b.set(key, value, ttlSeconds);
      return true;
    });
    return ok === true;
  }

  async delete(key: string): Promise<boolean> {
    return (await this.call("del", (b) => b.del(key))) === true;
  }

  async acquireLock(key: string, token: string, ttlMs: number): Promise<LockResult> {
    const owned = await this.call("lock", (b) => b.setIfAbsent(key, token, ttlMs));
    if (owned === undefined) return "unavailable";
    return owned ? "acquired" : "held";
  }

  async releaseLock(key: string, token: string): Promise<void> {
    await this.call("unlock", (b) => b.deleteIfEquals(key, token));
  }

  /** Resolves undefined when the cache could not count, so callers can fall back. */
  async incrementWindow(key: string, windowMs: number): Promise<number | undefined> {
    return await this.call("incr", (b) => b.incrementWindow(key, windowMs));
  }

  /** Active probe; a `false` ping counts against the breaker like an error. */
  async health(): Promise<boolean> {
    const ok = await this.call("ping", async (b) => {
      if (!(await b.ping())) throw new Error("cache ping returned false");
      return true;
    });
    return ok === true;
  }

  private async call<T>(op: string, fn: (backend: CacheBackend) => Promise<T>): Promise<T | undefined> {
    const { backend, breaker } = this;
    if (!backend || !breaker) {
      cacheOperationsCounter.labels(op, "disabled").inc();
      return;
    }
    if (breaker.isOpen()) {
      cacheOperationsCounter.labels(op, "short_circuit").inc();
      return;
    }
    try {
      return await breaker.execute(() => fn(backend));
    } catch (error) {
      if (error instanceof DependencyUnavailableError && !(error instanceof DependencyTimeoutError)) {
        cacheOperationsCounter.labels(op, "short_circuit").inc();
        return;
      }
      cacheOperationsCounter.labels(op, "error").inc();
      this.log.warn({ op, err: errorMessage(error) }, "cache operation failed");
      return;
    }
  }
}
