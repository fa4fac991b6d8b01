import type { CacheStore } from "./cache/store";
import { rateLimitEnforcedCounter, rateLimitRejectionsCounter } from "../config/metrics";
import { componentLogger, type Logger } from "../config/logger";

export interface RateLimitRule {
  limit: number;
  windowMs: number;
}

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterSeconds: number };

const UNIT_MS: Record<string, number> = {
  second: 1000,
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000
};

/** Parses "<n> per <second|minute|hour|day>", e.g. "20 per hour". */
export function parseRateLimit(value: string): RateLimitRule {
  const match = /^\s*(\d+)\s*(?:per|\/)\s*(second|minute|hour|day)s?\s*$/i.exec(value);
  if (!match) {
    throw new Error(`Invalid rate limit "${value}"; expected "<n> per <second|minute|hour|day>"`);
  }
  const limit = Number(match[1]);
  if (limit < 1) throw new Error(`Invalid rate limit "${value}"; limit must be at least 1`);
  return { limit, windowMs: UNIT_MS[match[2].toLowerCase()] };
}

export interface RateLimiterOptions {
  defaultRule: RateLimitRule;
  routes?: Record<string, RateLimitRule>;
  keyPrefix?: string;
  now?: () => number;
  logger?: Logger;
}

/**
 * Fixed-window limiter keyed by (route, identity). Counts live in the cache
 * when it answers; otherwise in a per-process map, so limits are per instance
 * while the cache is down.
 */
export class RateLimiter {
  private readonly local = new Map<string, { count: number; expiresAt: number }>();
  private readonly now: () => number;
  private readonly prefix: string;
  private readonly log: Logger;

  constructor(private readonly cache: CacheStore, private readonly options: RateLimiterOptions) {
    this.now = options.now ?? Date.now;
    this.prefix = options.keyPrefix ?? "ratelimit";
    this.log = options.logger ?? componentLogger("rate-limit");
  }

  ruleFor(route: string): RateLimitRule {
    return this.options.routes?.[route] ?? this.options.defaultRule;
  }

  async checkRateLimit(route: string, identity: string): Promise<RateLimitDecision> {
    const { limit, windowMs } = this.ruleFor(route);
    const now = this.now();
    const windowStart = Math.floor(now / windowMs) * windowMs;
    const key = `${this.prefix}:${route}:${identity}:${windowStart}`;

    let store = "cache";
    let count = await this.cache.incrementWindow(key, windowStart + windowMs - now);
    if (count === undefined) {
      store = "memory";
      count = this.incrementLocal(key, windowStart + windowMs, now);
    }
    rateLimitEnforcedCounter.labels(route, store).inc();

    if (count > limit) {
      rateLimitRejectionsCounter.labels(route).inc();
      const retryAfterSeconds = Math.max(1, Math.ceil((windowStart + windowMs - now) / 1000));
      this.log.info({ route, identity, count, limit, retryAfterSeconds, store }, "rate limit exceeded");
      return { allowed: false, retryAfterSeconds };
    }
    return { allowed: true, remaining: limit - count };
  }

  private incrementLocal(key: string, expiresAt: number, now: number): number {
    this.prune(now);
    const slot = this.local.get(key);
    if (slot) {
      slot.count += 1;
      return slot.count;
    }
    this.local.set(key, { count: 1, expiresAt });
    return 1;
  }

  private prune(now: number) {
    for (const [key, slot] of this.local) {
      if (slot.expiresAt <= now) this.local.delete(key);
    }
  }
}
