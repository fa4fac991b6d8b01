import Redis from "ioredis";
import type { CacheBackend } from "./backend";
import { componentLogger } from "../../config/logger";

const log = componentLogger("redis");

const COMPARE_AND_DELETE = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0
`;

const INCREMENT_WINDOW = `
local count = redis.call("INCR", KEYS[1])
if count == 1 then
  redis.call("PEXPIRE", KEYS[1], ARGV[1])
end
return count
`;

export interface RedisCacheOptions {
  connectTimeoutMs?: number;
  commandTimeoutMs?: number;
}

/**
 * ioredis-backed cache. Commands fail fast while disconnected instead of
 * queueing, so an outage shows up as errors the breaker can count.
 */
export class RedisCacheBackend implements CacheBackend {
  readonly name = "redis";
  private readonly client: Redis;

  constructor(url: string, options: RedisCacheOptions = {}) {
    this.client = new Redis(url, {
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 0,
      connectTimeout: options.connectTimeoutMs ?? 800,
      commandTimeout: options.commandTimeoutMs ?? 800,
      retryStrategy: (times) => Math.min(times * 200, 5000),
    });
    // Connection errors also surface through failed commands, which the breaker counts.
    this.client.on("error", (err: Error) => log.debug({ err: err.message }, "redis connection error"));
  }

  async connect(): Promise<void> {
    if (this.client.status === "wait") {
      await this.client.connect();
    }
  }

  async get(key: string): Promise<string | null> {
    return await this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, "EX", Math.max(1, Math.ceil(ttlSeconds)));
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const res = await this.client.set(key, value, "PX", Math.max(1, Math.ceil(ttlMs)), "NX");
    return res === "OK";
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    const res = await this.client.eval(COMPARE_AND_DELETE, 1, key, value);
    return Number(res) === 1;
  }

  async del(key: string): Promise<boolean> {
    return (await this.client.del(key)) > 0;
  }

  async incrementWindow(key: string, windowMs: number): Promise<number> {
    const res = await this.client.eval(INCREMENT_WINDOW, 1, key, String(Math.max(1, windowMs)));
    const count = Number(res);
    if (!Number.isFinite(count)) {
      throw new Error(`unexpected INCR reply for ${key}`);
    }
    return count;
  }

  async ping(): Promise<boolean> {
    return (await this.client.ping()) === "PONG";
  }

  async close(): Promise<void> {
    this.client.disconnect();
  }
}
