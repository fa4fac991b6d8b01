// In-process cache backend: TTL + LRU map behind the CacheBackend contract
import type { CacheBackend } from "./backend";
import { cacheEvictionsCounter } from "../../config/metrics";

type Entry = { value: string; exp: number };

export interface MemoryCacheOptions {
  max?: number;
  now?: () => number;
}

export class MemoryCacheBackend implements CacheBackend {
  readonly name = "memory";
  private store = new Map<string, Entry>();
  private lru = new Set<string>();
  private readonly max: number;
  private readonly now: () => number;

  constructor(options: MemoryCacheOptions = {}) {
    this.max = options.max ?? 5000;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    return this.read(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.write(key, value, ttlSeconds * 1000);
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.read(key) !== undefined) return false;
    this.write(key, value, ttlMs);
    return true;
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    if (this.read(key) !== value) return false;
    return this.remove(key);
  }

  async del(key: string): Promise<boolean> {
    return this.remove(key);
  }

  async incrementWindow(key: string, windowMs: number): Promise<number> {
    const e = this.fresh(key);
    const count = e ? Number(e.value) + 1 : 1;
    this.put(key, { value: String(count), exp: e ? e.exp : this.now() + windowMs });
    return count;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  size(): number {
    return this.store.size;
  }

  clear() {
    this.store.clear();
    this.lru.clear();
  }

  private fresh(key: string): Entry | undefined {
    const e = this.store.get(key);
    if (!e) return;
    if (this.now() > e.exp) {
      this.remove(key);
      return;
    }
    return e;
  }

  private read(key: string): string | undefined {
    const e = this.fresh(key);
    if (!e) return;
    this.touch(key);
    return e.value;
  }

  private write(key: string, value: string, ttlMs: number) {
    this.put(key, { value, exp: this.now() + ttlMs });
  }

  private put(key: string, entry: Entry) {
    if (!this.store.has(key) && this.store.size >= this.max) {
      const oldestKey = this.lru.values().next().value;
      if (oldestKey !== undefined) {
        this.remove(oldestKey);
        cacheEvictionsCounter.labels(this.name).inc();
      }
    }
    this.store.set(key, entry);
    this.touch(key);
  }

  private touch(key: string) {
    this.lru.delete(key);
    this.lru.add(key);
  }

  private remove(key: string): boolean {
    this.lru.delete(key);
    return this.store.delete(key);
  }
}
