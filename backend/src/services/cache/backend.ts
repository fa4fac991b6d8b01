/**
 * Raw cache backend. Implementations may throw or hang; the CacheStore
 * adapter puts every call behind a breaker with a deadline.
 */
export interface CacheBackend {
  readonly name: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  /** SET NX with expiry; resolves true when this caller now owns the key. */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  /** Deletes `key` only while it still holds `value`. */
  deleteIfEquals(key: string, value: string): Promise<boolean>;
  del(key: string): Promise<boolean>;
  /** Atomically increments a counter, starting its expiry on first use. */
  incrementWindow(key: string, windowMs: number): Promise<number>;
  ping(): Promise<boolean>;
  close?(): Promise<void>;
}
