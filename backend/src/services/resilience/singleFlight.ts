import { v4 as uuidv4 } from "uuid";
import type { CacheStore } from "../cache/store";
import { singleFlightSharedCounter } from "../../config/metrics";
import { componentLogger, type Logger } from "../../config/logger";

export interface FlightTask<T> {
  /**
   * Leader work. Expected to settle on its own; the deadline is a backstop.
   * `signal` aborts at force-release, after which the result is discarded.
   */
  run(signal: AbortSignal): Promise<T>;
  /** Result handed to everyone still waiting when the slot is force-released. */
  fallback(): T;
  /** Looks for a result another process published while we waited on its lock. */
  peek(): Promise<T | undefined>;
}

export interface Flight<T> {
  value: T;
  /** True for callers that joined a generation run elsewhere, in this process or another. */
  shared: boolean;
  /** True when the deadline passed and `fallback()` was used. */
  forced: boolean;
}

export interface SingleFlightOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  lockPrefix?: string;
  logger?: Logger;
}

type Settled<T> = { value: T; forced: boolean; remote: boolean };

/**
 * At most one in-flight generation per key. Process-local through a promise
 * map; across processes through a cache lock while the cache is reachable.
 * With the cache down, only the local guarantee holds.
 */
export class SingleFlightCoordinator<T> {
  private readonly inflight = new Map<string, Promise<Settled<T>>>();
  private readonly log: Logger;
  private readonly lockPrefix: string;

  constructor(private readonly cache: CacheStore, private readonly options: SingleFlightOptions) {
    this.log = options.logger ?? componentLogger("single-flight");
    this.lockPrefix = options.lockPrefix ?? "lock";
  }

  inflightCount(): number {
    return this.inflight.size;
  }

  async execute(key: string, task: FlightTask<T>): Promise<Flight<T>> {
    const existing = this.inflight.get(key);
    if (existing) {
      singleFlightSharedCounter.labels("local").inc();
      const { value, forced } = await existing;
      return { value, forced, shared: true };
    }

    const flight = this.lead(key, task).finally(() => {
      if (this.inflight.get(key) === flight) this.inflight.delete(key);
    });
    this.inflight.set(key, flight);
    const { value, forced, remote } = await flight;
    return { value, forced, shared: remote };
  }

  private async lead(key: string, task: FlightTask<T>): Promise<Settled<T>> {
    const lockKey = `${this.lockPrefix}:${key}`;
    const token = uuidv4();
    const deadline = Date.now() + this.options.timeoutMs;

    let lock = await this.cache.acquireLock(lockKey, token, this.options.timeoutMs);
    if (lock === "held") {
      singleFlightSharedCounter.labels("remote").inc();
      const remote = await this.awaitRemote(lockKey, task, deadline);
      if (remote) return remote;
      // Holder went away without publishing; take over if time is left.
      lock = await this.cache.acquireLock(lockKey, token, Math.max(1, deadline - Date.now()));
      if (lock === "held" || Date.now() >= deadline) {
        return { value: task.fallback(), forced: true, remote: true };
      }
    }

    try {
      return await this.runWithDeadline(key, task, deadline - Date.now());
    } finally {
      if (lock === "acquired") await this.cache.releaseLock(lockKey, token);
    }
  }

  private async runWithDeadline(key: string, task: FlightTask<T>, remainingMs: number): Promise<Settled<T>> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const forced = new Promise<Settled<T>>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        this.log.warn({ key, timeoutMs: this.options.timeoutMs }, "single-flight slot force-released");
        resolve({ value: task.fallback(), forced: true, remote: false });
      }, Math.max(0, remainingMs));
    });

    const work = task.run(controller.signal).then((value) => ({ value, forced: false, remote: false }));
    // After a force-release nobody awaits `work`; its failure would otherwise go unobserved.
    work.catch((err: unknown) => this.log.error({ key, err }, "single-flight leader failed"));

    try {
      return await Promise.race([work, forced]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async awaitRemote(lockKey: string, task: FlightTask<T>, deadline: number): Promise<Settled<T> | undefined> {
    while (Date.now() < deadline) {
      await sleep(Math.min(this.options.pollIntervalMs, Math.max(1, deadline - Date.now())));
      const value = await task.peek();
      if (value !== undefined) return { value, forced: false, remote: true };
      // Lock gone (or cache gone) and nothing published: stop waiting.
      if ((await this.cache.get(lockKey)) === undefined) return;
    }
    return { value: task.fallback(), forced: true, remote: true };
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
