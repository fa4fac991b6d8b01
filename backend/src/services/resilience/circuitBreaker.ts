import {
  DependencyTimeoutError,
  DependencyUnavailableError,
  type DependencyName
} from "../../errors";
import { circuitStateGauge, circuitTransitionsCounter } from "../../config/metrics";
import { componentLogger, type Logger } from "../../config/logger";

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";
export type CapabilityState = "available" | "degraded" | "unavailable";

export interface CapabilityStatus {
  state: CapabilityState;
  circuit: CircuitState;
  consecutiveFailures: number;
  since: number; // epoch ms of the last transition
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  cooldownMs: number;
  timeoutMs: number;
  now?: () => number;
  logger?: Logger;
}

type Permit = "pass" | "probe" | "reject";

const STATE_GAUGE: Record<CircuitState, number> = { CLOSED: 0, HALF_OPEN: 1, OPEN: 2 };

/**
 * CLOSED/OPEN/HALF_OPEN breaker guarding one dependency.
 *
 * Permits are handed out synchronously, so the OPEN -> HALF_OPEN hop and the
 * "probe in flight" flag behave as a compare-and-set: exactly one caller gets
 * the probe, everybody else is short-circuited until it settles.
 */
export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private failures = 0;
  private openedAt = 0;
  private transitionedAt: number;
  private probeInFlight = false;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(readonly dependency: DependencyName, private readonly options: CircuitBreakerOptions) {
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? componentLogger("circuit-breaker");
    this.transitionedAt = this.now();
    circuitStateGauge.labels(dependency).set(STATE_GAUGE.CLOSED);
  }

  get timeoutMs(): number {
    return this.options.timeoutMs;
  }

  /**
   * Runs `operation` under the breaker with a deadline. Rejects with
   * DependencyUnavailableError when short-circuited and DependencyTimeoutError
   * when the deadline passes; the operation's signal is aborted in that case.
   */
  async execute<T>(operation: (signal: AbortSignal) => Promise<T>, timeoutMs = this.options.timeoutMs): Promise<T> {
    const permit = this.acquire();
    if (permit === "reject") {
      throw new DependencyUnavailableError(this.dependency, `${this.dependency} circuit is open`);
    }
    const isProbe = permit === "probe";

    try {
      const result = await runWithTimeout(this.dependency, operation, timeoutMs);
      this.onSuccess(isProbe);
      return result;
    } catch (error) {
      this.onFailure(isProbe, error);
      throw error;
    }
  }

  /** Counts an outcome observed outside `execute`, e.g. a ping that answered false. */
  record(ok: boolean, reason?: unknown) {
    if (ok) this.onSuccess(false);
    else this.onFailure(false, reason);
  }

  capability(): CapabilityStatus {
    // An expired cooldown is reported as half-open even before a probe arrives.
    const circuit =
      this.state === "OPEN" && this.now() - this.openedAt >= this.options.cooldownMs ? "HALF_OPEN" : this.state;
    let state: CapabilityState = "available";
    if (circuit === "OPEN") state = "unavailable";
    else if (circuit === "HALF_OPEN" || this.failures > 0) state = "degraded";
    return { state, circuit, consecutiveFailures: this.failures, since: this.transitionedAt };
  }

  isOpen(): boolean {
    return this.capability().circuit === "OPEN";
  }

  private acquire(): Permit {
    if (this.state === "CLOSED") return "pass";

    if (this.state === "OPEN") {
      if (this.now() - this.openedAt < this.options.cooldownMs) return "reject";
      this.transition("HALF_OPEN");
    }

    if (this.probeInFlight) return "reject";
    this.probeInFlight = true;
    return "probe";
  }

  private onSuccess(isProbe: boolean) {
    if (isProbe) {
      this.probeInFlight = false;
      this.failures = 0;
      this.transition("CLOSED");
      return;
    }
    // Late answers from calls admitted before the circuit opened do not close it.
    if (this.state === "CLOSED") this.failures = 0;
  }

  private onFailure(isProbe: boolean, error: unknown) {
    if (isProbe) {
      this.probeInFlight = false;
      this.trip(error);
      return;
    }
    if (this.state !== "CLOSED") return;

    this.failures += 1;
    if (this.failures >= this.options.failureThreshold) {
      this.trip(error);
    }
  }

  private trip(error: unknown) {
    this.openedAt = this.now();
    this.transition("OPEN");
    this.log.warn(
      {
        dependency: this.dependency,
        failures: this.failures,
        cooldownMs: this.options.cooldownMs,
        reason: error instanceof Error ? error.name : undefined
      },
      "circuit opened"
    );
  }

  private transition(to: CircuitState) {
    if (this.state === to) return;
    this.state = to;
    this.transitionedAt = this.now();
    circuitStateGauge.labels(this.dependency).set(STATE_GAUGE[to]);
    circuitTransitionsCounter.labels(this.dependency, to).inc();
    if (to !== "OPEN") this.log.info({ dependency: this.dependency, state: to }, "circuit transition");
  }
}

async function runWithTimeout<T>(
  dependency: DependencyName,
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new DependencyTimeoutError(dependency, timeoutMs));
    }, timeoutMs);
  });

  const pending = operation(controller.signal);
  // The loser of the race may still settle; keep that from surfacing as unhandled.
  pending.catch(() => undefined);

  try {
    return await Promise.race([pending, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
