import { Semaphore } from "async-mutex";
import type { GenerationBackend } from "./types";
import type { NormalizedParameters } from "../suggestions/params";
import type { SuggestionList } from "../suggestions/types";
import { CircuitBreaker, type CapabilityStatus } from "../resilience/circuitBreaker";
import { DependencyUnavailableError, GenerationFailureError } from "../../errors";
import { generationCallsCounter, generationDurationHistogram } from "../../config/metrics";
import { withSpan } from "../../config/otel";
import type { Logger } from "../../config/logger";

export interface GenerationAdapterOptions {
  failureThreshold: number;
  cooldownMs: number;
  timeoutMs: number;
  concurrency: number;
  now?: () => number;
  logger?: Logger;
}

const UNAVAILABLE: CapabilityStatus = {
  state: "unavailable",
  circuit: "OPEN",
  consecutiveFailures: 0,
  since: 0
};

/**
 * Owns the real generator's capability state. Calls go through a breaker with
 * the generation timeout and a process-wide concurrency cap.
 */
export class GenerationAdapter {
  private readonly breaker: CircuitBreaker | null;
  private readonly semaphore: Semaphore;

  constructor(private readonly backend: GenerationBackend | null, options: GenerationAdapterOptions) {
    this.breaker = backend
      ? new CircuitBreaker("generation", {
          failureThreshold: options.failureThreshold,
          cooldownMs: options.cooldownMs,
          timeoutMs: options.timeoutMs,
          now: options.now,
          logger: options.logger
        })
      : null;
    this.semaphore = new Semaphore(Math.max(1, options.concurrency));
  }

  get backendName(): string {
    return this.backend?.name ?? "none";
  }

  capability(): CapabilityStatus {
    return this.breaker ? this.breaker.capability() : UNAVAILABLE;
  }

  /**
   * Rejects with DependencyUnavailableError (open circuit, no backend),
   * DependencyTimeoutError, or GenerationFailureError (unusable payload).
   */
  async generate(params: NormalizedParameters): Promise<SuggestionList> {
    const { backend, breaker } = this;
    if (!backend || !breaker) {
      throw new DependencyUnavailableError("generation", "no generation backend configured");
    }

    return await withSpan(
      "generation.generate",
      () =>
        this.semaphore.runExclusive(async () => {
          const end = generationDurationHistogram.labels(backend.name).startTimer();
          try {
            const suggestions = await breaker.execute(async (signal) => {
              const out = await backend.generate(params, breaker.timeoutMs, signal);
              return validateSuggestions(out);
            });
            generationCallsCounter.labels(backend.name, "success").inc();
            return suggestions;
          } catch (error) {
            generationCallsCounter.labels(backend.name, outcomeLabel(error)).inc();
            throw error;
          } finally {
            end();
          }
        }),
      { backend: backend.name, days: params.days }
    );
  }
}

function validateSuggestions(out: unknown): SuggestionList {
  if (!Array.isArray(out)) throw new GenerationFailureError("Generation payload is not a list");
  const lines = out.filter((s): s is string => typeof s === "string" && s.trim().length > 0);
  if (lines.length === 0) throw new GenerationFailureError("Generation payload is empty");
  return lines.map((s) => s.trim());
}

function outcomeLabel(error: unknown): string {
  if (error instanceof DependencyUnavailableError) {
    return error.name === "DependencyTimeoutError" ? "timeout" : "short_circuit";
  }
  if (error instanceof GenerationFailureError) return "invalid";
  return "error";
}
