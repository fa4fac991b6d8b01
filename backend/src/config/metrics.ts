import { register, Counter, Gauge, Histogram } from "prom-client";

// General Metrics
export const requestCounter = new Counter({
  name: "packer_requests_total",
  help: "Total API requests",
  labelNames: ["route", "status_code"],
});

// Suggestion Metrics
export const suggestionRequestsCounter = new Counter({
  name: "suggestion_requests_total",
  help: "Suggestion lookups by where the answer came from.",
  labelNames: ["source"],
});

export const generationCallsCounter = new Counter({
  name: "generation_calls_total",
  help: "Generation backend invocations by outcome.",
  labelNames: ["backend", "outcome"],
});

export const generationDurationHistogram = new Histogram({
  name: "generation_duration_seconds",
  help: "Generation backend latency",
  labelNames: ["backend"],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 20],
});

export const singleFlightSharedCounter = new Counter({
  name: "single_flight_shared_total",
  help: "Callers that awaited an in-flight generation instead of starting one.",
  labelNames: ["scope"],
});

// Cache Metrics
export const cacheOperationsCounter = new Counter({
  name: "cache_operations_total",
  help: "Cache store operations by result.",
  labelNames: ["op", "result"],
});

export const cacheEvictionsCounter = new Counter({
  name: "cache_evictions_total",
  help: "Total number of in-memory cache evictions.",
  labelNames: ["cache_name"],
});

// Circuit Breaker Metrics
export const circuitStateGauge = new Gauge({
  name: "circuit_state",
  help: "Circuit breaker state per dependency (0 closed, 1 half-open, 2 open).",
  labelNames: ["dependency"],
});

export const circuitTransitionsCounter = new Counter({
  name: "circuit_transitions_total",
  help: "Circuit breaker state transitions.",
  labelNames: ["dependency", "to"],
});

// Rate Limiting Metrics
export const rateLimitEnforcedCounter = new Counter({
  name: "rate_limit_enforced_total",
  help: "Total number of rate limit checks.",
  labelNames: ["route", "store"],
});

export const rateLimitRejectionsCounter = new Counter({
  name: "rate_limit_rejections_total",
  help: "Total number of rate limit rejections.",
  labelNames: ["route"],
});

// Expose metrics endpoint
export async function getMetrics() {
  return await register.metrics();
}

export function getContentType() {
  return register.contentType;
}
