// Dependency health routes
import type { FastifyInstance } from "fastify";
import type { DependencyHealth, HealthResponse } from "../../../shared/types";
import type { Services } from "../services/container";
import type { CapabilityStatus } from "../services/resilience/circuitBreaker";
import { decide } from "../services/resilience/degradation";
import type { DependencyName } from "../errors";
import { ping } from "../db/client";
import { getContentType, getMetrics } from "../config/metrics";

const DEPENDENCIES: readonly DependencyName[] = ["durableStore", "cache", "generation", "auxiliaryContext"];

function dependencyHealth(status: CapabilityStatus, backend?: string): DependencyHealth {
  const out: DependencyHealth = {
    state: status.state,
    circuit: status.circuit,
    consecutiveFailures: status.consecutiveFailures
  };
  if (backend) out.backend = backend;
  return out;
}

export async function healthRoutes(app: FastifyInstance, services: Services) {
  /**
   * Durable store check plus the capability of every optional dependency.
   * GET /api/health
   */
  app.get("/api/health", async (_req, reply) => {
    const storeUp = await ping();
    // Active probe so a recovered cache shows up without waiting for traffic.
    await services.cache.health();

    const dependencies: HealthResponse["dependencies"] = {
      durableStore: { state: storeUp ? "available" : "unavailable" },
      cache: dependencyHealth(services.cache.capability(), services.cache.backendName),
      generation: dependencyHealth(services.generation.capability(), services.generation.backendName),
      auxiliaryContext: dependencyHealth(services.weather.capability())
    };

    // A dependency whose policy says "fail" makes the service unhealthy; any other gap degrades it.
    let status: HealthResponse["status"] = "healthy";
    for (const name of DEPENDENCIES) {
      const { state } = dependencies[name];
      if (decide(name, state).action === "fail") status = "unhealthy";
      else if (state !== "available" && status === "healthy") status = "degraded";
    }

    const body: HealthResponse = { status, timestamp: new Date().toISOString(), dependencies };
    reply.code(status === "unhealthy" ? 503 : 200).send(body);
  });

  /**
   * Prometheus exposition.
   * GET /metrics
   */
  app.get("/metrics", async (_req, reply) => {
    reply.header("Content-Type", getContentType());
    reply.send(await getMetrics());
  });
}
