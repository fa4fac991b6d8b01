/* Backend Server Entry Point */
import "./config/otel"; // Bootstrap OpenTelemetry before loading instrumented modules
import Fastify, { type FastifyError } from "fastify";
import cors from "@fastify/cors";
import { env } from "./config/env";
import { RATE_LIMIT_ENABLED } from "./config/constants";
import { logger } from "./config/logger";
import { requestCounter } from "./config/metrics";
import { closePool, query } from "./db/client";
import { pgTripRepository, type TripRepository } from "./db/trips";
import { StoreFailureError, ValidationError } from "./errors";
import { rateLimitHook } from "./middleware/security";
import { healthRoutes } from "./routes/health";
import { suggestionRoutes } from "./routes/suggestions";
import { tripRoutes } from "./routes/trips";
import { createServices, type Services } from "./services/container";
import { withRetry } from "./utils/retry";

export interface BuildOptions {
  services?: Services;
  trips?: TripRepository;
  rateLimitEnabled?: boolean;
}

export async function build(options: BuildOptions = {}) {
  const services = options.services ?? createServices();
  const app = Fastify({ logger: { level: env.LOG_LEVEL } });

  await app.register(cors, { origin: env.CORS_ORIGIN, credentials: true });

  // Only validation problems reach callers in detail; dependency failures stay generic.
  app.setErrorHandler((error: FastifyError, req, reply) => {
    if (error instanceof ValidationError) {
      reply.code(400).send({ error: "validation_error", message: error.message, issues: error.issues });
      return;
    }
    if (error instanceof StoreFailureError) {
      reply.code(503).send({ error: "store_unavailable", message: "Service temporarily unavailable" });
      return;
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      reply.code(error.statusCode).send({ error: "bad_request", message: error.message });
      return;
    }
    req.log.error({ err: error }, "unhandled request error");
    reply.code(500).send({ error: "internal_error", message: "Internal server error" });
  });

  app.addHook(
    "onRequest",
    rateLimitHook(services.rateLimiter, { enabled: options.rateLimitEnabled ?? RATE_LIMIT_ENABLED })
  );
  app.addHook("onResponse", async (req, reply) => {
    requestCounter.labels(req.routeOptions.url ?? "unmatched", String(reply.statusCode)).inc();
  });
  app.addHook("onClose", async () => {
    await services.close();
  });

  await healthRoutes(app, services);
  await suggestionRoutes(app, services.suggestions);
  await tripRoutes(app, { suggestions: services.suggestions, trips: options.trips ?? pgTripRepository });

  return app;
}

async function start() {
  await withRetry(() => query("SELECT 1"), { maxRetries: 5, initialDelayMs: 250, label: "postgres connectivity" });

  const services = createServices();
  await services.open();
  const app = await build({ services });
  await app.listen({ port: env.PORT, host: "0.0.0.0" });
  app.log.info(`Backend listening on http://localhost:${env.PORT}`);

  const shutdown = () => {
    app
      .close()
      .then(() => closePool())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

// Start server if run directly (not imported)
if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err: unknown) => {
    logger.fatal({ err }, "startup failed");
    process.exit(1);
  });
}
