// Observability: tracing
import { context, trace, type AttributeValue, type Attributes } from "@opentelemetry/api";

import { NodeSDK } from "@opentelemetry/sdk-node";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { env } from "./env";
import { componentLogger } from "./logger";

const log = componentLogger("otel");

/**
 * Bootstraps OpenTelemetry NodeSDK with HTTP/Fastify/PG/ioredis auto-instrumentations.
 * Controlled via env:
 *  - ENABLE_OTEL=true
 *  - OTEL_SERVICE_NAME=trip-packer-backend
 *  - OTEL_EXPORTER_OTLP_ENDPOINT=http://localhost:4318/v1/traces (default)
 */
if (env.ENABLE_OTEL) {
  const serviceName = env.OTEL_SERVICE_NAME;

  const sdk = new NodeSDK({
    serviceName,
    traceExporter: new OTLPTraceExporter({ url: env.OTEL_EXPORTER_OTLP_ENDPOINT }),
    instrumentations: [getNodeAutoInstrumentations()],
  });

  try {
    sdk.start();
    log.info({ serviceName }, "NodeSDK started");
  } catch (err) {
    log.error({ err }, "NodeSDK start failed");
  }

  const shutdown = () => {
    sdk
      .shutdown()
      .then(() => log.info("NodeSDK shut down"))
      .catch((err: unknown) => log.error({ err }, "NodeSDK shutdown error"));
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

export const tracer = trace.getTracer("trip-packer");

function toAttributes(attrs?: Record<string, unknown>): Attributes {
  const out: Attributes = {};
  if (!attrs) return out;
  for (const [k, v] of Object.entries(attrs)) {
    if (isAttributeValue(v)) out[k] = v;
  }
  return out;
}

function isAttributeValue(v: unknown): v is AttributeValue {
  return typeof v === "string" || typeof v === "number" || typeof v === "boolean";
}

export async function withSpan<T>(
  name: string,
  fn: () => Promise<T> | T,
  attrs?: Record<string, unknown>
): Promise<T> {
  return await tracer.startActiveSpan(name, { attributes: toAttributes(attrs) }, async (span) => {
    try {
      return await fn();
    } catch (e) {
      span.recordException(e instanceof Error ? e : String(e));
      span.setAttribute("error", true);
      throw e;
    } finally {
      span.end();
    }
  });
}

export function addEvent(name: string, attrs?: Record<string, unknown>) {
  const span = trace.getSpan(context.active());
  span?.addEvent(name, toAttributes(attrs));
}
