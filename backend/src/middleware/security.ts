// Request guards: per-route rate limiting
import type { FastifyReply, FastifyRequest } from "fastify";
import type { RateLimiter } from "../services/rateLimiter";

export interface RateLimitHookOptions {
  enabled: boolean;
  exempt?: string[];
}

export function clientIdentity(req: FastifyRequest): string {
  const forwarded = req.headers["x-forwarded-for"];
  const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(",")[0]?.trim();
  return first || req.ip;
}

export function rateLimitHook(limiter: RateLimiter, options: RateLimitHookOptions) {
  const exempt = new Set(options.exempt ?? ["/api/health"]);

  return async function onRequestRateLimit(req: FastifyRequest, reply: FastifyReply) {
    if (!options.enabled) return;
    const route = req.routeOptions.url;
    if (!route || !route.startsWith("/api/") || exempt.has(route)) return;

    const decision = await limiter.checkRateLimit(route, clientIdentity(req));
    if (!decision.allowed) {
      reply
        .code(429)
        .header("Retry-After", String(decision.retryAfterSeconds))
        .send({ error: "rate_limited", retryAfterSeconds: decision.retryAfterSeconds });
      return reply;
    }
    reply.header("X-RateLimit-Remaining", String(decision.remaining));
  };
}
