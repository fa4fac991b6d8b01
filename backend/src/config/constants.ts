import { env } from "./env";
import { parseRateLimit, type RateLimitRule } from "../services/rateLimiter";

export const PROJECT_NAME = "trip-packer";
export const PORT_BACKEND = env.PORT;

export type CacheBackendKind = "redis" | "memory" | "none";

function isCacheBackendKind(value: string): value is CacheBackendKind {
  return value === "redis" || value === "memory" || value === "none";
}

export const CACHE_BACKEND: CacheBackendKind = isCacheBackendKind(env.CACHE_BACKEND)
  ? env.CACHE_BACKEND
  : "redis";
export const REDIS_URL = env.REDIS_URL;
export const CACHE_TIMEOUT_MS = env.CACHE_TIMEOUT_MS;
export const CACHE_FAILURE_THRESHOLD = env.CACHE_FAILURE_THRESHOLD;
export const CACHE_COOLDOWN_MS = env.CACHE_COOLDOWN_MS;

export const SUGGESTION_CACHE_PREFIX = "ai_suggestions";
export const TRIP_MAPPING_PREFIX = "ai_trip_mapping";
export const SUGGESTION_TTL_SECONDS = env.SUGGESTION_TTL_SECONDS;
export const CACHE_FALLBACK_RESULTS = env.CACHE_FALLBACK_RESULTS;
export const FALLBACK_TTL_SECONDS = env.FALLBACK_TTL_SECONDS;

export const CHAT_MODEL = env.CHAT_MODEL;
export const MOCK_OPENAI = !!env.MOCK_OPENAI || !env.OPENAI_API_KEY;
export const GENERATION_TIMEOUT_MS = env.GENERATION_TIMEOUT_MS;
export const GENERATION_CONCURRENCY = Math.max(1, env.GENERATION_CONCURRENCY);
export const GENERATION_FAILURE_THRESHOLD = env.GENERATION_FAILURE_THRESHOLD;
export const GENERATION_COOLDOWN_MS = env.GENERATION_COOLDOWN_MS;

// Leaves room for the cache write after the generation call returns.
export const FLIGHT_TIMEOUT_MS =
  env.FLIGHT_TIMEOUT_MS > 0 ? env.FLIGHT_TIMEOUT_MS : GENERATION_TIMEOUT_MS + CACHE_TIMEOUT_MS;
export const LOCK_POLL_INTERVAL_MS = env.LOCK_POLL_INTERVAL_MS;

export const WEATHER_API_KEY = env.WEATHER_API_KEY;
export const WEATHER_UNITS: "metric" | "imperial" =
  env.WEATHER_UNITS === "imperial" ? "imperial" : "metric";
export const WEATHER_TIMEOUT_MS = env.WEATHER_TIMEOUT_MS;
export const WEATHER_TTL_SECONDS = 24 * 60 * 60;
export const WEATHER_FAILURE_THRESHOLD = 3;
export const WEATHER_COOLDOWN_MS = 60_000;

export const RATE_LIMIT_ENABLED = env.RATE_LIMIT_ENABLED;
export const RATE_LIMIT_DEFAULT: RateLimitRule = parseRateLimit(env.RATE_LIMIT_DEFAULT);
export const RATE_LIMIT_ROUTES: Record<string, RateLimitRule> = {
  "/api/suggestions": parseRateLimit(env.RATE_LIMIT_SUGGESTIONS),
  "/api/trips/:id/suggestions": parseRateLimit(env.RATE_LIMIT_SUGGESTIONS)
};
