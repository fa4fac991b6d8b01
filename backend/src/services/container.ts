import {
  CACHE_BACKEND,
  CACHE_COOLDOWN_MS,
  CACHE_FAILURE_THRESHOLD,
  CACHE_FALLBACK_RESULTS,
  CACHE_TIMEOUT_MS,
  CHAT_MODEL,
  FALLBACK_TTL_SECONDS,
  FLIGHT_TIMEOUT_MS,
  GENERATION_CONCURRENCY,
  GENERATION_COOLDOWN_MS,
  GENERATION_FAILURE_THRESHOLD,
  GENERATION_TIMEOUT_MS,
  LOCK_POLL_INTERVAL_MS,
  MOCK_OPENAI,
  RATE_LIMIT_DEFAULT,
  RATE_LIMIT_ROUTES,
  REDIS_URL,
  SUGGESTION_TTL_SECONDS,
  WEATHER_API_KEY,
  WEATHER_COOLDOWN_MS,
  WEATHER_FAILURE_THRESHOLD,
  WEATHER_TIMEOUT_MS,
  WEATHER_TTL_SECONDS,
  WEATHER_UNITS
} from "../config/constants";
import { env } from "../config/env";
import { componentLogger } from "../config/logger";
import { errorMessage } from "../errors";
import type { CacheBackend } from "./cache/backend";
import { MemoryCacheBackend } from "./cache/memory";
import { RedisCacheBackend } from "./cache/redis";
import { CacheStore } from "./cache/store";
import { GenerationAdapter } from "./generation/adapter";
import { MockGenerator } from "./generation/mock";
import { OpenAIGenerator } from "./generation/openai";
import type { GenerationBackend } from "./generation/types";
import { RateLimiter } from "./rateLimiter";
import { SuggestionService } from "./suggestions/orchestrator";
import { DisabledWeatherProvider, OpenWeatherProvider, type WeatherProvider } from "./weather";

export interface Services {
  cache: CacheStore;
  generation: GenerationAdapter;
  weather: WeatherProvider;
  suggestions: SuggestionService;
  rateLimiter: RateLimiter;
  /** Connects network backends; a cache that will not connect leaves the cache degraded. */
  open(): Promise<void>;
  close(): Promise<void>;
}

export interface ServiceOverrides {
  cacheBackend?: CacheBackend | null;
  generationBackend?: GenerationBackend | null;
  weather?: WeatherProvider;
  now?: () => number;
}

function defaultCacheBackend(): CacheBackend | null {
  if (CACHE_BACKEND === "memory") return new MemoryCacheBackend();
  if (CACHE_BACKEND === "redis") {
    return new RedisCacheBackend(REDIS_URL, {
      connectTimeoutMs: CACHE_TIMEOUT_MS,
      commandTimeoutMs: CACHE_TIMEOUT_MS
    });
  }
  return null;
}

function defaultGenerationBackend(): GenerationBackend | null {
  if (MOCK_OPENAI) return null;
  return new OpenAIGenerator({ apiKey: env.OPENAI_API_KEY, model: CHAT_MODEL });
}

/** Wires the adapters from configuration. Overrides exist for tests. */
export function createServices(overrides: ServiceOverrides = {}): Services {
  const log = componentLogger("container");
  const now = overrides.now;

  const cacheBackend = overrides.cacheBackend !== undefined ? overrides.cacheBackend : defaultCacheBackend();
  const cache = new CacheStore(cacheBackend, {
    failureThreshold: CACHE_FAILURE_THRESHOLD,
    cooldownMs: CACHE_COOLDOWN_MS,
    timeoutMs: CACHE_TIMEOUT_MS,
    now
  });

  const generationBackend =
    overrides.generationBackend !== undefined ? overrides.generationBackend : defaultGenerationBackend();
  const generation = new GenerationAdapter(generationBackend, {
    failureThreshold: GENERATION_FAILURE_THRESHOLD,
    cooldownMs: GENERATION_COOLDOWN_MS,
    timeoutMs: GENERATION_TIMEOUT_MS,
    concurrency: GENERATION_CONCURRENCY,
    now
  });

  const weather =
    overrides.weather ??
    (WEATHER_API_KEY
      ? new OpenWeatherProvider(cache, {
          apiKey: WEATHER_API_KEY,
          units: WEATHER_UNITS,
          timeoutMs: WEATHER_TIMEOUT_MS,
          ttlSeconds: WEATHER_TTL_SECONDS,
          failureThreshold: WEATHER_FAILURE_THRESHOLD,
          cooldownMs: WEATHER_COOLDOWN_MS,
          now
        })
      : new DisabledWeatherProvider());

  const suggestions = new SuggestionService(
    { cache, generation, mock: new MockGenerator(), weather },
    {
      ttlSeconds: SUGGESTION_TTL_SECONDS,
      cacheFallbacks: CACHE_FALLBACK_RESULTS,
      fallbackTtlSeconds: FALLBACK_TTL_SECONDS,
      flightTimeoutMs: FLIGHT_TIMEOUT_MS,
      pollIntervalMs: LOCK_POLL_INTERVAL_MS,
      now
    }
  );

  const rateLimiter = new RateLimiter(cache, {
    defaultRule: RATE_LIMIT_DEFAULT,
    routes: RATE_LIMIT_ROUTES,
    now
  });

  log.info(
    { cache: cache.backendName, generation: generation.backendName, weather: weather.capability().state },
    "services wired"
  );

  return {
    cache,
    generation,
    weather,
    suggestions,
    rateLimiter,
    async open() {
      if (!(cacheBackend instanceof RedisCacheBackend)) return;
      try {
        await cacheBackend.connect();
      } catch (error) {
        log.warn({ err: errorMessage(error) }, "cache connect failed; running degraded");
      }
    },
    async close() {
      await cacheBackend?.close?.();
    }
  };
}
