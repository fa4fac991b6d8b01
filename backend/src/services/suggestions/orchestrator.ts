import type { CacheStore } from "../cache/store";
import type { GenerationAdapter } from "../generation/adapter";
import type { MockBackend } from "../generation/types";
import type { WeatherProvider } from "../weather";
import { SingleFlightCoordinator } from "../resilience/singleFlight";
import { decide } from "../resilience/degradation";
import {
  normalizeParameters,
  parseRequestParameters,
  withWeather,
  type NormalizedParameters,
  type RequestParameters,
  type WeatherSnapshot
} from "./params";
import { fingerprintNormalized } from "./fingerprint";
import { decodeEntry, encodeEntry, type CacheEntry } from "./entry";
import type { SuggestionList, SuggestionOrigin, SuggestionOutcome } from "./types";
import { TRIP_MAPPING_PREFIX } from "../../config/constants";
import { suggestionRequestsCounter } from "../../config/metrics";
import { addEvent, withSpan } from "../../config/otel";
import { componentLogger, type Logger } from "../../config/logger";
import { errorMessage } from "../../errors";

export interface SuggestionServiceOptions {
  ttlSeconds: number;
  cacheFallbacks: boolean;
  fallbackTtlSeconds: number;
  flightTimeoutMs: number;
  pollIntervalMs: number;
  now?: () => number;
  logger?: Logger;
}

export interface SuggestionServiceDeps {
  cache: CacheStore;
  generation: GenerationAdapter;
  mock: MockBackend;
  weather: WeatherProvider;
}

interface Generated {
  suggestions: SuggestionList;
  origin: SuggestionOrigin;
}

/**
 * "Get or generate" for packing suggestions. Validation errors are the only
 * thing that escapes; every dependency problem ends in a cached list, a fresh
 * list, or the deterministic substitute.
 */
export class SuggestionService {
  private readonly cache: CacheStore;
  private readonly generation: GenerationAdapter;
  private readonly mock: MockBackend;
  private readonly weather: WeatherProvider;
  private readonly flights: SingleFlightCoordinator<Generated>;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(deps: SuggestionServiceDeps, private readonly options: SuggestionServiceOptions) {
    this.cache = deps.cache;
    this.generation = deps.generation;
    this.mock = deps.mock;
    this.weather = deps.weather;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? componentLogger("suggestions");
    this.flights = new SingleFlightCoordinator<Generated>(deps.cache, {
      timeoutMs: options.flightTimeoutMs,
      pollIntervalMs: options.pollIntervalMs,
      logger: this.log
    });
  }

  async getSuggestions(input: unknown): Promise<SuggestionList> {
    const outcome = await this.resolveSuggestions(input);
    return outcome.suggestions;
  }

  async resolveSuggestions(input: unknown): Promise<SuggestionOutcome> {
    const parsed = parseRequestParameters(input);

    return await withSpan("suggestions.resolve", async () => {
      const { params, fetched } = await this.enrich(parsed);
      const normalized = normalizeParameters(params);
      const key = fingerprintNormalized(normalized);

      const hit = await this.lookup(key);
      if (hit) {
        suggestionRequestsCounter.labels("cache").inc();
        this.log.debug({ key, origin: hit.origin }, "suggestion cache hit");
        return withContext({ fingerprint: key, suggestions: hit.payload, source: "cache", origin: hit.origin }, fetched);
      }

      const flight = await this.flights.execute(key, {
        run: (signal) => this.generateAndStore(key, normalized, signal),
        fallback: () => ({ suggestions: this.mock.generate(normalized), origin: "fallback" }),
        peek: async () => {
          const entry = await this.lookup(key);
          return entry ? { suggestions: entry.payload, origin: entry.origin } : undefined;
        }
      });
      if (flight.forced) addEvent("suggestions.flight_forced", { key });

      const { suggestions, origin } = flight.value;
      suggestionRequestsCounter.labels(origin).inc();
      return withContext({ fingerprint: key, suggestions, source: origin, origin }, fetched);
    }, { destination: parsed.destination, days: parsed.days });
  }

  /** Points a trip at the fingerprint its suggestions were stored under. */
  async rememberTrip(tripId: string | number, key: string): Promise<boolean> {
    return await this.cache.set(`${TRIP_MAPPING_PREFIX}:${tripId}`, key, this.options.ttlSeconds);
  }

  /** Drops a trip's cached suggestions. True when an entry was removed. */
  async invalidateTrip(tripId: string | number): Promise<boolean> {
    const mappingKey = `${TRIP_MAPPING_PREFIX}:${tripId}`;
    const key = await this.cache.get(mappingKey);
    if (key === undefined) return false;
    const removed = await this.cache.delete(key);
    await this.cache.delete(mappingKey);
    this.log.info({ tripId, key, removed }, "trip suggestions invalidated");
    return removed;
  }

  private async enrich(params: RequestParameters): Promise<{ params: RequestParameters; fetched?: WeatherSnapshot }> {
    if (params.weather) return { params };
    const decision = decide("auxiliaryContext", this.weather.capability().state);
    if (decision.action !== "proceed") return { params };

    const snapshot = await this.weather.getSnapshot(params.destination);
    if (!snapshot) return { params };
    return { params: withWeather(params, snapshot), fetched: snapshot };
  }

  private async lookup(key: string): Promise<CacheEntry | undefined> {
    if (decide("cache", this.cache.capability().state).action !== "proceed") return;
    const raw = await this.cache.get(key);
    if (raw === undefined) return;
    const entry = decodeEntry(raw, key, this.now());
    if (!entry) this.log.debug({ key }, "discarding unreadable or expired cache entry");
    return entry;
  }

  private async store(
    key: string,
    suggestions: SuggestionList,
    origin: SuggestionOrigin,
    ttlSeconds: number,
    signal: AbortSignal
  ) {
    if (signal.aborted) {
      this.log.info({ key, origin }, "discarding result of force-released flight");
      return;
    }
    if (decide("cache", this.cache.capability().state).action !== "proceed") return;
    await this.cache.set(key, encodeEntry(key, suggestions, origin, ttlSeconds, this.now()), ttlSeconds);
  }

  private async generateAndStore(
    key: string,
    normalized: NormalizedParameters,
    signal: AbortSignal
  ): Promise<Generated> {
    const decision = decide("generation", this.generation.capability().state);
    if (decision.action !== "proceed") {
      this.log.info({ key, backend: this.generation.backendName }, "generation unavailable; using mock");
      return await this.fallback(key, normalized, signal);
    }

    try {
      const suggestions = await this.generation.generate(normalized);
      await this.store(key, suggestions, "generated", this.options.ttlSeconds, signal);
      return { suggestions, origin: "generated" };
    } catch (error) {
      this.log.warn(
        { key, backend: this.generation.backendName, err: errorMessage(error) },
        "generation failed; using mock"
      );
      return await this.fallback(key, normalized, signal);
    }
  }

  private async fallback(key: string, normalized: NormalizedParameters, signal: AbortSignal): Promise<Generated> {
    const suggestions = this.mock.generate(normalized);
    if (this.options.cacheFallbacks) {
      await this.store(key, suggestions, "fallback", this.options.fallbackTtlSeconds, signal);
    }
    return { suggestions, origin: "fallback" };
  }
}

function withContext(outcome: SuggestionOutcome, weather: WeatherSnapshot | undefined): SuggestionOutcome {
  return weather ? { ...outcome, weather } : outcome;
}
