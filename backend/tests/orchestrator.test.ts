import { describe, it, expect, vi } from "vitest";
import { SuggestionService } from "../src/services/suggestions/orchestrator";
import { CacheStore } from "../src/services/cache/store";
import { MemoryCacheBackend } from "../src/services/cache/memory";
import type { CacheBackend } from "../src/services/cache/backend";
import { GenerationAdapter } from "../src/services/generation/adapter";
import { MockGenerator } from "../src/services/generation/mock";
import type { GenerationBackend } from "../src/services/generation/types";
import { DisabledWeatherProvider, type WeatherProvider } from "../src/services/weather";
import { fingerprint } from "../src/services/suggestions/fingerprint";
import {
  normalizeParameters,
  parseRequestParameters,
  withWeather,
  type NormalizedParameters
} from "../src/services/suggestions/params";
import type { SuggestionList } from "../src/services/suggestions/types";
import { ValidationError } from "../src/errors";

const PARIS = {
  destination: "Paris",
  days: 5,
  style: "leisure",
  transport: "flight",
  travelers: ["Alice"],
  activities: ["museums"]
};

const GENERATED = ["1 x Passport", "5 x T-shirts", "1 x Umbrella"];

class FakeBackend implements GenerationBackend {
  readonly name = "fake";
  calls = 0;
  seen: NormalizedParameters[] = [];

  constructor(private readonly impl: () => Promise<SuggestionList> = async () => [...GENERATED]) {}

  async generate(params: NormalizedParameters): Promise<SuggestionList> {
    this.calls += 1;
    this.seen.push(params);
    return await this.impl();
  }
}

/** Answers pings with false and errors on every data call. */
class DegradedCacheBackend implements CacheBackend {
  readonly name = "degraded";
  get = vi.fn(async (_key: string): Promise<string | null> => {
    throw new Error("connection reset");
  });
  set = vi.fn(async (_key: string, _value: string, _ttlSeconds: number): Promise<void> => {
    throw new Error("connection reset");
  });
  setIfAbsent = vi.fn(async (_key: string, _value: string, _ttlMs: number): Promise<boolean> => {
    throw new Error("connection reset");
  });
  deleteIfEquals = vi.fn(async (_key: string, _value: string) => false);
  del = vi.fn(async (_key: string) => false);
  incrementWindow = vi.fn(async (_key: string, _windowMs: number) => 1);
  ping = vi.fn(async () => false);
}

interface SetupOptions {
  backend?: GenerationBackend | null;
  cacheBackend?: CacheBackend | null;
  weather?: WeatherProvider;
  cacheFallbacks?: boolean;
  generationTimeoutMs?: number;
  flightTimeoutMs?: number;
  now?: () => number;
}

function setup(options: SetupOptions = {}) {
  const now = options.now;
  const cacheBackend = options.cacheBackend !== undefined ? options.cacheBackend : new MemoryCacheBackend({ now });
  const cache = new CacheStore(cacheBackend, { failureThreshold: 3, cooldownMs: 60_000, timeoutMs: 100, now });
  const backend = options.backend !== undefined ? options.backend : new FakeBackend();
  const generation = new GenerationAdapter(backend, {
    failureThreshold: 3,
    cooldownMs: 60_000,
    timeoutMs: options.generationTimeoutMs ?? 200,
    concurrency: 4,
    now
  });
  const service = new SuggestionService(
    { cache, generation, mock: new MockGenerator(), weather: options.weather ?? new DisabledWeatherProvider() },
    {
      ttlSeconds: 86_400,
      cacheFallbacks: options.cacheFallbacks ?? false,
      fallbackTtlSeconds: 300,
      flightTimeoutMs: options.flightTimeoutMs ?? 1000,
      pollIntervalMs: 5,
      now
    }
  );
  return { service, cache };
}

function mockListFor(input: unknown) {
  return new MockGenerator().generate(normalizeParameters(parseRequestParameters(input)));
}

const hang = () => new Promise<SuggestionList>(() => undefined);

describe("SuggestionService", () => {
  it("should generate once and serve the second call from the cache", async () => {
    const backend = new FakeBackend();
    const { service } = setup({ backend });

    const first = await service.resolveSuggestions(PARIS);
    const second = await service.resolveSuggestions({ ...PARIS, destination: " paris " });

    expect(backend.calls).toBe(1);
    expect(first).toMatchObject({ source: "generated", origin: "generated", suggestions: GENERATED });
    expect(second).toMatchObject({ source: "cache", origin: "generated", suggestions: GENERATED });
    expect(second.fingerprint).toBe(first.fingerprint);
  });

  it("should call the backend once for many concurrent callers", async () => {
    const backend = new FakeBackend(async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      return [...GENERATED];
    });
    const { service } = setup({ backend });

    const lists = await Promise.all(Array.from({ length: 10 }, () => service.getSuggestions(PARIS)));

    expect(backend.calls).toBe(1);
    for (const list of lists) expect(list).toEqual(GENERATED);
  });

  it("should keep serving through a degraded cache without raising", async () => {
    const backend = new FakeBackend();
    const cacheBackend = new DegradedCacheBackend();
    const { service, cache } = setup({ backend, cacheBackend });

    expect(await cache.health()).toBe(false);
    await expect(service.getSuggestions(PARIS)).resolves.toEqual(GENERATED);
    await expect(service.getSuggestions(PARIS)).resolves.toEqual(GENERATED);

    expect(backend.calls).toBe(2);
    expect(cache.capability().state).toBe("unavailable");
    expect(cacheBackend.set).not.toHaveBeenCalled();
  });

  it("should run without any cache backend", async () => {
    const backend = new FakeBackend();
    const { service } = setup({ backend, cacheBackend: null });

    await expect(service.getSuggestions(PARIS)).resolves.toEqual(GENERATED);
    await expect(service.getSuggestions(PARIS)).resolves.toEqual(GENERATED);
    expect(backend.calls).toBe(2);
  });

  it("should return the mock list when generation times out, without caching it", async () => {
    const { service, cache } = setup({ backend: new FakeBackend(hang), generationTimeoutMs: 30 });

    const outcome = await service.resolveSuggestions(PARIS);

    expect(outcome.source).toBe("fallback");
    expect(outcome.origin).toBe("fallback");
    expect(outcome.suggestions).toEqual(mockListFor(PARIS));
    expect(await cache.get(outcome.fingerprint)).toBeUndefined();
  });

  it("should return the mock list when the backend fails or returns nothing usable", async () => {
    const failing = setup({
      backend: new FakeBackend(async () => {
        throw new Error("upstream 502");
      })
    });
    expect(await failing.service.getSuggestions(PARIS)).toEqual(mockListFor(PARIS));

    const empty = setup({ backend: new FakeBackend(async () => ["", "  "]) });
    expect(await empty.service.getSuggestions(PARIS)).toEqual(mockListFor(PARIS));
  });

  it("should use the mock when no generation backend is configured", async () => {
    const { service } = setup({ backend: null });
    const outcome = await service.resolveSuggestions(PARIS);
    expect(outcome).toMatchObject({ source: "fallback", origin: "fallback", suggestions: mockListFor(PARIS) });
  });

  it("should cache fallbacks tagged as such when enabled", async () => {
    const { service } = setup({ backend: null, cacheFallbacks: true });

    await service.resolveSuggestions(PARIS);
    const again = await service.resolveSuggestions(PARIS);

    expect(again).toMatchObject({ source: "cache", origin: "fallback", suggestions: mockListFor(PARIS) });
  });

  it("should hand out the mock list when the flight deadline passes first", async () => {
    const { service } = setup({ backend: new FakeBackend(hang), generationTimeoutMs: 1000, flightTimeoutMs: 30 });

    const results = await Promise.all([service.resolveSuggestions(PARIS), service.resolveSuggestions(PARIS)]);

    for (const outcome of results) {
      expect(outcome.source).toBe("fallback");
      expect(outcome.suggestions).toEqual(mockListFor(PARIS));
    }
  });

  it("should discard a generation that finishes after the flight deadline", async () => {
    const backend = new FakeBackend(async () => {
      await new Promise((resolve) => setTimeout(resolve, 60));
      return ["9 x Late"];
    });
    const { service, cache } = setup({ backend, generationTimeoutMs: 1000, flightTimeoutMs: 20 });

    const first = await service.resolveSuggestions(PARIS);
    await new Promise((resolve) => setTimeout(resolve, 100));

    expect(first.source).toBe("fallback");
    expect(backend.calls).toBe(1);
    expect(await cache.get(first.fingerprint)).toBeUndefined();
  });

  it("should reject invalid input before touching any dependency", async () => {
    const backend = new FakeBackend();
    const cacheBackend = new MemoryCacheBackend();
    const get = vi.spyOn(cacheBackend, "get");
    const { service } = setup({ backend, cacheBackend });

    await expect(service.resolveSuggestions({ destination: "", days: -1 })).rejects.toBeInstanceOf(ValidationError);
    expect(get).not.toHaveBeenCalled();
    expect(backend.calls).toBe(0);
  });

  it("should store the Paris list for a day and answer from the cache a second later", async () => {
    let clock = 1_760_000_000_000;
    const backend = new FakeBackend();
    const { service, cache } = setup({ backend, now: () => clock });

    const first = await service.resolveSuggestions(PARIS);
    expect(first.fingerprint).toBe(fingerprint(parseRequestParameters(PARIS)));
    expect(first.fingerprint).toMatch(/^ai_suggestions:[0-9a-f]{32}$/);

    const raw = await cache.get(first.fingerprint);
    expect(raw).toBeDefined();
    expect(JSON.parse(raw ?? "null")).toEqual({
      v: 1,
      key: first.fingerprint,
      payload: GENERATED,
      origin: "generated",
      createdAt: 1_760_000_000_000,
      ttl: 86_400
    });

    clock += 1000;
    const second = await service.resolveSuggestions(PARIS);
    expect(second.source).toBe("cache");
    expect(second.suggestions).toEqual(GENERATED);
    expect(backend.calls).toBe(1);

    clock = 1_760_000_000_000 + 86_400_000 + 1;
    const expired = await service.resolveSuggestions(PARIS);
    expect(expired.source).toBe("generated");
    expect(backend.calls).toBe(2);
  });

  it("should enrich with weather when none is supplied", async () => {
    const snapshot = { temperatureC: 18.4, humidity: 71, condition: "Light Rain", precipitation: true };
    const getSnapshot = vi.fn(async (_destination: string) => snapshot);
    const weather: WeatherProvider = {
      capability: () => ({ state: "available", circuit: "CLOSED", consecutiveFailures: 0, since: 0 }),
      getSnapshot
    };
    const backend = new FakeBackend();
    const { service } = setup({ backend, weather });

    const outcome = await service.resolveSuggestions(PARIS);

    expect(getSnapshot).toHaveBeenCalledWith("Paris");
    expect(outcome.weather).toEqual(snapshot);
    expect(outcome.fingerprint).toBe(fingerprint(withWeather(parseRequestParameters(PARIS), snapshot)));
    expect(backend.seen[0].weather).toEqual({
      temperatureC: 18,
      humidity: 70,
      condition: "light rain",
      precipitation: true
    });

    const supplied = await service.resolveSuggestions({
      ...PARIS,
      weather: { temperatureC: 5, humidity: 40, condition: "clear" }
    });
    expect(getSnapshot).toHaveBeenCalledTimes(1);
    expect(supplied.weather).toBeUndefined();
  });

  it("should skip the weather lookup while weather is unavailable", async () => {
    const getSnapshot = vi.fn(async (_destination: string) => undefined);
    const weather: WeatherProvider = {
      capability: () => ({ state: "unavailable", circuit: "OPEN", consecutiveFailures: 3, since: 0 }),
      getSnapshot
    };
    const { service } = setup({ weather });

    const outcome = await service.resolveSuggestions(PARIS);
    expect(getSnapshot).not.toHaveBeenCalled();
    expect(outcome.fingerprint).toBe(fingerprint(parseRequestParameters(PARIS)));
  });

  it("should invalidate a trip's cached suggestions through its mapping", async () => {
    const backend = new FakeBackend();
    const { service } = setup({ backend });

    const outcome = await service.resolveSuggestions(PARIS);
    expect(await service.rememberTrip("trip-1", outcome.fingerprint)).toBe(true);

    expect(await service.invalidateTrip("trip-1")).toBe(true);
    await service.resolveSuggestions(PARIS);
    expect(backend.calls).toBe(2);
    expect(await service.invalidateTrip("trip-1")).toBe(false);
  });
});
