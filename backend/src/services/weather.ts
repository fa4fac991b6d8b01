import { z } from "zod";
import type { CacheStore } from "./cache/store";
import { CircuitBreaker, type CapabilityStatus } from "./resilience/circuitBreaker";
import { normalizeText, weatherSnapshotSchema, type WeatherSnapshot } from "./suggestions/params";
import { componentLogger, type Logger } from "../config/logger";
import { errorMessage } from "../errors";

const OPENWEATHER_URL = "https://api.openweathermap.org/data/2.5/weather";
const PRECIPITATION = new Set(["Rain", "Drizzle", "Thunderstorm", "Snow"]);

const currentWeatherSchema = z.object({
  main: z.object({ temp: z.number(), humidity: z.number() }),
  weather: z.array(z.object({ main: z.string(), description: z.string() })).min(1)
});

export interface WeatherProvider {
  capability(): CapabilityStatus;
  /** Undefined on any failure; weather is never required. */
  getSnapshot(destination: string): Promise<WeatherSnapshot | undefined>;
}

export interface OpenWeatherOptions {
  apiKey: string;
  units: "metric" | "imperial";
  timeoutMs: number;
  ttlSeconds: number;
  failureThreshold: number;
  cooldownMs: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
  logger?: Logger;
}

export class OpenWeatherProvider implements WeatherProvider {
  private readonly breaker: CircuitBreaker;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor(private readonly cache: CacheStore, private readonly options: OpenWeatherOptions) {
    this.log = options.logger ?? componentLogger("weather");
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.breaker = new CircuitBreaker("auxiliaryContext", {
      failureThreshold: options.failureThreshold,
      cooldownMs: options.cooldownMs,
      timeoutMs: options.timeoutMs,
      now: options.now,
      logger: this.log
    });
  }

  capability(): CapabilityStatus {
    return this.breaker.capability();
  }

  async getSnapshot(destination: string): Promise<WeatherSnapshot | undefined> {
    const cacheKey = `weather:${normalizeText(destination)}:${this.options.units}`;
    const cached = await this.cache.get(cacheKey);
    if (cached !== undefined) {
      const snapshot = parseCached(cached);
      if (snapshot) return snapshot;
    }

    if (this.breaker.isOpen()) return;
    try {
      const snapshot = await this.breaker.execute((signal) => this.fetchCurrent(destination, signal));
      await this.cache.set(cacheKey, JSON.stringify(snapshot), this.options.ttlSeconds);
      return snapshot;
    } catch (error) {
      this.log.warn({ destination, err: errorMessage(error) }, "weather lookup failed");
      return;
    }
  }

  private async fetchCurrent(destination: string, signal: AbortSignal): Promise<WeatherSnapshot> {
    const url = new URL(OPENWEATHER_URL);
    url.searchParams.set("q", destination);
    url.searchParams.set("appid", this.options.apiKey);
    url.searchParams.set("units", this.options.units);
    url.searchParams.set("lang", "en");

    const res = await this.fetchImpl(url, { signal });
    if (!res.ok) {
      throw new Error(`weather API responded ${res.status}`);
    }
    const body = currentWeatherSchema.parse(await res.json());
    const temp = this.options.units === "imperial" ? ((body.main.temp - 32) * 5) / 9 : body.main.temp;
    return {
      temperatureC: Math.round(temp * 10) / 10,
      humidity: body.main.humidity,
      condition: body.weather[0].description,
      precipitation: body.weather.some((w) => PRECIPITATION.has(w.main))
    };
  }
}

/** Stand-in when no API key is configured: permanently unavailable. */
export class DisabledWeatherProvider implements WeatherProvider {
  capability(): CapabilityStatus {
    return { state: "unavailable", circuit: "OPEN", consecutiveFailures: 0, since: 0 };
  }

  async getSnapshot(): Promise<WeatherSnapshot | undefined> {
    return;
  }
}

function parseCached(raw: string): WeatherSnapshot | undefined {
  try {
    const parsed = weatherSnapshotSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return;
  }
}
