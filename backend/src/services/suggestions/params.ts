import { z } from "zod";
import { ValidationError } from "../../errors";

export const TRAVEL_STYLES = ["business", "leisure", "adventure", "backpacking", "luxury"] as const;
export const TRANSPORT_METHODS = ["flight", "road_trip", "train", "cruise", "other"] as const;

export type TravelStyle = (typeof TRAVEL_STYLES)[number];
export type TransportMethod = (typeof TRANSPORT_METHODS)[number];

const trimmedText = (max: number) => z.string().trim().min(1).max(max);

// Enum fields accept any casing ("Leisure", " FLIGHT ") and store the canonical value.
const lowerCased = (v: unknown) => (typeof v === "string" ? v.trim().toLowerCase() : v);
const travelStyleSchema = z.preprocess(lowerCased, z.enum(TRAVEL_STYLES));
const transportMethodSchema = z.preprocess(lowerCased, z.enum(TRANSPORT_METHODS));

export const weatherSnapshotSchema = z.object({
  temperatureC: z.coerce.number().finite().min(-90).max(60),
  humidity: z.coerce.number().finite().min(0).max(100),
  condition: trimmedText(80),
  precipitation: z.boolean().optional()
});

export const requestParametersSchema = z.object({
  destination: trimmedText(200),
  days: z.coerce.number().int().min(1).max(365),
  style: travelStyleSchema.default("leisure"),
  transport: transportMethodSchema.default("flight"),
  travelers: z.array(trimmedText(100)).max(50).default([]),
  activities: z.array(trimmedText(100)).max(50).default([]),
  startDate: z
    .string()
    .trim()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
    .optional(),
  weather: weatherSnapshotSchema.optional()
});

export type WeatherSnapshot = z.infer<typeof weatherSnapshotSchema>;

export type RequestParameters = Readonly<
  Omit<z.infer<typeof requestParametersSchema>, "travelers" | "activities" | "weather"> & {
    travelers: readonly string[];
    activities: readonly string[];
    weather?: Readonly<WeatherSnapshot>;
  }
>;

/**
 * Canonical form of RequestParameters. Two requests that mean the same thing
 * normalize to deep-equal values; this is what gets hashed and what the
 * generators see.
 */
export interface NormalizedParameters {
  readonly destination: string;
  readonly days: number;
  readonly style: TravelStyle;
  readonly transport: TransportMethod;
  readonly travelers: readonly string[];
  readonly activities: readonly string[];
  readonly startDate: string | null;
  readonly weather: Readonly<WeatherSnapshot> | null;
}

export function parseRequestParameters(input: unknown): RequestParameters {
  const parsed = requestParametersSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      "Invalid suggestion request",
      parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }))
    );
  }
  const p = parsed.data;
  return Object.freeze({
    ...p,
    travelers: Object.freeze([...p.travelers]),
    activities: Object.freeze([...p.activities]),
    weather: p.weather ? Object.freeze({ ...p.weather }) : undefined
  });
}

export function withWeather(params: RequestParameters, weather: WeatherSnapshot): RequestParameters {
  return Object.freeze({ ...params, weather: Object.freeze({ ...weather }) });
}

export function normalizeText(s: string): string {
  return s.normalize("NFC").trim().replace(/\s+/g, " ").toLowerCase();
}

// Keeps duplicates: travelers are a headcount, two "alex" entries are two people.
function normalizeList(items: readonly string[]): string[] {
  return items.map(normalizeText).filter(Boolean).sort();
}

function normalizeSet(items: readonly string[]): string[] {
  return [...new Set(normalizeList(items))];
}

// -0 would otherwise survive rounding and compare unequal in tests.
function quantize(value: number, step: number): number {
  return Math.round(value / step) * step + 0;
}

export function normalizeWeather(w: Readonly<WeatherSnapshot>): WeatherSnapshot {
  const out: WeatherSnapshot = {
    temperatureC: quantize(w.temperatureC, 1),
    humidity: quantize(w.humidity, 5),
    condition: normalizeText(w.condition)
  };
  if (w.precipitation !== undefined) out.precipitation = w.precipitation;
  return out;
}

export function normalizeParameters(params: RequestParameters): NormalizedParameters {
  return Object.freeze({
    destination: normalizeText(params.destination),
    days: Math.trunc(params.days),
    style: params.style,
    transport: params.transport,
    travelers: Object.freeze(normalizeList(params.travelers)),
    activities: Object.freeze(normalizeSet(params.activities)),
    startDate: params.startDate ?? null,
    weather: params.weather ? Object.freeze(normalizeWeather(params.weather)) : null
  });
}
