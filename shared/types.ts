// Wire types for the HTTP API

export type SuggestionSource = "cache" | "generated" | "fallback";
export type SuggestionOrigin = "generated" | "fallback";

export interface WeatherSnapshotBody {
  temperatureC: number;
  humidity: number;
  condition: string;
  precipitation?: boolean;
}

export interface SuggestionRequestBody {
  destination: string;
  days: number;
  style?: string;
  transport?: string;
  travelers?: string[];
  activities?: string[];
  startDate?: string;
  weather?: WeatherSnapshotBody;
}

export interface SuggestionResponse {
  fingerprint: string;
  suggestions: string[];
  source: SuggestionSource;
  origin: SuggestionOrigin;
  weather?: WeatherSnapshotBody;
}

export interface PackingItemBody {
  id: string;
  name: string;
  category: string;
  quantity: number;
  is_essential: boolean;
  ai_suggested: boolean;
}

export interface TripSuggestionsResponse {
  success: true;
  suggestions: PackingItemBody[];
  count: number;
  source: SuggestionSource;
}

export interface InvalidateResponse {
  tripId: string;
  invalidated: boolean;
}

export type CapabilityStateBody = "available" | "degraded" | "unavailable";

export interface DependencyHealth {
  state: CapabilityStateBody;
  circuit: "CLOSED" | "OPEN" | "HALF_OPEN";
  consecutiveFailures: number;
  backend?: string;
}

export interface HealthResponse {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  dependencies: {
    durableStore: { state: CapabilityStateBody };
    cache: DependencyHealth;
    generation: DependencyHealth;
    auxiliaryContext: DependencyHealth;
  };
}

export interface ErrorResponse {
  error: string;
  message?: string;
  issues?: { path: string; message: string }[];
  retryAfterSeconds?: number;
}
