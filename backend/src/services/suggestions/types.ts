import type { WeatherSnapshot } from "./params";

/** Lines of the form "QUANTITY x ITEM", e.g. "5 x T-shirts". */
export type SuggestionList = string[];

/** Whether a list came from the real backend or the deterministic substitute. */
export type SuggestionOrigin = "generated" | "fallback";

/** Where this particular caller got the list from. */
export type SuggestionSource = "cache" | "generated" | "fallback";

export interface SuggestionOutcome {
  fingerprint: string;
  suggestions: SuggestionList;
  source: SuggestionSource;
  origin: SuggestionOrigin;
  /** Set when the orchestrator fetched weather for this request. */
  weather?: WeatherSnapshot;
}
