import type { NormalizedParameters } from "../suggestions/params";
import type { SuggestionList } from "../suggestions/types";

export interface GenerationBackend {
  readonly name: string;
  /** May throw or hang; callers bound it with `timeoutMs` and `signal`. */
  generate(params: NormalizedParameters, timeoutMs: number, signal?: AbortSignal): Promise<SuggestionList>;
}

export interface MockBackend {
  readonly name: string;
  /** Total and deterministic; no I/O. */
  generate(params: NormalizedParameters): SuggestionList;
}
