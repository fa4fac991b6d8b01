import type OpenAI from "openai";
import type { GenerationBackend } from "./types";
import type { NormalizedParameters } from "../suggestions/params";
import type { SuggestionList } from "../suggestions/types";
import { extractSuggestionLines } from "./parse";
import { GenerationFailureError } from "../../errors";

export interface OpenAIGeneratorOptions {
  apiKey: string;
  model: string;
}

export function buildPrompt(params: NormalizedParameters): string {
  const people = Math.max(1, params.travelers.length);
  let prompt = `Generate a comprehensive packing list for the following trip:

Destination: ${params.destination}
Duration: ${params.days} days
Number of travelers: ${people}
Travel style: ${params.style}
Transportation: ${params.transport.replace("_", " ")}
`;

  if (params.startDate) prompt += `Departure: ${params.startDate}\n`;
  if (params.activities.length > 0) prompt += `Activities: ${params.activities.join(", ")}\n`;
  if (params.weather) {
    const w = params.weather;
    prompt += `Weather: ${w.condition}, around ${w.temperatureC}°C, humidity ${w.humidity}%`;
    prompt += w.precipitation ? ", expect precipitation\n" : "\n";
  }

  prompt += `
IMPORTANT: For each item, suggest smart quantities based on:
- Trip duration (${params.days} days)
- Number of travelers (${people} person(s))
- Item shareability (e.g., toothpaste can be shared, but toothbrushes cannot)

Format each line EXACTLY as: "QUANTITY x ITEM_NAME"
Examples:
- "${params.days} x Pairs of socks" (one per day)
- "${people} x Toothbrush" (one per person)
- "1 x Toothpaste" (shared among all travelers)

Provide the complete packing list with smart quantities, one item per line.
`;
  return prompt;
}

/** Real generator on the OpenAI Responses API. Slow and fallible by nature. */
export class OpenAIGenerator implements GenerationBackend {
  readonly name = "openai";
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAIGeneratorOptions) {}

  async generate(params: NormalizedParameters, timeoutMs: number, signal?: AbortSignal): Promise<SuggestionList> {
    const client = await this.getClient();
    const response = await client.responses.create(
      {
        model: this.options.model,
        input: buildPrompt(params),
        store: false,
        metadata: { app: "trip-packer", purpose: "packing_suggestions" }
      },
      { timeout: timeoutMs, signal, maxRetries: 0 }
    );

    const text = response.output_text?.trim() ?? "";
    const suggestions = extractSuggestionLines(text);
    if (suggestions.length === 0) {
      throw new GenerationFailureError("Generation returned no usable suggestion lines");
    }
    return suggestions;
  }

  private async getClient(): Promise<OpenAI> {
    if (!this.client) {
      const { OpenAI } = await import("openai");
      this.client = new OpenAI({ apiKey: this.options.apiKey });
    }
    return this.client;
  }
}
