// Suggestion routes
import type { FastifyInstance } from "fastify";
import type { SuggestionResponse } from "../../../shared/types";
import type { SuggestionService } from "../services/suggestions/orchestrator";

export async function suggestionRoutes(app: FastifyInstance, suggestions: SuggestionService) {
  /**
   * Packing suggestions for ad-hoc trip parameters.
   * POST /api/suggestions
   */
  app.post("/api/suggestions", async (req, reply) => {
    const outcome = await suggestions.resolveSuggestions(req.body);
    const body: SuggestionResponse = {
      fingerprint: outcome.fingerprint,
      suggestions: outcome.suggestions,
      source: outcome.source,
      origin: outcome.origin
    };
    if (outcome.weather) body.weather = outcome.weather;
    reply.send(body);
  });
}
