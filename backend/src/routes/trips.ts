// Trip suggestion routes: generate into a stored trip, invalidate its cache
import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { InvalidateResponse, TripSuggestionsResponse } from "../../../shared/types";
import type { SuggestionService } from "../services/suggestions/orchestrator";
import type { TripRecord, TripRepository } from "../db/trips";
import { categorizeItem, parseSuggestion } from "../services/generation/parse";

const tripParamsSchema = z.object({ id: z.string().uuid() });

export interface TripRouteDeps {
  suggestions: SuggestionService;
  trips: TripRepository;
}

function toRequest(trip: TripRecord) {
  return {
    destination: trip.destination,
    days: trip.duration,
    style: trip.style,
    transport: trip.transport,
    travelers: trip.travelers,
    activities: trip.activities,
    ...(trip.startDate ? { startDate: trip.startDate } : {}),
    ...(trip.weather ? { weather: trip.weather } : {})
  };
}

export async function tripRoutes(app: FastifyInstance, deps: TripRouteDeps) {
  /**
   * Generate suggestions for a stored trip and add them as packing items.
   * POST /api/trips/:id/suggestions
   */
  app.post("/api/trips/:id/suggestions", async (req, reply) => {
    const params = tripParamsSchema.safeParse(req.params);
    if (!params.success) {
      reply.code(404).send({ error: "not_found", message: "Trip not found" });
      return;
    }
    const tripId = params.data.id;

    const trip = await deps.trips.getTrip(tripId);
    if (!trip) {
      reply.code(404).send({ error: "not_found", message: "Trip not found" });
      return;
    }

    const outcome = await deps.suggestions.resolveSuggestions(toRequest(trip));
    if (outcome.weather) {
      await deps.trips.saveWeather(tripId, outcome.weather);
    }

    const items = outcome.suggestions.map((line) => {
      const { quantity, name } = parseSuggestion(line);
      return { name, quantity, category: categorizeItem(name) };
    });
    const created = await deps.trips.addSuggestedItems(tripId, items);
    await deps.suggestions.rememberTrip(tripId, outcome.fingerprint);

    req.log.info({ tripId, count: created.length, source: outcome.source }, "trip suggestions added");
    const body: TripSuggestionsResponse = {
      success: true,
      suggestions: created.map((item) => ({
        id: item.id,
        name: item.name,
        category: item.category,
        quantity: item.quantity,
        is_essential: item.isEssential,
        ai_suggested: item.aiSuggested
      })),
      count: created.length,
      source: outcome.source
    };
    reply.send(body);
  });

  /**
   * Drop the cached suggestions behind a trip.
   * DELETE /api/trips/:id/suggestions/cache
   */
  app.delete("/api/trips/:id/suggestions/cache", async (req, reply) => {
    const params = tripParamsSchema.safeParse(req.params);
    if (!params.success) {
      reply.code(404).send({ error: "not_found", message: "Trip not found" });
      return;
    }
    const body: InvalidateResponse = {
      tripId: params.data.id,
      invalidated: await deps.suggestions.invalidateTrip(params.data.id)
    };
    reply.send(body);
  });
}
