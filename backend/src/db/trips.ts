import { z } from "zod";
import { query, withTx } from "./client";
import { withSpan } from "../config/otel";
import {
  TRANSPORT_METHODS,
  TRAVEL_STYLES,
  weatherSnapshotSchema,
  type TransportMethod,
  type TravelStyle,
  type WeatherSnapshot
} from "../services/suggestions/params";
import { StoreFailureError } from "../errors";
import type { ItemCategory } from "../services/generation/parse";

export interface TripRecord {
  id: string;
  destination: string;
  startDate: string | null;
  duration: number;
  style: TravelStyle;
  transport: TransportMethod;
  travelers: string[];
  activities: string[];
  weather: WeatherSnapshot | null;
}

export interface NewPackingItem {
  name: string;
  category: ItemCategory;
  quantity: number;
}

export interface PackingItemRecord extends NewPackingItem {
  id: string;
  isEssential: boolean;
  aiSuggested: boolean;
  displayOrder: number;
}

/** Durable trip storage. Implementations throw StoreFailureError when unreachable. */
export interface TripRepository {
  getTrip(id: string): Promise<TripRecord | undefined>;
  saveWeather(id: string, weather: WeatherSnapshot): Promise<void>;
  addSuggestedItems(tripId: string, items: NewPackingItem[]): Promise<PackingItemRecord[]>;
}

const tripRowSchema = z.object({
  id: z.string(),
  destination: z.string(),
  start_date: z.string().nullable(),
  duration: z.coerce.number().int(),
  travel_style: z.enum(TRAVEL_STYLES).catch("leisure"),
  transportation: z.enum(TRANSPORT_METHODS).catch("flight"),
  travelers: z.array(z.string()).catch([]),
  activities: z.array(z.string()).catch([]),
  weather_conditions: weatherSnapshotSchema.nullable().catch(null)
});

const itemRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  category: z.string(),
  quantity: z.coerce.number().int(),
  is_essential: z.boolean(),
  ai_suggested: z.boolean(),
  display_order: z.coerce.number().int()
});

function toTrip(row: unknown): TripRecord {
  const parsed = tripRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new StoreFailureError("Unexpected trip row shape", { cause: parsed.error });
  }
  const r = parsed.data;
  return {
    id: r.id,
    destination: r.destination,
    startDate: r.start_date,
    duration: Math.max(1, r.duration),
    style: r.travel_style,
    transport: r.transportation,
    travelers: r.travelers,
    activities: r.activities,
    weather: r.weather_conditions
  };
}

export const pgTripRepository: TripRepository = {
  async getTrip(id) {
    return await withSpan(
      "db.getTrip",
      async () => {
        const { rows } = await query(
          `SELECT id::text, destination, to_char(start_date, 'YYYY-MM-DD') AS start_date, duration,
                  travel_style, transportation, travelers, activities, weather_conditions
             FROM trips WHERE id = $1`,
          [id]
        );
        return rows.length > 0 ? toTrip(rows[0]) : undefined;
      },
      { id }
    );
  },

  async saveWeather(id, weather) {
    await withSpan(
      "db.saveWeather",
      () =>
        query("UPDATE trips SET weather_conditions = $2::jsonb, updated_at = now() WHERE id = $1", [
          id,
          JSON.stringify(weather)
        ]),
      { id }
    );
  },

  async addSuggestedItems(tripId, items) {
    return await withSpan(
      "db.addSuggestedItems",
      () =>
        withTx(async (client) => {
          const { rows: orderRows } = await client.query<{ next: number }>(
            "SELECT COALESCE(MAX(display_order) + 1, 0)::int AS next FROM packing_items WHERE trip_id = $1",
            [tripId]
          );
          let order = orderRows[0]?.next ?? 0;
          const created: PackingItemRecord[] = [];
          for (const item of items) {
            const { rows } = await client.query(
              `INSERT INTO packing_items (trip_id, name, category, quantity, is_essential, ai_suggested, display_order)
               VALUES ($1, $2, $3, $4, false, true, $5)
               RETURNING id::text, name, category, quantity, is_essential, ai_suggested, display_order`,
              [tripId, item.name, item.category, item.quantity, order]
            );
            const row = itemRowSchema.parse(rows[0]);
            created.push({
              id: row.id,
              name: row.name,
              category: item.category,
              quantity: row.quantity,
              isEssential: row.is_essential,
              aiSuggested: row.ai_suggested,
              displayOrder: row.display_order
            });
            order += 1;
          }
          return created;
        }),
      { tripId, count: items.length }
    );
  }
};
