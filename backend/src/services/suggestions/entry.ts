import { z } from "zod";
import type { SuggestionList, SuggestionOrigin } from "./types";

const ENTRY_VERSION = 1;

const cacheEntrySchema = z.object({
  v: z.literal(ENTRY_VERSION),
  key: z.string(),
  payload: z.array(z.string()),
  origin: z.enum(["generated", "fallback"]),
  createdAt: z.number(),
  ttl: z.number().positive()
});

export type CacheEntry = z.infer<typeof cacheEntrySchema>;

export function encodeEntry(
  key: string,
  payload: SuggestionList,
  origin: SuggestionOrigin,
  ttlSeconds: number,
  now: number
): string {
  const entry: CacheEntry = { v: ENTRY_VERSION, key, payload, origin, createdAt: now, ttl: ttlSeconds };
  return JSON.stringify(entry);
}

/**
 * Decodes a stored entry. Anything unreadable, stored under another key, or
 * past `createdAt + ttl` reads as a miss, whatever the backend's own expiry says.
 */
export function decodeEntry(raw: string, key: string, now: number): CacheEntry | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return;
  }
  const parsed = cacheEntrySchema.safeParse(json);
  if (!parsed.success) return;
  const entry = parsed.data;
  if (entry.key !== key) return;
  if (now > entry.createdAt + entry.ttl * 1000) return;
  return entry;
}
