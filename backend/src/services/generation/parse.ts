import categories from "../../data/item-categories.json";
import type { SuggestionList } from "../suggestions/types";

export type ItemCategory =
  | "clothing"
  | "toiletries"
  | "electronics"
  | "documents"
  | "medical"
  | "entertainment"
  | "gear"
  | "food"
  | "other";

export interface ParsedSuggestion {
  quantity: number;
  name: string;
}

const SUGGESTION_LINE = /^(\d+)\s*x\s*(.+)$/i;
const BULLET = /^[•\-*]+\s*/;
const LIST_NUMBER = /^\d+[.)]\s+(?=\d+\s*x)/i;

/**
 * Keeps only "QUANTITY x ITEM" lines from free-form model output, stripping
 * bullets and list numbering ("1. 3 x Socks" -> "3 x Socks").
 */
export function extractSuggestionLines(text: string): SuggestionList {
  const out: SuggestionList = [];
  for (const raw of text.split("\n")) {
    const cleaned = raw.trim().replace(BULLET, "").replace(LIST_NUMBER, "").trim();
    if (cleaned && SUGGESTION_LINE.test(cleaned)) out.push(cleaned);
  }
  return out;
}

export function parseSuggestion(line: string): ParsedSuggestion {
  const m = SUGGESTION_LINE.exec(line.trim());
  if (!m) return { quantity: 1, name: line.trim() };
  return { quantity: Math.max(1, Number(m[1])), name: m[2].trim() };
}

const KEYWORDS: ReadonlyArray<[ItemCategory, string[]]> = [
  ["clothing", categories.clothing],
  ["toiletries", categories.toiletries],
  ["electronics", categories.electronics],
  ["documents", categories.documents],
  ["medical", categories.medical],
  ["entertainment", categories.entertainment],
  ["gear", categories.gear],
  ["food", categories.food]
];

/** Keyword categorisation on whole words, first matching category wins. */
export function categorizeItem(name: string): ItemCategory {
  const text = ` ${name.toLowerCase().replace(/[^a-z0-9\s-]/g, " ").replace(/\s+/g, " ")} `;
  for (const [category, words] of KEYWORDS) {
    if (words.some((w) => text.includes(` ${w} `))) return category;
  }
  return "other";
}
