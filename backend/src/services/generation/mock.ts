import type { MockBackend } from "./types";
import type { NormalizedParameters } from "../suggestions/params";
import type { SuggestionList } from "../suggestions/types";

const MAX_SUGGESTIONS = 15;

export class MockGenerator implements MockBackend {
  readonly name = "mock";

  generate(params: NormalizedParameters): SuggestionList {
    const people = Math.max(1, params.travelers.length);
    const days = params.days;

    const items = [
      `${people} x Passport and travel documents`,
      `${people} x Phone charger`,
      `${people} x Comfortable walking shoes`,
      `${days} x T-shirts`,
      `${days} x Pairs of socks`,
      `${days + 2} x Underwear`,
      `${people} x Toothbrush`,
      "1 x Toothpaste",
      `${people} x Deodorant`,
      "1 x Sunscreen",
      `${people} x Reusable water bottle`
    ];

    if (params.style === "business") {
      items.push(`${days} x Business shirts`, `${people} x Laptop and accessories`, "1 x Business cards holder");
    } else if (params.style === "adventure") {
      items.push(`${people} x Hiking boots`, `${people} x Backpack`, "1 x First aid kit");
    }

    if (params.transport === "flight") {
      items.push(`${people} x Luggage tags`, `${people} x Travel pillow`, `${people} x Eye mask`);
    }

    return items.slice(0, MAX_SUGGESTIONS);
  }
}
