// src/ai/aliases.ts
import { normalize } from "./lang/normalize";

// ─────────────────────────────────────────────
// Casual phrase → canonical menu name.
// Applied in insertion order; keys can fire one after another on the
// rewritten text ("caesar salad" then "salad"), which over-matches on
// purpose rather than guessing which key the guest meant.
// ─────────────────────────────────────────────
export const SYNONYMS: ReadonlyArray<readonly [string, string]> = [
  ["fries", "French Fries"],
  ["chips", "French Fries"],
  ["lava cake", "Chocolate Lava Cake"],
  ["chicken sandwich", "Grilled Chicken Sandwich"],
  ["caesar salad", "Veg Caesar Salad"],
  ["salad", "Veg Caesar Salad"],
];

/**
 * Substring-replace every synonym key found in `text` with the normalized
 * canonical form. `text` is expected to be normalized already.
 */
export function applySynonyms(text: string): string {
  let out = text;
  for (const [wrong, canonical] of SYNONYMS) {
    if (out.includes(wrong)) {
      out = out.split(wrong).join(normalize(canonical));
    }
  }
  return out;
}

