// src/ai/ingest/textMatchEngine.ts

import type { MenuItem, OrderItem } from "../../types";
import { applySynonyms } from "../aliases";
import { normalize, tokens } from "../lang/normalize";

export type MatchRule = "name" | "token" | "tag";

// ─────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────

function snapshot(item: MenuItem): OrderItem {
  return {
    name: item.name,
    quantity: 1,
    tags: [...item.tags],
    available: item.available,
    prep_time_min: item.prep_time_min,
    menu_id: item.id,
  };
}

/**
 * First rule that fires for one menu item against prepared text:
 *  (a) whole normalized name is a substring
 *  (b) some text token equals some name token
 *  (c) some tag is a substring
 */
export function matchRule(
  item: MenuItem,
  text: string,
  textTokens: string[]
): MatchRule | null {
  const name = normalize(item.name);

  if (name && text.includes(name)) return "name";

  const nameTokens = new Set(tokens(name));
  if (textTokens.some((t) => nameTokens.has(t))) return "token";

  if (item.tags.some((tag) => !!tag && text.includes(tag))) return "tag";

  return null;
}

// ─────────────────────────────────────────────
// MAIN MATCH FUNCTION
// ─────────────────────────────────────────────

/**
 * Free text → order items (quantity 1), in catalog order, one per menu item.
 * No ranking: every item with a hit is returned.
 */
export function matchItems(raw: string, catalog: readonly MenuItem[]): OrderItem[] {
  if (!catalog.length) return [];

  const text = applySynonyms(normalize(raw));
  const textTokens = tokens(text);
  if (!textTokens.length) return [];

  const seen = new Set<string>();
  const found: OrderItem[] = [];

  for (const item of catalog) {
    if (!matchRule(item, text, textTokens)) continue;

    const key = item.id || item.name;
    if (seen.has(key)) continue;
    seen.add(key);
    found.push(snapshot(item));
  }

  return found;
}
