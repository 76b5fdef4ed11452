// src/ai/ingest/detectIntent.ts

import type { DietaryTag, MenuItem } from "../../types";
import { matchItems } from "./textMatchEngine";
import type { ParsedIntent } from "./types";

// -------------------------------------------------------
// Keywords (deterministic)
// -------------------------------------------------------

const GREETING_RE = /\b(hi|hello|hey|good morning|good evening)\b/;
const CANCEL_RE = /\b(cancel|never mind|stop|don't)\b/;
const CONFIRM_WORDS = new Set(["yes", "yep", "confirm", "please", "sure", "ok"]);
const PREFERENCE_TRIGGERS = [
  "vegetarian",
  "vegan",
  "no onion",
  "no dairy",
  "dairy-free",
  "nut allergy",
];
const ORDER_VERB_RE = /\b(order|i want|i'd like|get me|bring me|please get|i need)\b/;

// "2 fries", "2 x fries", "3pcs lava cake" (first number anywhere)
const QTY_RE = /(\d+)\s*(?:x|pcs|pieces)?\s*(.+)/;

// Short utterances ("club sandwich", "fries") count as item requests
const SHORT_UTTERANCE_MAX_TOKENS = 3;

export function extractDietary(t: string): DietaryTag[] {
  const dietary: DietaryTag[] = [];
  if (t.includes("vegetarian") || t.includes("vegan")) dietary.push("vegetarian");
  if (t.includes("no onion")) dietary.push("no_onion");
  if (t.includes("no dairy") || t.includes("dairy-free")) dietary.push("no_dairy");
  if (t.includes("nut")) dietary.push("no_nuts");
  return dietary;
}

// -------------------------------------------------------
// MAIN FUNCTION
// -------------------------------------------------------
export function detectIntent(text: string, catalog: readonly MenuItem[]): ParsedIntent {
  const msg = (text || "").trim().toLowerCase();

  // -------------------------------------------------------
  // 1) Greeting
  // -------------------------------------------------------
  if (GREETING_RE.test(msg)) {
    console.log("[INTENT][HIT] greeting", { msg });
    return { intent: "greeting" };
  }

  // -------------------------------------------------------
  // 2) Cancel
  // -------------------------------------------------------
  if (CANCEL_RE.test(msg)) {
    console.log("[INTENT][HIT] cancel", { msg });
    return { intent: "cancel" };
  }

  // -------------------------------------------------------
  // 3) Confirm (whole message only: "yes", "ok")
  // -------------------------------------------------------
  if (CONFIRM_WORDS.has(msg)) {
    console.log("[INTENT][HIT] confirm", { msg });
    return { intent: "confirm" };
  }

  // -------------------------------------------------------
  // 4) Dietary preferences (several can be set at once)
  // -------------------------------------------------------
  if (PREFERENCE_TRIGGERS.some((k) => msg.includes(k))) {
    const dietary = extractDietary(msg);
    console.log("[INTENT][HIT] set_preference", { msg, dietary });
    return { intent: "set_preference", dietary };
  }

  // -------------------------------------------------------
  // 5) Quantified order
  // -------------------------------------------------------
  const qtyMatch = msg.match(QTY_RE);
  if (qtyMatch) {
    const qty = Number(qtyMatch[1]);
    if (Number.isSafeInteger(qty) && qty >= 1) {
      const items = matchItems(qtyMatch[2], catalog).map((m) => ({ ...m, quantity: qty }));
      if (items.length) {
        console.log("[INTENT][HIT] order_food (qty)", { msg, qty, items: items.length });
        return { intent: "order_food", items };
      }
    }
  }

  // -------------------------------------------------------
  // 6) Order verbs or short utterance
  // -------------------------------------------------------
  const tokenCount = msg.split(/\s+/).filter(Boolean).length;
  if (ORDER_VERB_RE.test(msg) || tokenCount <= SHORT_UTTERANCE_MAX_TOKENS) {
    const items = matchItems(text, catalog);
    if (items.length) {
      console.log("[INTENT][HIT] order_food", { msg, items: items.length });
      return { intent: "order_food", items };
    }
    console.log("[INTENT][HIT] clarify", { msg });
    return { intent: "clarify" };
  }

  // -------------------------------------------------------
  // 7) Fallback
  // -------------------------------------------------------
  return { intent: "unknown" };
}
