// src/ai/ingest/types.ts

import type { DietaryTag, OrderItem } from "../../types";

export type ParsedIntent =
  | { intent: "greeting" }
  | { intent: "cancel" }
  | { intent: "confirm" }
  | { intent: "set_preference"; dietary: DietaryTag[] }
  | { intent: "order_food"; items: OrderItem[] }
  | { intent: "clarify" }
  | { intent: "unknown" };

// ─────────────────────────────────────────────
// Conversation state
// ─────────────────────────────────────────────

export type PendingOrder =
  | { kind: "awaiting_confirmation"; items: OrderItem[]; eta_min: number }
  | { kind: "awaiting_conflict_resolution"; items: OrderItem[]; conflicts: OrderItem[] }
  | { kind: "awaiting_alternatives"; items: OrderItem[]; unavailable: OrderItem[] };

export type PlacedOrder = {
  items: OrderItem[];
  eta_min: number | null;
  placed_at: string; // ISO
};

export type Preferences = Partial<Record<DietaryTag, true>>;

export interface SessionContext {
  session_id: string;
  guest_id: string | null;
  preferences: Preferences;
  pending: PendingOrder | null;
  history: PlacedOrder[];
  created_at: string;
  updated_at: string;
}
