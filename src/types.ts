// src/types.ts
import { z } from "zod";

// ─────────────────────────────────────────────
// Menu / order items
// ─────────────────────────────────────────────

export type MenuItem = {
  readonly id: string;
  readonly name: string;
  readonly tags: readonly string[];
  readonly available: boolean;
  readonly prep_time_min: number | null;
};

// Snapshot of a menu item at match time. Never a live reference:
// a catalog reload must not change what a guest already asked for.
export type OrderItem = {
  name: string;
  quantity: number; // >= 1
  tags: string[];
  available: boolean;
  prep_time_min: number | null;
  menu_id: string;
};

export type DietaryTag = "vegetarian" | "no_onion" | "no_dairy" | "no_nuts";

// ─────────────────────────────────────────────
// Chat contract (transport <-> agent)
// ─────────────────────────────────────────────

export const ChatRequestSchema = z.object({
  session_id: z.string().nullable().optional(),
  guest_id: z.string().nullable().optional(),
  message: z.string(),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export type ReplyIntent =
  | "greeting"
  | "set_preference"
  | "cancel"
  | "confirm"
  | "confirm_request"
  | "clarify"
  | "freeform"
  | "error";

export type SuggestedAction =
  | "provide_item_name"
  | "replace_item"
  | "remove_item"
  | "offer_alternatives"
  | "confirm"
  | "modify"
  | "cancel";

export type ChatResponse = {
  session_id: string;
  reply: string;
  intent?: ReplyIntent;
  suggested_actions?: SuggestedAction[];
  context?: Record<string, unknown>;
};
