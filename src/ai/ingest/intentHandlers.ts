// src/ai/ingest/intentHandlers.ts

import type { ChatResponse, DietaryTag, OrderItem } from "../../types";
import type { PendingOrder, SessionContext } from "./types";

// Reply minus the session id (the orchestrator owns that)
export type TurnReply = Omit<ChatResponse, "session_id">;

// Next state is a fresh object whenever anything changed; the orchestrator
// persists it only if the whole turn succeeds.
export type TurnResult = {
  reply: TurnReply;
  state: SessionContext;
};

// Tags a vegetarian guest must not be served
export const NON_VEG_TAGS: ReadonlySet<string> = new Set([
  "non-veg",
  "chicken",
  "beef",
  "pork",
  "fish",
  "egg",
]);

export const REPLIES = {
  greeting: "Hello! How can I help with room service today?",
  cancelled: "Cancelled your pending request.",
  placed: "Order placed. Thank you!",
  nothingToConfirm: "Nothing to confirm.",
  itemNotFound: "I couldn't find that item. Can you name it differently?",
  clarify: "I didn't understand. Can you specify the dish name (e.g., 'Grilled Chicken Sandwich')?",
  error: "Sorry, I couldn't process that.",
} as const;

function touch(ctx: SessionContext, patch: Partial<SessionContext>): SessionContext {
  return { ...ctx, ...patch, updated_at: new Date().toISOString() };
}

function names(items: OrderItem[]): string {
  return items.map((i) => i.name).join(", ");
}

export function pendingView(p: PendingOrder): { items: OrderItem[]; eta_min?: number } {
  return p.kind === "awaiting_confirmation" ? { items: p.items, eta_min: p.eta_min } : { items: p.items };
}

// Per dish line, not per unit: "2 x fries" at 10 min is still 10.
export function estimateEta(items: OrderItem[]): number {
  return items.reduce((sum, i) => sum + (i.prep_time_min ?? 0), 0);
}

export function findConflicts(items: OrderItem[], ctx: SessionContext): OrderItem[] {
  if (!ctx.preferences.vegetarian) return [];
  return items.filter((i) => i.tags.some((t) => NON_VEG_TAGS.has(t)));
}

export function findUnavailable(items: OrderItem[]): OrderItem[] {
  return items.filter((i) => !i.available);
}

// ─────────────────────────────────────────────
// Handlers
// ─────────────────────────────────────────────

export function handleGreeting(ctx: SessionContext): TurnResult {
  return { reply: { reply: REPLIES.greeting, intent: "greeting" }, state: ctx };
}

export function handleSetPreference(ctx: SessionContext, dietary: DietaryTag[]): TurnResult {
  const preferences = { ...ctx.preferences };
  for (const d of dietary) preferences[d] = true;

  const state = touch(ctx, { preferences });
  return {
    reply: {
      reply: `Saved preferences: ${dietary.join(", ")}`,
      intent: "set_preference",
      context: { preferences },
    },
    state,
  };
}

export function handleCancel(ctx: SessionContext): TurnResult {
  const state = ctx.pending ? touch(ctx, { pending: null }) : ctx;
  return { reply: { reply: REPLIES.cancelled, intent: "cancel" }, state };
}

export function handleConfirm(ctx: SessionContext): TurnResult {
  const pending = ctx.pending;
  if (!pending) {
    return { reply: { reply: REPLIES.nothingToConfirm, intent: "confirm" }, state: ctx };
  }

  // terminal: no rollback once placed
  const history = [
    ...ctx.history,
    {
      items: pending.items,
      eta_min: pending.kind === "awaiting_confirmation" ? pending.eta_min : null,
      placed_at: new Date().toISOString(),
    },
  ];
  const state = touch(ctx, { pending: null, history });

  return {
    reply: { reply: REPLIES.placed, intent: "confirm", context: { history } },
    state,
  };
}

export function handleOrder(ctx: SessionContext, items: OrderItem[]): TurnResult {
  if (!items.length) {
    return {
      reply: { reply: REPLIES.itemNotFound, intent: "clarify", suggested_actions: ["provide_item_name"] },
      state: ctx,
    };
  }

  const conflicts = findConflicts(items, ctx);
  const unavailable = findUnavailable(items);

  if (conflicts.length) {
    return {
      reply: {
        reply: `These items conflict with your dietary preferences: ${names(conflicts)}. Replace or remove?`,
        intent: "confirm",
        suggested_actions: ["replace_item", "remove_item"],
        context: { conflicts },
      },
      state: touch(ctx, { pending: { kind: "awaiting_conflict_resolution", items, conflicts } }),
    };
  }

  if (unavailable.length) {
    return {
      reply: {
        reply: `Sorry, these are currently unavailable: ${names(unavailable)}. Would you like alternatives?`,
        intent: "clarify",
        suggested_actions: ["offer_alternatives"],
        context: { unavailable },
      },
      state: touch(ctx, { pending: { kind: "awaiting_alternatives", items, unavailable } }),
    };
  }

  const eta = estimateEta(items);
  const pending: PendingOrder = { kind: "awaiting_confirmation", items, eta_min: eta };
  const lines = items.map((i) => `${i.quantity} x ${i.name}`).join(", ");

  return {
    reply: {
      reply: `Confirming: ${lines}. ETA ~${eta} minutes. Shall I place the order?`,
      intent: "confirm_request",
      suggested_actions: ["confirm", "modify", "cancel"],
      context: { pending: pendingView(pending) },
    },
    state: touch(ctx, { pending }),
  };
}

export function handleClarify(ctx: SessionContext): TurnResult {
  return {
    reply: { reply: REPLIES.clarify, intent: "clarify", suggested_actions: ["provide_item_name"] },
    state: ctx,
  };
}
