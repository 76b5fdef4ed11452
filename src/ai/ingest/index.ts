// src/ai/ingest/index.ts
import type { ChatRequest, ChatResponse } from "../../types";
import type { Catalog } from "../../menu/menuIndex";
import { KeyedQueue } from "../../util/keyedQueue";
import type { ReplyRenderer } from "../renderer";
import { detectIntent } from "./detectIntent";
import {
  REPLIES,
  handleCancel,
  handleClarify,
  handleConfirm,
  handleGreeting,
  handleOrder,
  handleSetPreference,
  type TurnResult,
} from "./intentHandlers";
import { emptySession, type SessionRepository } from "./stateManager";
import type { ParsedIntent, SessionContext } from "./types";

export type AgentDeps = {
  catalog: Catalog;
  sessions: SessionRepository;
  renderer?: ReplyRenderer | null;
  now?: () => number;
};

function errMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Turns one guest message into one reply. Never throws: every failure ends
 * as an "error" reply and the session keeps its pre-turn state.
 */
export class RoomServiceAgent {
  private readonly queue = new KeyedQueue();
  private readonly now: () => number;

  constructor(private readonly deps: AgentDeps) {
    this.now = deps.now ?? Date.now;
    console.log("[AGENT] ready", {
      menuItems: deps.catalog.size,
      renderer: deps.renderer?.name ?? "none",
    });
  }

  get sessions(): SessionRepository {
    return this.deps.sessions;
  }

  resolveSessionId(sessionId: string | null | undefined): string {
    const id = (sessionId || "").trim();
    return id || `guest-${Math.floor(this.now() / 1000)}`;
  }

  async run(req: ChatRequest): Promise<ChatResponse> {
    const sessionId = this.resolveSessionId(req.session_id);
    // one turn at a time per session; other sessions are not blocked
    return this.queue.run(sessionId, () => this.turn(sessionId, req));
  }

  private async turn(sessionId: string, req: ChatRequest): Promise<ChatResponse> {
    try {
      const existing = await this.deps.sessions.get(sessionId);
      const ctx = existing ?? emptySession(sessionId, req.guest_id || null);

      const parsed = detectIntent(req.message, this.deps.catalog.items());
      const result = await this.transition(ctx, parsed, req.message);

      if (!existing || result.state !== ctx) {
        await this.deps.sessions.put(sessionId, result.state);
      }

      // the reply leaves the agent; stored state must not be reachable from it
      const { context, ...reply } = result.reply;
      return context
        ? { session_id: sessionId, ...reply, context: structuredClone(context) }
        : { session_id: sessionId, ...reply };
    } catch (e: unknown) {
      console.error("[AGENT][ERROR]", { sessionId, error: errMessage(e) });
      return { session_id: sessionId, reply: REPLIES.error, intent: "error" };
    }
  }

  private async transition(
    ctx: SessionContext,
    parsed: ParsedIntent,
    message: string
  ): Promise<TurnResult> {
    switch (parsed.intent) {
      case "greeting":
        return handleGreeting(ctx);
      case "set_preference":
        return handleSetPreference(ctx, parsed.dietary);
      case "cancel":
        return handleCancel(ctx);
      case "confirm":
        return handleConfirm(ctx);
      case "order_food":
        return handleOrder(ctx, parsed.items);
      case "clarify":
        return handleClarify(ctx);
      case "unknown":
        return this.handleUnknown(ctx, message);
      default:
        console.warn("[AGENT] unhandled intent", parsed);
        return { reply: { reply: REPLIES.error, intent: "error" }, state: ctx };
    }
  }

  // Static clarification, or the configured renderer when there is one
  private async handleUnknown(ctx: SessionContext, message: string): Promise<TurnResult> {
    const renderer = this.deps.renderer;
    if (!renderer) return handleClarify(ctx);

    try {
      const reply = await renderer.render({
        message,
        menu: this.deps.catalog.items().map((i) => i.name),
        preferences: Object.keys(ctx.preferences),
      });
      return { reply: { reply, intent: "freeform" }, state: ctx };
    } catch (e: unknown) {
      console.warn("[RENDER][ERR]", { renderer: renderer.name, error: errMessage(e) });
      return {
        reply: {
          reply: `Sorry, I couldn't generate a reply right now (${errMessage(e)}).`,
          intent: "error",
        },
        state: ctx,
      };
    }
  }
}
