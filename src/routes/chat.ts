// src/routes/chat.ts
import express from "express";
import { ChatRequestSchema } from "../types";
import type { RoomServiceAgent } from "../ai/ingest";

export function chatRouter(agent: RoomServiceAgent): express.Router {
  const chat = express.Router();

  chat.post("/chat", async (req, res) => {
    const parsed = ChatRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({
        ok: false,
        error: "invalid_request",
        issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
    }

    try {
      const out = await agent.run(parsed.data);
      return res.json(out);
    } catch (e: unknown) {
      // agent.run does not throw; guard anyway so a bug is a 500, not a hang
      console.error("[chat]", e instanceof Error ? e.message : e);
      return res.status(500).json({ ok: false, error: "server_error" });
    }
  });

  // Debug view of a session
  chat.get("/api/sessions/:id", async (req, res) => {
    try {
      const session = await agent.sessions.get(req.params.id);
      if (!session) return res.status(404).json({ ok: false, error: "not_found" });
      return res.json({ ok: true, session });
    } catch (e: unknown) {
      console.error("[sessions]", e instanceof Error ? e.message : e);
      return res.status(500).json({ ok: false, error: "server_error" });
    }
  });

  return chat;
}
