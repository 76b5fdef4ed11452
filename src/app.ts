// src/app.ts
import express from "express";
import cors from "cors";
import bodyParser from "body-parser";
import type { RoomServiceAgent } from "./ai/ingest";
import type { Catalog, MenuSource } from "./menu/menuIndex";
import { chatRouter } from "./routes/chat";
import { menuRouter } from "./routes/menu";

export type AppDeps = {
  agent: RoomServiceAgent;
  catalog: Catalog;
  menuSource: () => MenuSource;
  jwtSecret: string;
  corsOrigin?: string[];
  title?: string;
  version?: string;
};

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const title = deps.title ?? "Room Service Agent";
  const version = deps.version ?? "0.1.0";
  const origins = deps.corsOrigin ?? ["*"];

  // ─────────────────────────────
  // Global CORS
  // ─────────────────────────────
  app.use(
    cors({
      // cors only treats "*" as a wildcard when it is a plain string
      origin: origins.includes("*") ? "*" : origins,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
      credentials: false,
    })
  );

  app.use(bodyParser.json());

  // ─────────────────────────────
  // Status / health
  // ─────────────────────────────
  app.get("/", (_req, res) => res.json({ status: "ok", app: title, version }));
  app.get("/health", (_req, res) => res.json({ ok: true }));

  // ─────────────────────────────
  // Main API routes
  // ─────────────────────────────
  app.use(chatRouter(deps.agent));
  app.use(
    menuRouter({ catalog: deps.catalog, source: deps.menuSource, jwtSecret: deps.jwtSecret })
  );

  // Malformed JSON bodies land here
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    console.warn("[SERVER] request error", { status, error: err instanceof Error ? err.message : err });
    res.status(status).json({ ok: false, error: status === 400 ? "invalid_json" : "server_error" });
  });

  return app;
}
