// src/config/index.ts
import dotenv from "dotenv";

dotenv.config();

export type AiBackend = "none" | "mock" | "openai" | "gemini";

const AI_BACKENDS: AiBackend[] = ["none", "mock", "openai", "gemini"];

function asBackend(raw: string | undefined): AiBackend {
  const v = (raw || "").trim().toLowerCase();
  const hit = AI_BACKENDS.find((b) => b === v);
  if (hit) return hit;
  if (v) console.warn("[CONFIG] unknown AI_BACKEND, using none:", v);
  return "none";
}

function asInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : fallback;
}

export const config = {
  app: {
    title: "Room Service Agent",
    version: "0.1.0",
    port: asInt(process.env.PORT, 8787),
    corsOrigin: (process.env.CORS_ORIGIN || "*").split(",").map((s) => s.trim()),
  },
  menu: {
    // explicit path wins; otherwise data/menu.json then data/data.json
    path: (process.env.MENU_PATH || "").trim() || null,
  },
  ai: {
    backend: asBackend(process.env.AI_BACKEND),
    openaiKey: (process.env.OPENAI_API_KEY || "").trim(),
    openaiModel: process.env.AI_MODEL || "gpt-4o-mini",
    geminiKey: (process.env.GEMINI_API_KEY || "").trim(),
    geminiModel: process.env.GEMINI_MODEL || "gemini-1.5-flash",
  },
  sessions: {
    ttlMs: asInt(process.env.SESSION_TTL_MS, 24 * 60 * 60 * 1000),
    max: asInt(process.env.SESSION_MAX, 10_000),
  },
  admin: {
    jwtSecret: process.env.JWT_SECRET || "",
  },
} as const;

export type AppConfig = typeof config;
