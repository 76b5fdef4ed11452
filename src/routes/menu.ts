// src/routes/menu.ts
import express from "express";
import type { Catalog, MenuSource } from "../menu/menuIndex";
import { ensureAdmin } from "./_ensureAdmin";

export function menuRouter(opts: {
  catalog: Catalog;
  source: () => MenuSource;
  jwtSecret: string;
}): express.Router {
  const { catalog, source, jwtSecret } = opts;
  const menu = express.Router();

  menu.get("/api/menu", (_req, res) => {
    res.json({ ok: true, items: catalog.items() });
  });

  // Full replace from the configured source
  menu.post("/api/admin/menu/reload", ensureAdmin(jwtSecret), (_req, res) => {
    try {
      const count = catalog.reload(source());
      console.log("[menu] reloaded", { count, by: res.locals.admin_id ?? null });
      return res.json({ ok: true, count });
    } catch (e: unknown) {
      console.error("[menu] reload", e instanceof Error ? e.message : e);
      return res.status(500).json({ ok: false, error: "server_error" });
    }
  });

  return menu;
}
