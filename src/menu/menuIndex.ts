// src/menu/menuIndex.ts
import fs from "fs";
import path from "path";
import { z } from "zod";
import type { MenuItem } from "../types";

// A file path, or records already in memory (tests, admin uploads)
export type MenuSource = string | unknown[];

const MenuRecordSchema = z.object({
  id: z.union([z.string(), z.number()]).nullable().optional(),
  _id: z.union([z.string(), z.number()]).nullable().optional(),
  name: z.string().trim().min(1),
  tags: z.array(z.string()).nullable().optional(),
  available: z.boolean().nullable().optional(),
  prep_time_min: z.number().int().nonnegative().nullable().optional(),
});

type MenuRecord = z.infer<typeof MenuRecordSchema>;

function identityOf(row: MenuRecord): string {
  // empty or zero ids count as missing
  return String(row.id || row._id || row.name);
}

function toMenuItem(row: MenuRecord): MenuItem {
  return Object.freeze({
    id: identityOf(row),
    name: row.name,
    tags: Object.freeze([...(row.tags || [])]),
    available: row.available ?? true,
    prep_time_min: row.prep_time_min ?? null,
  });
}

function readRecords(source: MenuSource): unknown[] {
  if (Array.isArray(source)) return source;

  if (!fs.existsSync(source)) {
    console.warn("[MENU] no menu file found; starting with empty menu.", { source });
    return [];
  }

  try {
    const data: unknown = JSON.parse(fs.readFileSync(source, "utf-8"));
    if (!Array.isArray(data)) {
      console.warn("[MENU] menu file is not a list; starting with empty menu.", { source });
      return [];
    }
    return data;
  } catch (e: unknown) {
    console.error("[MENU] failed to load menu file:", e instanceof Error ? e.message : e);
    return [];
  }
}

/**
 * Load menu records. Never throws: a missing or malformed source gives an
 * empty list, bad records are skipped, duplicates (by id, else name) keep
 * the first one seen.
 */
export function loadMenu(source: MenuSource): MenuItem[] {
  const records = readRecords(source);
  const seen = new Set<string>();
  const items: MenuItem[] = [];

  records.forEach((raw, idx) => {
    const parsed = MenuRecordSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn("[MENU] skipping invalid record", {
        idx,
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      return;
    }

    const item = toMenuItem(parsed.data);
    if (seen.has(item.id)) return;
    seen.add(item.id);
    items.push(item);
  });

  console.log("[MENU] loaded", { items: items.length, from: Array.isArray(source) ? "memory" : source });
  return items;
}

/**
 * data/menu.json, then data/data.json, under the working directory.
 * MENU_PATH overrides both.
 */
export function resolveMenuPath(explicit: string | null, root: string = process.cwd()): string {
  if (explicit) return path.resolve(root, explicit);

  const primary = path.join(root, "data", "menu.json");
  const fallback = path.join(root, "data", "data.json");
  if (fs.existsSync(primary)) return primary;
  if (fs.existsSync(fallback)) return fallback;
  return primary;
}

/**
 * The loaded, indexed menu. Read-only apart from reload(), which replaces
 * everything at once.
 */
export class Catalog {
  private entries: MenuItem[] = [];
  private byId = new Map<string, MenuItem>();

  constructor(source: MenuSource = []) {
    this.reload(source);
  }

  reload(source: MenuSource): number {
    const items = loadMenu(source);
    this.entries = items;
    this.byId = new Map(items.map((i) => [i.id, i]));
    return items.length;
  }

  items(): readonly MenuItem[] {
    return this.entries;
  }

  get(id: string): MenuItem | undefined {
    return this.byId.get(id);
  }

  get size(): number {
    return this.entries.length;
  }
}
