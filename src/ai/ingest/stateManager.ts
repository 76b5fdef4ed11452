// src/ai/ingest/stateManager.ts

import type { SessionContext } from "./types";

/**
 * Where session contexts live. The agent only talks to this interface, so
 * a shared store (redis, a table) can replace the in-memory one without
 * touching call sites.
 */
export interface SessionRepository {
  get(sessionId: string): Promise<SessionContext | null>;
  put(sessionId: string, ctx: SessionContext): Promise<void>;
  delete(sessionId: string): Promise<boolean>;
  readonly size: number;
}

export type InMemorySessionStoreOptions = {
  ttlMs?: number; // idle lifetime; 0 = never expire
  maxEntries?: number; // LRU cap; 0 = unbounded
  sweepIntervalMs?: number; // 0 = no background sweep
  now?: () => number;
};

type Entry = { ctx: SessionContext; expiresAt: number };

export function emptySession(sessionId: string, guestId: string | null = null): SessionContext {
  const now = new Date().toISOString();
  return {
    session_id: sessionId,
    guest_id: guestId,
    preferences: {},
    pending: null,
    history: [],
    created_at: now,
    updated_at: now,
  };
}

/**
 * Map-backed store. Map insertion order doubles as recency order:
 * every get/put moves the key to the end, eviction takes from the front.
 */
export class InMemorySessionStore implements SessionRepository {
  private store = new Map<string, Entry>();
  private sweepTimer: NodeJS.Timeout | undefined;
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(opts: InMemorySessionStoreOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 0;
    this.maxEntries = opts.maxEntries ?? 0;
    this.now = opts.now ?? Date.now;

    const sweepMs = opts.sweepIntervalMs ?? 0;
    if (sweepMs > 0 && this.ttlMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), sweepMs);
      this.sweepTimer.unref();
    }
  }

  private expiry(): number {
    return this.ttlMs > 0 ? this.now() + this.ttlMs : Number.POSITIVE_INFINITY;
  }

  async get(sessionId: string): Promise<SessionContext | null> {
    const entry = this.store.get(sessionId);
    if (!entry) return null;

    if (this.now() > entry.expiresAt) {
      this.store.delete(sessionId);
      console.log("[SESSION] expired", { sessionId });
      return null;
    }

    // touch
    this.store.delete(sessionId);
    this.store.set(sessionId, { ctx: entry.ctx, expiresAt: this.expiry() });
    return entry.ctx;
  }

  async put(sessionId: string, ctx: SessionContext): Promise<void> {
    this.store.delete(sessionId);
    this.store.set(sessionId, { ctx, expiresAt: this.expiry() });

    if (this.maxEntries > 0) {
      while (this.store.size > this.maxEntries) {
        const oldest = this.store.keys().next();
        if (oldest.done) break;
        this.store.delete(oldest.value);
        console.log("[SESSION] evicted (lru)", { sessionId: oldest.value });
      }
    }
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.store.delete(sessionId);
  }

  get size(): number {
    return this.store.size;
  }

  /** Drop expired entries; returns how many went. */
  sweep(): number {
    const now = this.now();
    let cleaned = 0;
    for (const [key, entry] of this.store.entries()) {
      if (now > entry.expiresAt) {
        this.store.delete(key);
        cleaned++;
      }
    }
    if (cleaned > 0) {
      console.log("[SESSION] sweep", { cleaned, remaining: this.store.size });
    }
    return cleaned;
  }

  shutdown(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }
}
