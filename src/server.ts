// src/server.ts
import { config } from './config';
import { createApp } from './app';
import { Catalog, resolveMenuPath } from './menu/menuIndex';
import { InMemorySessionStore } from './ai/ingest/stateManager';
import { RoomServiceAgent } from './ai/ingest';
import { buildRenderer } from './ai/renderer';

// ─────────────────────────────
// Boot diagnostics
// ─────────────────────────────
console.log('[BOOT] AI_BACKEND =', config.ai.backend);
console.log('[BOOT] OPENAI_API_KEY present?', !!config.ai.openaiKey);
console.log('[BOOT] GEMINI_API_KEY present?', !!config.ai.geminiKey);
console.log('[BOOT] JWT_SECRET present?', !!config.admin.jwtSecret);
console.log('[BOOT] sessions ttlMs =', config.sessions.ttlMs, 'max =', config.sessions.max);

const menuSource = () => resolveMenuPath(config.menu.path);

const catalog = new Catalog(menuSource());
const sessions = new InMemorySessionStore({
  ttlMs: config.sessions.ttlMs,
  maxEntries: config.sessions.max,
  sweepIntervalMs: 60_000,
});
const agent = new RoomServiceAgent({
  catalog,
  sessions,
  renderer: buildRenderer(config.ai),
});

const app = createApp({
  agent,
  catalog,
  menuSource,
  jwtSecret: config.admin.jwtSecret,
  corsOrigin: config.app.corsOrigin,
  title: config.app.title,
  version: config.app.version,
});

// ─────────────────────────────
// Server start / stop
// ─────────────────────────────
const server = app.listen(config.app.port, () =>
  console.log('✅ Room service agent listening on', config.app.port)
);

function shutdown(signal: string) {
  console.log('[BOOT] shutting down on', signal);
  sessions.shutdown();
  server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
