import { Catalog } from '../src/menu/menuIndex';
import { InMemorySessionStore } from '../src/ai/ingest/stateManager';
import { RoomServiceAgent } from '../src/ai/ingest';
import type { ReplyRenderer } from '../src/ai/renderer';

export const MENU = [
  { id: '1', name: 'French Fries', tags: [], available: true, prep_time_min: 10 },
  { id: '2', name: 'Grilled Chicken Sandwich', tags: ['chicken', 'non-veg'], available: true, prep_time_min: 20 },
  { id: '3', name: 'Veg Caesar Salad', tags: ['veg'], available: true, prep_time_min: 8 },
  { id: '4', name: 'Chocolate Lava Cake', tags: ['dessert'], available: false, prep_time_min: null },
];

export function makeAgent(opts: {
  menu?: unknown[];
  renderer?: ReplyRenderer | null;
  now?: () => number;
} = {}) {
  const catalog = new Catalog(opts.menu ?? MENU);
  const sessions = new InMemorySessionStore();
  const agent = new RoomServiceAgent({
    catalog,
    sessions,
    renderer: opts.renderer ?? null,
    now: opts.now,
  });
  return { agent, catalog, sessions };
}
