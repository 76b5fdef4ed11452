import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InMemorySessionStore, emptySession } from '../src/ai/ingest/stateManager';

function clock(start = 0) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

describe('emptySession', () => {
  it('starts with no preferences, no pending order and no history', () => {
    const s = emptySession('s1', 'g1');
    assert.equal(s.session_id, 's1');
    assert.equal(s.guest_id, 'g1');
    assert.deepEqual(s.preferences, {});
    assert.equal(s.pending, null);
    assert.deepEqual(s.history, []);
    assert.equal(s.created_at, s.updated_at);
  });
});

describe('InMemorySessionStore', () => {
  it('stores and returns sessions', async () => {
    const store = new InMemorySessionStore();
    assert.equal(await store.get('a'), null);

    const ctx = emptySession('a');
    await store.put('a', ctx);
    assert.equal(await store.get('a'), ctx);
    assert.equal(store.size, 1);
  });

  it('deletes sessions', async () => {
    const store = new InMemorySessionStore();
    await store.put('a', emptySession('a'));
    assert.equal(await store.delete('a'), true);
    assert.equal(await store.delete('a'), false);
    assert.equal(store.size, 0);
  });

  it('expires idle sessions after the ttl', async () => {
    const c = clock();
    const store = new InMemorySessionStore({ ttlMs: 1000, now: c.now });
    await store.put('a', emptySession('a'));

    c.advance(1000);
    assert.notEqual(await store.get('a'), null);

    c.advance(1001);
    assert.equal(await store.get('a'), null);
    assert.equal(store.size, 0);
  });

  it('refreshes the ttl on every read', async () => {
    const c = clock();
    const store = new InMemorySessionStore({ ttlMs: 1000, now: c.now });
    await store.put('a', emptySession('a'));

    c.advance(800);
    assert.notEqual(await store.get('a'), null);
    c.advance(800);
    assert.notEqual(await store.get('a'), null);
  });

  it('never expires with ttl 0', async () => {
    const c = clock();
    const store = new InMemorySessionStore({ ttlMs: 0, now: c.now });
    await store.put('a', emptySession('a'));
    c.advance(365 * 24 * 60 * 60 * 1000);
    assert.notEqual(await store.get('a'), null);
  });

  it('evicts the least recently used session past the cap', async () => {
    const store = new InMemorySessionStore({ maxEntries: 2 });
    await store.put('a', emptySession('a'));
    await store.put('b', emptySession('b'));
    await store.get('a');
    await store.put('c', emptySession('c'));

    assert.equal(store.size, 2);
    assert.equal(await store.get('b'), null);
    assert.notEqual(await store.get('a'), null);
    assert.notEqual(await store.get('c'), null);
  });

  it('sweeps expired sessions in one pass', async () => {
    const c = clock();
    const store = new InMemorySessionStore({ ttlMs: 100, now: c.now });
    await store.put('a', emptySession('a'));
    await store.put('b', emptySession('b'));
    c.advance(50);
    await store.put('c', emptySession('c'));

    c.advance(60);
    assert.equal(store.sweep(), 2);
    assert.equal(store.size, 1);
    assert.notEqual(await store.get('c'), null);
  });

  it('stops its sweep timer on shutdown', () => {
    const store = new InMemorySessionStore({ ttlMs: 100, sweepIntervalMs: 10 });
    store.shutdown();
    store.shutdown();
    assert.equal(store.size, 0);
  });
});
