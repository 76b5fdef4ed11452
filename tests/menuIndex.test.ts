import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Catalog, loadMenu, resolveMenuPath } from '../src/menu/menuIndex';

describe('loadMenu', () => {
  let dir: string;

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'menu-test-'));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('gives an empty menu for a missing file', () => {
    assert.deepEqual(loadMenu(path.join(dir, 'nope.json')), []);
  });

  it('gives an empty menu for invalid JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '[{ "name": ');
    assert.deepEqual(loadMenu(file), []);
  });

  it('gives an empty menu when the file is not a list', () => {
    const file = path.join(dir, 'object.json');
    fs.writeFileSync(file, JSON.stringify({ items: [{ name: 'Tea' }] }));
    assert.deepEqual(loadMenu(file), []);
  });

  it('reads records from a file', () => {
    const file = path.join(dir, 'menu.json');
    fs.writeFileSync(file, JSON.stringify([{ id: 'a', name: 'Masala Chai', tags: ['drinks'], prep_time_min: 5 }]));
    assert.deepEqual(loadMenu(file), [
      { id: 'a', name: 'Masala Chai', tags: ['drinks'], available: true, prep_time_min: 5 },
    ]);
  });

  it('fills defaults and falls back to _id, then name, for identity', () => {
    const out = loadMenu([{ name: 'Tea' }, { id: 7, name: 'Coffee' }, { _id: 'x9', name: 'Juice' }]);
    assert.deepEqual(out, [
      { id: 'Tea', name: 'Tea', tags: [], available: true, prep_time_min: null },
      { id: '7', name: 'Coffee', tags: [], available: true, prep_time_min: null },
      { id: 'x9', name: 'Juice', tags: [], available: true, prep_time_min: null },
    ]);
  });

  it('treats empty and zero ids as missing', () => {
    const out = loadMenu([
      { id: '', name: 'Tea' },
      { id: '', name: 'Coffee' },
      { id: 0, _id: '', name: 'Juice' },
    ]);
    assert.deepEqual(out.map((i) => i.id), ['Tea', 'Coffee', 'Juice']);
  });

  it('keeps the first record when ids repeat', () => {
    const out = loadMenu([
      { id: '1', name: 'First' },
      { id: '1', name: 'Second' },
      { name: 'Tea' },
      { name: 'Tea', available: false },
    ]);
    assert.deepEqual(out.map((i) => i.name), ['First', 'Tea']);
    assert.equal(out[1].available, true);
  });

  it('skips invalid records and keeps the rest', () => {
    const out = loadMenu([
      { name: '' },
      { tags: ['x'] },
      { name: 'Negative', prep_time_min: -1 },
      { name: 'Fraction', prep_time_min: 2.5 },
      'not a record',
      { name: 'Good' },
    ]);
    assert.deepEqual(out.map((i) => i.name), ['Good']);
  });

  it('freezes loaded items', () => {
    const [item] = loadMenu([{ name: 'Tea', tags: ['drinks'] }]);
    assert.ok(Object.isFrozen(item));
    assert.ok(Object.isFrozen(item.tags));
  });
});

describe('resolveMenuPath', () => {
  let root: string;

  before(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'menu-root-'));
    fs.mkdirSync(path.join(root, 'data'));
  });

  after(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('prefers an explicit path', () => {
    assert.equal(resolveMenuPath('custom/menu.json', root), path.resolve(root, 'custom/menu.json'));
  });

  it('falls back to data/data.json when data/menu.json is missing', () => {
    fs.writeFileSync(path.join(root, 'data', 'data.json'), '[]');
    assert.equal(resolveMenuPath(null, root), path.join(root, 'data', 'data.json'));
  });

  it('uses data/menu.json when it exists', () => {
    fs.writeFileSync(path.join(root, 'data', 'menu.json'), '[]');
    assert.equal(resolveMenuPath(null, root), path.join(root, 'data', 'menu.json'));
  });
});

describe('Catalog', () => {
  it('indexes by id and replaces everything on reload', () => {
    const catalog = new Catalog([{ id: '1', name: 'Tea' }, { id: '2', name: 'Coffee' }]);
    assert.equal(catalog.size, 2);
    assert.equal(catalog.get('2')?.name, 'Coffee');

    assert.equal(catalog.reload([{ id: '3', name: 'Juice' }]), 1);
    assert.equal(catalog.get('2'), undefined);
    assert.deepEqual(catalog.items().map((i) => i.name), ['Juice']);
  });

  it('works empty', () => {
    const catalog = new Catalog();
    assert.equal(catalog.size, 0);
    assert.deepEqual(catalog.items(), []);
  });
});
