import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { emptyTrackerDocument } from '@turbinetrack/shared';

import { DocumentStoreError } from './errors.js';
import { JsonFileDocumentStore } from './jsonFileStore.js';
import { MemoryDocumentStore } from './memoryStore.js';

describe('JsonFileDocumentStore', () => {
  let dir = '';

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'turbinetrack-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads an empty document when the file is missing', () => {
    const store = new JsonFileDocumentStore(join(dir, 'data.json'));
    expect(store.load()).toEqual(emptyTrackerDocument());
  });

  it('loads an empty document from a blank file', () => {
    const file = join(dir, 'data.json');
    writeFileSync(file, '  \n');
    expect(new JsonFileDocumentStore(file).load()).toEqual(emptyTrackerDocument());
  });

  it('writes indented JSON and reads it back with unknown fields intact', () => {
    const file = join(dir, 'nested', 'data.json');
    const store = new JsonFileDocumentStore(file);
    const doc = emptyTrackerDocument();
    doc.part_masters.push({ part_number: 'PN-1', description: 'Main Bearing', manufacturer: '' });
    Object.assign(doc, { site_notes: ['north ridge'] });
    store.save(doc);

    expect(readFileSync(file, 'utf8').startsWith('{\n    "turbines": []')).toBe(true);
    const loaded = store.load();
    expect(loaded.part_masters).toEqual([{ part_number: 'PN-1', description: 'Main Bearing', manufacturer: '' }]);
    expect(loaded).toHaveProperty('site_notes', ['north ridge']);
  });

  it('fails with store_corrupt on invalid JSON', () => {
    const file = join(dir, 'data.json');
    writeFileSync(file, '{"turbines": [');
    const store = new JsonFileDocumentStore(file);
    expect(() => store.load()).toThrowError(DocumentStoreError);
    try {
      store.load();
    } catch (e) {
      expect(e instanceof DocumentStoreError && e.code).toBe('store_corrupt');
    }
  });

  it('fails with store_corrupt when a record has the wrong shape', () => {
    const file = join(dir, 'data.json');
    writeFileSync(file, JSON.stringify({ part_instances: [{ instance_id: 1, part_number: 'PN-1' }] }));
    expect(() => new JsonFileDocumentStore(file).load()).toThrowError(
      `invalid document in ${file}: part_instances.0.serial_number: Required`,
    );
  });

  it('fails with store_unreadable when the path is a directory', () => {
    const path = join(dir, 'folder');
    mkdirSync(path);
    try {
      new JsonFileDocumentStore(path).load();
      expect.unreachable();
    } catch (e) {
      expect(e instanceof DocumentStoreError && e.code).toBe('store_unreadable');
    }
  });

  it('fails with store_unwritable when the target cannot be created', () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'x');
    const store = new JsonFileDocumentStore(join(blocker, 'data.json'));
    try {
      store.save(emptyTrackerDocument());
      expect.unreachable();
    } catch (e) {
      expect(e instanceof DocumentStoreError && e.code).toBe('store_unwritable');
    }
  });
});

describe('MemoryDocumentStore', () => {
  it('counts saves and detaches snapshots', () => {
    const store = new MemoryDocumentStore();
    const doc = store.load();
    doc.part_masters.push({ part_number: 'PN-1', description: '', manufacturer: '' });
    expect(store.persisted.part_masters).toEqual([]);

    store.save(doc);
    doc.part_masters.pop();
    expect(store.saveCount).toBe(1);
    expect(store.persisted.part_masters).toHaveLength(1);
  });

  it('rejects a save once when asked to', () => {
    const store = new MemoryDocumentStore();
    store.failNextSave = true;
    expect(() => store.save(emptyTrackerDocument())).toThrowError('memory store rejected the write');
    expect(store.saveCount).toBe(0);
    store.save(emptyTrackerDocument());
    expect(store.saveCount).toBe(1);
  });
});
