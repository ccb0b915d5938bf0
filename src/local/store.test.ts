import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { EntryInfoCache } from './cache.js';
import { LocalEntryStore, sortSummaries } from './store.js';
import type { EntryMetadata } from '../types.js';

function metadata(id: number, overrides: Partial<EntryMetadata> = {}): EntryMetadata {
  return {
    id,
    title: `Entry ${id}`,
    status: 'unread',
    starred: false,
    images: {},
    last_updated: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('LocalEntryStore', () => {
  let tmpDir: string;
  let cache: EntryInfoCache;
  let store: LocalEntryStore;

  function writeEntry(meta: EntryMetadata, withHtml = true): void {
    const dir = path.join(tmpDir, String(meta.id));
    fs.mkdirSync(dir, { recursive: true });
    if (withHtml) fs.writeFileSync(path.join(dir, 'entry.html'), '<p>x</p>');
    fs.writeFileSync(path.join(dir, 'metadata.json'), JSON.stringify(meta));
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fluxreader-store-test-'));
    cache = new EntryInfoCache().retain();
    store = new LocalEntryStore(tmpDir, cache);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true });
  });

  it('lists only numeric directories with a document', async () => {
    writeEntry(metadata(3));
    writeEntry(metadata(1));
    writeEntry(metadata(2), false);
    fs.mkdirSync(path.join(tmpDir, 'notes'));
    expect(await store.listEntryIds()).toEqual([1, 3]);
    expect(await store.isDownloaded(2)).toBe(false);
  });

  it('serves metadata from the cache after the first read', async () => {
    writeEntry(metadata(1));
    const first = await store.loadMetadata(1);
    expect(first?.title).toBe('Entry 1');
    expect(cache.get(1)).toEqual(first);
  });

  it('returns null for missing or malformed metadata', async () => {
    expect(await store.loadMetadata(9)).toBeNull();
    fs.mkdirSync(path.join(tmpDir, '8'));
    fs.writeFileSync(path.join(tmpDir, '8', 'metadata.json'), '{"id":"x"}');
    expect(await store.loadMetadata(8)).toBeNull();
  });

  it('writes updates to disk before the cache', async () => {
    writeEntry(metadata(1));
    const updated = await store.updateMetadata(1, { status: 'read' });
    expect(updated?.status).toBe('read');
    expect(updated?.last_updated).not.toBe('2026-01-01T00:00:00.000Z');
    const onDisk = JSON.parse(
      fs.readFileSync(path.join(tmpDir, '1', 'metadata.json'), 'utf-8'),
    ) as EntryMetadata;
    expect(onDisk.status).toBe('read');
    expect(cache.get(1)?.status).toBe('read');
  });

  it('returns null when updating an entry without a record', async () => {
    expect(await store.updateMetadata(4, { starred: true })).toBeNull();
  });

  it('deletes an entry and its cache slot', async () => {
    writeEntry(metadata(1));
    await store.loadMetadata(1);
    expect(await store.deleteEntry(1)).toBe(true);
    expect(fs.existsSync(path.join(tmpDir, '1'))).toBe(false);
    expect(cache.get(1)).toBeNull();
    expect(await store.deleteEntry(1)).toBe(false);
  });

  it('clears partial and complete entries alike', async () => {
    writeEntry(metadata(1));
    writeEntry(metadata(2), false);
    fs.mkdirSync(path.join(tmpDir, 'keep'));
    expect(await store.clearAll()).toBe(2);
    expect(fs.readdirSync(tmpDir)).toEqual(['keep']);
  });

  it('lists summaries newest first by default', async () => {
    writeEntry(metadata(1, { published_at: '2024-01-01T00:00:00Z' }));
    writeEntry(
      metadata(2, {
        published_at: '2024-03-01T00:00:00Z',
        feed: { id: 1, title: 'Blog' },
        starred: true,
      }),
    );
    const list = await store.listLocalEntries();
    expect(list.map((e) => e.id)).toEqual([2, 1]);
    expect(list[0]).toEqual({
      id: 2,
      title: 'Entry 2',
      status: 'unread',
      starred: true,
      published_at: '2024-03-01T00:00:00Z',
      feedTitle: 'Blog',
    });
  });
});

describe('sortSummaries', () => {
  const items = [
    { id: 2, title: 'beta', status: null, starred: false },
    { id: 1, title: 'Alpha', status: null, starred: false },
    { id: 3, title: 'alpha', status: null, starred: false },
  ];

  it('sorts by id', () => {
    expect(sortSummaries(items, 'id').map((e) => e.id)).toEqual([1, 2, 3]);
  });

  it('sorts by title, ties by id', () => {
    const ids = sortSummaries(items, 'title').map((e) => e.id);
    expect(ids[2]).toBe(2);
  });
});
