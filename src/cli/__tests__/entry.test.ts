import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import { ValidationError } from '../../errors.js';
import {
  buildListQuery,
  parseId,
  runEntryClose,
  runEntryDownload,
  runEntryList,
  runEntryMark,
  runEntryOpen,
  runEntryStar,
  runMarkAllRead,
} from '../commands/entry.js';
import { createTestApp, testEntry, writeLocalEntry, type TestApp } from './helpers.js';

describe('entry commands', () => {
  let t: TestApp;

  afterEach(() => {
    t.cleanup();
  });

  describe('parseId', () => {
    it('accepts positive integers only', async () => {
      t = await createTestApp();
      expect(parseId('42')).toBe(42);
      expect(() => parseId('0')).toThrow(ValidationError);
      expect(() => parseId('4.5')).toThrow('Invalid entry id "4.5"');
      expect(() => parseId('abc', 'feed')).toThrow('Invalid feed id "abc"');
    });
  });

  describe('runEntryList', () => {
    it('lists unread entries by default', async () => {
      t = await createTestApp({
        entries: [testEntry(1), testEntry(2, { status: 'read' }), testEntry(3)],
      });
      const entries = await runEntryList(t.app, {});
      expect(entries.map((e) => e.id)).toEqual([3, 1]);
    });

    it('takes statuses, starred and limit from options', async () => {
      t = await createTestApp({ config: { hide_read_entries: false } });
      expect(buildListQuery(t.app, { status: 'read,removed', starred: true, limit: '5' })).toEqual({
        order: 'published_at',
        direction: 'desc',
        limit: 5,
        status: ['read', 'removed'],
        starred: true,
      });
      expect(buildListQuery(t.app, {}).status).toBeUndefined();
    });

    it('rejects an unknown status', async () => {
      t = await createTestApp();
      expect(() => buildListQuery(t.app, { status: 'archived' })).toThrow(
        'Invalid status "archived"',
      );
    });

    it('needs a configured server', async () => {
      t = await createTestApp({ config: { server_address: '' } });
      await expect(runEntryList(t.app, {})).rejects.toThrow('Server not configured');
    });

    it('reports a server failure', async () => {
      t = await createTestApp();
      t.gateway.offline = true;
      await expect(runEntryList(t.app, {})).rejects.toThrow(
        'Failed to load entries: fetch failed',
      );
    });
  });

  describe('runEntryDownload', () => {
    it('downloads from the server', async () => {
      t = await createTestApp({ entries: [testEntry(4)] });
      const result = await runEntryDownload(t.app, '4', { images: false });
      expect(result.kind).toBe('completed');
      expect(fs.readFileSync(t.app.store.htmlPath(4), 'utf-8')).toContain('Body 4');
    });

    it('reuses the local copy without the server', async () => {
      t = await createTestApp();
      writeLocalEntry(t.app, 5);
      t.gateway.offline = true;
      const result = await runEntryDownload(t.app, '5', {});
      expect(result.kind === 'completed' && result.alreadyDownloaded).toBe(true);
      expect(t.gateway.calls).toEqual([]);
    });

    it('fails for an entry the server does not have', async () => {
      t = await createTestApp();
      await expect(runEntryDownload(t.app, '9', {})).rejects.toThrow(
        'Failed to fetch entry 9: HTTP 404',
      );
    });
  });

  describe('runEntryOpen', () => {
    it('shows the document and marks it read in the background', async () => {
      t = await createTestApp({ entries: [testEntry(2)] });
      const result = await runEntryOpen(t.app, '2');

      expect(result.markedRead).toBe(true);
      expect(t.opened).toEqual([t.app.store.htmlPath(2)]);
      expect((await t.app.store.readMetadata(2))?.status).toBe('read');
      expect((await t.app.queue.loadStatusQueue()).get(2)?.newStatus).toBe('read');
      expect(t.spawner).toHaveBeenCalledOnce();
      expect(t.spawner.mock.calls[0]?.[1].slice(-3)).toEqual(['__sync-status', '2', 'read']);
    });

    it('leaves a read entry alone', async () => {
      t = await createTestApp({ entries: [testEntry(2, { status: 'read' })] });
      const result = await runEntryOpen(t.app, '2');
      expect(result.markedRead).toBe(false);
      expect(t.spawner).not.toHaveBeenCalled();
    });
  });

  describe('status and bookmarks', () => {
    it('marks one entry through the single-entry path', async () => {
      t = await createTestApp({ entries: [testEntry(1)] });
      const result = await runEntryMark(t.app, ['1'], 'read');
      expect(result.message).toBe('Entry marked as read');
    });

    it('marks several entries with one call', async () => {
      t = await createTestApp({ entries: [testEntry(1), testEntry(2)] });
      const result = await runEntryMark(t.app, ['1', '2'], 'read');
      expect(result.message).toBe('Successfully marked 2 entries as read');
      expect(t.gateway.callsTo('updateEntries')).toHaveLength(1);
    });

    it('toggles the star', async () => {
      t = await createTestApp({ entries: [testEntry(3)] });
      expect((await runEntryStar(t.app, '3')).message).toBe('Bookmark updated');
      expect(t.gateway.entries.get(3)?.starred).toBe(true);
    });

    it('marks everything read', async () => {
      t = await createTestApp({ entries: [testEntry(1), testEntry(2)] });
      expect((await runMarkAllRead(t.app)).message).toBe('All unread entries marked as read');
      expect(t.gateway.entries.get(2)?.status).toBe('read');
    });
  });

  describe('runEntryClose', () => {
    it('deletes a read entry when auto-delete is on', async () => {
      t = await createTestApp({ config: { auto_delete_read_on_close: true } });
      writeLocalEntry(t.app, 6, { status: 'read' });
      expect(await runEntryClose(t.app, '6')).toBe(true);
      expect(fs.existsSync(t.app.store.entryDir(6))).toBe(false);
    });
  });
});
