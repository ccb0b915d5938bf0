import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { CollectionKind, EntryStatus } from '../types.js';
import { errorMessage, isNotFound } from '../errors.js';
import { writeFileAtomic } from '../local/files.js';
import { logger } from '../logger.js';
import type {
  BookmarkQueue,
  CollectionQueue,
  MutationQueue,
  QueueCounts,
  QueuedStatus,
  StatusQueue,
} from './types.js';

const log = logger.child('Queue');

const statusSchema = z.enum(['unread', 'read', 'removed']);

const statusFileSchema = z.record(
  z.string(),
  z.object({
    newStatus: statusSchema,
    originalStatus: statusSchema,
    timestamp: z.string().default(''),
  }),
);

const bookmarkFileSchema = z.record(
  z.string(),
  z.object({ starred: z.boolean(), timestamp: z.string().default('') }),
);

const collectionFileSchema = z.record(
  z.string(),
  z.object({
    operation: z.literal('mark_all_read'),
    timestamp: z.string().default(''),
  }),
);

type QueueFile = 'status' | 'bookmark' | CollectionKind;

function opposite(status: EntryStatus): EntryStatus {
  return status === 'read' ? 'unread' : 'read';
}

function toMap<V>(record: Record<string, V>): Map<number, V> {
  const map = new Map<number, V>();
  for (const [key, value] of Object.entries(record)) {
    const id = Number(key);
    if (Number.isInteger(id) && id > 0) map.set(id, value);
  }
  return map;
}

/**
 * File-backed pending mutation queues under `<root>/queue/`. Every change
 * rewrites the whole file through a temp file and rename, so readers see
 * either the previous or the next full map.
 */
export class MutationQueueStore implements MutationQueue {
  private readonly dir: string;

  constructor(root: string) {
    this.dir = path.join(root, 'queue');
  }

  filePath(file: QueueFile): string {
    return path.join(this.dir, `${file}.json`);
  }

  private async readRaw(file: QueueFile): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath(file), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return {};
      throw err;
    }
    try {
      return JSON.parse(raw);
    } catch (err) {
      log.warn('Unreadable queue file, treating it as empty', {
        file,
        error: errorMessage(err),
      });
      return {};
    }
  }

  private async write<V>(file: QueueFile, map: Map<number, V>): Promise<void> {
    const data: Record<string, V> = {};
    for (const [id, value] of [...map.entries()].sort((a, b) => a[0] - b[0])) {
      data[String(id)] = value;
    }
    await writeFileAtomic(this.filePath(file), JSON.stringify(data, null, 2));
  }

  private async clearFile(file: QueueFile): Promise<boolean> {
    try {
      await fs.rm(this.filePath(file), { force: true });
      return true;
    } catch (err) {
      log.warn('Could not clear queue file', { file, error: errorMessage(err) });
      return false;
    }
  }

  async loadStatusQueue(): Promise<StatusQueue> {
    const parsed = statusFileSchema.safeParse(await this.readRaw('status'));
    return parsed.success ? toMap(parsed.data) : new Map();
  }

  async saveStatusQueue(queue: StatusQueue): Promise<void> {
    await this.write('status', queue);
  }

  async enqueueStatus(
    entryId: number,
    newStatus: QueuedStatus,
    originalStatus?: EntryStatus,
  ): Promise<void> {
    const queue = await this.loadStatusQueue();
    queue.set(entryId, {
      newStatus,
      originalStatus: originalStatus ?? opposite(newStatus),
      timestamp: new Date().toISOString(),
    });
    await this.saveStatusQueue(queue);
  }

  async removeStatus(entryId: number): Promise<void> {
    const queue = await this.loadStatusQueue();
    if (!queue.delete(entryId)) return;
    await this.saveStatusQueue(queue);
  }

  clearStatusQueue(): Promise<boolean> {
    return this.clearFile('status');
  }

  async loadBookmarkQueue(): Promise<BookmarkQueue> {
    const parsed = bookmarkFileSchema.safeParse(await this.readRaw('bookmark'));
    return parsed.success ? toMap(parsed.data) : new Map();
  }

  async enqueueBookmark(entryId: number, starred: boolean): Promise<void> {
    const queue = await this.loadBookmarkQueue();
    queue.set(entryId, { starred, timestamp: new Date().toISOString() });
    await this.write('bookmark', queue);
  }

  async removeBookmark(entryId: number): Promise<void> {
    const queue = await this.loadBookmarkQueue();
    if (!queue.delete(entryId)) return;
    await this.write('bookmark', queue);
  }

  clearBookmarkQueue(): Promise<boolean> {
    return this.clearFile('bookmark');
  }

  async loadCollectionQueue(kind: CollectionKind): Promise<CollectionQueue> {
    const parsed = collectionFileSchema.safeParse(await this.readRaw(kind));
    return parsed.success ? toMap(parsed.data) : new Map();
  }

  async enqueueCollection(kind: CollectionKind, id: number): Promise<void> {
    const queue = await this.loadCollectionQueue(kind);
    queue.set(id, {
      operation: 'mark_all_read',
      timestamp: new Date().toISOString(),
    });
    await this.write(kind, queue);
  }

  async removeCollection(kind: CollectionKind, id: number): Promise<void> {
    const queue = await this.loadCollectionQueue(kind);
    if (!queue.delete(id)) return;
    await this.write(kind, queue);
  }

  clearCollectionQueue(kind: CollectionKind): Promise<boolean> {
    return this.clearFile(kind);
  }

  async clearAll(): Promise<void> {
    await this.clearStatusQueue();
    await this.clearBookmarkQueue();
    await this.clearCollectionQueue('feed');
    await this.clearCollectionQueue('category');
  }

  async getTotalQueueCount(): Promise<QueueCounts> {
    const status = (await this.loadStatusQueue()).size;
    const bookmark = (await this.loadBookmarkQueue()).size;
    const feed = (await this.loadCollectionQueue('feed')).size;
    const category = (await this.loadCollectionQueue('category')).size;
    return {
      total: status + bookmark + feed + category,
      status,
      bookmark,
      feed,
      category,
    };
  }
}
