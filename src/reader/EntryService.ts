import type { Gateway } from '../api/types.js';
import type { Config } from '../config/config.js';
import { ValidationError, errorMessage, isValidEntryId, requireEntryId } from '../errors.js';
import type { EntryInfoCache } from '../local/cache.js';
import type { LocalEntryStore } from '../local/store.js';
import { logger } from '../logger.js';
import type { MutationQueue, QueuedStatus } from '../sync/types.js';
import type { CollectionKind, EntryStatus } from '../types.js';

export interface ServiceResult {
  ok: boolean;
  /** The change was applied locally and waits in the queue. */
  queued: boolean;
  message: string;
}

/** Starts the out-of-process push of one status change. */
export type StatusPusher = (entryId: number, status: EntryStatus) => boolean;

export interface EntryServiceDeps {
  gateway: Gateway;
  store: LocalEntryStore;
  queue: MutationQueue;
  cache: EntryInfoCache;
  config: Config;
  pushStatus?: StatusPusher;
}

const log = logger.child('EntryService');

function oppositeStatus(status: QueuedStatus): QueuedStatus {
  return status === 'read' ? 'unread' : 'read';
}

function offlineStatusMessage(status: EntryStatus): string {
  return `Marked as ${status} (will sync when online)`;
}

function collectionLabel(kind: CollectionKind): string {
  return kind === 'feed' ? 'Feed' : 'Category';
}

/**
 * User-facing entry mutations. Each one tries the server first and falls
 * back to an optimistic local change plus a queued mutation.
 */
export class EntryService {
  private readonly deps: EntryServiceDeps;

  constructor(deps: EntryServiceDeps) {
    this.deps = deps;
  }

  async changeEntryStatus(entryId: number, status: EntryStatus): Promise<ServiceResult> {
    const id = requireEntryId(entryId);
    const { gateway, store, queue, cache } = this.deps;

    const result = await gateway.updateEntries(id, { status });
    if (status === 'removed') {
      if (!result.ok) {
        log.warn('Remove failed', { id, error: result.error.message });
        return { ok: false, queued: false, message: 'Failed to remove entry' };
      }
      await this.deleteRemoved([id]);
      return { ok: true, queued: false, message: 'Entry marked as removed' };
    }
    if (result.ok) {
      await store.updateMetadata(id, { status });
      await queue.removeStatus(id);
      cache.invalidate();
      return { ok: true, queued: false, message: `Entry marked as ${status}` };
    }

    log.info('Status update failed, queueing', { id, status, error: result.error.message });
    await store.updateMetadata(id, { status });
    await queue.enqueueStatus(id, status, oppositeStatus(status));
    return { ok: true, queued: true, message: offlineStatusMessage(status) };
  }

  async changeEntriesStatus(entryIds: number[], status: EntryStatus): Promise<ServiceResult> {
    const ids = entryIds.filter(isValidEntryId);
    if (ids.length === 0) {
      throw new ValidationError('No valid entry ids given');
    }
    const { gateway, store, queue, cache } = this.deps;

    const result = await gateway.updateEntries(ids, { status });
    if (status === 'removed') {
      if (!result.ok) {
        log.warn('Bulk remove failed', { count: ids.length, error: result.error.message });
        return { ok: false, queued: false, message: 'Failed to remove entries' };
      }
      await this.deleteRemoved(ids);
      return {
        ok: true,
        queued: false,
        message: `Successfully marked ${ids.length} entries as removed`,
      };
    }
    if (result.ok) {
      for (const id of ids) {
        await store.updateMetadata(id, { status });
        await queue.removeStatus(id);
      }
      cache.invalidate();
      return {
        ok: true,
        queued: false,
        message: `Successfully marked ${ids.length} entries as ${status}`,
      };
    }

    log.info('Bulk status update failed, queueing', {
      count: ids.length,
      status,
      error: result.error.message,
    });
    const original = oppositeStatus(status);
    for (const id of ids) {
      await store.updateMetadata(id, { status });
      await queue.enqueueStatus(id, status, original);
    }
    return { ok: true, queued: true, message: offlineStatusMessage(status) };
  }

  /** Removed entries leave the queue and the disk. */
  private async deleteRemoved(ids: number[]): Promise<void> {
    const { store, queue, cache } = this.deps;
    for (const id of ids) {
      await queue.removeStatus(id);
      try {
        await store.deleteEntry(id);
      } catch (err) {
        log.warn('Could not delete removed entry', { id, error: errorMessage(err) });
      }
    }
    cache.invalidate();
  }

  /**
   * Flips the star. The current value comes from the caller, then the local
   * record, then the server.
   */
  async toggleBookmark(entryId: number, currentStarred?: boolean): Promise<ServiceResult> {
    const id = requireEntryId(entryId);
    const { gateway, store, queue, cache } = this.deps;

    let current = currentStarred ?? (await store.loadMetadata(id))?.starred;
    if (current === undefined) {
      const fetched = await gateway.getEntry(id);
      if (!fetched.ok) {
        return { ok: false, queued: false, message: 'Cannot update bookmark' };
      }
      current = fetched.value.starred;
    }
    const starred = !current;

    const result = await gateway.toggleBookmark(id);
    await store.updateMetadata(id, { starred });
    if (result.ok) {
      await queue.removeBookmark(id);
      cache.invalidate();
      return { ok: true, queued: false, message: 'Bookmark updated' };
    }

    log.info('Bookmark toggle failed, queueing', { id, starred, error: result.error.message });
    await queue.enqueueBookmark(id, starred);
    return {
      ok: true,
      queued: true,
      message: 'Bookmark updated (will sync when online)',
    };
  }

  async markCollectionRead(kind: CollectionKind, collectionId: number): Promise<ServiceResult> {
    if (!isValidEntryId(collectionId)) {
      throw new ValidationError(`Invalid ${kind} id: ${String(collectionId)}`);
    }
    const { gateway, queue, cache } = this.deps;
    const result =
      kind === 'feed'
        ? await gateway.markFeedAsRead(collectionId)
        : await gateway.markCategoryAsRead(collectionId);

    await this.markLocalCollectionRead(kind, collectionId);
    const label = collectionLabel(kind);
    if (result.ok) {
      await queue.removeCollection(kind, collectionId);
      cache.invalidate();
      return { ok: true, queued: false, message: `${label} marked as read` };
    }

    log.info('Mark as read failed, queueing', {
      kind,
      id: collectionId,
      error: result.error.message,
    });
    await queue.enqueueCollection(kind, collectionId);
    return {
      ok: true,
      queued: true,
      message: `${label} marked as read (will sync when online)`,
    };
  }

  /** Marks up to 1000 unread entries read with one bulk call. Needs the server. */
  markAllUnreadAsRead(): Promise<ServiceResult> {
    return this.bulkTransition('unread', 'read', 'All unread entries marked as read', 'Failed to mark all as read');
  }

  markAllReadAsRemoved(): Promise<ServiceResult> {
    return this.bulkTransition('read', 'removed', 'Read entries removed', 'Failed to remove read entries');
  }

  /**
   * Marks an entry read when it is opened. The queue entry is written before
   * the background push starts, so a crash in between loses nothing.
   */
  async performAutoMarkAsRead(
    entryId: number,
    currentStatus: EntryStatus,
  ): Promise<boolean> {
    const { config, store, queue, pushStatus } = this.deps;
    if (!config.mark_as_read_on_open || currentStatus === 'read') return false;
    const id = requireEntryId(entryId);

    await store.updateMetadata(id, { status: 'read' });
    await queue.enqueueStatus(id, 'read', currentStatus);
    if (pushStatus && !pushStatus(id, 'read')) {
      log.warn('Background push did not start; change stays queued', { id });
    }
    return true;
  }

  /** Close-time cleanup. Starred entries are never deleted. */
  async onEntryClosed(entryId: number): Promise<boolean> {
    if (!this.deps.config.auto_delete_read_on_close || !isValidEntryId(entryId)) {
      return false;
    }
    const metadata = await this.deps.store.readMetadata(entryId);
    if (!metadata || metadata.status !== 'read' || metadata.starred) return false;
    try {
      return await this.deps.store.deleteEntry(entryId);
    } catch (err) {
      log.warn('Auto-delete on close failed', { id: entryId, error: errorMessage(err) });
      return false;
    }
  }

  private async bulkTransition(
    from: EntryStatus,
    to: EntryStatus,
    successMessage: string,
    failureMessage: string,
  ): Promise<ServiceResult> {
    const { gateway, config, store, cache } = this.deps;
    const listing = await gateway.getEntries({
      status: [from],
      order: config.order,
      direction: config.direction,
      limit: 1000,
    });
    if (!listing.ok) {
      return { ok: false, queued: false, message: failureMessage };
    }
    const ids = listing.value.entries.map((e) => e.id).filter(isValidEntryId);
    if (ids.length === 0) {
      return { ok: true, queued: false, message: successMessage };
    }
    const result = await gateway.updateEntries(ids, { status: to });
    if (!result.ok) {
      return { ok: false, queued: false, message: failureMessage };
    }
    if (to === 'removed') {
      await this.deleteRemoved(ids);
      return { ok: true, queued: false, message: successMessage };
    }
    for (const id of ids) await store.updateMetadata(id, { status: to });
    cache.invalidate();
    return { ok: true, queued: false, message: successMessage };
  }

  private async markLocalCollectionRead(kind: CollectionKind, id: number): Promise<void> {
    const { store } = this.deps;
    for (const entryId of await store.listEntryIds()) {
      const metadata = await store.loadMetadata(entryId);
      if (!metadata || metadata.status === 'read') continue;
      const matches =
        kind === 'feed' ? metadata.feed?.id === id : metadata.category?.id === id;
      if (matches) await store.updateMetadata(entryId, { status: 'read' });
    }
  }
}
