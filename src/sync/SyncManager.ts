import type { Gateway } from '../api/types.js';
import { logger } from '../logger.js';
import type { Prompter } from '../prompts/prompter.js';
import type { LocalEntryStore } from '../local/store.js';
import type { CollectionKind, EntryStatus } from '../types.js';
import type {
  MutationQueue,
  QueuedStatus,
  SyncCounts,
  SyncOutcome,
  SyncReport,
  SyncStatus,
} from './types.js';

type StatusListener = (status: SyncStatus) => void;

/** The entry currently shown to the user, refreshed when its status syncs. */
export interface OpenEntryHandle {
  entryId: number;
  onStatusChanged(status: EntryStatus): void;
}

export type SyncChoice = 'later' | 'sync' | 'delete';

export interface SyncManagerDeps {
  queue: MutationQueue;
  gateway: Gateway;
  store: Pick<LocalEntryStore, 'updateMetadata'>;
  prompter: Prompter;
}

const log = logger.child('SyncManager');

function emptyCounts(): SyncCounts {
  return { processed: 0, failed: 0 };
}

export function emptyReport(): SyncReport {
  return {
    processed: 0,
    failed: 0,
    status: emptyCounts(),
    bookmark: emptyCounts(),
    feed: emptyCounts(),
    category: emptyCounts(),
  };
}

export function formatSyncMessage(processed: number, failed: number): string {
  if (processed > 0) {
    const synced =
      processed === 1 ? '1 change synced' : `${processed} changes synced`;
    return failed > 0 ? `${synced}, ${failed} failed` : synced;
  }
  if (failed > 0) {
    return failed === 1
      ? '1 change failed to sync'
      : `${failed} changes failed to sync`;
  }
  return 'All changes are already synced';
}

export function syncPromptTitle(total: number): string {
  return total === 1 ? 'Sync 1 pending change?' : `Sync ${total} pending changes?`;
}

/**
 * Replays queued mutations against the server. Ids leave the queue only
 * after their call succeeded; failures stay queued for the next run.
 */
export class SyncManager {
  private readonly queue: MutationQueue;
  private readonly gateway: Gateway;
  private readonly store: Pick<LocalEntryStore, 'updateMetadata'>;
  private readonly prompter: Prompter;
  private status: SyncStatus;
  private listeners: StatusListener[] = [];
  private openEntry: OpenEntryHandle | null = null;

  constructor(deps: SyncManagerDeps) {
    this.queue = deps.queue;
    this.gateway = deps.gateway;
    this.store = deps.store;
    this.prompter = deps.prompter;
    this.status = { state: 'idle', pendingCount: 0, lastSyncTime: null };
  }

  getStatus(): SyncStatus {
    return { ...this.status };
  }

  onStatusChange(cb: StatusListener): () => void {
    this.listeners.push(cb);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== cb);
    };
  }

  setOpenEntry(handle: OpenEntryHandle | null): void {
    this.openEntry = handle;
  }

  private updateStatus(partial: Partial<SyncStatus>): void {
    this.status = { ...this.status, ...partial };
    for (const cb of this.listeners) {
      cb(this.getStatus());
    }
  }

  async processAllQueues(
    opts: { autoConfirm?: boolean } = {},
  ): Promise<SyncOutcome> {
    const counts = await this.queue.getTotalQueueCount();
    this.updateStatus({ state: 'idle', pendingCount: counts.total });
    if (counts.total === 0) {
      return { kind: 'nothing_to_sync', message: 'All changes are already synced' };
    }

    log.info('Processing queues', { ...counts });

    if (!opts.autoConfirm) {
      this.updateStatus({ state: 'confirm' });
      const choice = await this.prompter.choose<SyncChoice>({
        title: syncPromptTitle(counts.total),
        choices: [
          { value: 'later', label: 'Later' },
          { value: 'sync', label: 'Sync Now' },
          { value: 'delete', label: 'Delete Queue' },
        ],
        defaultValue: 'later',
      });

      if (choice === 'later') {
        this.updateStatus({ state: 'idle' });
        return {
          kind: 'deferred',
          message: `Sync postponed (${counts.total} pending)`,
          pending: counts.total,
        };
      }

      if (choice === 'delete') {
        const confirmed = await this.prompter.confirm(
          'Delete Queue',
          `Are you sure you want to delete the sync queue?\n\nYou still have ${counts.total} entries that need to sync with the server.\n\nThis action cannot be undone.`,
          false,
        );
        this.updateStatus({ state: 'idle' });
        if (!confirmed) {
          return {
            kind: 'deferred',
            message: `Sync postponed (${counts.total} pending)`,
            pending: counts.total,
          };
        }
        await this.queue.clearAll();
        this.updateStatus({ pendingCount: 0 });
        log.info('All sync queues cleared');
        return { kind: 'discarded', message: 'All sync queues cleared' };
      }
    }

    const report = await this.drain();
    return {
      kind: 'synced',
      message: formatSyncMessage(report.processed, report.failed),
      report,
    };
  }

  /** Drains every queue without asking. */
  async drain(): Promise<SyncReport> {
    this.updateStatus({ state: 'draining' });
    const report = emptyReport();

    report.status = await this.drainStatusQueue();
    report.bookmark = await this.drainBookmarkQueue();
    report.feed = await this.drainCollectionQueue('feed');
    report.category = await this.drainCollectionQueue('category');

    for (const part of [report.status, report.bookmark, report.feed, report.category]) {
      report.processed += part.processed;
      report.failed += part.failed;
    }

    this.updateStatus({ state: 'reporting' });
    const remaining = await this.queue.getTotalQueueCount();
    log.info('Sync finished', {
      processed: report.processed,
      failed: report.failed,
      remaining: remaining.total,
    });
    this.updateStatus({
      state: 'idle',
      pendingCount: remaining.total,
      lastSyncTime: new Date(),
    });
    return report;
  }

  /** At most one bulk call per target status. */
  private async drainStatusQueue(): Promise<SyncCounts> {
    const counts = emptyCounts();
    const pending = await this.queue.loadStatusQueue();
    if (pending.size === 0) return counts;

    const byStatus: Record<QueuedStatus, number[]> = { read: [], unread: [] };
    const unsendable: number[] = [];
    for (const [id, mutation] of pending) {
      if (mutation.newStatus === 'removed') unsendable.push(id);
      else byStatus[mutation.newStatus].push(id);
    }
    if (unsendable.length > 0) {
      log.warn('Dropping queued removals', { ids: unsendable });
      for (const id of unsendable) pending.delete(id);
      await this.queue.saveStatusQueue(pending);
    }

    for (const status of ['read', 'unread'] as const) {
      const ids = byStatus[status];
      if (ids.length === 0) continue;

      const result = await this.gateway.updateEntries(ids, { status });
      if (!result.ok) {
        log.warn('Bulk status update failed', {
          status,
          count: ids.length,
          error: result.error.message,
        });
        counts.failed += ids.length;
        continue;
      }

      const queue = await this.queue.loadStatusQueue();
      for (const id of ids) {
        if (queue.get(id)?.newStatus === status) queue.delete(id);
      }
      await this.queue.saveStatusQueue(queue);

      for (const id of ids) {
        await this.applyLocalStatus(id, status);
      }
      counts.processed += ids.length;
    }
    return counts;
  }

  private async applyLocalStatus(id: number, status: EntryStatus): Promise<void> {
    try {
      await this.store.updateMetadata(id, { status });
    } catch (err) {
      log.warn('Local status update failed', {
        id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    if (this.openEntry?.entryId === id) {
      this.openEntry.onStatusChanged(status);
    }
  }

  /** Toggles only when the server disagrees with the wanted value. */
  private async drainBookmarkQueue(): Promise<SyncCounts> {
    const counts = emptyCounts();
    const pending = await this.queue.loadBookmarkQueue();

    for (const [id, mutation] of pending) {
      const current = await this.gateway.getEntry(id);
      if (!current.ok) {
        counts.failed++;
        continue;
      }
      if (current.value.starred !== mutation.starred) {
        const toggled = await this.gateway.toggleBookmark(id);
        if (!toggled.ok) {
          counts.failed++;
          continue;
        }
      }
      await this.queue.removeBookmark(id);
      try {
        await this.store.updateMetadata(id, { starred: mutation.starred });
      } catch (err) {
        log.warn('Local bookmark update failed', {
          id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
      counts.processed++;
    }
    return counts;
  }

  private async drainCollectionQueue(kind: CollectionKind): Promise<SyncCounts> {
    const counts = emptyCounts();
    const pending = await this.queue.loadCollectionQueue(kind);

    for (const id of pending.keys()) {
      const result =
        kind === 'feed'
          ? await this.gateway.markFeedAsRead(id)
          : await this.gateway.markCategoryAsRead(id);
      if (result.ok) {
        await this.queue.removeCollection(kind, id);
        counts.processed++;
      } else {
        log.error(`Failed to mark ${kind} as read`, {
          id,
          error: result.error.message,
        });
        counts.failed++;
      }
    }
    return counts;
  }
}
