import type { CollectionKind, EntryStatus } from '../types.js';

/** Statuses that can wait in the queue. Removals are never queued. */
export type QueuedStatus = Exclude<EntryStatus, 'removed'>;

export interface PendingStatusMutation {
  newStatus: EntryStatus;
  /** Status assumed current before the change. Diagnostic only. */
  originalStatus: EntryStatus;
  timestamp: string;
}

export interface PendingBookmarkMutation {
  starred: boolean;
  timestamp: string;
}

export interface PendingCollectionMutation {
  operation: 'mark_all_read';
  timestamp: string;
}

export type StatusQueue = Map<number, PendingStatusMutation>;
export type BookmarkQueue = Map<number, PendingBookmarkMutation>;
export type CollectionQueue = Map<number, PendingCollectionMutation>;

export interface QueueCounts {
  total: number;
  status: number;
  bookmark: number;
  feed: number;
  category: number;
}

export interface MutationQueue {
  enqueueStatus(
    entryId: number,
    newStatus: QueuedStatus,
    originalStatus?: EntryStatus,
  ): Promise<void>;
  removeStatus(entryId: number): Promise<void>;
  loadStatusQueue(): Promise<StatusQueue>;
  saveStatusQueue(queue: StatusQueue): Promise<void>;
  clearStatusQueue(): Promise<boolean>;

  enqueueBookmark(entryId: number, starred: boolean): Promise<void>;
  removeBookmark(entryId: number): Promise<void>;
  loadBookmarkQueue(): Promise<BookmarkQueue>;
  clearBookmarkQueue(): Promise<boolean>;

  enqueueCollection(kind: CollectionKind, id: number): Promise<void>;
  removeCollection(kind: CollectionKind, id: number): Promise<void>;
  loadCollectionQueue(kind: CollectionKind): Promise<CollectionQueue>;
  clearCollectionQueue(kind: CollectionKind): Promise<boolean>;

  clearAll(): Promise<void>;
  getTotalQueueCount(): Promise<QueueCounts>;
}

export type SyncState = 'idle' | 'confirm' | 'draining' | 'reporting';

export interface SyncStatus {
  state: SyncState;
  pendingCount: number;
  lastSyncTime: Date | null;
}

export interface SyncCounts {
  processed: number;
  failed: number;
}

export interface SyncReport extends SyncCounts {
  status: SyncCounts;
  bookmark: SyncCounts;
  feed: SyncCounts;
  category: SyncCounts;
}

export type SyncOutcome =
  | { kind: 'nothing_to_sync'; message: string }
  | { kind: 'deferred'; message: string; pending: number }
  | { kind: 'discarded'; message: string }
  | { kind: 'synced'; message: string; report: SyncReport };
