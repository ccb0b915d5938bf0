import type { App } from '../../factory.js';
import type { QueueCounts, SyncOutcome } from '../../sync/types.js';

export const QUEUE_KINDS = ['status', 'bookmark', 'feed', 'category'] as const;
export type QueueKind = (typeof QUEUE_KINDS)[number];

function isQueueKind(value: string): value is QueueKind {
  return QUEUE_KINDS.some((k) => k === value);
}

/**
 * Replays pending changes. Without --yes the user is asked first; off a
 * terminal that question answers "later".
 */
export async function runSync(app: App, opts: { yes?: boolean }): Promise<SyncOutcome> {
  return app.sync.processAllQueues({ autoConfirm: opts.yes === true });
}

export async function runQueueStatus(app: App): Promise<QueueCounts> {
  return app.queue.getTotalQueueCount();
}

export async function runQueueClear(app: App, kind?: string): Promise<QueueKind[]> {
  if (kind === undefined) {
    await app.queue.clearAll();
    return [...QUEUE_KINDS];
  }
  if (!isQueueKind(kind)) {
    throw new Error(`Unknown queue "${kind}". Valid queues: ${QUEUE_KINDS.join(', ')}`);
  }
  switch (kind) {
    case 'status':
      await app.queue.clearStatusQueue();
      break;
    case 'bookmark':
      await app.queue.clearBookmarkQueue();
      break;
    default:
      await app.queue.clearCollectionQueue(kind);
  }
  return [kind];
}
