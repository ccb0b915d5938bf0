import type { EntriesQuery, Gateway } from '../api/types.js';
import type { Config } from '../config/config.js';
import type { LocalEntryStore } from '../local/store.js';
import type { Entry } from '../types.js';
import type { BatchDownloadWorkflow } from './BatchDownloadWorkflow.js';
import type { BatchResult } from './types.js';

export const PREFETCH_SOURCES = ['unread', 'starred'] as const;
export type PrefetchSource = (typeof PREFETCH_SOURCES)[number];

export type PrefetchOutcome =
  | { kind: 'failed'; message: string }
  | { kind: 'nothing'; message: string }
  | { kind: 'done'; message: string; result: BatchResult; selected: number };

export function prefetchQuery(source: PrefetchSource, config: Config): EntriesQuery {
  const query: EntriesQuery = {
    order: config.order,
    direction: config.direction,
    limit: config.limit,
  };
  if (source === 'unread') {
    query.status = ['unread'];
  } else {
    query.status = ['unread', 'read'];
    query.starred = true;
  }
  return query;
}

/** The first `count` entries of the listing that are not on disk yet. */
export async function selectForPrefetch(
  store: LocalEntryStore,
  entries: Entry[],
  count: number,
): Promise<Entry[]> {
  const selected: Entry[] = [];
  for (const entry of entries) {
    if (selected.length >= count) break;
    if (!(await store.isDownloaded(entry.id))) selected.push(entry);
  }
  return selected;
}

export async function prefetchEntries(opts: {
  gateway: Gateway;
  store: LocalEntryStore;
  batch: BatchDownloadWorkflow;
  config: Config;
  source: PrefetchSource;
  count: number;
}): Promise<PrefetchOutcome> {
  const listing = await opts.gateway.getEntries(prefetchQuery(opts.source, opts.config));
  if (!listing.ok) {
    return { kind: 'failed', message: 'Failed to load entries' };
  }
  const selected = await selectForPrefetch(opts.store, listing.value.entries, opts.count);
  if (selected.length === 0) {
    return { kind: 'nothing', message: 'No undownloaded entries in this list' };
  }
  const result = await opts.batch.execute(selected, {
    includeImages: opts.config.include_images,
  });
  const message = result.cancelled
    ? result.message
    : `Prefetched ${result.completed} entries`;
  return { kind: 'done', message, result, selected: selected.length };
}
