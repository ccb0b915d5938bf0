import type { EntriesQuery, Gateway } from '../api/types.js';
import type { Config } from '../config/config.js';
import { parseTimestamp } from '../dates.js';
import { ValidationError, requireEntryId } from '../errors.js';
import { logger } from '../logger.js';
import type { LocalEntryStore } from '../local/store.js';
import type { DownloadWorkflow } from '../download/DownloadWorkflow.js';
import type { DownloadResult } from '../download/types.js';
import type {
  Entry,
  EntryMetadata,
  NavigationContext,
  NavigationDirection,
} from '../types.js';
import type { Viewer } from './viewer.js';

export type AdjacentResult =
  | { kind: 'found'; entry: Entry; source: 'server' | 'local' }
  | { kind: 'none'; reason: 'server' | 'offline' };

export type NavigateResult =
  | { kind: 'opened'; entryId: number; download: DownloadResult }
  | { kind: 'none'; message: string }
  | { kind: 'failed'; message: string };

const log = logger.child('Navigation');

/** Minimal entry rebuilt from a local record; enough to reopen it. */
export function metadataToEntry(metadata: EntryMetadata): Entry {
  const entry: Entry = {
    id: metadata.id,
    title: metadata.title,
    status: metadata.status,
    starred: metadata.starred,
  };
  if (metadata.url) entry.url = metadata.url;
  if (metadata.published_at) entry.published_at = metadata.published_at;
  if (metadata.feed) {
    entry.feed = { ...metadata.feed };
    if (metadata.category) entry.feed.category = { ...metadata.category };
  }
  return entry;
}

/**
 * Server query for the neighbour of an entry published at `publishedAt`.
 * Next is always the older neighbour, whatever the listing's direction.
 */
export function buildNavigationQuery(
  publishedAt: number,
  direction: NavigationDirection,
  context: NavigationContext,
  config: Config,
): EntriesQuery {
  const unreadOnly = config.hide_read_entries || context.type === 'unread';
  const query: EntriesQuery = {
    limit: 1,
    order: config.order,
    status: unreadOnly ? ['unread'] : ['unread', 'read'],
  };
  if (context.type === 'feed') query.feed_id = context.id;
  if (context.type === 'category') query.category_id = context.id;
  if (context.type === 'starred') query.starred = true;

  if (direction === 'next') {
    query.direction = 'desc';
    query.published_before = publishedAt;
  } else {
    query.direction = 'asc';
    query.published_after = publishedAt;
  }
  return query;
}

/** Adjacent id by position in an ordered list. */
export function adjacentInList(
  ids: number[],
  entryId: number,
  direction: NavigationDirection,
): number | null {
  const index = ids.indexOf(entryId);
  if (index === -1) return null;
  const target = direction === 'next' ? ids[index + 1] : ids[index - 1];
  return target ?? null;
}

/** Offline fallback: neighbour by numeric id among downloaded entries. */
export function adjacentById(
  ids: number[],
  entryId: number,
  direction: NavigationDirection,
): number | null {
  let best: number | null = null;
  for (const id of ids) {
    if (direction === 'next' && id > entryId && (best === null || id < best)) best = id;
    if (direction === 'previous' && id < entryId && (best === null || id > best)) best = id;
  }
  return best;
}

export function noAdjacentMessage(
  direction: NavigationDirection,
  reason: 'server' | 'offline',
): string {
  return reason === 'server'
    ? `No ${direction} entry available on server`
    : `No ${direction} entry available in local files`;
}

export interface NavigationDeps {
  gateway: Gateway;
  store: LocalEntryStore;
  config: Config;
  workflow: DownloadWorkflow;
  viewer: Viewer;
}

export class NavigationCursor {
  private readonly deps: NavigationDeps;

  constructor(deps: NavigationDeps) {
    this.deps = deps;
  }

  async findAdjacent(
    entryId: number,
    direction: NavigationDirection,
    context: NavigationContext,
  ): Promise<AdjacentResult> {
    requireEntryId(entryId);
    const { store, gateway, config } = this.deps;

    if (context.type === 'local') {
      const targetId = adjacentInList(context.orderedIds, entryId, direction);
      const metadata = targetId === null ? null : await store.loadMetadata(targetId);
      if (!metadata) return { kind: 'none', reason: 'offline' };
      return { kind: 'found', entry: metadataToEntry(metadata), source: 'local' };
    }

    const reference = await store.loadMetadata(entryId);
    const publishedAt = parseTimestamp(reference?.published_at);
    if (publishedAt === null) {
      throw new ValidationError('Cannot navigate: missing timestamp information');
    }

    const query = buildNavigationQuery(publishedAt, direction, context, config);
    const result = await gateway.getEntries(query);
    if (result.ok) {
      const entry = result.value.entries[0];
      return entry
        ? { kind: 'found', entry, source: 'server' }
        : { kind: 'none', reason: 'server' };
    }

    log.info('Server unreachable, navigating local files', {
      entryId,
      error: result.error.message,
    });
    const targetId = adjacentById(await store.listEntryIds(), entryId, direction);
    const metadata = targetId === null ? null : await store.loadMetadata(targetId);
    if (!metadata) return { kind: 'none', reason: 'offline' };
    return { kind: 'found', entry: metadataToEntry(metadata), source: 'local' };
  }

  /** Finds the neighbour and opens it, downloading first when needed. */
  async navigate(
    entryId: number,
    direction: NavigationDirection,
    context: NavigationContext,
  ): Promise<NavigateResult> {
    const adjacent = await this.findAdjacent(entryId, direction, context);
    if (adjacent.kind === 'none') {
      return { kind: 'none', message: noAdjacentMessage(direction, adjacent.reason) };
    }
    const download = await this.deps.workflow.execute(adjacent.entry, {
      includeImages: this.deps.config.include_images,
    });
    if (download.kind === 'completed') {
      await this.deps.viewer.open(download.htmlPath, context);
      return { kind: 'opened', entryId: adjacent.entry.id, download };
    }
    if (download.kind === 'failed') {
      return { kind: 'failed', message: download.error };
    }
    return { kind: 'failed', message: 'Download cancelled' };
  }
}
