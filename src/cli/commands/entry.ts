import type { EntriesQuery } from '../../api/types.js';
import { requireServer, type App } from '../../factory.js';
import { ValidationError } from '../../errors.js';
import type { DownloadResult } from '../../download/types.js';
import type { ServiceResult } from '../../reader/EntryService.js';
import { metadataToEntry } from '../../reader/navigation.js';
import {
  ENTRY_STATUSES,
  type Entry,
  type EntryStatus,
  type NavigationContext,
} from '../../types.js';

export interface EntryListOptions {
  status?: string;
  feed?: string;
  category?: string;
  starred?: boolean;
  search?: string;
  limit?: string;
}

export interface EntryDownloadOptions {
  images?: boolean;
}

export interface EntryOpenResult {
  download: DownloadResult;
  markedRead: boolean;
}

export function parseId(value: string, label = 'entry'): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid ${label} id "${value}"`);
  }
  return id;
}

function isEntryStatus(value: string): value is EntryStatus {
  return ENTRY_STATUSES.some((s) => s === value);
}

export function parseStatus(value: string): EntryStatus {
  if (!isEntryStatus(value)) {
    throw new ValidationError(
      `Invalid status "${value}". Valid statuses: ${ENTRY_STATUSES.join(', ')}`,
    );
  }
  return value;
}

export function buildListQuery(app: App, opts: EntryListOptions): EntriesQuery {
  const { config } = app;
  const query: EntriesQuery = {
    order: config.order,
    direction: config.direction,
    limit: opts.limit !== undefined ? parseId(opts.limit, 'limit') : config.limit,
  };
  if (opts.status) {
    query.status = opts.status.split(',').map((s) => parseStatus(s.trim()));
  } else if (config.hide_read_entries) {
    query.status = ['unread'];
  }
  if (opts.starred) query.starred = true;
  if (opts.search) query.search = opts.search;
  return query;
}

export async function runEntryList(app: App, opts: EntryListOptions): Promise<Entry[]> {
  requireServer(app.config);
  const query = buildListQuery(app, opts);
  const result = opts.feed
    ? await app.gateway.getFeedEntries(parseId(opts.feed, 'feed'), query)
    : opts.category
      ? await app.gateway.getCategoryEntries(parseId(opts.category, 'category'), query)
      : await app.gateway.getEntries(query);
  if (!result.ok) {
    throw new Error(`Failed to load entries: ${result.error.message}`);
  }
  return result.value.entries;
}

/** The local copy when there is one, the server's entry otherwise. */
export async function resolveEntry(app: App, entryId: number): Promise<Entry> {
  if (await app.store.isDownloaded(entryId)) {
    const metadata = await app.store.loadMetadata(entryId);
    if (metadata) return metadataToEntry(metadata);
  }
  requireServer(app.config);
  const result = await app.gateway.getEntry(entryId);
  if (!result.ok) {
    throw new Error(`Failed to fetch entry ${entryId}: ${result.error.message}`);
  }
  return result.value;
}

export async function runEntryDownload(
  app: App,
  idStr: string,
  opts: EntryDownloadOptions,
): Promise<DownloadResult> {
  const entry = await resolveEntry(app, parseId(idStr));
  return app.download.execute(entry, {
    includeImages: opts.images ?? app.config.include_images,
  });
}

/** Downloads when needed, shows the document and applies mark-on-open. */
export async function runEntryOpen(
  app: App,
  idStr: string,
  context: NavigationContext = { type: 'global' },
): Promise<EntryOpenResult> {
  const entry = await resolveEntry(app, parseId(idStr));
  const download = await app.download.execute(entry, {
    includeImages: app.config.include_images,
  });
  if (download.kind !== 'completed') {
    return { download, markedRead: false };
  }
  await app.viewer.open(download.htmlPath, context);
  const markedRead = await app.entries.performAutoMarkAsRead(entry.id, entry.status);
  return { download, markedRead };
}

export async function runEntryClose(app: App, idStr: string): Promise<boolean> {
  return app.entries.onEntryClosed(parseId(idStr));
}

export async function runEntryMark(
  app: App,
  ids: string[],
  status: string,
): Promise<ServiceResult> {
  const target = parseStatus(status);
  const parsed = ids.map((id) => parseId(id));
  const [first] = parsed;
  if (parsed.length === 1 && first !== undefined) {
    return app.entries.changeEntryStatus(first, target);
  }
  return app.entries.changeEntriesStatus(parsed, target);
}

export async function runEntryStar(app: App, idStr: string): Promise<ServiceResult> {
  return app.entries.toggleBookmark(parseId(idStr));
}

export async function runMarkAllRead(app: App): Promise<ServiceResult> {
  requireServer(app.config);
  return app.entries.markAllUnreadAsRead();
}

export async function runRemoveAllRead(app: App): Promise<ServiceResult> {
  requireServer(app.config);
  return app.entries.markAllReadAsRemoved();
}
