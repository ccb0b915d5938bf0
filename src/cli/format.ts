import { formatDate } from '../dates.js';
import type { DownloadResult } from '../download/types.js';
import { formatSize, type StorageStats } from '../local/storage.js';
import type { LocalEntrySummary } from '../local/store.js';
import type { QueueCounts } from '../sync/types.js';
import type { Category, Entry, Feed } from '../types.js';

export function formatTsvRow(fields: string[]): string {
  return fields.join('\t');
}

export function formatTsvKeyValue(pairs: [string, string][]): string {
  return pairs.map(([k, v]) => `${k}\t${v}`).join('\n');
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function star(starred: boolean): string {
  return starred ? '*' : '';
}

export function entryToTsvRow(entry: Entry): string {
  return formatTsvRow([
    String(entry.id),
    entry.status,
    star(entry.starred),
    formatDate(entry.published_at),
    entry.feed?.title ?? '',
    entry.title,
  ]);
}

export function localEntryToTsvRow(entry: LocalEntrySummary): string {
  return formatTsvRow([
    String(entry.id),
    entry.status ?? '',
    star(entry.starred),
    formatDate(entry.published_at),
    entry.feedTitle ?? '',
    entry.title,
  ]);
}

export function feedToTsvRow(feed: Feed): string {
  return formatTsvRow([String(feed.id), feed.category?.title ?? '', feed.title]);
}

export function categoryToTsvRow(category: Category): string {
  return formatTsvRow([
    String(category.id),
    String(category.total_unread ?? ''),
    category.title,
  ]);
}

export function queueCountsToTsv(counts: QueueCounts): string {
  return formatTsvKeyValue([
    ['status', String(counts.status)],
    ['bookmark', String(counts.bookmark)],
    ['feed', String(counts.feed)],
    ['category', String(counts.category)],
    ['total', String(counts.total)],
  ]);
}

export function storageStatsToTsv(stats: StorageStats): string {
  return formatTsvKeyValue([
    ['entries', String(stats.entryCount)],
    ['images', String(stats.imageCount)],
    ['image_size', formatSize(stats.imageBytes)],
    ['total_size', formatSize(stats.totalBytes)],
  ]);
}

export function downloadResultText(result: DownloadResult): string {
  switch (result.kind) {
    case 'completed':
      return result.alreadyDownloaded
        ? result.htmlPath
        : `${result.message}\n${result.htmlPath}`;
    case 'cancelled':
      return 'Download cancelled';
    case 'failed':
      return `Download failed: ${result.error}`;
  }
}
