import fs from 'node:fs/promises';
import path from 'node:path';
import { parseTimestamp } from '../dates.js';
import { logger } from '../logger.js';
import type { ImageFetcher } from '../content/fetchImage.js';
import { fileExists, readDirSafe } from './files.js';
import { ENTRY_HTML, METADATA_FILE } from './paths.js';
import type { LocalEntryStore } from './store.js';

export interface StorageStats {
  entryCount: number;
  totalBytes: number;
  imageBytes: number;
  imageCount: number;
}

export interface DatedEntry {
  id: number;
  /** Unix seconds: published date, else the document's mtime. */
  publishedAt: number;
}

const SECONDS_PER_DAY = 24 * 60 * 60;
const log = logger.child('Storage');

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function isImageFile(name: string): boolean {
  return name !== ENTRY_HTML && name !== METADATA_FILE && !name.endsWith('.tmp');
}

async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() ? stat.size : null;
  } catch {
    return null;
  }
}

/** Every file in an entry directory other than its document and metadata. */
async function imageFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const name of await readDirSafe(dir)) {
    if (!isImageFile(name)) continue;
    if ((await fileSize(path.join(dir, name))) !== null) files.push(name);
  }
  return files;
}

export async function getStorageStats(store: LocalEntryStore): Promise<StorageStats> {
  const stats: StorageStats = {
    entryCount: 0,
    totalBytes: 0,
    imageBytes: 0,
    imageCount: 0,
  };
  for (const id of await store.listEntryIds()) {
    stats.entryCount++;
    const dir = store.entryDir(id);
    for (const name of await readDirSafe(dir)) {
      const size = await fileSize(path.join(dir, name));
      if (size === null) continue;
      stats.totalBytes += size;
      if (isImageFile(name)) {
        stats.imageBytes += size;
        stats.imageCount++;
      }
    }
  }
  return stats;
}

export async function listEntriesWithDates(
  store: LocalEntryStore,
): Promise<DatedEntry[]> {
  const dated: DatedEntry[] = [];
  for (const id of await store.listEntryIds()) {
    const metadata = await store.loadMetadata(id);
    let publishedAt = parseTimestamp(metadata?.published_at);
    if (publishedAt === null) {
      const stat = await fs.stat(store.htmlPath(id));
      publishedAt = Math.floor(stat.mtimeMs / 1000);
    }
    dated.push({ id, publishedAt });
  }
  return dated;
}

export function filterOlderThan(
  entries: DatedEntry[],
  days: number,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): DatedEntry[] {
  const threshold = days * SECONDS_PER_DAY;
  return entries.filter((e) => nowSeconds - e.publishedAt >= threshold);
}

/** Deletes entries published at least `days` ago. Returns their ids. */
export async function deleteOlderThan(
  store: LocalEntryStore,
  days: number,
  nowSeconds?: number,
): Promise<number[]> {
  const old = filterOlderThan(await listEntriesWithDates(store), days, nowSeconds);
  const deleted: number[] = [];
  for (const { id } of old) {
    if (await store.deleteEntry(id)) deleted.push(id);
  }
  log.info('Purged old entries', { days, count: deleted.length });
  return deleted;
}

export async function deleteImages(store: LocalEntryStore, id: number): Promise<number> {
  const dir = store.entryDir(id);
  const files = await imageFiles(dir);
  for (const name of files) {
    await fs.rm(path.join(dir, name), { force: true });
  }
  return files.length;
}

export async function deleteAllImages(store: LocalEntryStore): Promise<number> {
  let total = 0;
  for (const id of await store.listEntryIds()) {
    total += await deleteImages(store, id);
  }
  log.info('Deleted downloaded images', { count: total });
  return total;
}

/**
 * Re-downloads images listed in the entry's metadata whose files are
 * missing. Returns how many came back.
 */
export async function recoverImages(
  store: LocalEntryStore,
  id: number,
  fetcher: ImageFetcher,
): Promise<number> {
  const metadata = await store.readMetadata(id);
  if (!metadata) return 0;
  const dir = store.entryDir(id);
  let recovered = 0;
  for (const [filename, url] of Object.entries(metadata.images)) {
    if (url === '' || path.basename(filename) !== filename) continue;
    const destPath = path.join(dir, filename);
    if (await fileExists(destPath)) continue;
    const result = await fetcher.download({
      url,
      destPath,
      entryUrl: metadata.url,
    });
    if (result.ok) recovered++;
  }
  return recovered;
}

export async function recoverAllImages(
  store: LocalEntryStore,
  fetcher: ImageFetcher,
): Promise<number> {
  let total = 0;
  for (const id of await store.listEntryIds()) {
    total += await recoverImages(store, id, fetcher);
  }
  log.info('Recovered missing images', { count: total });
  return total;
}
