import fs from 'node:fs/promises';
import { LocalStoreError, errorMessage } from '../errors.js';
import { parseTimestamp } from '../dates.js';
import { logger } from '../logger.js';
import type { EntryMetadata } from '../types.js';
import type { EntryInfoCache } from './cache.js';
import { fileExists, readDirSafe } from './files.js';
import { readMetadataFile, writeMetadataFile } from './metadata.js';
import {
  entryDir,
  entryHtmlPath,
  metadataPath,
  parseEntryDirName,
} from './paths.js';

export const LOCAL_SORTS = ['published', 'title', 'id'] as const;
export type LocalSort = (typeof LOCAL_SORTS)[number];

export interface LocalEntrySummary {
  id: number;
  title: string;
  status: EntryMetadata['status'] | null;
  starred: boolean;
  published_at?: string;
  feedTitle?: string;
}

export type MetadataPatch = Partial<
  Pick<EntryMetadata, 'status' | 'starred' | 'title' | 'images'>
>;

const log = logger.child('LocalEntryStore');

/**
 * Downloaded entries under one download root. Metadata writes go to disk
 * first and to the shared cache second.
 */
export class LocalEntryStore {
  readonly downloadRoot: string;
  private readonly cache: EntryInfoCache;

  constructor(downloadRoot: string, cache: EntryInfoCache) {
    this.downloadRoot = downloadRoot;
    this.cache = cache;
  }

  entryDir(id: number): string {
    return entryDir(this.downloadRoot, id);
  }

  htmlPath(id: number): string {
    return entryHtmlPath(this.downloadRoot, id);
  }

  metadataPath(id: number): string {
    return metadataPath(this.downloadRoot, id);
  }

  isDownloaded(id: number): Promise<boolean> {
    return fileExists(this.htmlPath(id));
  }

  /** Ids of every numeric directory holding a completed document, ascending. */
  async listEntryIds(): Promise<number[]> {
    const ids: number[] = [];
    for (const name of await readDirSafe(this.downloadRoot)) {
      const id = parseEntryDirName(name);
      if (id !== null && (await this.isDownloaded(id))) ids.push(id);
    }
    return ids.sort((a, b) => a - b);
  }

  async loadMetadata(id: number): Promise<EntryMetadata | null> {
    const cached = this.cache.get(id);
    if (cached) return cached;
    const metadata = await readMetadataFile(this.metadataPath(id));
    if (metadata) this.cache.set(id, metadata);
    return metadata;
  }

  /** Disk copy only, bypassing the cache. */
  readMetadata(id: number): Promise<EntryMetadata | null> {
    return readMetadataFile(this.metadataPath(id));
  }

  async saveMetadata(metadata: EntryMetadata): Promise<void> {
    try {
      await writeMetadataFile(this.metadataPath(metadata.id), metadata);
    } catch (err) {
      throw new LocalStoreError(
        `Could not write metadata for entry ${metadata.id}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    this.cache.set(metadata.id, metadata);
  }

  /** Drops the metadata file and its cached copy, leaving the rest. */
  async discardMetadata(id: number): Promise<void> {
    await fs.rm(this.metadataPath(id), { force: true });
    this.cache.delete(id);
  }

  /**
   * Merge fields into an existing record. Returns null when the entry has
   * no local record.
   */
  async updateMetadata(
    id: number,
    patch: MetadataPatch,
  ): Promise<EntryMetadata | null> {
    const current = await this.readMetadata(id);
    if (!current) return null;
    const next: EntryMetadata = {
      ...current,
      ...patch,
      last_updated: new Date().toISOString(),
    };
    await this.saveMetadata(next);
    log.debug('Updated local metadata', { id, ...patch });
    return next;
  }

  async listLocalEntries(sort: LocalSort = 'published'): Promise<LocalEntrySummary[]> {
    const summaries: LocalEntrySummary[] = [];
    for (const id of await this.listEntryIds()) {
      const metadata = await this.loadMetadata(id);
      const summary: LocalEntrySummary = {
        id,
        title: metadata?.title ?? `Entry ${id}`,
        status: metadata?.status ?? null,
        starred: metadata?.starred ?? false,
      };
      if (metadata?.published_at) summary.published_at = metadata.published_at;
      if (metadata?.feed) summary.feedTitle = metadata.feed.title;
      summaries.push(summary);
    }
    return sortSummaries(summaries, sort);
  }

  async deleteEntry(id: number): Promise<boolean> {
    const dir = this.entryDir(id);
    try {
      await fs.access(dir);
    } catch {
      return false;
    }
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (err) {
      throw new LocalStoreError(
        `Could not delete entry ${id}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    this.cache.delete(id);
    log.info('Deleted local entry', { id });
    return true;
  }

  /** Removes every numeric entry directory, complete or partial. */
  async clearAll(): Promise<number> {
    let count = 0;
    for (const name of await readDirSafe(this.downloadRoot)) {
      const id = parseEntryDirName(name);
      if (id !== null && (await this.deleteEntry(id))) count++;
    }
    this.cache.invalidate();
    return count;
  }
}

export function sortSummaries(
  summaries: LocalEntrySummary[],
  sort: LocalSort,
): LocalEntrySummary[] {
  const sorted = [...summaries];
  switch (sort) {
    case 'title':
      return sorted.sort(
        (a, b) => a.title.localeCompare(b.title) || a.id - b.id,
      );
    case 'id':
      return sorted.sort((a, b) => a.id - b.id);
    case 'published':
      return sorted.sort((a, b) => {
        const ta = parseTimestamp(a.published_at) ?? 0;
        const tb = parseTimestamp(b.published_at) ?? 0;
        return tb - ta || b.id - a.id;
      });
  }
}
