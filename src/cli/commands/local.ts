import type { App } from '../../factory.js';
import {
  deleteAllImages,
  deleteImages,
  deleteOlderThan,
  getStorageStats,
  recoverAllImages,
  recoverImages,
  type StorageStats,
} from '../../local/storage.js';
import { LOCAL_SORTS, type LocalEntrySummary, type LocalSort } from '../../local/store.js';
import { parseId } from './entry.js';

function parseSort(value: string | undefined): LocalSort {
  const sort = value ?? 'published';
  const match = LOCAL_SORTS.find((s) => s === sort);
  if (!match) {
    throw new Error(`Invalid sort "${sort}". Valid sorts: ${LOCAL_SORTS.join(', ')}`);
  }
  return match;
}

export async function runLocalList(
  app: App,
  opts: { sort?: string },
): Promise<LocalEntrySummary[]> {
  return app.store.listLocalEntries(parseSort(opts.sort));
}

export async function runLocalDelete(app: App, ids: string[]): Promise<number[]> {
  const deleted: number[] = [];
  for (const id of ids.map((value) => parseId(value))) {
    if (await app.store.deleteEntry(id)) deleted.push(id);
  }
  return deleted;
}

export interface ClearResult {
  cleared: number;
  cancelled: boolean;
}

export async function runLocalClear(app: App, opts: { yes?: boolean }): Promise<ClearResult> {
  if (!opts.yes) {
    const confirmed = await app.prompter.confirm(
      'Delete all local entries?',
      'Every downloaded entry and its images will be removed. Pending changes stay queued.',
      false,
    );
    if (!confirmed) return { cleared: 0, cancelled: true };
  }
  return { cleared: await app.store.clearAll(), cancelled: false };
}

export async function runLocalPurge(app: App, daysStr: string): Promise<number[]> {
  const days = Number(daysStr);
  if (!Number.isInteger(days) || days < 0) {
    throw new Error(`Invalid number of days "${daysStr}"`);
  }
  return deleteOlderThan(app.store, days);
}

export async function runImagesDelete(app: App, idStr?: string): Promise<number> {
  if (idStr === undefined) return deleteAllImages(app.store);
  return deleteImages(app.store, parseId(idStr));
}

export async function runImagesRecover(app: App, idStr?: string): Promise<number> {
  if (idStr === undefined) return recoverAllImages(app.store, app.fetcher);
  return recoverImages(app.store, parseId(idStr), app.fetcher);
}

export async function runLocalStats(app: App): Promise<StorageStats> {
  return getStorageStats(app.store);
}
