import { requireServer, type App } from '../../factory.js';
import type { ServiceResult } from '../../reader/EntryService.js';
import type { Category, CollectionKind, Feed } from '../../types.js';
import { parseId } from './entry.js';

export async function runFeedList(app: App): Promise<Feed[]> {
  requireServer(app.config);
  const result = await app.gateway.getFeeds();
  if (!result.ok) {
    throw new Error(`Failed to load feeds: ${result.error.message}`);
  }
  return result.value;
}

export async function runCategoryList(app: App): Promise<Category[]> {
  requireServer(app.config);
  const result = await app.gateway.getCategories(true);
  if (!result.ok) {
    throw new Error(`Failed to load categories: ${result.error.message}`);
  }
  return result.value;
}

export async function runCollectionMarkRead(
  app: App,
  kind: CollectionKind,
  idStr: string,
): Promise<ServiceResult> {
  return app.entries.markCollectionRead(kind, parseId(idStr, kind));
}
