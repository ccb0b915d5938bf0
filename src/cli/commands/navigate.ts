import type { App } from '../../factory.js';
import { LOCAL_SORTS, type LocalSort } from '../../local/store.js';
import type { NavigateResult } from '../../reader/navigation.js';
import type { NavigationContext, NavigationDirection } from '../../types.js';
import { parseId } from './entry.js';

const CONTEXT_HELP = 'global, unread, starred, feed:<id>, category:<id>, local';

function isLocalSort(value: string): value is LocalSort {
  return LOCAL_SORTS.some((s) => s === value);
}

/** Reads a listing scope such as `feed:12`. The local scope lists disk order. */
export async function parseContext(
  app: App,
  value: string | undefined,
  sort = 'published',
): Promise<NavigationContext> {
  const raw = (value ?? 'global').trim();
  const [type, id] = raw.split(':');
  switch (type) {
    case 'global':
    case 'unread':
    case 'starred':
      return { type };
    case 'feed':
    case 'category':
      if (id === undefined) {
        throw new Error(`Context "${raw}" needs an id, as in ${type}:12`);
      }
      return { type, id: parseId(id, type) };
    case 'local': {
      if (!isLocalSort(sort)) {
        throw new Error(`Invalid sort "${sort}". Valid sorts: ${LOCAL_SORTS.join(', ')}`);
      }
      const entries = await app.store.listLocalEntries(sort);
      return { type: 'local', orderedIds: entries.map((e) => e.id) };
    }
    default:
      throw new Error(`Invalid context "${raw}". Valid contexts: ${CONTEXT_HELP}`);
  }
}

export async function runNavigate(
  app: App,
  idStr: string,
  direction: NavigationDirection,
  opts: { context?: string; sort?: string },
): Promise<NavigateResult> {
  const entryId = parseId(idStr);
  const context = await parseContext(app, opts.context, opts.sort);
  const result = await app.navigation.navigate(entryId, direction, context);
  if (result.kind === 'opened') {
    await app.entries.onEntryClosed(entryId);
    const metadata = await app.store.loadMetadata(result.entryId);
    if (metadata) {
      await app.entries.performAutoMarkAsRead(result.entryId, metadata.status);
    }
  }
  return result;
}
