import { requireServer, type App } from '../../factory.js';
import {
  PREFETCH_SOURCES,
  prefetchEntries,
  type PrefetchOutcome,
  type PrefetchSource,
} from '../../download/prefetch.js';

function parseSource(value: string): PrefetchSource {
  const match = PREFETCH_SOURCES.find((s) => s === value);
  if (!match) {
    throw new Error(
      `Invalid source "${value}". Valid sources: ${PREFETCH_SOURCES.join(', ')}`,
    );
  }
  return match;
}

export async function runPrefetch(
  app: App,
  sourceStr: string,
  opts: { count?: string },
): Promise<PrefetchOutcome> {
  requireServer(app.config);
  const source = parseSource(sourceStr);
  const count =
    opts.count !== undefined ? Number(opts.count) : app.config.prefetch_count;
  if (!Number.isInteger(count) || count <= 0) {
    throw new Error(
      'Nothing to prefetch: pass --count <n> or set prefetch_count',
    );
  }
  return prefetchEntries({
    gateway: app.gateway,
    store: app.store,
    batch: app.batch,
    config: app.config,
    source,
    count,
  });
}
