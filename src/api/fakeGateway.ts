import { GatewayError } from '../errors.js';
import { parseTimestamp } from '../dates.js';
import type { Category, EntriesPage, Entry, Feed } from '../types.js';
import type {
  ApiResult,
  EntriesQuery,
  Gateway,
  Me,
  UpdateEntriesBody,
} from './types.js';

type GatewayMethod = keyof Gateway;

export interface GatewayCall {
  method: GatewayMethod;
  args: unknown[];
}

function ok<T>(value: T): ApiResult<T> {
  return { ok: true, value };
}

/**
 * In-process stand-in for the feed server. Holds entries in memory, records
 * every call and fails whole methods on demand.
 */
export class InMemoryGateway implements Gateway {
  readonly entries = new Map<number, Entry>();
  readonly feeds: Feed[] = [];
  readonly categories: Category[] = [];
  readonly calls: GatewayCall[] = [];
  /** Every method fails with a network error while set. */
  offline = false;
  private readonly failing = new Set<GatewayMethod>();
  private readonly failingStatuses = new Set<string>();

  constructor(entries: Entry[] = []) {
    for (const entry of entries) this.entries.set(entry.id, { ...entry });
  }

  failOn(method: GatewayMethod): this {
    this.failing.add(method);
    return this;
  }

  /** Fails only `updateEntries` calls that set this status. */
  failStatusUpdate(status: string): this {
    this.failingStatuses.add(status);
    return this;
  }

  callsTo(method: GatewayMethod): GatewayCall[] {
    return this.calls.filter((c) => c.method === method);
  }

  private record(method: GatewayMethod, args: unknown[]): GatewayError | null {
    this.calls.push({ method, args });
    if (this.offline) {
      return new GatewayError('network', 'fetch failed');
    }
    if (this.failing.has(method)) {
      return new GatewayError('http', 'HTTP 500', 500);
    }
    return null;
  }

  private list(query: EntriesQuery = {}): EntriesPage {
    let list = [...this.entries.values()];
    if (query.status && query.status.length > 0) {
      const wanted = query.status;
      list = list.filter((e) => wanted.includes(e.status));
    }
    if (query.feed_id !== undefined) {
      list = list.filter((e) => e.feed?.id === query.feed_id);
    }
    if (query.category_id !== undefined) {
      list = list.filter((e) => e.feed?.category?.id === query.category_id);
    }
    if (query.starred !== undefined) {
      list = list.filter((e) => e.starred === query.starred);
    }
    const published = (e: Entry): number => parseTimestamp(e.published_at) ?? 0;
    const before = query.published_before;
    if (before !== undefined) {
      list = list.filter((e) => published(e) < before);
    }
    const after = query.published_after;
    if (after !== undefined) {
      list = list.filter((e) => published(e) > after);
    }
    const sign = query.direction === 'asc' ? 1 : -1;
    list.sort((a, b) => sign * (published(a) - published(b) || a.id - b.id));
    const total = list.length;
    if (query.limit !== undefined) list = list.slice(0, query.limit);
    return { total, entries: list };
  }

  getEntries(query?: EntriesQuery): Promise<ApiResult<EntriesPage>> {
    const error = this.record('getEntries', [query]);
    if (error) return Promise.resolve({ ok: false, error });
    return Promise.resolve(ok(this.list(query)));
  }

  getFeedEntries(
    feedId: number,
    query?: EntriesQuery,
  ): Promise<ApiResult<EntriesPage>> {
    const error = this.record('getFeedEntries', [feedId, query]);
    if (error) return Promise.resolve({ ok: false, error });
    return Promise.resolve(ok(this.list({ ...query, feed_id: feedId })));
  }

  getCategoryEntries(
    categoryId: number,
    query?: EntriesQuery,
  ): Promise<ApiResult<EntriesPage>> {
    const error = this.record('getCategoryEntries', [categoryId, query]);
    if (error) return Promise.resolve({ ok: false, error });
    return Promise.resolve(ok(this.list({ ...query, category_id: categoryId })));
  }

  getEntry(id: number): Promise<ApiResult<Entry>> {
    const error = this.record('getEntry', [id]);
    if (error) return Promise.resolve({ ok: false, error });
    const entry = this.entries.get(id);
    if (!entry) {
      return Promise.resolve({
        ok: false,
        error: new GatewayError('http', 'HTTP 404', 404),
      });
    }
    return Promise.resolve(ok({ ...entry }));
  }

  updateEntries(
    ids: number | number[],
    body: UpdateEntriesBody,
  ): Promise<ApiResult<void>> {
    const list = Array.isArray(ids) ? ids : [ids];
    const error = this.record('updateEntries', [list, body]);
    if (error) return Promise.resolve({ ok: false, error });
    if (body.status && this.failingStatuses.has(body.status)) {
      return Promise.resolve({
        ok: false,
        error: new GatewayError('network', 'fetch failed'),
      });
    }
    for (const id of list) {
      const entry = this.entries.get(id);
      if (entry && body.status) entry.status = body.status;
    }
    return Promise.resolve(ok(undefined));
  }

  toggleBookmark(id: number): Promise<ApiResult<void>> {
    const error = this.record('toggleBookmark', [id]);
    if (error) return Promise.resolve({ ok: false, error });
    const entry = this.entries.get(id);
    if (entry) entry.starred = !entry.starred;
    return Promise.resolve(ok(undefined));
  }

  markFeedAsRead(feedId: number): Promise<ApiResult<void>> {
    const error = this.record('markFeedAsRead', [feedId]);
    if (error) return Promise.resolve({ ok: false, error });
    for (const entry of this.entries.values()) {
      if (entry.feed?.id === feedId) entry.status = 'read';
    }
    return Promise.resolve(ok(undefined));
  }

  markCategoryAsRead(categoryId: number): Promise<ApiResult<void>> {
    const error = this.record('markCategoryAsRead', [categoryId]);
    if (error) return Promise.resolve({ ok: false, error });
    for (const entry of this.entries.values()) {
      if (entry.feed?.category?.id === categoryId) entry.status = 'read';
    }
    return Promise.resolve(ok(undefined));
  }

  getFeeds(): Promise<ApiResult<Feed[]>> {
    const error = this.record('getFeeds', []);
    if (error) return Promise.resolve({ ok: false, error });
    return Promise.resolve(ok([...this.feeds]));
  }

  getCategories(includeCounts?: boolean): Promise<ApiResult<Category[]>> {
    const error = this.record('getCategories', [includeCounts]);
    if (error) return Promise.resolve({ ok: false, error });
    return Promise.resolve(ok([...this.categories]));
  }

  getMe(): Promise<ApiResult<Me>> {
    const error = this.record('getMe', []);
    if (error) return Promise.resolve({ ok: false, error });
    return Promise.resolve(ok({ id: 1, username: 'reader' }));
  }
}
