import type {
  Category,
  EntriesPage,
  Entry,
  Feed,
} from '../types.js';
import { HttpClient, type HttpClientOptions, type Query } from './client.js';
import type {
  ApiResult,
  EntriesQuery,
  Gateway,
  Me,
  UpdateEntriesBody,
} from './types.js';

/**
 * Query parameters for an entries listing. `status` is repeated once per
 * value and omitted when exactly unread+read are requested, which the server
 * already treats as "anything but removed".
 */
export function entriesQueryParams(query: EntriesQuery = {}): Query {
  const params: Query = [];
  const statuses = query.status ?? [];
  const isUnreadAndRead =
    statuses.length === 2 &&
    statuses.includes('unread') &&
    statuses.includes('read');
  if (!isUnreadAndRead) {
    for (const status of statuses) params.push(['status', status]);
  }
  params.push(['order', query.order]);
  params.push(['direction', query.direction]);
  params.push(['limit', query.limit]);
  params.push(['feed_id', query.feed_id]);
  params.push(['category_id', query.category_id]);
  if (query.search !== undefined && query.search.trim() !== '') {
    params.push(['search', query.search]);
  }
  if (query.starred !== undefined) {
    params.push(['starred', query.starred ? 'true' : 'false']);
  }
  params.push(['published_before', query.published_before]);
  params.push(['published_after', query.published_after]);
  return params;
}

export class MinifluxGateway implements Gateway {
  private readonly http: HttpClient;

  constructor(opts: HttpClientOptions | HttpClient) {
    this.http = opts instanceof HttpClient ? opts : new HttpClient(opts);
  }

  buildEntriesUrl(query: EntriesQuery = {}): string {
    return this.http.url('/entries', entriesQueryParams(query));
  }

  getEntries(query?: EntriesQuery): Promise<ApiResult<EntriesPage>> {
    return this.http.get<EntriesPage>('/entries', entriesQueryParams(query));
  }

  getFeedEntries(
    feedId: number,
    query?: EntriesQuery,
  ): Promise<ApiResult<EntriesPage>> {
    const { feed_id: _ignored, ...rest } = query ?? {};
    return this.http.get<EntriesPage>(
      `/feeds/${feedId}/entries`,
      entriesQueryParams(rest),
    );
  }

  getCategoryEntries(
    categoryId: number,
    query?: EntriesQuery,
  ): Promise<ApiResult<EntriesPage>> {
    const { category_id: _ignored, ...rest } = query ?? {};
    return this.http.get<EntriesPage>(
      `/categories/${categoryId}/entries`,
      entriesQueryParams(rest),
    );
  }

  getEntry(id: number): Promise<ApiResult<Entry>> {
    return this.http.get<Entry>(`/entries/${id}`);
  }

  updateEntries(
    ids: number | number[],
    body: UpdateEntriesBody,
  ): Promise<ApiResult<void>> {
    const entryIds = Array.isArray(ids) ? ids : [ids];
    return this.http.put('/entries', { ...body, entry_ids: entryIds });
  }

  toggleBookmark(id: number): Promise<ApiResult<void>> {
    return this.http.put(`/entries/${id}/bookmark`);
  }

  markFeedAsRead(feedId: number): Promise<ApiResult<void>> {
    return this.http.put(`/feeds/${feedId}/mark-all-as-read`);
  }

  markCategoryAsRead(categoryId: number): Promise<ApiResult<void>> {
    return this.http.put(`/categories/${categoryId}/mark-all-as-read`);
  }

  getFeeds(): Promise<ApiResult<Feed[]>> {
    return this.http.get<Feed[]>('/feeds');
  }

  getCategories(includeCounts = false): Promise<ApiResult<Category[]>> {
    return this.http.get<Category[]>(
      '/categories',
      includeCounts ? [['counts', 'true']] : [],
    );
  }

  getMe(): Promise<ApiResult<Me>> {
    return this.http.get<Me>('/me');
  }
}
