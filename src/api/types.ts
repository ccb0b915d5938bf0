import type { GatewayError } from '../errors.js';
import type {
  Category,
  EntriesPage,
  Entry,
  EntryStatus,
  Feed,
} from '../types.js';
import type { SortDirection, SortOrder } from '../config/config.js';

export type ApiResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: GatewayError };

export interface EntriesQuery {
  status?: EntryStatus[];
  order?: SortOrder;
  direction?: SortDirection;
  limit?: number;
  feed_id?: number;
  category_id?: number;
  search?: string;
  starred?: boolean;
  /** unix seconds */
  published_before?: number;
  /** unix seconds */
  published_after?: number;
}

export interface UpdateEntriesBody {
  status?: EntryStatus;
  [key: string]: unknown;
}

export interface Me {
  id: number;
  username: string;
}

/**
 * Stateless access to the feed server. Methods resolve to an ApiResult and
 * never reject.
 */
export interface Gateway {
  getEntries(query?: EntriesQuery): Promise<ApiResult<EntriesPage>>;
  getFeedEntries(
    feedId: number,
    query?: EntriesQuery,
  ): Promise<ApiResult<EntriesPage>>;
  getCategoryEntries(
    categoryId: number,
    query?: EntriesQuery,
  ): Promise<ApiResult<EntriesPage>>;
  getEntry(id: number): Promise<ApiResult<Entry>>;
  updateEntries(
    ids: number | number[],
    body: UpdateEntriesBody,
  ): Promise<ApiResult<void>>;
  toggleBookmark(id: number): Promise<ApiResult<void>>;
  markFeedAsRead(feedId: number): Promise<ApiResult<void>>;
  markCategoryAsRead(categoryId: number): Promise<ApiResult<void>>;
  getFeeds(): Promise<ApiResult<Feed[]>>;
  getCategories(includeCounts?: boolean): Promise<ApiResult<Category[]>>;
  getMe(): Promise<ApiResult<Me>>;
}
