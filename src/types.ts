export type EntryStatus = 'unread' | 'read' | 'removed';

export const ENTRY_STATUSES: readonly EntryStatus[] = [
  'unread',
  'read',
  'removed',
];

export interface CategoryRef {
  id: number;
  title: string;
}

export interface FeedRef {
  id: number;
  title: string;
  category?: CategoryRef;
}

export interface Entry {
  id: number;
  title: string;
  content?: string;
  summary?: string;
  url?: string;
  published_at?: string;
  status: EntryStatus;
  starred: boolean;
  feed?: FeedRef;
}

export interface Feed {
  id: number;
  title: string;
  site_url: string;
  feed_url: string;
  category?: CategoryRef;
  disabled?: boolean;
}

export interface Category {
  id: number;
  title: string;
  total_unread?: number;
}

export interface EntriesPage {
  total: number;
  entries: Entry[];
}

/** Side-file stored next to a downloaded entry's HTML. */
export interface EntryMetadata {
  id: number;
  title: string;
  url?: string;
  status: EntryStatus;
  starred: boolean;
  published_at?: string;
  feed?: { id: number; title: string };
  category?: CategoryRef;
  /** local filename -> original source URL */
  images: Record<string, string>;
  last_updated: string;
}

export type CollectionKind = 'feed' | 'category';

export type NavigationDirection = 'previous' | 'next';

export type NavigationContext =
  | { type: 'global' }
  | { type: 'unread' }
  | { type: 'starred' }
  | { type: 'feed'; id: number }
  | { type: 'category'; id: number }
  | { type: 'local'; orderedIds: number[] };
