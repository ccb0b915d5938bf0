import { describe, it, expect } from 'vitest';
import { EntryInfoCache } from './cache.js';
import type { EntryMetadata } from '../types.js';

const meta: EntryMetadata = {
  id: 1,
  title: 'First',
  status: 'unread',
  starred: false,
  images: {},
  last_updated: '2026-01-01T00:00:00.000Z',
};

describe('EntryInfoCache', () => {
  it('returns null for unknown ids', () => {
    expect(new EntryInfoCache().get(1)).toBeNull();
  });

  it('stores and deletes entries', () => {
    const cache = new EntryInfoCache();
    cache.set(1, meta);
    expect(cache.get(1)).toEqual(meta);
    cache.delete(1);
    expect(cache.get(1)).toBeNull();
  });

  it('clears when the last holder releases it', () => {
    const cache = new EntryInfoCache().retain().retain();
    cache.set(1, meta);
    cache.release();
    expect(cache.get(1)).toEqual(meta);
    cache.release();
    expect(cache.refCount).toBe(0);
    expect(cache.size).toBe(0);
  });

  it('ignores extra releases', () => {
    const cache = new EntryInfoCache();
    cache.release();
    expect(cache.refCount).toBe(0);
  });
});
