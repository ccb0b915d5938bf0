import { describe, it, expect, vi } from 'vitest';
import { MinifluxGateway, entriesQueryParams } from './miniflux.js';
import { buildQueryString, type FetchLike } from './client.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createGateway(fetchImpl: FetchLike): MinifluxGateway {
  return new MinifluxGateway({
    serverAddress: 'https://reader.example.com/',
    apiToken: 'test-secret',
    timeoutMs: 1000,
    fetch: fetchImpl,
  });
}

describe('entriesQueryParams', () => {
  it('omits status when exactly unread and read are requested', () => {
    const qs = buildQueryString(
      entriesQueryParams({ status: ['unread', 'read'], limit: 5 }),
    );
    expect(qs).toBe('?limit=5');
  });

  it('repeats status once per value', () => {
    const qs = buildQueryString(
      entriesQueryParams({ status: ['unread', 'removed'] }),
    );
    expect(qs).toBe('?status=unread&status=removed');
  });

  it('encodes navigation filters in a stable order', () => {
    const qs = buildQueryString(
      entriesQueryParams({
        status: ['unread'],
        order: 'published_at',
        direction: 'desc',
        limit: 1,
        feed_id: 7,
        starred: false,
        published_before: 1700000000,
      }),
    );
    expect(qs).toBe(
      '?status=unread&order=published_at&direction=desc&limit=1&feed_id=7&starred=false&published_before=1700000000',
    );
  });

  it('skips a blank search term', () => {
    expect(buildQueryString(entriesQueryParams({ search: '  ' }))).toBe('');
  });
});

describe('MinifluxGateway', () => {
  it('sends the auth token and parses an entries page', async () => {
    const fetchImpl = vi.fn<FetchLike>(() =>
      Promise.resolve(jsonResponse({ total: 0, entries: [] })),
    );
    const gateway = createGateway(fetchImpl);

    const result = await gateway.getEntries({ status: ['unread'] });

    expect(result).toEqual({ ok: true, value: { total: 0, entries: [] } });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://reader.example.com/v1/entries?status=unread');
    expect(init?.method).toBe('GET');
    expect(new Headers(init?.headers).get('X-Auth-Token')).toBe('test-secret');
  });

  it('builds entry urls against the /v1 base', () => {
    const gateway = createGateway(vi.fn<FetchLike>());
    expect(gateway.buildEntriesUrl({ limit: 1, order: 'id' })).toBe(
      'https://reader.example.com/v1/entries?order=id&limit=1',
    );
  });

  it('sends one bulk update with every id', async () => {
    const fetchImpl = vi.fn<FetchLike>(() =>
      Promise.resolve(new Response(null, { status: 204 })),
    );
    const gateway = createGateway(fetchImpl);

    const result = await gateway.updateEntries([1, 2], { status: 'read' });

    expect(result.ok).toBe(true);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://reader.example.com/v1/entries');
    expect(init?.method).toBe('PUT');
    expect(JSON.parse(String(init?.body))).toEqual({
      status: 'read',
      entry_ids: [1, 2],
    });
  });

  it('wraps a single id into an array', async () => {
    const fetchImpl = vi.fn<FetchLike>(() =>
      Promise.resolve(new Response(null, { status: 204 })),
    );
    await createGateway(fetchImpl).updateEntries(9, { status: 'unread' });
    const init = fetchImpl.mock.calls[0]?.[1];
    expect(JSON.parse(String(init?.body))).toEqual({
      status: 'unread',
      entry_ids: [9],
    });
  });

  it('targets collection endpoints for mark-all-as-read', async () => {
    const fetchImpl = vi.fn<FetchLike>(() =>
      Promise.resolve(new Response(null, { status: 204 })),
    );
    const gateway = createGateway(fetchImpl);
    await gateway.markFeedAsRead(3);
    await gateway.markCategoryAsRead(4);
    await gateway.toggleBookmark(5);
    expect(fetchImpl.mock.calls.map((c) => c[0])).toEqual([
      'https://reader.example.com/v1/feeds/3/mark-all-as-read',
      'https://reader.example.com/v1/categories/4/mark-all-as-read',
      'https://reader.example.com/v1/entries/5/bookmark',
    ]);
  });

  it('maps a rejected fetch to a network error', async () => {
    const gateway = createGateway(
      vi.fn<FetchLike>(() => Promise.reject(new Error('ECONNREFUSED'))),
    );
    const result = await gateway.getEntry(1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('network');
      expect(result.error.isTransport).toBe(true);
      expect(result.error.message).toBe('ECONNREFUSED');
    }
  });

  it('maps a non-2xx response to an http error with the server message', async () => {
    const gateway = createGateway(
      vi.fn<FetchLike>(() =>
        Promise.resolve(jsonResponse({ error_message: 'Not Found' }, 404)),
      ),
    );
    const result = await gateway.getEntry(1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('http');
      expect(result.error.status).toBe(404);
      expect(result.error.message).toBe('HTTP 404: Not Found');
    }
  });

  it('maps an invalid body to a parse error', async () => {
    const gateway = createGateway(
      vi.fn<FetchLike>(() => Promise.resolve(new Response('<html>'))),
    );
    const result = await gateway.getFeeds();
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('parse');
  });

  it('requests category counts when asked', async () => {
    const fetchImpl = vi.fn<FetchLike>(() => Promise.resolve(jsonResponse([])));
    await createGateway(fetchImpl).getCategories(true);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe(
      'https://reader.example.com/v1/categories?counts=true',
    );
  });
});
