import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { FetchLike } from '../api/client.js';
import { ImageFetcher } from '../content/fetchImage.js';
import { HtmlContentPipeline, type ContentPipeline } from '../content/pipeline.js';
import { ValidationError } from '../errors.js';
import { EntryInfoCache } from '../local/cache.js';
import { LocalEntryStore } from '../local/store.js';
import { AutoPrompter, ScriptedPrompter, type Prompter } from '../prompts/prompter.js';
import { createDownloadProgressStore } from '../stores/downloadProgressStore.js';
import type { Entry, EntryMetadata } from '../types.js';
import { CancellationToken } from './cancellation.js';
import { DownloadWorkflow } from './DownloadWorkflow.js';

const CONTENT =
  '<p>Intro</p><img src="https://img.test/a.png" width="40"><img src="https://img.test/b.jpg">';

function entry(overrides: Partial<Entry> = {}): Entry {
  return {
    id: 12,
    title: 'Offline post',
    url: 'https://blog.example.com/posts/12',
    content: CONTENT,
    status: 'unread',
    starred: false,
    feed: { id: 3, title: 'Blog', category: { id: 4, title: 'Tech' } },
    ...overrides,
  };
}

function imageResponse(): Response {
  return new Response(new Uint8Array(64), {
    headers: { 'Content-Type': 'image/png' },
  });
}

describe('DownloadWorkflow', () => {
  let tmpDir: string;
  let store: LocalEntryStore;
  let fetchImpl: Mock<FetchLike>;
  let token: CancellationToken;
  let clock: number;

  function workflow(
    prompter: Prompter = new AutoPrompter(),
    pipeline: ContentPipeline = new HtmlContentPipeline(),
  ): DownloadWorkflow {
    return new DownloadWorkflow({
      store,
      pipeline,
      fetcher: new ImageFetcher({ fetch: fetchImpl }),
      prompter,
      token,
      progress: createDownloadProgressStore(),
      now: () => clock,
    });
  }

  function entryFile(name: string): string {
    return path.join(tmpDir, '12', name);
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fluxreader-download-test-'));
    store = new LocalEntryStore(tmpDir, new EntryInfoCache());
    fetchImpl = vi.fn<FetchLike>(() => Promise.resolve(imageResponse()));
    token = new CancellationToken();
    clock = 0;
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true });
  });

  it('downloads images, writes the document and then the metadata', async () => {
    const result = await workflow().execute(entry(), { includeImages: true });

    expect(result).toMatchObject({
      kind: 'completed',
      alreadyDownloaded: false,
      images: { total: 2, downloaded: 2, failed: 0 },
      message: 'Download completed!\n\n2 images downloaded',
    });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    const html = fs.readFileSync(entryFile('entry.html'), 'utf-8');
    expect(html).toContain('src="image_001.png" style="width: 40px"');
    expect(html).toContain('src="image_002.jpg"');
    expect(html).toContain('<base href="file://');
    const meta = JSON.parse(fs.readFileSync(entryFile('metadata.json'), 'utf-8')) as EntryMetadata;
    expect(meta.images).toEqual({
      'image_001.png': 'https://img.test/a.png',
      'image_002.jpg': 'https://img.test/b.jpg',
    });
    expect(meta.category).toEqual({ id: 4, title: 'Tech' });
  });

  it('opens an existing local copy without any network call', async () => {
    fs.mkdirSync(path.join(tmpDir, '12'));
    fs.writeFileSync(entryFile('entry.html'), '<p>cached</p>');

    const result = await workflow().execute(entry(), { includeImages: true });

    expect(result).toMatchObject({ kind: 'completed', alreadyDownloaded: true });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('keeps going when some images fail', async () => {
    fetchImpl.mockImplementation((url) =>
      Promise.resolve(
        String(url).endsWith('b.jpg') ? new Response('missing', { status: 404 }) : imageResponse(),
      ),
    );

    const result = await workflow().execute(entry(), { includeImages: true });

    expect(result.kind === 'completed' ? result.message : '').toBe(
      'Download completed!\n\n1 images downloaded\n1 images skipped',
    );
    expect(fs.existsSync(entryFile('image_002.jpg'))).toBe(false);
  });

  it('skips image downloads when disabled', async () => {
    const result = await workflow().execute(entry(), { includeImages: false });
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(result.kind === 'completed' ? result.message : '').toBe(
      'Download completed!\n\n2 images skipped',
    );
    expect(fs.readFileSync(entryFile('entry.html'), 'utf-8')).toContain('src="image_002.jpg"');
  });

  it('falls back to the summary when there is no content', async () => {
    const result = await workflow().execute(
      entry({ content: undefined, summary: '<p>Short</p>' }),
      { includeImages: true },
    );
    expect(result.kind === 'completed' ? result.message : '').toBe('Download completed!');
    expect(fs.readFileSync(entryFile('entry.html'), 'utf-8')).toContain('<p>Short</p>');
  });

  it('rejects missing entry data', async () => {
    await expect(workflow().execute(null, { includeImages: true })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it('removes the entry when cancelled before preparing', async () => {
    token.request();
    const prompter = new ScriptedPrompter(['cancel_entry']);

    const result = await workflow(prompter).execute(entry(), { includeImages: true });

    expect(result).toEqual({ kind: 'cancelled', entryId: 12 });
    expect(prompter.asked).toEqual(['Cancel download?']);
    expect(fs.existsSync(path.join(tmpDir, '12'))).toBe(false);
  });

  it('continues without the remaining images', async () => {
    fetchImpl.mockImplementation(() => {
      token.request();
      clock += 1500;
      return Promise.resolve(imageResponse());
    });
    const prompter = new ScriptedPrompter(['skip_images']);

    const result = await workflow(prompter).execute(entry(), { includeImages: true });

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(prompter.asked).toEqual(['Cancel download?']);
    expect(result).toMatchObject({
      kind: 'completed',
      images: { total: 2, downloaded: 1, failed: 1 },
    });
    expect(fs.existsSync(entryFile('entry.html'))).toBe(true);
  });

  it('does not look at the token more than once a second', async () => {
    fetchImpl.mockImplementation(() => {
      token.request();
      return Promise.resolve(imageResponse());
    });
    const prompter = new ScriptedPrompter(['continue']);

    await workflow(prompter).execute(entry(), { includeImages: true });

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(prompter.asked).toEqual(['Cancel download?']);
  });

  it('deletes the entry directory when cancelled during images', async () => {
    fetchImpl.mockImplementation(() => {
      token.request();
      clock += 1500;
      return Promise.resolve(imageResponse());
    });

    const result = await workflow(new ScriptedPrompter(['cancel_entry'])).execute(entry(), {
      includeImages: true,
    });

    expect(result.kind).toBe('cancelled');
    expect(fs.existsSync(path.join(tmpDir, '12'))).toBe(false);
  });

  it('does not count the entry as downloaded when the document cannot be written', async () => {
    fs.mkdirSync(path.join(entryFile('entry.html'), 'blocker'), { recursive: true });

    const result = await workflow().execute(entry(), { includeImages: false });

    expect(result).toMatchObject({ kind: 'failed', entryId: 12 });
    expect(await store.isDownloaded(12)).toBe(false);
    expect(fs.existsSync(entryFile('metadata.json'))).toBe(false);
    expect(await store.loadMetadata(12)).toBeNull();
  });

  it('keeps downloaded images when processing fails', async () => {
    const broken: ContentPipeline = {
      prepare: (html, url) => new HtmlContentPipeline().prepare(html, url),
      render: () => {
        throw new Error('render failed');
      },
    };

    const result = await workflow(new AutoPrompter(), broken).execute(entry(), {
      includeImages: true,
    });

    expect(result).toEqual({
      kind: 'failed',
      entryId: 12,
      error: 'Failed to process content: render failed',
    });
    expect(fs.existsSync(entryFile('image_001.png'))).toBe(true);
    expect(await store.isDownloaded(12)).toBe(false);
  });
});
