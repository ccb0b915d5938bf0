import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { FetchLike } from '../api/client.js';
import { InMemoryGateway } from '../api/fakeGateway.js';
import { ImageFetcher } from '../content/fetchImage.js';
import { HtmlContentPipeline } from '../content/pipeline.js';
import { EntryInfoCache } from '../local/cache.js';
import { LocalEntryStore } from '../local/store.js';
import { AutoPrompter, ScriptedPrompter, type Prompter } from '../prompts/prompter.js';
import { createDownloadProgressStore } from '../stores/downloadProgressStore.js';
import type { Entry } from '../types.js';
import { BatchDownloadWorkflow } from './BatchDownloadWorkflow.js';
import { CancellationToken } from './cancellation.js';
import { batchSummaryMessage } from './messages.js';

function entry(id: number, content = `<p>Body ${id}</p>`): Entry {
  return { id, title: `Entry ${id}`, content, status: 'unread', starred: false };
}

const TWO_IMAGES = '<img src="https://img.test/a.png"><img src="https://img.test/b.png">';

describe('batchSummaryMessage', () => {
  it('covers full success, full failure and mixed results', () => {
    expect(batchSummaryMessage(1, 1, 0)).toBe('Download completed successfully!');
    expect(batchSummaryMessage(3, 3, 0)).toBe('All 3 entries downloaded successfully!');
    expect(batchSummaryMessage(2, 0, 2)).toBe('All 2 entries failed to download.');
    expect(batchSummaryMessage(3, 2, 1)).toBe('Batch download completed: 2 successful, 1 failed.');
  });
});

describe('BatchDownloadWorkflow', () => {
  let tmpDir: string;
  let store: LocalEntryStore;
  let gateway: InMemoryGateway;
  let fetchImpl: Mock<FetchLike>;
  let token: CancellationToken;
  let clock: number;

  function workflow(prompter: Prompter = new AutoPrompter()): BatchDownloadWorkflow {
    return new BatchDownloadWorkflow({
      gateway,
      store,
      pipeline: new HtmlContentPipeline(),
      fetcher: new ImageFetcher({ fetch: fetchImpl }),
      prompter,
      token,
      progress: createDownloadProgressStore(),
      now: () => clock,
    });
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fluxreader-batch-test-'));
    store = new LocalEntryStore(tmpDir, new EntryInfoCache());
    gateway = new InMemoryGateway();
    fetchImpl = vi.fn<FetchLike>(() =>
      Promise.resolve(
        new Response(new Uint8Array(32), { headers: { 'Content-Type': 'image/png' } }),
      ),
    );
    token = new CancellationToken();
    clock = 0;
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true });
  });

  it('downloads every entry and reports the summary', async () => {
    const result = await workflow().execute([entry(1), entry(2)], { includeImages: true });
    expect(result).toEqual({
      completed: 2,
      failed: 0,
      cancelled: false,
      message: 'All 2 entries downloaded successfully!',
    });
    expect(await store.listEntryIds()).toEqual([1, 2]);
  });

  it('prefers the full entry from the server', async () => {
    gateway.entries.set(5, entry(5, '<p>Full text</p>'));
    await workflow().execute([entry(5, '<p>Trunc</p>')], { includeImages: false });
    expect(fs.readFileSync(store.htmlPath(5), 'utf-8')).toContain('<p>Full text</p>');
  });

  it('counts already downloaded entries as done without refetching', async () => {
    fs.mkdirSync(path.join(tmpDir, '3'));
    fs.writeFileSync(store.htmlPath(3), '<p>x</p>');
    const result = await workflow().execute([entry(3)], { includeImages: true });
    expect(result.completed).toBe(1);
    expect(gateway.callsTo('getEntry')).toEqual([]);
  });

  it('counts entries with invalid ids as failed', async () => {
    const result = await workflow().execute([entry(0), entry(4)], { includeImages: true });
    expect(result.message).toBe('Batch download completed: 1 successful, 1 failed.');
  });

  it('skips images for the rest of the batch', async () => {
    fetchImpl.mockImplementation(() => {
      token.request();
      clock += 1500;
      return Promise.resolve(
        new Response(new Uint8Array(32), { headers: { 'Content-Type': 'image/png' } }),
      );
    });
    const prompter = new ScriptedPrompter(['skip_images_all']);

    const result = await workflow(prompter).execute(
      [entry(1, TWO_IMAGES), entry(2, TWO_IMAGES)],
      { includeImages: true },
    );

    expect(result.completed).toBe(2);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(prompter.asked).toEqual(['Cancel batch download?']);
    expect(fs.existsSync(path.join(tmpDir, '2', 'image_001.png'))).toBe(false);
  });

  it('stops the whole batch on cancel all', async () => {
    fetchImpl.mockImplementation(() => {
      token.request();
      clock += 1500;
      return Promise.resolve(
        new Response(new Uint8Array(32), { headers: { 'Content-Type': 'image/png' } }),
      );
    });

    const result = await workflow(new ScriptedPrompter(['cancel_all'])).execute(
      [entry(1), entry(2, TWO_IMAGES), entry(3)],
      { includeImages: true },
    );

    expect(result).toEqual({
      completed: 1,
      failed: 0,
      cancelled: true,
      message: 'Batch download cancelled. Downloaded 1/3 entries.',
    });
    expect(await store.listEntryIds()).toEqual([1]);
    expect(fs.existsSync(path.join(tmpDir, '2'))).toBe(false);
  });

  it('keeps the failures counted before cancel all', async () => {
    fetchImpl.mockImplementation(() => {
      token.request();
      clock += 1500;
      return Promise.resolve(
        new Response(new Uint8Array(32), { headers: { 'Content-Type': 'image/png' } }),
      );
    });

    const result = await workflow(new ScriptedPrompter(['cancel_all'])).execute(
      [entry(0), entry(2, TWO_IMAGES), entry(3)],
      { includeImages: true },
    );

    expect(result).toEqual({
      completed: 0,
      failed: 1,
      cancelled: true,
      message: 'Batch download cancelled. Downloaded 0/3 entries.',
    });
  });

  it('asks between entries once the cancel key was pressed', async () => {
    fetchImpl.mockImplementation(() => {
      token.request();
      clock += 1500;
      return Promise.resolve(
        new Response(new Uint8Array(32), { headers: { 'Content-Type': 'image/png' } }),
      );
    });
    const prompter = new ScriptedPrompter(['cancel_all']);

    const result = await workflow(prompter).execute(
      [entry(1, '<img src="https://img.test/a.png">'), entry(2)],
      { includeImages: true },
    );

    expect(result.message).toBe('Batch download cancelled. Downloaded 1/2 entries.');
    expect(prompter.asked).toEqual(['Cancel batch download?']);
    expect(await store.listEntryIds()).toEqual([1]);
  });
});
