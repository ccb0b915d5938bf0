import fs from 'node:fs/promises';
import type { Gateway } from '../api/types.js';
import { errorMessage, isValidEntryId } from '../errors.js';
import { logger } from '../logger.js';
import { entryContent, type ContentPipeline } from '../content/pipeline.js';
import { materializeImages, type ImageFetcher } from '../content/fetchImage.js';
import type { LocalEntryStore } from '../local/store.js';
import type { Prompter } from '../prompts/prompter.js';
import {
  downloadProgressStore,
  type DownloadProgressStore,
} from '../stores/downloadProgressStore.js';
import type { Entry } from '../types.js';
import { CancellationToken, createThrottle } from './cancellation.js';
import { askWithView, persistEntry, type ProgressView } from './DownloadWorkflow.js';
import {
  batchCancelledMessage,
  batchEntryMessage,
  batchImagesMessage,
  batchSummaryMessage,
  imagesMessage,
  processingMessage,
} from './messages.js';
import {
  batchChoices,
  batchImageChoices,
  type BatchResult,
  type DownloadOptions,
} from './types.js';

export interface BatchDownloadDeps {
  gateway: Gateway;
  store: LocalEntryStore;
  pipeline: ContentPipeline;
  fetcher: ImageFetcher;
  prompter: Prompter;
  token?: CancellationToken;
  progress?: DownloadProgressStore;
  view?: ProgressView;
  now?: () => number;
}

interface BatchState {
  skipImagesForAll: boolean;
  cancelAll: boolean;
}

const log = logger.child('BatchDownload');

/**
 * Downloads several entries in order. Choices made at a checkpoint can
 * apply to the rest of the batch: skip or include images, or stop.
 */
export class BatchDownloadWorkflow {
  private readonly deps: BatchDownloadDeps;
  private readonly progress: DownloadProgressStore;
  readonly token: CancellationToken;

  constructor(deps: BatchDownloadDeps) {
    this.deps = deps;
    this.token = deps.token ?? new CancellationToken();
    this.progress = deps.progress ?? downloadProgressStore;
  }

  async execute(entries: Entry[], opts: DownloadOptions): Promise<BatchResult> {
    const total = entries.length;
    const state: BatchState = { skipImagesForAll: false, cancelAll: false };
    const due = createThrottle(undefined, this.deps.now);
    let completed = 0;
    let failed = 0;

    try {
      for (const [i, listed] of entries.entries()) {
        const index = i + 1;
        const title = listed.title || 'Untitled Entry';
        this.progress.getState().startEntry(title, index, total);
        this.progress
          .getState()
          .setPhase('preparing', batchEntryMessage(index, total, title));

        if (due() && this.token.isRequested) {
          const choice = await askWithView(this.deps.prompter, this.deps.view, {
            title: 'Cancel batch download?',
            message: this.progress.getState().message,
            choices: batchChoices(state.skipImagesForAll),
            defaultValue: 'resume',
          });
          this.token.reset();
          if (choice === 'cancel_all') state.cancelAll = true;
          else if (choice === 'skip_images_all') state.skipImagesForAll = true;
          else if (choice === 'include_images_all') state.skipImagesForAll = false;
        }
        if (state.cancelAll) return this.cancelled(completed, failed, total);

        const ok = await this.downloadOne(listed, { index, total, due, state, opts });
        if (state.cancelAll) return this.cancelled(completed, failed, total);
        if (ok) completed++;
        else failed++;
      }
    } finally {
      this.progress.getState().reset();
    }

    const message = batchSummaryMessage(total, completed, failed);
    log.info('Batch download finished', { total, completed, failed });
    return { completed, failed, cancelled: false, message };
  }

  private cancelled(completed: number, failed: number, total: number): BatchResult {
    const message = batchCancelledMessage(completed, total);
    log.info('Batch download cancelled', { completed, failed, total });
    return { completed, failed, cancelled: true, message };
  }

  /** Listings may carry truncated content; the full entry wins when reachable. */
  private async refetch(entry: Entry): Promise<Entry> {
    const result = await this.deps.gateway.getEntry(entry.id);
    return result.ok ? result.value : entry;
  }

  private async downloadOne(
    listed: Entry,
    ctx: {
      index: number;
      total: number;
      due: () => boolean;
      state: BatchState;
      opts: DownloadOptions;
    },
  ): Promise<boolean> {
    const { store, pipeline, fetcher, prompter, view } = this.deps;
    if (!isValidEntryId(listed.id)) return false;
    if (await store.isDownloaded(listed.id)) return true;

    const entry = await this.refetch(listed);
    const title = entry.title || 'Untitled Entry';
    try {
      await fs.mkdir(store.entryDir(entry.id), { recursive: true });
      const prepared = pipeline.prepare(entryContent(entry), entry.url);
      const includeImages = ctx.opts.includeImages && !ctx.state.skipImagesForAll;

      if (includeImages && prepared.images.length > 0) {
        this.progress
          .getState()
          .setPhase(
            'downloading',
            this.imageMessage(ctx, title, 1, prepared.images.length),
          );
        let dropEntry = false;
        await materializeImages(prepared.images, fetcher, {
          entryDir: store.entryDir(entry.id),
          entryUrl: entry.url,
          beforeEach: async (i, totalImages) => {
            const message = this.imageMessage(ctx, title, i + 1, totalImages);
            this.progress.getState().setImageProgress(i + 1, totalImages, message);
            if (!ctx.due() || !this.token.isRequested) return true;
            const choice = await askWithView(prompter, view, {
              title: 'Cancel batch download?',
              message,
              choices: batchImageChoices(ctx.state.skipImagesForAll),
              defaultValue: 'resume',
            });
            this.token.reset();
            switch (choice) {
              case 'cancel_entry':
                dropEntry = true;
                return false;
              case 'cancel_all':
                ctx.state.cancelAll = true;
                dropEntry = true;
                return false;
              case 'skip_images_entry':
                return false;
              case 'skip_images_all':
                ctx.state.skipImagesForAll = true;
                return false;
              case 'include_images_all':
                ctx.state.skipImagesForAll = false;
                return true;
              case 'resume':
                return true;
            }
          },
        });
        if (dropEntry) {
          await store.deleteEntry(entry.id);
          return false;
        }
      }

      this.progress.getState().setPhase('processing', processingMessage(title));
      await persistEntry(store, pipeline, entry, prepared);
      return true;
    } catch (err) {
      log.error('Batch entry failed', { entryId: entry.id, error: errorMessage(err) });
      return false;
    }
  }

  private imageMessage(
    ctx: { index: number; total: number },
    title: string,
    i: number,
    totalImages: number,
  ): string {
    return ctx.total === 1
      ? imagesMessage(title, i, totalImages)
      : batchImagesMessage(ctx.index, ctx.total, title, i, totalImages);
  }
}
