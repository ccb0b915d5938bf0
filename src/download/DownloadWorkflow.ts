import fs from 'node:fs/promises';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { ContentPipeline, PreparedContent } from '../content/pipeline.js';
import { entryContent, validateForDownload } from '../content/pipeline.js';
import { materializeImages, type ImageFetcher } from '../content/fetchImage.js';
import { buildMetadata } from '../local/metadata.js';
import { writeFileAtomic } from '../local/files.js';
import type { LocalEntryStore } from '../local/store.js';
import type { ChooseOptions, Prompter } from '../prompts/prompter.js';
import {
  downloadProgressStore,
  type DownloadProgressStore,
} from '../stores/downloadProgressStore.js';
import type { Entry } from '../types.js';
import { CancellationToken, createThrottle } from './cancellation.js';
import {
  completionMessage,
  imageErrorsMessage,
  imagesMessage,
  preparingMessage,
  processingMessage,
} from './messages.js';
import {
  IMAGE_PHASE_CHOICES,
  PHASE_CHOICES,
  type DownloadOptions,
  type DownloadResult,
  type ImageCounts,
} from './types.js';

/** Hides a live progress view while a prompt owns the terminal. */
export interface ProgressView {
  suspend(): void;
  resume(): void;
}

export interface DownloadWorkflowDeps {
  store: LocalEntryStore;
  pipeline: ContentPipeline;
  fetcher: ImageFetcher;
  prompter: Prompter;
  token?: CancellationToken;
  progress?: DownloadProgressStore;
  view?: ProgressView;
  now?: () => number;
}

const log = logger.child('DownloadWorkflow');

export async function askWithView<T extends string>(
  prompter: Prompter,
  view: ProgressView | undefined,
  opts: ChooseOptions<T>,
): Promise<T> {
  view?.suspend();
  try {
    return await prompter.choose(opts);
  } finally {
    view?.resume();
  }
}

export function countImages(prepared: PreparedContent): ImageCounts {
  const downloaded = prepared.images.filter((img) => img.downloaded).length;
  return {
    total: prepared.images.length,
    downloaded,
    failed: prepared.images.length - downloaded,
  };
}

/**
 * Writes the metadata and then the document. The document is what marks an
 * entry as downloaded, so it goes last and a failed write drops the metadata.
 */
export async function persistEntry(
  store: LocalEntryStore,
  pipeline: ContentPipeline,
  entry: Entry,
  prepared: PreparedContent,
): Promise<string> {
  const htmlPath = store.htmlPath(entry.id);
  const html = pipeline.render(entry, prepared, store.entryDir(entry.id));
  await store.saveMetadata(buildMetadata(entry, prepared.imagesMapping));
  try {
    await writeFileAtomic(htmlPath, html);
  } catch (err) {
    await store.discardMetadata(entry.id);
    throw err;
  }
  return htmlPath;
}

/**
 * Downloads one entry for offline reading: prepare, fetch images,
 * render, save. Cancellation is checked before preparing, between images
 * at most once a second, and before processing.
 */
export class DownloadWorkflow {
  private readonly store: LocalEntryStore;
  private readonly pipeline: ContentPipeline;
  private readonly fetcher: ImageFetcher;
  private readonly prompter: Prompter;
  private readonly progress: DownloadProgressStore;
  private readonly view: ProgressView | undefined;
  private readonly now: () => number;
  readonly token: CancellationToken;

  constructor(deps: DownloadWorkflowDeps) {
    this.store = deps.store;
    this.pipeline = deps.pipeline;
    this.fetcher = deps.fetcher;
    this.prompter = deps.prompter;
    this.token = deps.token ?? new CancellationToken();
    this.progress = deps.progress ?? downloadProgressStore;
    this.view = deps.view;
    this.now = deps.now ?? Date.now;
  }

  async execute(
    input: Entry | null | undefined,
    opts: DownloadOptions,
  ): Promise<DownloadResult> {
    const entry = validateForDownload(input);
    const title = entry.title || 'Untitled Entry';

    if (await this.store.isDownloaded(entry.id)) {
      log.debug('Opening existing local copy', { entryId: entry.id });
      return {
        kind: 'completed',
        entryId: entry.id,
        htmlPath: this.store.htmlPath(entry.id),
        alreadyDownloaded: true,
        images: { total: 0, downloaded: 0, failed: 0 },
        message: '',
      };
    }

    const state = this.progress.getState();
    state.startEntry(title);
    try {
      state.setPhase('preparing', preparingMessage(title));
      if (!(await this.checkpoint())) return await this.cancel(entry.id);

      let prepared: PreparedContent;
      try {
        await fs.mkdir(this.store.entryDir(entry.id), { recursive: true });
        prepared = this.pipeline.prepare(entryContent(entry), entry.url);
      } catch (err) {
        log.error('Failed to prepare download', {
          entryId: entry.id,
          error: errorMessage(err),
        });
        return {
          kind: 'failed',
          entryId: entry.id,
          error: `Failed to prepare download: ${errorMessage(err)}`,
        };
      }

      if (opts.includeImages && prepared.images.length > 0) {
        state.setPhase('downloading', imagesMessage(title, 1, prepared.images.length));
        const due = createThrottle(undefined, this.now);
        let cancelled = false;
        await materializeImages(prepared.images, this.fetcher, {
          entryDir: this.store.entryDir(entry.id),
          entryUrl: entry.url,
          beforeEach: async (index, total) => {
            const message = imagesMessage(title, index + 1, total);
            this.progress.getState().setImageProgress(index + 1, total, message);
            if (!due() || !this.token.isRequested) return true;
            const choice = await askWithView(this.prompter, this.view, {
              title: 'Cancel download?',
              message,
              choices: IMAGE_PHASE_CHOICES,
              defaultValue: 'resume',
            });
            this.token.reset();
            if (choice === 'cancel_entry') cancelled = true;
            return choice === 'resume';
          },
        });
        if (cancelled) return await this.cancel(entry.id);

        const counts = countImages(prepared);
        if (counts.failed > 0) {
          log.warn('Image download errors', { entryId: entry.id, ...counts });
          this.progress.getState().setMessage(imageErrorsMessage(counts));
        }
      }

      if (!(await this.checkpoint())) return await this.cancel(entry.id);

      this.progress.getState().setPhase('processing', processingMessage(title));
      let htmlPath: string;
      try {
        htmlPath = await persistEntry(this.store, this.pipeline, entry, prepared);
      } catch (err) {
        log.error('Failed to process content', {
          entryId: entry.id,
          error: errorMessage(err),
        });
        return {
          kind: 'failed',
          entryId: entry.id,
          error: `Failed to process content: ${errorMessage(err)}`,
        };
      }

      const counts = countImages(prepared);
      const message = completionMessage(opts.includeImages, counts);
      this.progress.getState().setPhase('completing', message);
      log.info('Downloaded entry', { entryId: entry.id, images: counts.downloaded });
      return {
        kind: 'completed',
        entryId: entry.id,
        htmlPath,
        alreadyDownloaded: false,
        images: counts,
        message,
      };
    } finally {
      this.progress.getState().reset();
    }
  }

  /** False when the user asked to drop this entry. */
  private async checkpoint(): Promise<boolean> {
    if (!this.token.isRequested) return true;
    const choice = await askWithView(this.prompter, this.view, {
      title: 'Cancel download?',
      message: this.progress.getState().message,
      choices: PHASE_CHOICES,
      defaultValue: 'continue',
    });
    this.token.reset();
    return choice === 'continue';
  }

  private async cancel(entryId: number): Promise<DownloadResult> {
    await this.store.deleteEntry(entryId);
    log.info('Download cancelled', { entryId });
    return { kind: 'cancelled', entryId };
  }
}
