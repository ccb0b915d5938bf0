import type { FetchLike } from './api/client.js';
import { MinifluxGateway } from './api/miniflux.js';
import type { Gateway } from './api/types.js';
import { downloadDir, readConfig, resolveRoot, type Config } from './config/config.js';
import { ImageFetcher, imageFetcherOptions } from './content/fetchImage.js';
import { HtmlContentPipeline } from './content/pipeline.js';
import { BatchDownloadWorkflow } from './download/BatchDownloadWorkflow.js';
import { CancellationToken } from './download/cancellation.js';
import { DownloadWorkflow, type ProgressView } from './download/DownloadWorkflow.js';
import { EntryInfoCache } from './local/cache.js';
import { LocalEntryStore } from './local/store.js';
import type { Prompter } from './prompts/prompter.js';
import { EntryService, type StatusPusher } from './reader/EntryService.js';
import { NavigationCursor } from './reader/navigation.js';
import { PathViewer, type Viewer } from './reader/viewer.js';
import {
  createDownloadProgressStore,
  type DownloadProgressStore,
} from './stores/downloadProgressStore.js';
import { SyncManager } from './sync/SyncManager.js';
import { spawnStatusWorker, type Spawner } from './sync/background.js';
import { MutationQueueStore } from './sync/queue.js';

export interface AppOptions {
  prompter: Prompter;
  root?: string;
  config?: Config;
  viewer?: Viewer;
  /** Live progress display, built around the app's progress store and token. */
  createView?: (progress: DownloadProgressStore, token: CancellationToken) => ProgressView;
  gateway?: Gateway;
  fetch?: FetchLike;
  spawner?: Spawner;
}

export interface App {
  root: string;
  config: Config;
  cache: EntryInfoCache;
  store: LocalEntryStore;
  queue: MutationQueueStore;
  gateway: Gateway;
  fetcher: ImageFetcher;
  prompter: Prompter;
  progress: DownloadProgressStore;
  token: CancellationToken;
  download: DownloadWorkflow;
  batch: BatchDownloadWorkflow;
  sync: SyncManager;
  navigation: NavigationCursor;
  entries: EntryService;
  viewer: Viewer;
  dispose(): void;
}

export function isServerConfigured(config: Config): boolean {
  return config.server_address.trim() !== '' && config.api_token.trim() !== '';
}

export function requireServer(config: Config): void {
  if (!isServerConfigured(config)) {
    throw new Error(
      "Server not configured. Run 'fluxreader config set server_address <url>' and 'fluxreader config set api_token <token>'.",
    );
  }
}

/** Wires every service around one root, one config and one shared cache. */
export async function createApp(opts: AppOptions): Promise<App> {
  const root = opts.root ?? resolveRoot();
  const config = opts.config ?? (await readConfig(root));
  const cache = new EntryInfoCache().retain();
  const store = new LocalEntryStore(downloadDir(root, config), cache);
  const queue = new MutationQueueStore(root);
  const gateway =
    opts.gateway ??
    new MinifluxGateway({
      serverAddress: config.server_address,
      apiToken: config.api_token,
      timeoutMs: config.request_timeout_ms,
      ...(opts.fetch ? { fetch: opts.fetch } : {}),
    });
  const fetcher = new ImageFetcher({
    ...imageFetcherOptions(config),
    ...(opts.fetch ? { fetch: opts.fetch } : {}),
  });
  const pipeline = new HtmlContentPipeline();
  const progress = createDownloadProgressStore();
  const token = new CancellationToken();
  const { prompter } = opts;
  const view = opts.createView?.(progress, token);

  const download = new DownloadWorkflow({
    store,
    pipeline,
    fetcher,
    prompter,
    token,
    progress,
    view,
  });
  const batch = new BatchDownloadWorkflow({
    gateway,
    store,
    pipeline,
    fetcher,
    prompter,
    token,
    progress,
    view,
  });
  const viewer = opts.viewer ?? new PathViewer();

  let pushStatus: StatusPusher | undefined;
  if (isServerConfigured(config)) {
    const creds = {
      root,
      serverAddress: config.server_address,
      apiToken: config.api_token,
    };
    pushStatus = (entryId, status) =>
      spawnStatusWorker(entryId, status, creds, opts.spawner);
  }

  return {
    root,
    config,
    cache,
    store,
    queue,
    gateway,
    fetcher,
    prompter,
    progress,
    token,
    download,
    batch,
    sync: new SyncManager({ queue, gateway, store, prompter }),
    navigation: new NavigationCursor({ gateway, store, config, workflow: download, viewer }),
    entries: new EntryService({ gateway, store, queue, cache, config, pushStatus }),
    viewer,
    dispose: () => cache.release(),
  };
}
