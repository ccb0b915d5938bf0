import { render, type Instance } from 'ink';
import { DownloadProgress } from '../components/DownloadProgress.js';
import type { CancellationToken } from '../download/cancellation.js';
import type { ProgressView } from '../download/DownloadWorkflow.js';
import type { DownloadProgressStore } from '../stores/downloadProgressStore.js';

/**
 * Renders the download progress box while a command runs. Prompts suspend
 * it, since ink draws one tree per render call.
 */
export class InkProgressView implements ProgressView {
  private readonly progress: DownloadProgressStore;
  private readonly token: CancellationToken;
  private instance: Instance | null = null;
  private active = false;
  private readonly onSigint = (): void => {
    this.token.request();
  };

  constructor(progress: DownloadProgressStore, token: CancellationToken) {
    this.progress = progress;
    this.token = token;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    process.on('SIGINT', this.onSigint);
    this.mount();
  }

  stop(): void {
    if (!this.active) return;
    this.active = false;
    process.off('SIGINT', this.onSigint);
    this.unmount();
  }

  suspend(): void {
    this.unmount();
  }

  resume(): void {
    if (this.active) this.mount();
  }

  private mount(): void {
    if (this.instance) return;
    this.instance = render(
      <DownloadProgress store={this.progress} onCancel={() => this.token.request()} />,
      { exitOnCtrlC: false },
    );
  }

  private unmount(): void {
    this.instance?.unmount();
    this.instance = null;
  }
}

/** Runs `task` with the progress view shown, when there is one. */
export async function withProgress<T>(
  view: InkProgressView | null,
  task: () => Promise<T>,
): Promise<T> {
  view?.start();
  try {
    return await task();
  } finally {
    view?.stop();
  }
}
