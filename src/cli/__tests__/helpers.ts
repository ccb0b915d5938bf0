import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { vi, type Mock } from 'vitest';
import { InMemoryGateway } from '../../api/fakeGateway.js';
import { defaultConfig, type Config } from '../../config/config.js';
import { createApp, type App } from '../../factory.js';
import { AutoPrompter, type Prompter } from '../../prompts/prompter.js';
import { PathViewer } from '../../reader/viewer.js';
import type { Spawner } from '../../sync/background.js';
import type { Entry, EntryMetadata } from '../../types.js';

export interface TestApp {
  app: App;
  root: string;
  gateway: InMemoryGateway;
  opened: string[];
  spawner: Mock<Spawner>;
  cleanup(): void;
}

export const serverConfig: Config = {
  ...defaultConfig,
  server_address: 'https://reader.example.com',
  api_token: 'test-secret',
};

export function testEntry(id: number, overrides: Partial<Entry> = {}): Entry {
  return {
    id,
    title: `Entry ${id}`,
    content: `<p>Body ${id}</p>`,
    status: 'unread',
    starred: false,
    published_at: `2024-01-0${id}T00:00:00Z`,
    ...overrides,
  };
}

export async function createTestApp(
  opts: { entries?: Entry[]; config?: Partial<Config>; prompter?: Prompter } = {},
): Promise<TestApp> {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'fluxreader-cli-test-'));
  const gateway = new InMemoryGateway(opts.entries ?? []);
  const opened: string[] = [];
  const spawner = vi.fn<Spawner>(() => ({ unref: vi.fn(), on: vi.fn() }));
  const app = await createApp({
    root,
    config: { ...serverConfig, ...opts.config },
    prompter: opts.prompter ?? new AutoPrompter(),
    gateway,
    viewer: new PathViewer((line) => opened.push(line)),
    spawner,
  });
  return {
    app,
    root,
    gateway,
    opened,
    spawner,
    cleanup: () => {
      app.dispose();
      fs.rmSync(root, { recursive: true });
    },
  };
}

/** Writes a downloaded entry straight to disk. */
export function writeLocalEntry(
  app: App,
  id: number,
  meta: Partial<EntryMetadata> = {},
): void {
  fs.mkdirSync(app.store.entryDir(id), { recursive: true });
  fs.writeFileSync(app.store.htmlPath(id), `<p>${id}</p>`);
  const metadata: EntryMetadata = {
    id,
    title: `Entry ${id}`,
    status: 'unread',
    starred: false,
    images: {},
    last_updated: '',
    ...meta,
  };
  fs.writeFileSync(app.store.metadataPath(id), JSON.stringify(metadata));
}
