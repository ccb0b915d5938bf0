import { Command } from 'commander';
import { readConfig, resolveRoot } from '../config/config.js';
import { createApp, type App } from '../factory.js';
import { configureLogging } from '../logger.js';
import { createPrompter } from '../prompts/inkPrompter.js';
import { CommandViewer, PathViewer } from '../reader/viewer.js';
import {
  SYNC_STATUS_COMMAND,
  gatewayFromEnv,
  runStatusWorker,
} from '../sync/background.js';
import type { NavigationDirection } from '../types.js';
import {
  categoryToTsvRow,
  downloadResultText,
  entryToTsvRow,
  feedToTsvRow,
  formatJson,
  formatTsvKeyValue,
  localEntryToTsvRow,
  queueCountsToTsv,
  storageStatsToTsv,
} from './format.js';
import { runConfigGet, runConfigList, runConfigSet } from './commands/config.js';
import {
  runEntryClose,
  runEntryDownload,
  runEntryList,
  runEntryMark,
  runEntryOpen,
  runEntryStar,
  runMarkAllRead,
  runRemoveAllRead,
  parseId,
  parseStatus,
  type EntryListOptions,
} from './commands/entry.js';
import { runCategoryList, runCollectionMarkRead, runFeedList } from './commands/feed.js';
import { runInit, type InitOptions } from './commands/init.js';
import {
  runImagesDelete,
  runImagesRecover,
  runLocalClear,
  runLocalDelete,
  runLocalList,
  runLocalPurge,
  runLocalStats,
} from './commands/local.js';
import { runLogsExport } from './commands/logs.js';
import { parseContext, runNavigate } from './commands/navigate.js';
import { runPrefetch } from './commands/prefetch.js';
import { runQueueClear, runQueueStatus, runSync } from './commands/sync.js';
import { InkProgressView, withProgress } from './progress.js';

interface GlobalOpts {
  json?: boolean;
  yes?: boolean;
  verbose?: boolean;
  open?: boolean;
}

interface ContextOpts {
  context?: string;
  sort?: string;
}

interface Session {
  app: App;
  view: InkProgressView | null;
}

function output(data: unknown, textFn: () => string, opts: GlobalOpts): void {
  if (opts.json) {
    console.log(formatJson(data));
  } else {
    const text = textFn();
    if (text !== '') console.log(text);
  }
}

function handleError(err: unknown, json?: boolean): never {
  const message = err instanceof Error ? err.message : String(err);
  if (json) {
    console.error(formatJson({ error: message }));
  } else {
    console.error(`Error: ${message}`);
  }
  process.exit(1);
}

async function openSession(opts: GlobalOpts): Promise<Session> {
  const root = resolveRoot();
  const config = await readConfig(root);
  configureLogging(root, { level: config.log_level, verbose: opts.verbose });
  const prompter = createPrompter({ yes: opts.yes });
  const live = prompter.interactive && process.stdout.isTTY && !opts.json;
  let view: InkProgressView | null = null;
  const app = await createApp({
    root,
    config,
    prompter,
    viewer: opts.open
      ? new CommandViewer()
      : new PathViewer((line) => {
          if (!opts.json) console.log(line);
        }),
    createView: live
      ? (progress, token) => {
          view = new InkProgressView(progress, token);
          return view;
        }
      : undefined,
  });
  return { app, view };
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name('fluxreader')
    .version('0.1.0')
    .description('Offline reader and sync queue for Miniflux');

  /** Runs a command body against a fresh app and reports failures. */
  const withSession =
    <A extends unknown[]>(
      body: (session: Session, opts: GlobalOpts, ...args: A) => Promise<void>,
    ) =>
    async (...args: A): Promise<void> => {
      const opts = program.opts<GlobalOpts>();
      let session: Session | null = null;
      try {
        session = await openSession(opts);
        await body(session, opts, ...args);
      } catch (err) {
        handleError(err, opts.json);
      } finally {
        session?.app.dispose();
      }
    };

  // fluxreader init
  program
    .command('init')
    .description('Write a default config.yml under the data root')
    .option('--server <url>', 'Miniflux server address')
    .option('--token <token>', 'Miniflux API token')
    .action(async (opts: InitOptions) => {
      const parentOpts = program.opts<GlobalOpts>();
      try {
        const result = await runInit(resolveRoot(), opts);
        output(
          result,
          () =>
            result.alreadyExists
              ? `Already initialized: ${result.path}`
              : `Initialized ${result.path}`,
          parentOpts,
        );
      } catch (err) {
        handleError(err, parentOpts.json);
      }
    });

  // fluxreader config ...
  const config = program.command('config').description('Manage settings');

  config
    .command('get')
    .description('Get a configuration value')
    .argument('<key>', 'Config key')
    .action(async (key: string) => {
      const parentOpts = program.opts<GlobalOpts>();
      try {
        const value = await runConfigGet(resolveRoot(), key);
        output({ [key]: value }, () => String(value), parentOpts);
      } catch (err) {
        handleError(err, parentOpts.json);
      }
    });

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', 'Config key')
    .argument('<value>', 'Config value')
    .action(async (key: string, value: string) => {
      const parentOpts = program.opts<GlobalOpts>();
      try {
        const stored = await runConfigSet(resolveRoot(), key, value);
        output({ [key]: stored }, () => `Set ${key} = ${String(stored)}`, parentOpts);
      } catch (err) {
        handleError(err, parentOpts.json);
      }
    });

  config
    .command('list')
    .description('Show every setting')
    .action(async () => {
      const parentOpts = program.opts<GlobalOpts>();
      try {
        const all = await runConfigList(resolveRoot());
        const masked = { ...all, api_token: all.api_token ? '***' : '' };
        output(
          masked,
          () => formatTsvKeyValue(Object.entries(masked).map(([k, v]) => [k, String(v)])),
          parentOpts,
        );
      } catch (err) {
        handleError(err, parentOpts.json);
      }
    });

  // fluxreader entries
  program
    .command('entries')
    .description('List entries on the server')
    .option('--status <statuses>', 'Comma-separated statuses (unread, read, removed)')
    .option('--feed <id>', 'Only entries of this feed')
    .option('--category <id>', 'Only entries of this category')
    .option('--starred', 'Only starred entries')
    .option('--search <text>', 'Full-text search')
    .option('--limit <n>', 'Maximum number of entries')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts, listOpts: EntryListOptions) => {
        const entries = await runEntryList(app, listOpts);
        output(entries, () => entries.map(entryToTsvRow).join('\n'), opts);
      }),
    );

  // fluxreader entry ...
  const entry = program.command('entry').description('Act on a single entry');

  entry
    .command('download')
    .description('Download an entry for offline reading')
    .argument('<id>', 'Entry ID')
    .option('--images', 'Download images')
    .option('--no-images', 'Skip images')
    .action(
      withSession(
        async (
          { app, view }: Session,
          opts: GlobalOpts,
          idStr: string,
          dlOpts: { images?: boolean },
        ) => {
          const result = await withProgress(view, () =>
            runEntryDownload(app, idStr, dlOpts),
          );
          output(result, () => downloadResultText(result), opts);
          if (result.kind === 'failed') process.exitCode = 1;
        },
      ),
    );

  entry
    .command('open')
    .description('Download if needed, show the entry and apply mark-on-open')
    .argument('<id>', 'Entry ID')
    .option('--context <context>', 'Listing the entry was opened from')
    .option('--sort <sort>', 'Order of the local listing (published, title, id)')
    .action(
      withSession(
        async ({ app, view }: Session, opts: GlobalOpts, idStr: string, openOpts: ContextOpts) => {
          const context = await parseContext(app, openOpts.context, openOpts.sort);
          const result = await withProgress(view, () => runEntryOpen(app, idStr, context));
          output(
            result,
            () => (result.download.kind === 'completed' ? '' : downloadResultText(result.download)),
            opts,
          );
        },
      ),
    );

  entry
    .command('close')
    .description('Apply the close-time cleanup to an entry')
    .argument('<id>', 'Entry ID')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts, idStr: string) => {
        const deleted = await runEntryClose(app, idStr);
        output({ deleted }, () => (deleted ? `Deleted local entry ${idStr}` : ''), opts);
      }),
    );

  entry
    .command('mark')
    .description('Set the status of one or more entries')
    .argument('<status>', 'unread, read or removed')
    .argument('<ids...>', 'Entry IDs')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts, status: string, ids: string[]) => {
        const result = await runEntryMark(app, ids, status);
        output(result, () => result.message, opts);
        if (!result.ok) process.exitCode = 1;
      }),
    );

  entry
    .command('star')
    .description('Toggle the bookmark of an entry')
    .argument('<id>', 'Entry ID')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts, idStr: string) => {
        const result = await runEntryStar(app, idStr);
        output(result, () => result.message, opts);
        if (!result.ok) process.exitCode = 1;
      }),
    );

  entry
    .command('mark-all-read')
    .description('Mark up to 1000 unread entries as read')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts) => {
        const result = await runMarkAllRead(app);
        output(result, () => result.message, opts);
        if (!result.ok) process.exitCode = 1;
      }),
    );

  entry
    .command('remove-read')
    .description('Mark up to 1000 read entries as removed')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts) => {
        const result = await runRemoveAllRead(app);
        output(result, () => result.message, opts);
        if (!result.ok) process.exitCode = 1;
      }),
    );

  // fluxreader nav ...
  const nav = program.command('nav').description('Open the entry next to another one');
  for (const direction of ['next', 'previous'] satisfies NavigationDirection[]) {
    nav
      .command(direction === 'next' ? 'next' : 'prev')
      .description(`Open the ${direction} entry`)
      .argument('<id>', 'Current entry ID')
      .option('--context <context>', 'global, unread, starred, feed:<id>, category:<id>, local')
      .option('--sort <sort>', 'Order of the local listing (published, title, id)')
      .action(
        withSession(
          async ({ app, view }: Session, opts: GlobalOpts, idStr: string, navOpts: ContextOpts) => {
            const result = await withProgress(view, () =>
              runNavigate(app, idStr, direction, navOpts),
            );
            output(result, () => (result.kind === 'opened' ? '' : result.message), opts);
            if (result.kind === 'failed') process.exitCode = 1;
          },
        ),
      );
  }

  // fluxreader feed / category ...
  for (const kind of ['feed', 'category'] as const) {
    const group = program
      .command(kind)
      .description(kind === 'feed' ? 'Feeds on the server' : 'Categories on the server');

    group
      .command('list')
      .description(`List ${kind === 'feed' ? 'feeds' : 'categories'}`)
      .action(
        withSession(async ({ app }: Session, opts: GlobalOpts) => {
          if (kind === 'feed') {
            const feeds = await runFeedList(app);
            output(feeds, () => feeds.map(feedToTsvRow).join('\n'), opts);
          } else {
            const categories = await runCategoryList(app);
            output(categories, () => categories.map(categoryToTsvRow).join('\n'), opts);
          }
        }),
      );

    group
      .command('mark-read')
      .description(`Mark every entry of a ${kind} as read`)
      .argument('<id>', `${kind} ID`)
      .action(
        withSession(async ({ app }: Session, opts: GlobalOpts, idStr: string) => {
          const result = await runCollectionMarkRead(app, kind, idStr);
          output(result, () => result.message, opts);
        }),
      );
  }

  // fluxreader sync
  program
    .command('sync')
    .description('Send pending changes to the server')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts) => {
        const outcome = await runSync(app, { yes: opts.yes });
        output(outcome, () => outcome.message, opts);
      }),
    );

  // fluxreader queue ...
  const queue = program.command('queue').description('Pending changes');

  queue
    .command('status')
    .description('Count pending changes')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts) => {
        const counts = await runQueueStatus(app);
        output(counts, () => queueCountsToTsv(counts), opts);
      }),
    );

  queue
    .command('clear')
    .description('Drop pending changes without sending them')
    .argument('[kind]', 'status, bookmark, feed or category; all when omitted')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts, kind: string | undefined) => {
        const cleared = await runQueueClear(app, kind);
        output({ cleared }, () => `Cleared ${cleared.join(', ')} queue`, opts);
      }),
    );

  // fluxreader local ...
  const local = program.command('local').description('Downloaded entries');

  local
    .command('list')
    .description('List downloaded entries')
    .option('--sort <sort>', 'published, title or id')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts, listOpts: { sort?: string }) => {
        const entries = await runLocalList(app, listOpts);
        output(entries, () => entries.map(localEntryToTsvRow).join('\n'), opts);
      }),
    );

  local
    .command('delete')
    .description('Delete downloaded entries')
    .argument('<ids...>', 'Entry IDs')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts, ids: string[]) => {
        const deleted = await runLocalDelete(app, ids);
        output({ deleted }, () => `Deleted ${deleted.length} entries`, opts);
      }),
    );

  local
    .command('clear')
    .description('Delete every downloaded entry')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts) => {
        const result = await runLocalClear(app, { yes: opts.yes });
        output(
          result,
          () => (result.cancelled ? 'Cancelled' : `Deleted ${result.cleared} entries`),
          opts,
        );
      }),
    );

  local
    .command('purge')
    .description('Delete entries published at least <days> days ago')
    .argument('<days>', 'Age in days')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts, days: string) => {
        const deleted = await runLocalPurge(app, days);
        output({ deleted }, () => `Deleted ${deleted.length} entries`, opts);
      }),
    );

  local
    .command('stats')
    .description('Show disk usage of downloaded entries')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts) => {
        const stats = await runLocalStats(app);
        output(stats, () => storageStatsToTsv(stats), opts);
      }),
    );

  const images = local.command('images').description('Images of downloaded entries');

  images
    .command('delete')
    .description('Delete images, keeping the documents')
    .argument('[id]', 'Entry ID; every entry when omitted')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts, idStr: string | undefined) => {
        const count = await runImagesDelete(app, idStr);
        output({ deleted: count }, () => `Deleted ${count} images`, opts);
      }),
    );

  images
    .command('recover')
    .description('Download images that are missing on disk')
    .argument('[id]', 'Entry ID; every entry when omitted')
    .action(
      withSession(async ({ app }: Session, opts: GlobalOpts, idStr: string | undefined) => {
        const count = await runImagesRecover(app, idStr);
        output({ recovered: count }, () => `Recovered ${count} images`, opts);
      }),
    );

  // fluxreader prefetch
  program
    .command('prefetch')
    .description('Download the next entries of a list')
    .argument('<source>', 'unread or starred')
    .option('--count <n>', 'Number of entries (default: prefetch_count)')
    .action(
      withSession(
        async (
          { app, view }: Session,
          opts: GlobalOpts,
          source: string,
          prefetchOpts: { count?: string },
        ) => {
          const outcome = await withProgress(view, () =>
            runPrefetch(app, source, prefetchOpts),
          );
          output(outcome, () => outcome.message, opts);
          if (outcome.kind === 'failed') process.exitCode = 1;
        },
      ),
    );

  // fluxreader logs ...
  const logs = program.command('logs').description('Log file');

  logs
    .command('export')
    .description('Copy the log file')
    .argument('<file>', 'Destination path')
    .action(async (file: string) => {
      const parentOpts = program.opts<GlobalOpts>();
      try {
        const target = await runLogsExport(resolveRoot(), file);
        output({ exported: target }, () => `Logs exported to ${target}`, parentOpts);
      } catch (err) {
        handleError(err, parentOpts.json);
      }
    });

  // Detached status worker started by mark-on-open
  program
    .command(SYNC_STATUS_COMMAND, { hidden: true })
    .argument('<id>')
    .argument('<status>')
    .action(async (idStr: string, status: string) => {
      const root = resolveRoot();
      try {
        const config = await readConfig(root);
        configureLogging(root, { level: config.log_level });
        const gateway = gatewayFromEnv(process.env, config.request_timeout_ms);
        if (!gateway) {
          process.exitCode = 1;
          return;
        }
        const synced = await runStatusWorker({
          root,
          entryId: parseId(idStr),
          status: parseStatus(status),
          gateway,
        });
        process.exitCode = synced ? 0 : 1;
      } catch (err) {
        handleError(err);
      }
    });

  // Global options
  program.option('--json', 'Output as JSON');
  program.option('-y, --yes', 'Answer prompts with their non-interactive default');
  program.option('--verbose', 'Log debug output to stderr');
  program.option('--open', 'Open documents in $FLUXREADER_VIEWER or the system viewer');

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
