import { spawn, type SpawnOptions } from 'node:child_process';
import { MinifluxGateway } from '../api/miniflux.js';
import type { Gateway } from '../api/types.js';
import { logger } from '../logger.js';
import type { EntryStatus } from '../types.js';
import { MutationQueueStore } from './queue.js';

export const SYNC_STATUS_COMMAND = '__sync-status';

export const ENV_SERVER = 'FLUXREADER_SERVER';
export const ENV_TOKEN = 'FLUXREADER_TOKEN';
export const ENV_HOME = 'FLUXREADER_HOME';

export interface DetachedChild {
  unref(): void;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type Spawner = (
  command: string,
  args: string[],
  options: SpawnOptions,
) => DetachedChild;

export interface WorkerCredentials {
  root: string;
  serverAddress: string;
  apiToken: string;
}

const log = logger.child('BackgroundSync');

const defaultSpawner: Spawner = (command, args, options) =>
  spawn(command, args, options);

export function buildWorkerCommand(
  entryId: number,
  status: EntryStatus,
  scriptPath: string = process.argv[1] ?? '',
): { command: string; args: string[] } {
  return {
    command: process.execPath,
    args: [
      ...process.execArgv,
      scriptPath,
      SYNC_STATUS_COMMAND,
      String(entryId),
      status,
    ],
  };
}

export function workerEnv(
  creds: WorkerCredentials,
  base: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  return {
    ...base,
    [ENV_HOME]: creds.root,
    [ENV_SERVER]: creds.serverAddress,
    [ENV_TOKEN]: creds.apiToken,
  };
}

/**
 * Starts a detached child that pushes one status change and exits. The
 * parent does not wait; the queue file is the only shared state.
 */
export function spawnStatusWorker(
  entryId: number,
  status: EntryStatus,
  creds: WorkerCredentials,
  spawner: Spawner = defaultSpawner,
): boolean {
  const { command, args } = buildWorkerCommand(entryId, status);
  try {
    const child = spawner(command, args, {
      detached: true,
      stdio: 'ignore',
      env: workerEnv(creds),
    });
    child.on('error', (err) => {
      log.warn('Background status worker failed to start', {
        entryId,
        error: err.message,
      });
    });
    child.unref();
    log.debug('Spawned background status worker', { entryId, status });
    return true;
  } catch (err) {
    log.warn('Could not spawn background status worker', {
      entryId,
      error: err instanceof Error ? err.message : String(err),
    });
    return false;
  }
}

export interface StatusWorkerOptions {
  root: string;
  entryId: number;
  status: EntryStatus;
  gateway: Gateway;
}

/**
 * Child side: one `updateEntries` call. The pending mutation is removed
 * only on success and only if it still targets the same status.
 */
export async function runStatusWorker(opts: StatusWorkerOptions): Promise<boolean> {
  const result = await opts.gateway.updateEntries(opts.entryId, {
    status: opts.status,
  });
  if (!result.ok) {
    log.info('Background status update left queued', {
      entryId: opts.entryId,
      error: result.error.message,
    });
    return false;
  }
  const queue = new MutationQueueStore(opts.root);
  const pending = await queue.loadStatusQueue();
  if (pending.get(opts.entryId)?.newStatus === opts.status) {
    await queue.removeStatus(opts.entryId);
  }
  log.debug('Background status update synced', { entryId: opts.entryId });
  return true;
}

/** Gateway for the child, built from the variables the parent passed. */
export function gatewayFromEnv(
  env: NodeJS.ProcessEnv,
  timeoutMs: number,
): MinifluxGateway | null {
  const serverAddress = env[ENV_SERVER];
  const apiToken = env[ENV_TOKEN];
  if (!serverAddress || !apiToken) return null;
  return new MinifluxGateway({ serverAddress, apiToken, timeoutMs });
}
