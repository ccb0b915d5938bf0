import { spawn } from 'node:child_process';
import { logger } from '../logger.js';
import type { Spawner } from '../sync/background.js';
import type { NavigationContext } from '../types.js';

/** Whatever shows a downloaded document to the user. */
export interface Viewer {
  open(htmlPath: string, context: NavigationContext): Promise<void>;
}

const log = logger.child('Viewer');

/** Prints the document path; the default when nothing should be launched. */
export class PathViewer implements Viewer {
  private readonly write: (line: string) => void;

  constructor(write: (line: string) => void = (line) => console.log(line)) {
    this.write = write;
  }

  open(htmlPath: string): Promise<void> {
    this.write(htmlPath);
    return Promise.resolve();
  }
}

export function openerCommand(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): { command: string; args: string[] } {
  const custom = env['FLUXREADER_VIEWER'];
  if (custom && custom.trim() !== '') return { command: custom.trim(), args: [] };
  if (platform === 'darwin') return { command: 'open', args: [] };
  if (platform === 'win32') return { command: 'cmd', args: ['/c', 'start', ''] };
  return { command: 'xdg-open', args: [] };
}

/** Hands the document to an external program and returns at once. */
export class CommandViewer implements Viewer {
  private readonly spawner: Spawner;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    opts: { spawner?: Spawner; env?: NodeJS.ProcessEnv } = {},
  ) {
    this.spawner = opts.spawner ?? ((command, args, options) => spawn(command, args, options));
    this.env = opts.env ?? process.env;
  }

  open(htmlPath: string): Promise<void> {
    const { command, args } = openerCommand(this.env);
    const child = this.spawner(command, [...args, htmlPath], {
      detached: true,
      stdio: 'ignore',
    });
    child.on('error', (err) => {
      log.warn('Viewer failed to start', { command, error: err.message });
    });
    child.unref();
    return Promise.resolve();
  }
}
