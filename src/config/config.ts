import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { isNotFound } from '../errors.js';

export const SORT_ORDERS = [
  'id',
  'status',
  'published_at',
  'category_title',
  'category_id',
] as const;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export const configSchema = z.object({
  server_address: z.string().default(''),
  api_token: z.string().default(''),
  limit: z.number().int().min(1).max(1000).default(100),
  order: z.enum(SORT_ORDERS).default('published_at'),
  direction: z.enum(['asc', 'desc']).default('desc'),
  hide_read_entries: z.boolean().default(true),
  include_images: z.boolean().default(true),
  mark_as_read_on_open: z.boolean().default(true),
  auto_delete_read_on_close: z.boolean().default(false),
  download_dir: z.string().default(''),
  prefetch_count: z.number().int().min(0).max(50).default(0),
  proxy_image_downloader_enabled: z.boolean().default(false),
  proxy_image_downloader_url: z.string().default(''),
  proxy_image_downloader_token: z.string().default(''),
  request_timeout_ms: z.number().int().positive().default(30_000),
  image_timeout_ms: z.number().int().positive().default(20_000),
  log_level: z.enum(LOG_LEVELS).default('info'),
});

export type Config = z.infer<typeof configSchema>;
export type ConfigKey = keyof Config;
export type SortOrder = Config['order'];
export type SortDirection = Config['direction'];

export const defaultConfig: Config = configSchema.parse({});

/**
 * Data root for config, queues, logs and (by default) downloaded entries.
 * FLUXREADER_HOME overrides ~/.fluxreader.
 */
export function resolveRoot(env: NodeJS.ProcessEnv = process.env): string {
  const override = env['FLUXREADER_HOME'];
  if (override && override.trim() !== '') return path.resolve(override);
  return path.join(os.homedir(), '.fluxreader');
}

export function configPath(root: string): string {
  return path.join(root, 'config.yml');
}

export function parseConfig(raw: string): Config {
  const data: unknown = yaml.parse(raw) ?? {};
  const result = configSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue ? issue.path.join('.') : 'config';
    const message = issue ? issue.message : 'invalid value';
    throw new Error(`Invalid config value for "${key}": ${message}`);
  }
  return result.data;
}

export async function readConfig(root: string): Promise<Config> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath(root), 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return { ...defaultConfig };
    throw err;
  }
  return parseConfig(raw);
}

export async function writeConfig(root: string, config: Config): Promise<void> {
  await fs.mkdir(root, { recursive: true });
  await fs.writeFile(configPath(root), yaml.stringify(config));
}

/** Download root: `download_dir` when set, `<root>/entries` otherwise. */
export function downloadDir(root: string, config: Config): string {
  const custom = config.download_dir.trim();
  if (custom !== '') return path.resolve(custom);
  return path.join(root, 'entries');
}
