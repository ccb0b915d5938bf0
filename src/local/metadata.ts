import fs from 'node:fs/promises';
import { z } from 'zod';
import type { Entry, EntryMetadata } from '../types.js';
import { writeFileAtomic } from './files.js';

const refSchema = z.object({ id: z.number(), title: z.string() });

export const entryMetadataSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  url: z.string().optional(),
  status: z.enum(['unread', 'read', 'removed']),
  starred: z.boolean().default(false),
  published_at: z.string().optional(),
  feed: refSchema.optional(),
  category: refSchema.optional(),
  images: z.record(z.string(), z.string()).default({}),
  last_updated: z.string().default(''),
});

export function buildMetadata(
  entry: Entry,
  images: Record<string, string>,
  now: Date = new Date(),
): EntryMetadata {
  const metadata: EntryMetadata = {
    id: entry.id,
    title: entry.title,
    status: entry.status,
    starred: entry.starred,
    images,
    last_updated: now.toISOString(),
  };
  if (entry.url) metadata.url = entry.url;
  if (entry.published_at) metadata.published_at = entry.published_at;
  if (entry.feed) {
    metadata.feed = { id: entry.feed.id, title: entry.feed.title };
    if (entry.feed.category) {
      metadata.category = {
        id: entry.feed.category.id,
        title: entry.feed.category.title,
      };
    }
  }
  return metadata;
}

/** Metadata from disk, or null when absent or unreadable. */
export async function readMetadataFile(
  filePath: string,
): Promise<EntryMetadata | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch {
    return null;
  }
  try {
    const parsed = entryMetadataSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export async function writeMetadataFile(
  filePath: string,
  metadata: EntryMetadata,
): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(metadata, null, 2));
}
