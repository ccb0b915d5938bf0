import { ValidationError, isValidEntryId } from '../errors.js';
import type { Entry } from '../types.js';
import { createHtmlDocument, rewriteContent } from './html.js';
import { discoverImages, imagesMapping, type ImageDescriptor } from './images.js';
import { replaceVideoEmbeds } from './video.js';

export interface PreparedContent {
  /** Source HTML after video normalization. */
  content: string;
  images: ImageDescriptor[];
  seenImages: Map<string, ImageDescriptor>;
  imagesMapping: Record<string, string>;
  baseUrl?: string;
}

export interface ContentPipeline {
  prepare(html: string, url?: string): PreparedContent;
  render(
    entry: Pick<Entry, 'title' | 'url' | 'published_at' | 'feed'>,
    prepared: PreparedContent,
    entryDir: string,
  ): string;
}

/** Body HTML for an entry: full content, then summary. */
export function entryContent(entry: Entry): string {
  return entry.content ?? entry.summary ?? '';
}

export function validateForDownload(entry: Entry | null | undefined): Entry {
  if (!entry) throw new ValidationError('Missing entry data');
  if (!isValidEntryId(entry.id)) {
    throw new ValidationError(`Invalid entry ID "${String(entry.id)}"`);
  }
  return entry;
}

export class HtmlContentPipeline implements ContentPipeline {
  prepare(html: string, url?: string): PreparedContent {
    const content = replaceVideoEmbeds(html);
    const baseUrl = url && url.trim() !== '' ? url : undefined;
    const { images, seen } = discoverImages(content, baseUrl);
    const prepared: PreparedContent = {
      content,
      images,
      seenImages: seen,
      imagesMapping: imagesMapping(images),
    };
    if (baseUrl) prepared.baseUrl = baseUrl;
    return prepared;
  }

  render(
    entry: Pick<Entry, 'title' | 'url' | 'published_at' | 'feed'>,
    prepared: PreparedContent,
    entryDir: string,
  ): string {
    const body = rewriteContent(
      prepared.content,
      prepared.seenImages,
      prepared.baseUrl,
    );
    return createHtmlDocument(entry, body, { entryDir });
  }
}
