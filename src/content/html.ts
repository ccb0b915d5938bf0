import * as cheerio from 'cheerio';
import type { Entry } from '../types.js';
import {
  isSkippableSource,
  localImageTag,
  normalizeImageUrl,
  type ImageDescriptor,
} from './images.js';

export const OFFLINE_UNSAFE_ELEMENTS = [
  'script',
  'iframe',
  'video',
  'object',
  'embed',
  'form',
  'style',
] as const;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** `file://` URL with a trailing slash for a local directory. */
export function pathToFileUrl(dir: string): string {
  const p = dir.replace(/\\/g, '/').replace(/\/+$/, '');
  return p.startsWith('/') ? `file://${p}/` : `file:///${p}/`;
}

/**
 * Points every discovered `<img>` at its local filename, whether or not the
 * file was fetched, then drops elements that cannot work offline.
 */
export function rewriteContent(
  html: string,
  seen: Map<string, ImageDescriptor>,
  baseUrl?: string,
): string {
  const $ = cheerio.load(html, null, false);
  $('img').each((_, el) => {
    const img = $(el);
    const src = img.attr('src');
    if (src === undefined || isSkippableSource(src)) return;
    const descriptor = seen.get(normalizeImageUrl(src, baseUrl));
    if (descriptor) img.replaceWith(localImageTag(descriptor));
  });
  $(OFFLINE_UNSAFE_ELEMENTS.join(', ')).remove();
  return $.html();
}

export interface DocumentOptions {
  entryDir?: string;
}

export function createHtmlDocument(
  entry: Pick<Entry, 'title' | 'url' | 'published_at' | 'feed'>,
  content: string,
  opts: DocumentOptions = {},
): string {
  const title = escapeHtml(entry.title || 'Untitled Entry');
  const baseTag = opts.entryDir
    ? `\n    <base href="${escapeHtml(pathToFileUrl(opts.entryDir))}">`
    : '';

  const meta: string[] = [];
  if (entry.feed?.title) {
    meta.push(`<p><strong>Feed:</strong> ${escapeHtml(entry.feed.title)}</p>`);
  }
  if (entry.published_at) {
    meta.push(
      `<p><strong>Published:</strong> ${escapeHtml(entry.published_at)}</p>`,
    );
  }
  if (entry.url) {
    const origin = /^(https?:\/\/[^/]+)/.exec(entry.url)?.[1] ?? entry.url;
    meta.push(
      `<p><strong>URL:</strong> <a href="${escapeHtml(entry.url)}">${escapeHtml(origin)}</a></p>`,
    );
  }
  const metaHtml = meta.length > 0 ? `\n        ${meta.join('\n        ')}` : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${title}</title>${baseTag}
</head>
<body>
    <div class="entry-meta">
        <h1>${title}</h1>${metaHtml}
    </div>
    <div class="entry-content">
        ${content}
    </div>
</body>
</html>`;
}
