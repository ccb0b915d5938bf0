import * as cheerio from 'cheerio';

const YOUTUBE_ID_PATTERNS = [
  /youtube(?:-nocookie)?\.com\/embed\/([A-Za-z0-9_-]{6,})/,
  /youtube\.com\/watch\?(?:[^#]*&)?v=([A-Za-z0-9_-]{6,})/,
  /youtu\.be\/([A-Za-z0-9_-]{6,})/,
];

export function extractYouTubeId(url: string): string | null {
  for (const pattern of YOUTUBE_ID_PATTERNS) {
    const match = pattern.exec(url);
    if (match?.[1]) return match[1];
  }
  return null;
}

export function youTubeThumbnailHtml(videoId: string): string {
  return (
    `<p><a href="https://www.youtube.com/watch?v=${videoId}">` +
    `<img src="https://img.youtube.com/vi/${videoId}/hqdefault.jpg" alt="YouTube video">` +
    `</a></p>`
  );
}

/**
 * Replaces YouTube iframes with a linked thumbnail. Other iframes are left
 * for the cleaner to strip.
 */
export function replaceVideoEmbeds(html: string): string {
  if (!html.includes('<iframe')) return html;
  const $ = cheerio.load(html, null, false);
  let replaced = 0;
  $('iframe').each((_, el) => {
    const frame = $(el);
    const src = frame.attr('src') ?? '';
    if (!src.includes('youtu')) return;
    const videoId = extractYouTubeId(src);
    if (!videoId) return;
    frame.replaceWith(youTubeThumbnailHtml(videoId));
    replaced++;
  });
  return replaced > 0 ? $.html() : html;
}
