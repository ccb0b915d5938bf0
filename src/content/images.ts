import * as cheerio from 'cheerio';

export interface ImageDescriptor {
  /** Normalized absolute source URL. */
  src: string;
  /** High-resolution variant from `srcset`. */
  src2x?: string;
  filename: string;
  width?: number;
  height?: number;
  downloaded: boolean;
  errorReason?: string;
}

export interface DiscoveredImages {
  images: ImageDescriptor[];
  /** Keyed by normalized source URL. */
  seen: Map<string, ImageDescriptor>;
}

const IMAGE_EXTENSIONS = new Set(['jpg', 'jpeg', 'png', 'gif', 'webp', 'svg']);
const SRCSET_2X = / (\S+) 2x, /;
const NUMERIC = /^\d+(\.\d+)?$/;

export function decodeAmpersands(url: string): string {
  return url.replace(/&amp;/g, '&');
}

/**
 * Absolute URL for an image source. Protocol-relative sources get `https:`;
 * relative ones resolve against the entry URL when there is one.
 */
export function normalizeImageUrl(src: string, baseUrl?: string): string {
  const decoded = decodeAmpersands(src.trim());
  if (decoded.startsWith('//')) return `https:${decoded}`;
  if (/^https?:\/\//i.test(decoded)) return decoded;
  if (!baseUrl) return decoded;
  try {
    return new URL(decoded, baseUrl).toString();
  } catch {
    return decoded;
  }
}

export function getImageExtension(url: string): string {
  const clean = url.split(/[?#]/)[0] ?? '';
  const lastSegment = clean.slice(clean.lastIndexOf('/') + 1);
  const match = /\.([A-Za-z0-9]{3,5})$/.exec(lastSegment);
  const ext = match?.[1]?.toLowerCase();
  return ext && IMAGE_EXTENSIONS.has(ext) ? ext : 'jpg';
}

export function imageFilename(index: number, ext: string): string {
  return `image_${String(index).padStart(3, '0')}.${ext}`;
}

function parseDimension(value: string | undefined): number | undefined {
  if (value === undefined || !NUMERIC.test(value.trim())) return undefined;
  return Number(value.trim());
}

export function isSkippableSource(src: string | undefined): boolean {
  return !src || src.trim() === '' || src.trim().startsWith('data:');
}

/**
 * Collects every distinct image in document order. Two tags that resolve to
 * the same URL share one descriptor and one filename.
 */
export function discoverImages(html: string, baseUrl?: string): DiscoveredImages {
  const $ = cheerio.load(html, null, false);
  const images: ImageDescriptor[] = [];
  const seen = new Map<string, ImageDescriptor>();

  $('img').each((_, el) => {
    const img = $(el);
    const src = img.attr('src');
    if (src === undefined || isSkippableSource(src)) return;

    const normalized = normalizeImageUrl(src, baseUrl);
    if (seen.has(normalized)) return;

    const descriptor: ImageDescriptor = {
      src: normalized,
      filename: imageFilename(images.length + 1, getImageExtension(normalized)),
      downloaded: false,
    };
    const srcset = img.attr('srcset');
    if (srcset) {
      const candidate = SRCSET_2X.exec(` ${srcset}, `)?.[1];
      if (candidate) descriptor.src2x = normalizeImageUrl(candidate, baseUrl);
    }
    const width = parseDimension(img.attr('width'));
    const height = parseDimension(img.attr('height'));
    if (width !== undefined) descriptor.width = width;
    if (height !== undefined) descriptor.height = height;

    images.push(descriptor);
    seen.set(normalized, descriptor);
  });

  return { images, seen };
}

/** filename -> source URL, persisted for later recovery. */
export function imagesMapping(images: ImageDescriptor[]): Record<string, string> {
  const mapping: Record<string, string> = {};
  for (const image of images) mapping[image.filename] = image.src;
  return mapping;
}

export function localImageTag(image: ImageDescriptor): string {
  const style: string[] = [];
  if (image.width !== undefined) style.push(`width: ${image.width}px`);
  if (image.height !== undefined) style.push(`height: ${image.height}px`);
  return style.length > 0
    ? `<img src="${image.filename}" style="${style.join('; ')}" alt=""/>`
    : `<img src="${image.filename}" alt=""/>`;
}

export function createDownloadSummary(
  includeImages: boolean,
  images: ImageDescriptor[],
): string {
  if (!includeImages) {
    return `${images.length} images found (skipped - disabled in settings)`;
  }
  if (images.length === 0) return 'No images found in entry';
  const downloaded = images.filter((img) => img.downloaded).length;
  if (downloaded === images.length) return 'All images downloaded successfully';
  if (downloaded > 0) {
    return `${downloaded} of ${images.length} images downloaded`;
  }
  return 'No images could be downloaded';
}
