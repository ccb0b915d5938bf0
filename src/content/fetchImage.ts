import fs from 'node:fs/promises';
import path from 'node:path';
import { USER_AGENT, type FetchLike } from '../api/client.js';
import type { Config } from '../config/config.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { decodeAmpersands, type ImageDescriptor } from './images.js';

export const MIN_IMAGE_BYTES = 10;
export const MAX_IMAGE_BYTES = 50 * 1024 * 1024;

const REDDIT_HOST = /redd\.it|reddit\.com/;
const REDDIT_DEFAULT_REFERER = 'https://www.reddit.com/';
const MOBILE_USER_AGENT =
  'Mozilla/5.0 (Linux; Android 10; Mobile) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.120 Mobile Safari/537.36';

/**
 * Reads a response body chunk by chunk. Returns null, and cancels the
 * stream, as soon as more than `limit` bytes have arrived.
 */
export async function readLimitedBody(
  response: Response,
  limit: number,
): Promise<Uint8Array | null> {
  if (!response.body) return new Uint8Array(0);
  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    size += value.byteLength;
    if (size > limit) {
      await reader.cancel();
      return null;
    }
    chunks.push(value);
  }
  const body = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return body;
}

export interface ImageFetcherOptions {
  timeoutMs?: number;
  /** Prefix the encoded image URL is appended to. Empty disables the proxy. */
  proxyUrl?: string;
  proxyToken?: string;
  fetch?: FetchLike;
}

export interface ImageRequest {
  url: string;
  url2x?: string;
  destPath: string;
  /** Article URL, used as Referer for hosts that require one. */
  entryUrl?: string;
}

export type ImageDownloadResult =
  | { ok: true; size: number }
  | { ok: false; reason: string };

const log = logger.child('ImageFetcher');

export function imageFetcherOptions(config: Config): ImageFetcherOptions {
  const opts: ImageFetcherOptions = { timeoutMs: config.image_timeout_ms };
  if (
    config.proxy_image_downloader_enabled &&
    config.proxy_image_downloader_url !== ''
  ) {
    opts.proxyUrl = config.proxy_image_downloader_url;
    if (config.proxy_image_downloader_token !== '') {
      opts.proxyToken = config.proxy_image_downloader_token;
    }
  }
  return opts;
}

export function applyProxyUrl(url: string, proxyUrl?: string): string {
  if (!proxyUrl) return url;
  return proxyUrl + encodeURIComponent(url);
}

export function imageRequestHeaders(
  downloadUrl: string,
  opts: { entryUrl?: string; proxyToken?: string },
): Record<string, string> {
  const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
  if (opts.proxyToken) headers['Authorization'] = `Bearer ${opts.proxyToken}`;
  if (REDDIT_HOST.test(downloadUrl)) {
    const entryUrl = decodeAmpersands(opts.entryUrl ?? REDDIT_DEFAULT_REFERER);
    headers['Referer'] = entryUrl.split('?')[0] || REDDIT_DEFAULT_REFERER;
    headers['User-Agent'] = MOBILE_USER_AGENT;
  }
  return headers;
}

/** Checks a completed response before anything is written to disk. */
export function validateImageResponse(
  status: number,
  contentType: string | null,
  contentLength: string | null,
  size: number,
): string | null {
  if (status !== 200) return `HTTP ${status}`;
  if (contentType) {
    const type = contentType.toLowerCase();
    if (!type.includes('image/') && !type.includes('application/octet-stream')) {
      return `Unexpected content type ${type}`;
    }
  }
  if (size < MIN_IMAGE_BYTES || size > MAX_IMAGE_BYTES) {
    return `Unexpected size ${size} bytes`;
  }
  if (contentLength !== null && contentLength.trim() !== '') {
    const expected = Number(contentLength);
    if (Number.isFinite(expected) && expected !== size) {
      return `Incomplete download (${size} of ${expected} bytes)`;
    }
  }
  return null;
}

export class ImageFetcher {
  private readonly timeoutMs: number;
  private readonly proxyUrl: string | undefined;
  private readonly proxyToken: string | undefined;
  private readonly fetchImpl: FetchLike;

  constructor(opts: ImageFetcherOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 20_000;
    this.proxyUrl = opts.proxyUrl;
    this.proxyToken = opts.proxyToken;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  /** Downloads one image to `destPath`. Never rejects. */
  async download(req: ImageRequest): Promise<ImageDownloadResult> {
    const sourceUrl = decodeAmpersands(req.url2x ?? req.url);
    const downloadUrl = applyProxyUrl(sourceUrl, this.proxyUrl);
    const headers = imageRequestHeaders(downloadUrl, {
      entryUrl: req.entryUrl,
      proxyToken: this.proxyUrl ? this.proxyToken : undefined,
    });

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let failure: string;
    try {
      const response = await this.fetchImpl(downloadUrl, {
        headers,
        signal: controller.signal,
        redirect: 'follow',
      });
      const declared = Number(response.headers.get('content-length'));
      if (Number.isFinite(declared) && declared > MAX_IMAGE_BYTES) {
        failure = `Unexpected size ${declared} bytes`;
      } else {
        const body = await readLimitedBody(response, MAX_IMAGE_BYTES);
        const invalid =
          body === null
            ? `Image larger than ${MAX_IMAGE_BYTES} bytes`
            : validateImageResponse(
                response.status,
                response.headers.get('content-type'),
                response.headers.get('content-length'),
                body.byteLength,
              );
        if (body !== null && invalid === null) {
          await fs.mkdir(path.dirname(req.destPath), { recursive: true });
          await fs.writeFile(req.destPath, body);
          log.debug('Image downloaded', {
            file: path.basename(req.destPath),
            size: body.byteLength,
          });
          return { ok: true, size: body.byteLength };
        }
        failure = invalid;
      }
    } catch (err) {
      failure = controller.signal.aborted
        ? `Timed out after ${this.timeoutMs}ms`
        : errorMessage(err);
    } finally {
      clearTimeout(timeout);
    }

    await fs.rm(req.destPath, { force: true });
    log.debug('Image download failed', { url: sourceUrl, reason: failure });
    return { ok: false, reason: failure };
  }
}

export interface MaterializeOptions {
  entryDir: string;
  entryUrl?: string;
  /**
   * Runs before each image; returning false stops the loop and leaves the
   * remaining descriptors untouched.
   */
  beforeEach?: (index: number, total: number) => Promise<boolean>;
}

/**
 * Downloads every descriptor into the entry directory, recording the
 * outcome on each one. A failed image never stops the others.
 */
export async function materializeImages(
  images: ImageDescriptor[],
  fetcher: ImageFetcher,
  opts: MaterializeOptions,
): Promise<{ downloaded: number; failed: number; stopped: boolean }> {
  let downloaded = 0;
  let failed = 0;
  for (const [index, image] of images.entries()) {
    if (opts.beforeEach && !(await opts.beforeEach(index, images.length))) {
      return { downloaded, failed, stopped: true };
    }
    const result = await fetcher.download({
      url: image.src,
      url2x: image.src2x,
      destPath: path.join(opts.entryDir, image.filename),
      entryUrl: opts.entryUrl,
    });
    image.downloaded = result.ok;
    if (result.ok) {
      delete image.errorReason;
      downloaded++;
    } else {
      image.errorReason = result.reason;
      failed++;
    }
  }
  return { downloaded, failed, stopped: false };
}
