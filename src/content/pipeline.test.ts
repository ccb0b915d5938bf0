import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors.js';
import type { Entry } from '../types.js';
import {
  HtmlContentPipeline,
  entryContent,
  validateForDownload,
} from './pipeline.js';

const entry: Entry = {
  id: 5,
  title: 'Clip',
  url: 'https://example.com/posts/5',
  status: 'unread',
  starred: false,
  content:
    '<p>Watch</p><iframe src="https://www.youtube.com/embed/abc123XYZ"></iframe>' +
    '<img src="/a.png"><script>track()</script>',
};

describe('HtmlContentPipeline', () => {
  const pipeline = new HtmlContentPipeline();

  it('discovers the video thumbnail as a regular image', () => {
    const prepared = pipeline.prepare(entryContent(entry), entry.url);
    expect(prepared.images.map((i) => i.src)).toEqual([
      'https://img.youtube.com/vi/abc123XYZ/hqdefault.jpg',
      'https://example.com/a.png',
    ]);
    expect(prepared.imagesMapping).toEqual({
      'image_001.jpg': 'https://img.youtube.com/vi/abc123XYZ/hqdefault.jpg',
      'image_002.png': 'https://example.com/a.png',
    });
  });

  it('renders a self-contained document', () => {
    const prepared = pipeline.prepare(entryContent(entry), entry.url);
    const html = pipeline.render(entry, prepared, '/data/entries/5');
    expect(html).toContain('<base href="file:///data/entries/5/">');
    expect(html).toContain(
      '<a href="https://www.youtube.com/watch?v=abc123XYZ"><img src="image_001.jpg" alt=""></a>',
    );
    expect(html).toContain('<img src="image_002.png" alt="">');
    expect(html).not.toContain('<script');
    expect(html).not.toContain('<iframe');
  });

  it('treats a blank url as no base', () => {
    const prepared = pipeline.prepare('<img src="a.png">', ' ');
    expect(prepared.baseUrl).toBeUndefined();
    expect(prepared.images[0]?.src).toBe('a.png');
  });
});

describe('entryContent', () => {
  it('falls back to the summary, then to nothing', () => {
    expect(entryContent({ ...entry, content: undefined, summary: 's' })).toBe('s');
    expect(entryContent({ ...entry, content: undefined })).toBe('');
  });
});

describe('validateForDownload', () => {
  it('rejects missing entries and bad ids', () => {
    expect(() => validateForDownload(null)).toThrow(ValidationError);
    expect(() => validateForDownload({ ...entry, id: 0 })).toThrow(
      'Invalid entry ID "0"',
    );
    expect(validateForDownload(entry)).toBe(entry);
  });
});
