import { describe, it, expect } from 'vitest';
import { extractYouTubeId, replaceVideoEmbeds } from './video.js';

describe('extractYouTubeId', () => {
  it('reads embed, watch and short links', () => {
    expect(extractYouTubeId('https://www.youtube.com/embed/abc123XYZ')).toBe(
      'abc123XYZ',
    );
    expect(
      extractYouTubeId('https://www.youtube-nocookie.com/embed/abc123XYZ?rel=0'),
    ).toBe('abc123XYZ');
    expect(extractYouTubeId('https://youtube.com/watch?t=3&v=abc123XYZ')).toBe(
      'abc123XYZ',
    );
    expect(extractYouTubeId('https://youtu.be/abc123XYZ')).toBe('abc123XYZ');
  });

  it('returns null for other hosts', () => {
    expect(extractYouTubeId('https://vimeo.com/123456')).toBeNull();
  });
});

describe('replaceVideoEmbeds', () => {
  it('swaps a YouTube iframe for a linked thumbnail', () => {
    const html =
      '<p>Intro</p><iframe src="https://www.youtube.com/embed/abc123XYZ"></iframe>';
    expect(replaceVideoEmbeds(html)).toBe(
      '<p>Intro</p><p><a href="https://www.youtube.com/watch?v=abc123XYZ">' +
        '<img src="https://img.youtube.com/vi/abc123XYZ/hqdefault.jpg" alt="YouTube video">' +
        '</a></p>',
    );
  });

  it('leaves other iframes untouched', () => {
    const html = '<iframe src="https://player.vimeo.com/video/1"></iframe>';
    expect(replaceVideoEmbeds(html)).toBe(html);
  });

  it('returns content without iframes unchanged', () => {
    expect(replaceVideoEmbeds('<p>x</p>')).toBe('<p>x</p>');
  });
});
