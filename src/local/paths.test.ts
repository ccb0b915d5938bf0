import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { entryHtmlPath, metadataPath, parseEntryDirName } from './paths.js';

describe('entry paths', () => {
  const root = path.join('/data', 'entries');

  it('keys directories by entry id', () => {
    expect(entryHtmlPath(root, 42)).toBe(
      path.join('/data', 'entries', '42', 'entry.html'),
    );
    expect(metadataPath(root, 42)).toBe(
      path.join('/data', 'entries', '42', 'metadata.json'),
    );
  });

  it('accepts only numeric directory names', () => {
    expect(parseEntryDirName('123')).toBe(123);
    expect(parseEntryDirName('0')).toBeNull();
    expect(parseEntryDirName('12a')).toBeNull();
    expect(parseEntryDirName('.tmp')).toBeNull();
  });
});
