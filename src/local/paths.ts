import path from 'node:path';

export const ENTRY_HTML = 'entry.html';
export const METADATA_FILE = 'metadata.json';

const ENTRY_DIR_PATTERN = /^\d+$/;

export function entryDir(downloadRoot: string, entryId: number): string {
  return path.join(downloadRoot, String(entryId));
}

export function entryHtmlPath(downloadRoot: string, entryId: number): string {
  return path.join(entryDir(downloadRoot, entryId), ENTRY_HTML);
}

export function metadataPath(downloadRoot: string, entryId: number): string {
  return path.join(entryDir(downloadRoot, entryId), METADATA_FILE);
}

/** Entry id for a directory name, or null when the name is not numeric. */
export function parseEntryDirName(name: string): number | null {
  if (!ENTRY_DIR_PATTERN.test(name)) return null;
  const id = Number(name);
  return id > 0 ? id : null;
}
