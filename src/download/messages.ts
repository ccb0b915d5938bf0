import type { ImageCounts } from './types.js';

export function preparingMessage(title: string): string {
  return `Downloading:\n${title}\n\nPreparing...`;
}

export function imagesMessage(title: string, index: number, total: number): string {
  return `Downloading:\n${title}\n\nDownloading ${index}/${total} images`;
}

export function batchImagesMessage(
  entryIndex: number,
  totalEntries: number,
  title: string,
  index: number,
  total: number,
): string {
  return `Downloading ${entryIndex}/${totalEntries}:\n${title}\n\nDownloading ${index}/${total} images`;
}

export function batchEntryMessage(
  entryIndex: number,
  totalEntries: number,
  title: string,
): string {
  return totalEntries === 1
    ? `Downloading: ${title}`
    : `Downloading ${entryIndex}/${totalEntries}: ${title}`;
}

export function processingMessage(title: string): string {
  return `Downloading:\n${title}\n\nProcessing content...`;
}

export function imageErrorsMessage(counts: ImageCounts): string {
  return `Some images failed to download (${counts.downloaded}/${counts.total} successful)\nContinuing with available images...`;
}

/** Final notice for one entry; zero counts are left out. */
export function completionMessage(includeImages: boolean, counts: ImageCounts): string {
  const lines: string[] = [];
  if (counts.total > 0) {
    if (includeImages) {
      if (counts.downloaded > 0) lines.push(`${counts.downloaded} images downloaded`);
      const skipped = counts.total - counts.downloaded;
      if (skipped > 0) lines.push(`${skipped} images skipped`);
    } else {
      lines.push(`${counts.total} images skipped`);
    }
  }
  return lines.length > 0
    ? `Download completed!\n\n${lines.join('\n')}`
    : 'Download completed!';
}

export function batchSummaryMessage(
  total: number,
  completed: number,
  failed: number,
): string {
  if (failed === 0) {
    return total === 1
      ? 'Download completed successfully!'
      : `All ${total} entries downloaded successfully!`;
  }
  if (completed === 0) {
    return total === 1 ? 'Download failed.' : `All ${total} entries failed to download.`;
  }
  return `Batch download completed: ${completed} successful, ${failed} failed.`;
}

export function batchCancelledMessage(completed: number, total: number): string {
  return `Batch download cancelled. Downloaded ${completed}/${total} entries.`;
}
