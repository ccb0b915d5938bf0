import type { PromptChoice } from '../prompts/prompter.js';

export type DownloadPhase =
  | 'idle'
  | 'preparing'
  | 'downloading'
  | 'processing'
  | 'completing';

/** Single entry, while images download. */
export type ImagePhaseChoice = 'cancel_entry' | 'skip_images' | 'resume';
/** Single entry, any other phase. */
export type PhaseChoice = 'cancel_entry' | 'continue';
/** Batch, between two entries. */
export type BatchChoice =
  | 'cancel_all'
  | 'skip_images_all'
  | 'include_images_all'
  | 'resume';
/** Batch, while one entry's images download. */
export type BatchImageChoice =
  | 'cancel_entry'
  | 'cancel_all'
  | 'skip_images_entry'
  | 'skip_images_all'
  | 'include_images_all'
  | 'resume';

export const IMAGE_PHASE_CHOICES: PromptChoice<ImagePhaseChoice>[] = [
  { value: 'cancel_entry', label: 'Cancel entry download' },
  { value: 'skip_images', label: 'Continue without images' },
  { value: 'resume', label: 'Resume downloading' },
];

export const PHASE_CHOICES: PromptChoice<PhaseChoice>[] = [
  { value: 'cancel_entry', label: 'Cancel entry download' },
  { value: 'continue', label: 'Continue' },
];

export function batchChoices(skipImagesForAll: boolean): PromptChoice<BatchChoice>[] {
  return [
    { value: 'cancel_all', label: 'Cancel all entries' },
    skipImagesForAll
      ? { value: 'include_images_all', label: 'Include images for remaining entries' }
      : { value: 'skip_images_all', label: 'Skip images for all entries' },
    { value: 'resume', label: 'Resume downloading' },
  ];
}

export function batchImageChoices(
  skipImagesForAll: boolean,
): PromptChoice<BatchImageChoice>[] {
  return [
    { value: 'cancel_entry', label: 'Cancel current entry' },
    { value: 'cancel_all', label: 'Cancel all entries' },
    { value: 'skip_images_entry', label: 'Skip images for this entry' },
    skipImagesForAll
      ? { value: 'include_images_all', label: 'Include images for remaining entries' }
      : { value: 'skip_images_all', label: 'Skip images for all entries' },
    { value: 'resume', label: 'Resume downloading' },
  ];
}

export interface DownloadOptions {
  includeImages: boolean;
}

export interface ImageCounts {
  total: number;
  downloaded: number;
  failed: number;
}

export type DownloadResult =
  | {
      kind: 'completed';
      entryId: number;
      htmlPath: string;
      alreadyDownloaded: boolean;
      images: ImageCounts;
      message: string;
    }
  | { kind: 'cancelled'; entryId: number }
  | { kind: 'failed'; entryId: number; error: string };

export interface BatchResult {
  completed: number;
  failed: number;
  cancelled: boolean;
  message: string;
}
