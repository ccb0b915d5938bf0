import { createStore, type StoreApi } from 'zustand/vanilla';
import { useStore } from 'zustand';
import type { DownloadPhase } from '../download/types.js';

export interface DownloadProgressState {
  phase: DownloadPhase;
  title: string;
  message: string;
  entryIndex: number;
  totalEntries: number;
  imageIndex: number;
  totalImages: number;

  startEntry: (title: string, entryIndex?: number, totalEntries?: number) => void;
  setPhase: (phase: DownloadPhase, message: string) => void;
  setImageProgress: (index: number, total: number, message: string) => void;
  setMessage: (message: string) => void;
  reset: () => void;
}

export type DownloadProgressStore = StoreApi<DownloadProgressState>;

type ProgressFields = Pick<
  DownloadProgressState,
  'phase' | 'title' | 'message' | 'entryIndex' | 'totalEntries' | 'imageIndex' | 'totalImages'
>;

const initial: ProgressFields = {
  phase: 'idle',
  title: '',
  message: '',
  entryIndex: 1,
  totalEntries: 1,
  imageIndex: 0,
  totalImages: 0,
};

export function createDownloadProgressStore(): DownloadProgressStore {
  return createStore<DownloadProgressState>((set) => ({
    ...initial,

    startEntry: (title, entryIndex = 1, totalEntries = 1) =>
      set({
        title,
        entryIndex,
        totalEntries,
        phase: 'idle',
        message: '',
        imageIndex: 0,
        totalImages: 0,
      }),
    setPhase: (phase, message) => set({ phase, message }),
    setImageProgress: (imageIndex, totalImages, message) =>
      set({ imageIndex, totalImages, message }),
    setMessage: (message) => set({ message }),
    reset: () => set({ ...initial }),
  }));
}

export const downloadProgressStore = createDownloadProgressStore();

export function useDownloadProgress<T>(
  selector: (state: DownloadProgressState) => T,
  store: DownloadProgressStore = downloadProgressStore,
): T {
  return useStore(store, selector);
}
