import type { SessionConfig } from '@/types';

export const DEFAULT_TOP_N = 25;

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  mode: { kind: 'timed', durationSeconds: 60 },
  punctuationProbability: 0,
  numbers: false,
  wordList: { id: 'default' },
  topN: DEFAULT_TOP_N,
};

/** Presets offered by the interactive menu. */
export const MENU_TIMED_SECONDS = 60;
export const MENU_WORD_COUNT = 50;

// Word generation
export const NUMBER_SUBSTITUTION_PROBABILITY = 0.1;
export const PUNCTUATION_MARKS = [',', '.', ';', ':', '!', '?'] as const;
export const SENTENCE_CHUNK_SIZE = 8;
export const PARAGRAPH_CHUNK_SIZE = 25;

// Runner
export const TICK_INTERVAL_MS = 100;
export const PREVIEW_WORD_COUNT = 10;
export const PROGRESS_BAR_WIDTH = 30;
