import type { BookChunking, WordListId } from './domain';

/** Persisted shape of a leaderboard row in `highscores.json`. */
export interface HighscoreEntryDto {
  readonly net_wpm: number;
  readonly raw_wpm: number;
  readonly accuracy: number;
  readonly errors: number;
  /** ISO-8601 string, or epoch milliseconds written as a string. */
  readonly timestamp: string;
  readonly chars_typed?: number;
}

/** Top-level content of the highscore file: mode key to ranked rows. */
export type HighscoreFileDto = Readonly<Record<string, readonly HighscoreEntryDto[]>>;

/** Persisted shape of the last used session configuration. */
export interface SessionConfigDto {
  readonly mode: 'timed' | 'words';
  readonly durationSeconds?: number;
  readonly wordCount?: number;
  readonly punctuationProbability: number;
  readonly numbers: boolean;
  readonly wordList: WordListId;
  readonly wordListPath?: string;
  readonly bookChunking?: BookChunking;
  readonly topN: number;
}
