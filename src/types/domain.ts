import type { HighscoreEntryDto } from './api';

/** Bundled word lists plus the two file-backed variants. */
export type BundledWordListId = 'default' | 'easy' | 'medium' | 'hard' | 'programming';

export type WordListId = BundledWordListId | 'custom' | 'book';

/** How book content is cut into typing units. */
export type BookChunking = 'words' | 'sentences' | 'paragraphs';

/**
 * Which word list a session draws from. File-backed lists carry their path.
 */
export type WordListSelection =
  | { readonly id: BundledWordListId }
  | { readonly id: 'custom'; readonly path: string }
  | { readonly id: 'book'; readonly path: string; readonly chunking?: BookChunking };

/** Timed sessions run against the clock, word-count sessions end after the last word. */
export type SessionMode =
  | { readonly kind: 'timed'; readonly durationSeconds: number }
  | { readonly kind: 'words'; readonly count: number };

/**
 * Immutable configuration of a typing session.
 */
export interface SessionConfig {
  readonly mode: SessionMode;
  /** Probability in [0, 1] that a word gets punctuation injected. */
  readonly punctuationProbability: number;
  readonly numbers: boolean;
  readonly wordList: WordListSelection;
  /** Leaderboard size for this configuration's mode key. */
  readonly topN: number;
}

/** Lifecycle of a typing session. */
export type SessionStatus = 'pending' | 'active' | 'finished';

export type SessionEndReason = 'words-exhausted' | 'time-expired' | 'finished' | 'aborted';

/** Position-aligned classification of one typed word against its target. */
export interface CharacterClassification {
  readonly mismatches: number;
  readonly omissions: number;
  readonly extras: number;
  readonly correct: number;
  readonly errors: number;
}

/**
 * Outcome of a single presented word.
 */
export interface WordAttempt extends CharacterClassification {
  readonly index: number;
  readonly target: string;
  readonly typed: string;
  /** Clock milliseconds when the word was presented. */
  readonly startedAt: number;
  /** Clock milliseconds when the word was submitted or finalized. */
  readonly endedAt: number;
  /** True when the word was cut off by the end of the session. */
  readonly partial: boolean;
}

/** Running aggregate owned by a typing session. */
export interface SessionCounters {
  readonly charsTyped: number;
  readonly correctChars: number;
  readonly errors: number;
  readonly mismatches: number;
  readonly omissions: number;
  readonly extras: number;
  readonly elapsedMs: number;
  /** Per submitted word, in seconds. */
  readonly wordDurations: readonly number[];
}

/**
 * Snapshot produced once when a session reaches `finished`.
 */
export interface SessionResult {
  readonly rawWpm: number;
  readonly netWpm: number;
  readonly accuracy: number;
  readonly consistency: number;
  readonly errors: number;
  readonly charsTyped: number;
  readonly correctChars: number;
  readonly mismatches: number;
  readonly omissions: number;
  readonly extras: number;
  readonly wordsCompleted: number;
  readonly elapsedSeconds: number;
  readonly modeKey: string;
  /** ISO-8601 wall-clock time of completion. */
  readonly timestamp: string;
  /** False for aborted sessions; those never reach the leaderboard. */
  readonly completed: boolean;
  readonly endReason: SessionEndReason;
}

/** Live view of a running session for display. */
export interface SessionSnapshot {
  readonly status: SessionStatus;
  readonly wordIndex: number;
  readonly currentWord: string | null;
  readonly upcoming: readonly string[];
  readonly input: string;
  readonly counters: SessionCounters;
  /** Null outside timed mode. */
  readonly remainingMs: number | null;
  readonly netWpm: number;
  readonly accuracy: number;
}

/**
 * A leaderboard row. Created from an accepted result and never mutated.
 */
export interface HighscoreEntry {
  readonly netWpm: number;
  readonly rawWpm: number;
  readonly accuracy: number;
  readonly errors: number;
  readonly timestamp: string;
  readonly charsTyped?: number;
}

/** Ranked entries for one mode key, best first. */
export type Leaderboard = readonly HighscoreEntry[];

export type LeaderboardMap = Readonly<Record<string, Leaderboard>>;

/** Outcome of offering a result to the highscore store. */
export interface HighscoreDecision {
  readonly accepted: boolean;
  readonly previousBest: HighscoreEntry | null;
  /** Net WPM difference to the previous best; null for a first entry. */
  readonly delta: number | null;
  readonly modeKey: string;
}

/**
 * Mapping utilities between the persisted shape and domain models.
 */
export interface HighscoreMapper {
  readonly toDomainEntry: (dto: HighscoreEntryDto) => HighscoreEntry;
  readonly toDtoEntry: (entry: HighscoreEntry) => HighscoreEntryDto;
}
