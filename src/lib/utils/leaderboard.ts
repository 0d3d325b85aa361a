import { roundTo } from '@/lib/engine/metrics';
import type { HighscoreEntry, HighscoreEntryDto, HighscoreMapper, Leaderboard, SessionResult } from '@/types';

const timestampValue = (timestamp: string): number => {
  if (/^\d+$/.test(timestamp)) return Number(timestamp);
  const parsed = Date.parse(timestamp);
  return Number.isNaN(parsed) ? Number.POSITIVE_INFINITY : parsed;
};

/** Net WPM desc, then accuracy desc, then oldest first. */
export const compareEntries = (a: HighscoreEntry, b: HighscoreEntry): number => {
  if (a.netWpm !== b.netWpm) return b.netWpm - a.netWpm;
  if (a.accuracy !== b.accuracy) return b.accuracy - a.accuracy;
  const left = timestampValue(a.timestamp);
  const right = timestampValue(b.timestamp);
  if (left === right) return 0;
  return left < right ? -1 : 1;
};

export const sortLeaderboard = (entries: Leaderboard): HighscoreEntry[] =>
  [...entries].sort(compareEntries);

export const insertEntry = (entries: Leaderboard, entry: HighscoreEntry, limit: number): HighscoreEntry[] =>
  sortLeaderboard([...entries, entry]).slice(0, Math.max(0, limit));

export const entryFromResult = (result: SessionResult): HighscoreEntry => ({
  netWpm: roundTo(result.netWpm, 2),
  rawWpm: roundTo(result.rawWpm, 2),
  accuracy: roundTo(result.accuracy, 4),
  errors: result.errors,
  timestamp: result.timestamp,
  charsTyped: result.charsTyped,
});

export const highscoreMapper: HighscoreMapper = {
  toDomainEntry: (dto: HighscoreEntryDto): HighscoreEntry => ({
    netWpm: dto.net_wpm,
    rawWpm: dto.raw_wpm,
    accuracy: dto.accuracy,
    errors: dto.errors,
    timestamp: dto.timestamp,
    ...(dto.chars_typed !== undefined ? { charsTyped: dto.chars_typed } : {}),
  }),
  toDtoEntry: (entry: HighscoreEntry): HighscoreEntryDto => ({
    net_wpm: entry.netWpm,
    raw_wpm: entry.rawWpm,
    accuracy: entry.accuracy,
    errors: entry.errors,
    timestamp: entry.timestamp,
    ...(entry.charsTyped !== undefined ? { chars_typed: entry.charsTyped } : {}),
  }),
};
