import { describe, expect, it } from '@jest/globals';

import {
  compareEntries,
  entryFromResult,
  highscoreMapper,
  insertEntry,
  sortLeaderboard,
} from '@/lib/utils/leaderboard';
import type { HighscoreEntry } from '@/types';

import { buildResult } from '../helpers/fixtures';

const entry = (netWpm: number, overrides?: Partial<HighscoreEntry>): HighscoreEntry => ({
  netWpm,
  rawWpm: netWpm + 5,
  accuracy: 0.9,
  errors: 2,
  timestamp: '2026-01-01T10:00:00.000Z',
  ...overrides,
});

describe('sortLeaderboard', () => {
  it('orders by net speed, then accuracy', () => {
    const sorted = sortLeaderboard([entry(40), entry(50, { accuracy: 0.9 }), entry(50, { accuracy: 0.95 })]);

    expect(sorted.map((row) => [row.netWpm, row.accuracy])).toEqual([
      [50, 0.95],
      [50, 0.9],
      [40, 0.9],
    ]);
  });

  it('puts the older entry first on a full tie', () => {
    const newer = entry(50, { timestamp: '2026-01-02T00:00:00.000Z' });
    const older = entry(50, { timestamp: '2026-01-01T00:00:00.000Z' });

    expect(compareEntries(older, newer)).toBeLessThan(0);
    expect(sortLeaderboard([newer, older])[0]).toBe(older);
  });

  it('understands epoch millisecond timestamps', () => {
    const epoch = entry(50, { timestamp: String(Date.parse('2025-06-01T00:00:00.000Z')) });
    const iso = entry(50, { timestamp: '2026-01-01T00:00:00.000Z' });

    expect(sortLeaderboard([iso, epoch])[0]).toBe(epoch);
  });

  it('treats two unreadable timestamps as a tie and ranks them after readable ones', () => {
    const first = entry(50, { timestamp: 'not a date' });
    const second = entry(50, { timestamp: 'also not a date' });
    const dated = entry(50, { timestamp: '2026-01-01T00:00:00.000Z' });

    expect(compareEntries(first, second)).toBe(0);
    expect(compareEntries(second, first)).toBe(0);
    expect(compareEntries(dated, first)).toBe(-1);
    expect(sortLeaderboard([first, dated, second])).toEqual([dated, first, second]);
  });
});

describe('insertEntry', () => {
  it('keeps at most the limit', () => {
    const board = insertEntry([entry(30), entry(20)], entry(25), 2);

    expect(board.map((row) => row.netWpm)).toEqual([30, 25]);
  });

  it('does not mutate the input', () => {
    const original = [entry(30)];
    insertEntry(original, entry(40), 5);

    expect(original).toHaveLength(1);
  });
});

describe('entryFromResult', () => {
  it('rounds the stored figures', () => {
    expect(
      entryFromResult(buildResult({ netWpm: 45.204, rawWpm: 50.129, accuracy: 0.95556, charsTyped: 240 })),
    ).toEqual({
      netWpm: 45.2,
      rawWpm: 50.13,
      accuracy: 0.9556,
      errors: 3,
      timestamp: '2026-01-01T10:00:00.000Z',
      charsTyped: 240,
    });
  });
});

describe('highscoreMapper', () => {
  it('maps persisted rows to entries', () => {
    expect(
      highscoreMapper.toDomainEntry({
        net_wpm: 45.2,
        raw_wpm: 50,
        accuracy: 0.95,
        errors: 3,
        timestamp: '1767261600000',
      }),
    ).toEqual({ netWpm: 45.2, rawWpm: 50, accuracy: 0.95, errors: 3, timestamp: '1767261600000' });
  });

  it('writes snake_case rows', () => {
    expect(highscoreMapper.toDtoEntry(entry(48.35, { charsTyped: 260 }))).toEqual({
      net_wpm: 48.35,
      raw_wpm: 53.35,
      accuracy: 0.9,
      errors: 2,
      timestamp: '2026-01-01T10:00:00.000Z',
      chars_typed: 260,
    });
  });
});
