import { describe, expect, it } from '@jest/globals';

import { highscoreEntrySchema, highscoreFileSchema, sessionResultSchema } from '@/lib/validators';

import { buildResult } from '../helpers/fixtures';

describe('highscoreEntrySchema', () => {
  const row = {
    net_wpm: 45.2,
    raw_wpm: 50,
    accuracy: 0.95,
    errors: 3,
    timestamp: '2026-01-01T10:00:00.000Z',
  };

  it('accepts an ISO timestamp', () => {
    expect(highscoreEntrySchema.safeParse(row).success).toBe(true);
  });

  it('accepts an epoch milliseconds timestamp', () => {
    expect(highscoreEntrySchema.safeParse({ ...row, timestamp: '1767261600000' }).success).toBe(true);
  });

  it('rejects an unparsable timestamp', () => {
    expect(highscoreEntrySchema.safeParse({ ...row, timestamp: 'yesterday-ish' }).success).toBe(false);
  });

  it('rejects accuracy above 1', () => {
    expect(highscoreEntrySchema.safeParse({ ...row, accuracy: 95 }).success).toBe(false);
  });
});

describe('highscoreFileSchema', () => {
  it('accepts any map and leaves boards to be checked one by one', () => {
    expect(highscoreFileSchema.safeParse({ 'timed-60-p0-n0': [{}], broken: 'oops' }).success).toBe(true);
  });

  it('rejects a top-level array', () => {
    expect(highscoreFileSchema.safeParse([]).success).toBe(false);
  });
});

describe('sessionResultSchema', () => {
  it('accepts a session result', () => {
    expect(sessionResultSchema.safeParse(buildResult()).success).toBe(true);
  });

  it('rejects a negative speed', () => {
    expect(sessionResultSchema.safeParse(buildResult({ netWpm: -1 })).success).toBe(false);
  });
});
