import type { HighscoreRepository, SessionConfigRepository } from '@/lib/db/repositories';
import type { LeaderboardMap, SessionConfig, SessionResult } from '@/types';

export const buildResult = (overrides?: Partial<SessionResult>): SessionResult => ({
  rawWpm: 50,
  netWpm: 45.2,
  accuracy: 0.95,
  consistency: 0.2,
  errors: 3,
  charsTyped: 250,
  correctChars: 238,
  mismatches: 2,
  omissions: 1,
  extras: 0,
  wordsCompleted: 50,
  elapsedSeconds: 60,
  modeKey: 'timed-60-p0-n0',
  timestamp: '2026-01-01T10:00:00.000Z',
  completed: true,
  endReason: 'time-expired',
  ...overrides,
});

export class InMemoryHighscoreRepository implements HighscoreRepository {
  public saveCount = 0;
  public failWith: Error | null = null;

  constructor(private leaderboards: LeaderboardMap = {}) {}

  async load(): Promise<LeaderboardMap> {
    return { ...this.leaderboards };
  }

  async save(leaderboards: LeaderboardMap): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.saveCount += 1;
    this.leaderboards = { ...leaderboards };
  }

  get current(): LeaderboardMap {
    return this.leaderboards;
  }
}

export class InMemorySessionConfigRepository implements SessionConfigRepository {
  public stored: SessionConfig | null = null;
  public saveCount = 0;

  async load(fallback: SessionConfig): Promise<SessionConfig> {
    return this.stored ?? fallback;
  }

  async save(config: SessionConfig): Promise<void> {
    this.saveCount += 1;
    this.stored = config;
  }

  async clear(): Promise<void> {
    this.stored = null;
  }
}

/** Source that hands out `words` in order and then ends. */
export const listSource = (words: readonly string[]) => {
  let index = 0;
  return {
    next: (): string | undefined => words[index++],
  };
};

/** Source that repeats one word forever. */
export const repeatSource = (word: string) => ({
  next: (): string => word,
});
