import { DEFAULT_TOP_N } from '@/config/session.config';
import type { HighscoreRepository } from '@/lib/db/repositories';
import { roundTo } from '@/lib/engine/metrics';
import { ConfigurationError, InvalidStateError } from '@/lib/errors';
import { entryFromResult, insertEntry } from '@/lib/utils/leaderboard';
import { silentLogger, type Logger } from '@/lib/utils/logger';
import { sessionResultSchema } from '@/lib/validators';
import type { HighscoreDecision, HighscoreEntry, LeaderboardMap, SessionResult } from '@/types';

export interface HighscoreServiceOptions {
  readonly topN?: number;
  readonly logger?: Logger;
}

/**
 * Keeps one bounded leaderboard per mode key and only records strict
 * improvements on the current best net WPM. The first result for a mode key
 * is always recorded.
 */
export class HighscoreService {
  private readonly defaultTopN: number;
  private readonly logger: Logger;

  constructor(
    private readonly repository: HighscoreRepository,
    options: HighscoreServiceOptions = {},
  ) {
    this.defaultTopN = options.topN ?? DEFAULT_TOP_N;
    this.logger = options.logger ?? silentLogger;
  }

  async consider(result: SessionResult, topN: number = this.defaultTopN): Promise<HighscoreDecision> {
    const validation = sessionResultSchema.safeParse(result);
    if (!validation.success) {
      throw new ConfigurationError('Invalid session result', validation.error.flatten());
    }
    if (!result.completed) {
      throw new InvalidStateError('Aborted sessions cannot be recorded', 'aborted');
    }
    if (!Number.isInteger(topN) || topN <= 0) {
      throw new ConfigurationError(`Leaderboard size must be a positive integer, got ${topN}`);
    }

    const leaderboards = await this.repository.load();
    const board = leaderboards[result.modeKey] ?? [];
    const best = board[0];

    if (best && !(result.netWpm > best.netWpm)) {
      this.logger.debug(`${result.modeKey}: ${result.netWpm} does not beat ${best.netWpm}`);
      return {
        accepted: false,
        previousBest: best,
        delta: roundTo(result.netWpm - best.netWpm, 2),
        modeKey: result.modeKey,
      };
    }

    const nextBoard = insertEntry(board, entryFromResult(result), topN);
    await this.repository.save({ ...leaderboards, [result.modeKey]: nextBoard });
    this.logger.debug(`${result.modeKey}: recorded ${result.netWpm} WPM`);

    return {
      accepted: true,
      previousBest: best ?? null,
      delta: best ? roundTo(result.netWpm - best.netWpm, 2) : null,
      modeKey: result.modeKey,
    };
  }

  async topN(modeKey: string, n: number = this.defaultTopN): Promise<HighscoreEntry[]> {
    const leaderboards = await this.repository.load();
    return [...(leaderboards[modeKey] ?? [])].slice(0, Math.max(0, Math.floor(n)));
  }

  async listLeaderboards(): Promise<LeaderboardMap> {
    return this.repository.load();
  }

  async listModeKeys(): Promise<string[]> {
    const leaderboards = await this.repository.load();
    return Object.keys(leaderboards).sort();
  }
}
