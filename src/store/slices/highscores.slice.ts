import { ensureAppError } from '@/lib/errors';
import type { HighscoreService } from '@/lib/services';
import type { HighscoreDecision, LeaderboardMap, SessionResult } from '@/types';

import type { AsyncStatus, StoreSetter } from '../types';

export interface HighscoresSlice {
  leaderboards: LeaderboardMap;
  highscoresStatus: AsyncStatus;
  highscoresError?: string;
  highscoresSaving: boolean;
  lastDecision: HighscoreDecision | null;
  loadHighscores: () => Promise<LeaderboardMap>;
  /** Offers a finished result to its leaderboard, bounded to `topN` entries. */
  submitResult: (result: SessionResult, topN?: number) => Promise<HighscoreDecision>;
}

interface CreateHighscoresSliceParams {
  set: StoreSetter<HighscoresSlice>;
  service: HighscoreService;
}

const mapErrorMessage = (error: unknown): string => {
  const appError = ensureAppError(error);
  return appError.expose ? appError.message : 'Unable to process highscore request.';
};

export const createHighscoresSlice = ({
  set,
  service,
}: CreateHighscoresSliceParams): HighscoresSlice => ({
  leaderboards: {},
  highscoresStatus: 'idle',
  highscoresSaving: false,
  lastDecision: null,

  loadHighscores: async (): Promise<LeaderboardMap> => {
    set({ highscoresStatus: 'loading', highscoresError: undefined });

    try {
      const leaderboards = await service.listLeaderboards();
      set({ leaderboards, highscoresStatus: 'ready' });
      return leaderboards;
    } catch (error) {
      set({
        highscoresStatus: 'error',
        highscoresError: mapErrorMessage(error),
      });
      throw ensureAppError(error);
    }
  },

  submitResult: async (result: SessionResult, topN?: number): Promise<HighscoreDecision> => {
    set({ highscoresSaving: true, highscoresError: undefined });

    try {
      const decision = await service.consider(result, topN);
      const leaderboards = await service.listLeaderboards();
      set({
        leaderboards,
        lastDecision: decision,
        highscoresStatus: 'ready',
        highscoresSaving: false,
      });
      return decision;
    } catch (error) {
      set({
        highscoresSaving: false,
        highscoresError: mapErrorMessage(error),
      });
      throw ensureAppError(error);
    }
  },
});
