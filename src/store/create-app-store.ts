import { createStore, type StoreApi } from 'zustand/vanilla';

import type { HighscoreService, SessionConfigService } from '@/lib/services';

import { createHighscoresSlice, type HighscoresSlice } from './slices/highscores.slice';
import { createSessionConfigSlice, type SessionConfigSlice } from './slices/session-config.slice';

export type AppStore = HighscoresSlice & SessionConfigSlice;

export interface CreateAppStoreOptions {
  readonly highscoreService: HighscoreService;
  readonly sessionConfigService: SessionConfigService;
}

export const createAppStore = ({
  highscoreService,
  sessionConfigService,
}: CreateAppStoreOptions): StoreApi<AppStore> =>
  createStore<AppStore>((set) => ({
    ...createHighscoresSlice({ service: highscoreService, set }),
    ...createSessionConfigSlice({ service: sessionConfigService, set }),
  }));
