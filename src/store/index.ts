export type { AppStore, CreateAppStoreOptions } from './create-app-store';
export { createAppStore } from './create-app-store';
export type { HighscoresSlice } from './slices/highscores.slice';
export type { SessionConfigSlice } from './slices/session-config.slice';
export type { AsyncStatus, StoreSetter } from './types';
