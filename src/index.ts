export * from './types';
export { AppError, ConfigurationError, InvalidStateError, NotFoundError, PersistenceError, ensureAppError } from './lib/errors';
export { DEFAULT_APP_CONFIG, loadAppConfig, type AppConfig } from './config/app.config';
export { DEFAULT_SESSION_CONFIG, DEFAULT_TOP_N } from './config/session.config';
export * from './lib/engine';
export * from './lib/words';
export {
  JsonFileHighscoreRepository,
  JsonFileSessionConfigRepository,
  type HighscoreRepository,
  type SessionConfigRepository,
} from './lib/db/repositories';
export { HighscoreService, SessionConfigService, type HighscoreServiceOptions } from './lib/services';
export { describeModeKey, makeModeKey, parseModeKey, type ParsedModeKey } from './lib/utils/mode-key';
export { compareEntries, insertEntry, sortLeaderboard } from './lib/utils/leaderboard';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './lib/utils/logger';
export { createAppStore, type AppStore } from './store';
