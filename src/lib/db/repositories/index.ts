export type {
  HighscoreRepository,
  JsonFileHighscoreRepositoryOptions,
} from './highscore.repository';
export { JsonFileHighscoreRepository } from './highscore.repository';
export type { SessionConfigRepository } from './session-config.repository';
export { JsonFileSessionConfigRepository } from './session-config.repository';
