export { HighscoreService, type HighscoreServiceOptions } from './highscore.service';
export { SessionConfigService } from './session-config.service';
