import path from 'node:path';
import type { StoreApi } from 'zustand/vanilla';

import { CONFIG_FILE_NAME, type AppConfig } from '@/config/app.config';
import { JsonFileHighscoreRepository, JsonFileSessionConfigRepository } from '@/lib/db/repositories';
import { HighscoreService, SessionConfigService } from '@/lib/services';
import { createLogger, type Logger } from '@/lib/utils/logger';
import { createAppStore, type AppStore } from '@/store';

export interface AppContext {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly store: StoreApi<AppStore>;
}

/** Wires repositories, services and the store for one process. */
export function createAppContext(config: AppConfig): AppContext {
  const loggerFor = (scope: string): Logger => createLogger({ scope, debug: config.debug });

  const highscoreRepository = new JsonFileHighscoreRepository({
    workingDir: config.workingDir,
    homeDir: config.homeDir,
    logger: loggerFor('highscores'),
    ...(config.highscoresPath ? { filePath: config.highscoresPath } : {}),
  });
  const configRepository = new JsonFileSessionConfigRepository(
    path.join(config.homeDir, CONFIG_FILE_NAME),
    loggerFor('config'),
  );

  const store = createAppStore({
    highscoreService: new HighscoreService(highscoreRepository, { logger: loggerFor('highscores') }),
    sessionConfigService: new SessionConfigService(configRepository),
  });

  return { config, logger: loggerFor('typing-drill'), store };
}
