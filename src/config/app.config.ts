import { homedir } from 'node:os';
import path from 'node:path';

import { ConfigurationError } from '@/lib/errors';
import { appEnvSchema } from '@/lib/validators';

export const APP_DIR_NAME = '.typing-drill';
export const HIGHSCORES_FILE_NAME = 'highscores.json';
export const CONFIG_FILE_NAME = 'config.json';

/**
 * Process-level settings resolved once at startup and handed to the store,
 * services and loggers.
 */
export interface AppConfig {
  readonly debug: boolean;
  /** Directory for the remembered config and the fallback highscore file. */
  readonly homeDir: string;
  /** Explicit highscore file; when absent the repository picks one. */
  readonly highscoresPath?: string;
  /** Directory checked first for `highscores.json`. */
  readonly workingDir: string;
}

export const DEFAULT_APP_CONFIG: AppConfig = {
  debug: false,
  homeDir: path.join(homedir(), APP_DIR_NAME),
  workingDir: process.cwd(),
};

export const loadAppConfig = (
  env: Readonly<Record<string, string | undefined>>,
  fallback: AppConfig = DEFAULT_APP_CONFIG,
): AppConfig => {
  const result = appEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError('Invalid environment configuration', result.error.flatten());
  }

  const parsed = result.data;
  const highscoresPath = parsed.TYPING_DRILL_HIGHSCORES ?? fallback.highscoresPath;
  return {
    debug: parsed.TYPING_DRILL_DEBUG ?? fallback.debug,
    homeDir: parsed.TYPING_DRILL_HOME ? path.resolve(parsed.TYPING_DRILL_HOME) : fallback.homeDir,
    workingDir: fallback.workingDir,
    ...(highscoresPath !== undefined ? { highscoresPath: path.resolve(highscoresPath) } : {}),
  };
};
