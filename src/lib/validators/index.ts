export { appEnvSchema, type AppEnv } from './app-env.schema';
export { cliArgsSchema, type CliArgs, type CliArgsInput } from './cli-args.schema';
export {
  highscoreBoardSchema,
  highscoreEntrySchema,
  highscoreFileSchema,
  sessionResultSchema,
  type HighscoreEntryInput,
  type SessionResultInput,
} from './highscore.schema';
export {
  sessionConfigDtoSchema,
  sessionConfigSchema,
  wordListSelectionSchema,
  type SessionConfigDtoInput,
  type SessionConfigInput,
} from './session-config.schema';
