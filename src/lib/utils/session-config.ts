import { sessionConfigDtoSchema, sessionConfigSchema } from '@/lib/validators';
import type { SessionConfig, SessionConfigDto, SessionMode, WordListSelection } from '@/types';

export const toSessionConfigDto = (config: SessionConfig): SessionConfigDto => ({
  mode: config.mode.kind,
  ...(config.mode.kind === 'timed'
    ? { durationSeconds: config.mode.durationSeconds }
    : { wordCount: config.mode.count }),
  punctuationProbability: config.punctuationProbability,
  numbers: config.numbers,
  wordList: config.wordList.id,
  ...('path' in config.wordList ? { wordListPath: config.wordList.path } : {}),
  ...(config.wordList.id === 'book' && config.wordList.chunking
    ? { bookChunking: config.wordList.chunking }
    : {}),
  topN: config.topN,
});

const toWordListSelection = (dto: SessionConfigDto, fallback: WordListSelection): WordListSelection => {
  switch (dto.wordList) {
    case 'custom':
      return dto.wordListPath ? { id: 'custom', path: dto.wordListPath } : fallback;
    case 'book':
      return dto.wordListPath
        ? {
            id: 'book',
            path: dto.wordListPath,
            ...(dto.bookChunking ? { chunking: dto.bookChunking } : {}),
          }
        : fallback;
    default:
      return { id: dto.wordList };
  }
};

const toSessionMode = (dto: SessionConfigDto, fallback: SessionMode): SessionMode => {
  if (dto.mode === 'timed' && dto.durationSeconds !== undefined) {
    return { kind: 'timed', durationSeconds: dto.durationSeconds };
  }
  if (dto.mode === 'words' && dto.wordCount !== undefined) {
    return { kind: 'words', count: dto.wordCount };
  }
  return fallback;
};

/**
 * Turns whatever was read from disk into a valid configuration, falling back
 * field by field where the stored value is unusable.
 */
export const normalizeSessionConfig = (raw: unknown, fallback: SessionConfig): SessionConfig => {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return fallback;
  }

  const merged = { ...toSessionConfigDto(fallback), ...raw };
  const parseResult = sessionConfigDtoSchema.safeParse(merged);
  if (!parseResult.success) {
    return fallback;
  }

  const dto = parseResult.data;
  const candidate: SessionConfig = {
    mode: toSessionMode(dto, fallback.mode),
    punctuationProbability: dto.punctuationProbability,
    numbers: dto.numbers,
    wordList: toWordListSelection(dto, fallback.wordList),
    topN: dto.topN,
  };

  return sessionConfigSchema.safeParse(candidate).success ? candidate : fallback;
};

export const serializeSessionConfig = (config: SessionConfig): string =>
  JSON.stringify(sessionConfigDtoSchema.parse(toSessionConfigDto(config)), null, 2);

export const hasConfigChanged = (current: SessionConfig, previous: SessionConfig | null): boolean => {
  if (!previous) {
    return true;
  }

  return serializeSessionConfig(current) !== serializeSessionConfig(previous);
};
