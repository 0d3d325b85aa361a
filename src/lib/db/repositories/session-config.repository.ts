import { readJsonFile, removeFile, writeJsonFileAtomic } from '@/lib/db/json-file';
import { silentLogger, type Logger } from '@/lib/utils/logger';
import { normalizeSessionConfig, toSessionConfigDto } from '@/lib/utils/session-config';
import type { SessionConfig } from '@/types';

export interface SessionConfigRepository {
  load(fallback: SessionConfig): Promise<SessionConfig>;
  save(config: SessionConfig): Promise<void>;
  clear(): Promise<void>;
}

/** Remembers the last used configuration in a JSON file. */
export class JsonFileSessionConfigRepository implements SessionConfigRepository {
  private readonly logger: Logger;

  constructor(
    private readonly filePath: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger;
  }

  async load(fallback: SessionConfig): Promise<SessionConfig> {
    const read = await readJsonFile(this.filePath);
    if (read.status === 'ok') {
      return normalizeSessionConfig(read.data, fallback);
    }

    if (read.status === 'invalid') {
      this.logger.warn(`Unable to read ${this.filePath}; using default configuration.`, read.error);
    }
    return fallback;
  }

  async save(config: SessionConfig): Promise<void> {
    try {
      await writeJsonFileAtomic(this.filePath, toSessionConfigDto(config));
    } catch (error) {
      this.logger.warn('Failed to remember the session configuration.', error);
    }
  }

  async clear(): Promise<void> {
    try {
      await removeFile(this.filePath);
    } catch (error) {
      this.logger.warn('Unable to clear the remembered configuration.', error);
    }
  }
}
