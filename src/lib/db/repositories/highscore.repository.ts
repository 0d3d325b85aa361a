import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import path from 'node:path';

import { HIGHSCORES_FILE_NAME } from '@/config/app.config';
import { readJsonFile, writeJsonFileAtomic } from '@/lib/db/json-file';
import { highscoreMapper, sortLeaderboard } from '@/lib/utils/leaderboard';
import { silentLogger, type Logger } from '@/lib/utils/logger';
import { highscoreBoardSchema, highscoreEntrySchema, highscoreFileSchema } from '@/lib/validators';
import type { HighscoreEntry, HighscoreFileDto, LeaderboardMap } from '@/types';

export interface HighscoreRepository {
  /** Every leaderboard, each sorted best first. Never throws on bad files. */
  load(): Promise<LeaderboardMap>;
  /** Replaces the whole persisted store. */
  save(leaderboards: LeaderboardMap): Promise<void>;
}

export interface JsonFileHighscoreRepositoryOptions {
  /** Fixed location; skips the working-directory check. */
  readonly filePath?: string;
  readonly workingDir: string;
  readonly homeDir: string;
  readonly logger?: Logger;
}

const isWritableDir = async (dir: string): Promise<boolean> => {
  try {
    await access(dir, constants.W_OK);
    return true;
  } catch {
    return false;
  }
};

/**
 * Highscores in `highscores.json`: the working directory when writable,
 * otherwise the app directory under the user's home.
 */
export class JsonFileHighscoreRepository implements HighscoreRepository {
  private resolvedPath: string | null;
  private readonly logger: Logger;

  constructor(private readonly options: JsonFileHighscoreRepositoryOptions) {
    this.resolvedPath = options.filePath ?? null;
    this.logger = options.logger ?? silentLogger;
  }

  async resolvePath(): Promise<string> {
    if (this.resolvedPath) {
      return this.resolvedPath;
    }

    const local = path.join(this.options.workingDir, HIGHSCORES_FILE_NAME);
    if (await isWritableDir(this.options.workingDir)) {
      this.resolvedPath = local;
    } else {
      this.resolvedPath = path.join(this.options.homeDir, HIGHSCORES_FILE_NAME);
      this.logger.debug(`${this.options.workingDir} is not writable, using ${this.resolvedPath}`);
    }
    return this.resolvedPath;
  }

  async load(): Promise<LeaderboardMap> {
    const filePath = await this.resolvePath();
    const read = await readJsonFile(filePath);
    if (read.status === 'missing') {
      this.logger.debug(`no highscore file at ${filePath}`);
      return {};
    }
    if (read.status === 'invalid') {
      this.logger.warn(`Unable to read ${filePath}; starting with empty highscores.`, read.error);
      return {};
    }

    const file = highscoreFileSchema.safeParse(read.data);
    if (!file.success) {
      this.logger.warn(`Unexpected highscore file layout in ${filePath}; starting with empty highscores.`);
      return {};
    }

    const leaderboards: Record<string, HighscoreEntry[]> = {};
    Object.entries(file.data).forEach(([modeKey, board]) => {
      const rows = highscoreBoardSchema.safeParse(board);
      if (!rows.success) {
        this.logger.warn(`Skipping invalid highscore board ${modeKey}`);
        return;
      }
      const entries: HighscoreEntry[] = [];
      rows.data.forEach((row, index) => {
        const parsed = highscoreEntrySchema.safeParse(row);
        if (parsed.success) {
          entries.push(highscoreMapper.toDomainEntry(parsed.data));
        } else {
          this.logger.warn(`Skipping invalid highscore row ${modeKey}[${index}]`);
        }
      });
      if (entries.length > 0) {
        leaderboards[modeKey] = sortLeaderboard(entries);
      }
    });
    return leaderboards;
  }

  async save(leaderboards: LeaderboardMap): Promise<void> {
    const filePath = await this.resolvePath();
    const payload: Record<string, HighscoreFileDto[string]> = {};
    Object.keys(leaderboards)
      .sort()
      .forEach((modeKey) => {
        const entries = leaderboards[modeKey] ?? [];
        payload[modeKey] = sortLeaderboard(entries).map(highscoreMapper.toDtoEntry);
      });

    await writeJsonFileAtomic(filePath, payload);
    this.logger.debug(`highscores written to ${filePath}`);
  }
}
