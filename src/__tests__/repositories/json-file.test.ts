import { mkdtemp, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';

import { readJsonFile, writeJsonFileAtomic } from '@/lib/db/json-file';
import { JsonFileHighscoreRepository } from '@/lib/db/repositories';
import { PersistenceError } from '@/lib/errors';

jest.mock('node:fs/promises', () => {
  const actual = jest.requireActual<typeof import('node:fs/promises')>('node:fs/promises');
  return { ...actual, rename: jest.fn(actual.rename) };
});

const previous = `${JSON.stringify(
  {
    'timed-60-p0-n0': [
      { net_wpm: 40, raw_wpm: 42, accuracy: 0.9, errors: 4, timestamp: '2026-01-01T09:00:00.000Z' },
    ],
  },
  null,
  2,
)}\n`;

describe('writeJsonFileAtomic', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'typing-drill-json-'));
    filePath = path.join(dir, 'highscores.json');
    await writeFile(filePath, previous, 'utf-8');
  });

  afterEach(async () => {
    jest.mocked(rename).mockClear();
    await rm(dir, { recursive: true, force: true });
  });

  it('replaces the file and leaves no temp file behind', async () => {
    await writeJsonFileAtomic(filePath, { a: 1 });

    await expect(readFile(filePath, 'utf-8')).resolves.toBe('{\n  "a": 1\n}\n');
    await expect(readdir(dir)).resolves.toEqual(['highscores.json']);
  });

  it('keeps the previous content when the final rename fails', async () => {
    jest.mocked(rename).mockRejectedValueOnce(new Error('disk full'));

    await expect(writeJsonFileAtomic(filePath, { a: 1 })).rejects.toBeInstanceOf(PersistenceError);

    await expect(readFile(filePath, 'utf-8')).resolves.toBe(previous);
    await expect(readdir(dir)).resolves.toEqual(['highscores.json']);
  });

  it('keeps saved highscores readable when a save is interrupted', async () => {
    jest.mocked(rename).mockRejectedValueOnce(new Error('disk full'));
    const repository = new JsonFileHighscoreRepository({ filePath, workingDir: dir, homeDir: dir });

    await expect(
      repository.save({
        'timed-60-p0-n0': [
          { netWpm: 55, rawWpm: 60, accuracy: 0.95, errors: 2, timestamp: '2026-01-02T09:00:00.000Z' },
        ],
      }),
    ).rejects.toBeInstanceOf(PersistenceError);

    const loaded = await repository.load();
    expect(loaded['timed-60-p0-n0']?.map((row) => row.netWpm)).toEqual([40]);
    expect(await readJsonFile(filePath)).toEqual({ status: 'ok', data: JSON.parse(previous) });
  });
});
