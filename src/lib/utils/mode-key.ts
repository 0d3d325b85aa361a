import path from 'node:path';

import { hashString } from '@/lib/words/rng';
import type { SessionConfig, WordListSelection } from '@/types';

const MODE_KEY_PATTERN = /^(timed|words)-(\d+)-p(\d+)-n([01])(?:-(.+))?$/;

export interface ParsedModeKey {
  readonly mode: 'timed' | 'words';
  readonly parameter: number;
  /** Punctuation probability in percent. */
  readonly punctuationPercent: number;
  readonly numbers: boolean;
  /** Word-list suffix; null for the default list. */
  readonly wordList: string | null;
}

const slugify = (value: string): string => {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug.length > 0 ? slug : 'file';
};

/** Readable file-name slug plus a short hash of the full path. */
const fileTag = (filePath: string): string => {
  const resolved = path.resolve(filePath);
  const hash = hashString(resolved).toString(16).padStart(8, '0').slice(0, 6);
  return `${slugify(path.parse(resolved).name)}-${hash}`;
};

const wordListSuffix = (selection: WordListSelection): string | null => {
  switch (selection.id) {
    case 'default':
      return null;
    case 'custom':
      return `custom-${fileTag(selection.path)}`;
    case 'book': {
      const base = `book-${fileTag(selection.path)}`;
      const chunking = selection.chunking ?? 'words';
      return chunking === 'words' ? base : `${base}-${chunking}`;
    }
    default:
      return selection.id;
  }
};

/**
 * Leaderboard partition for a configuration, e.g. `timed-60-p0-n1` or
 * `words-50-p10-n0-easy`. Identical configurations map to identical keys.
 */
export const makeModeKey = (config: SessionConfig): string => {
  const base =
    config.mode.kind === 'timed'
      ? `timed-${config.mode.durationSeconds}`
      : `words-${config.mode.count}`;
  const punctuation = Math.round(config.punctuationProbability * 100);
  const numbers = config.numbers ? 1 : 0;
  const suffix = wordListSuffix(config.wordList);
  return `${base}-p${punctuation}-n${numbers}${suffix ? `-${suffix}` : ''}`;
};

export const parseModeKey = (key: string): ParsedModeKey | null => {
  const match = MODE_KEY_PATTERN.exec(key);
  if (!match) {
    return null;
  }

  const [, mode, parameter, punctuation, numbers, wordList] = match;
  return {
    mode: mode === 'timed' ? 'timed' : 'words',
    parameter: Number(parameter),
    punctuationPercent: Number(punctuation),
    numbers: numbers === '1',
    wordList: wordList ?? null,
  };
};

/** Human readable label, falling back to the raw key when it does not parse. */
export const describeModeKey = (key: string): string => {
  const parsed = parseModeKey(key);
  if (!parsed) {
    return key;
  }

  const parts = [parsed.mode === 'timed' ? `Timed ${parsed.parameter}s` : `${parsed.parameter} words`];
  if (parsed.punctuationPercent > 0) parts.push(`punctuation ${parsed.punctuationPercent}%`);
  if (parsed.numbers) parts.push('numbers');
  if (parsed.wordList) parts.push(parsed.wordList);
  return parts.join(', ');
};
