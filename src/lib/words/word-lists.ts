import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ConfigurationError, NotFoundError, PersistenceError } from '@/lib/errors';
import type { BundledWordListId, WordListSelection } from '@/types';

import { convertBookText, formatBookUnits, isMissingFileError } from './book';

export const BUNDLED_WORD_LISTS: readonly BundledWordListId[] = [
  'default',
  'easy',
  'medium',
  'hard',
  'programming',
];

/** `data/wordlists` at the package root; same depth from `src/` and `dist/`. */
export const WORDLISTS_DIR = path.resolve(__dirname, '..', '..', '..', 'data', 'wordlists');

export const bundledWordListPath = (id: BundledWordListId, dir: string = WORDLISTS_DIR): string =>
  path.join(dir, `${id}.txt`);

export const parseWordList = (content: string): string[] => content.split(/\s+/).filter(Boolean);

const readText = async (filePath: string, label: string): Promise<string> => {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new NotFoundError(`${label} not found: ${filePath}`);
    }
    throw new PersistenceError(`Unable to read ${label.toLowerCase()} ${filePath}`, filePath, {
      cause: error,
    });
  }
};

export interface LoadedWordList {
  readonly words: readonly string[];
  /** Book lists are typed in order instead of sampled. */
  readonly ordered: boolean;
}

export async function loadWordList(
  selection: WordListSelection,
  options: { readonly dir?: string } = {},
): Promise<LoadedWordList> {
  let loaded: LoadedWordList;
  switch (selection.id) {
    case 'custom':
      loaded = { words: parseWordList(await readText(selection.path, 'Word list')), ordered: false };
      break;
    case 'book': {
      const content = await readText(selection.path, 'Book file');
      loaded = { words: formatBookUnits(convertBookText(content), selection.chunking), ordered: true };
      break;
    }
    default:
      loaded = {
        words: parseWordList(
          await readText(bundledWordListPath(selection.id, options.dir), 'Word list'),
        ),
        ordered: false,
      };
  }

  if (loaded.words.length === 0) {
    throw new ConfigurationError(`Word list "${selection.id}" contains no words`);
  }
  return loaded;
}
