import { readFile, writeFile } from 'node:fs/promises';

import { PARAGRAPH_CHUNK_SIZE, SENTENCE_CHUNK_SIZE } from '@/config/session.config';
import { NotFoundError, PersistenceError } from '@/lib/errors';
import type { BookChunking } from '@/types';

export interface ConvertBookOptions {
  /** Keep punctuation and case attached to words (default true). */
  readonly preservePunctuation?: boolean;
}

/**
 * Splits book text into typing words. With punctuation preserved words are
 * whitespace separated tokens; otherwise only lowercase letter runs remain.
 */
export function convertBookText(content: string, options: ConvertBookOptions = {}): string[] {
  if (options.preservePunctuation ?? true) {
    return content.match(/\S+/g) ?? [];
  }

  return content.toLowerCase().match(/[a-z]+/g) ?? [];
}

export function chunkWords(words: readonly string[], chunkSize: number): string[] {
  const size = Math.max(1, Math.floor(chunkSize));
  const chunks: string[] = [];
  for (let i = 0; i < words.length; i += size) {
    chunks.push(words.slice(i, i + size).join(' '));
  }
  return chunks;
}

export function formatBookUnits(words: readonly string[], chunking: BookChunking = 'words'): string[] {
  switch (chunking) {
    case 'sentences':
      return chunkWords(words, SENTENCE_CHUNK_SIZE);
    case 'paragraphs':
      return chunkWords(words, PARAGRAPH_CHUNK_SIZE);
    default:
      return [...words];
  }
}

export const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Converts a book file into a one-word-per-line list. Returns the word count.
 */
export async function convertBookFile(
  inputPath: string,
  outputPath: string,
  options: ConvertBookOptions = {},
): Promise<number> {
  let content: string;
  try {
    content = await readFile(inputPath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new NotFoundError(`Book file not found: ${inputPath}`);
    }
    throw new PersistenceError(`Unable to read ${inputPath}`, inputPath, { cause: error });
  }

  const words = convertBookText(content, options);
  try {
    await writeFile(outputPath, words.map((word) => `${word}\n`).join(''), 'utf-8');
  } catch (error) {
    throw new PersistenceError(`Unable to write ${outputPath}`, outputPath, { cause: error });
  }
  return words.length;
}
