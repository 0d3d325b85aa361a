import {
  NUMBER_SUBSTITUTION_PROBABILITY,
  PUNCTUATION_MARKS,
} from '@/config/session.config';
import type { SessionConfig } from '@/types';

import type { Rng } from './rng';

/**
 * Supplies target words one at a time. `undefined` means the sequence is
 * exhausted; random sources never are.
 */
export interface WordSequenceSource {
  next(): string | undefined;
}

export interface RandomWordSourceOptions {
  readonly words: readonly string[];
  readonly punctuationProbability: number;
  readonly numbers: boolean;
  readonly rng: Rng;
}

const capitalize = (word: string): string =>
  word.length > 0 ? word.charAt(0).toUpperCase() + word.slice(1) : word;

/** Applies number substitution and punctuation injection to one word. */
export function decorateWord(
  word: string,
  options: Omit<RandomWordSourceOptions, 'words'>,
): string {
  const { rng } = options;
  if (options.numbers && rng.chance(NUMBER_SUBSTITUTION_PROBABILITY)) {
    return String(rng.int(0, Math.pow(10, rng.int(1, 4)) - 1));
  }

  if (!rng.chance(options.punctuationProbability)) {
    return word;
  }

  // Half of the punctuated words get a trailing mark, the rest are capitalized.
  return rng.chance(0.5) ? `${word}${rng.pick(PUNCTUATION_MARKS)}` : capitalize(word);
}

export function createRandomWordSource(options: RandomWordSourceOptions): WordSequenceSource {
  if (options.words.length === 0) {
    throw new RangeError('A word source needs at least one word');
  }

  return {
    next: () => decorateWord(options.rng.pick(options.words), options),
  };
}

/** Presents the words in order and is exhausted after the last one. */
export function createSequentialWordSource(words: readonly string[]): WordSequenceSource {
  let index = 0;
  return {
    next: () => {
      const word = words[index];
      if (word !== undefined) index++;
      return word;
    },
  };
}

/**
 * Source for a session: ordered lists (books) are presented as written,
 * everything else is sampled with the configured decorations.
 */
export function buildWordSource(
  config: Pick<SessionConfig, 'punctuationProbability' | 'numbers'>,
  list: { readonly words: readonly string[]; readonly ordered: boolean },
  rng: Rng,
): WordSequenceSource {
  if (list.ordered) {
    return createSequentialWordSource(list.words);
  }

  return createRandomWordSource({
    words: list.words,
    punctuationProbability: config.punctuationProbability,
    numbers: config.numbers,
    rng,
  });
}
