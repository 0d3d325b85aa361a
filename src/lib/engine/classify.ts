import type { CharacterClassification } from '@/types';

/**
 * Classifies a typed word against its target by character position.
 *
 * Positions present in both strings are either correct or mismatched, target
 * positions past the end of `typed` are omissions and typed positions past the
 * end of `target` are extras. A character counts as correct only when it is
 * present in both strings and equal.
 *
 * Example: classifyWord("cat", "cwtx") =>
 *   { correct: 2, mismatches: 1, omissions: 0, extras: 1, errors: 2 }
 */
export function classifyWord(target: string, typed: string): CharacterClassification {
  const expected = Array.from(target);
  const actual = Array.from(typed);
  const overlap = Math.min(expected.length, actual.length);

  let correct = 0;
  let mismatches = 0;
  for (let i = 0; i < overlap; i++) {
    if (expected[i] === actual[i]) {
      correct++;
    } else {
      mismatches++;
    }
  }

  const omissions = Math.max(0, expected.length - actual.length);
  const extras = Math.max(0, actual.length - expected.length);

  return {
    correct,
    mismatches,
    omissions,
    extras,
    errors: mismatches + omissions + extras,
  };
}

/** Number of characters a string contributes to the typed-character count. */
export const countCharacters = (value: string): number => Array.from(value).length;

/** Whitespace-separated words in a string; book phrases hold several. */
export const countWords = (value: string): number => value.split(/\s+/).filter(Boolean).length;
