import { describe, expect, it } from '@jest/globals';

import { DEFAULT_SESSION_CONFIG } from '@/config/session.config';
import { describeModeKey, makeModeKey, parseModeKey } from '@/lib/utils/mode-key';

describe('makeModeKey', () => {
  it('encodes timed sessions', () => {
    expect(makeModeKey({ ...DEFAULT_SESSION_CONFIG, numbers: true })).toBe('timed-60-p0-n1');
  });

  it('encodes word sessions with punctuation as a percentage', () => {
    expect(
      makeModeKey({
        ...DEFAULT_SESSION_CONFIG,
        mode: { kind: 'words', count: 50 },
        punctuationProbability: 0.1,
      }),
    ).toBe('words-50-p10-n0');
  });

  it('appends bundled list names other than the default', () => {
    expect(makeModeKey({ ...DEFAULT_SESSION_CONFIG, wordList: { id: 'easy' } })).toBe('timed-60-p0-n0-easy');
  });

  it('appends a slug and a path hash for custom files', () => {
    expect(
      makeModeKey({ ...DEFAULT_SESSION_CONFIG, wordList: { id: 'custom', path: '/tmp/My Words.txt' } }),
    ).toBe('timed-60-p0-n0-custom-my-words-82585a');
  });

  it('keeps files with the same name apart', () => {
    const keyFor = (filePath: string) =>
      makeModeKey({ ...DEFAULT_SESSION_CONFIG, wordList: { id: 'custom', path: filePath } });

    expect(keyFor('/a/words.txt')).toBe('timed-60-p0-n0-custom-words-15b3e7');
    expect(keyFor('/b/words.txt')).toBe('timed-60-p0-n0-custom-words-2e331b');
    expect(keyFor('/tmp/my-words.txt')).not.toBe(keyFor('/tmp/My Words.txt'));
  });

  it('includes the chunking of book lists', () => {
    expect(
      makeModeKey({
        ...DEFAULT_SESSION_CONFIG,
        mode: { kind: 'timed', durationSeconds: 30 },
        wordList: { id: 'book', path: '/books/Moby_Dick.txt', chunking: 'sentences' },
      }),
    ).toBe('timed-30-p0-n0-book-moby-dick-0d378a-sentences');
  });

  it('maps identical configurations to identical keys', () => {
    expect(makeModeKey({ ...DEFAULT_SESSION_CONFIG })).toBe(makeModeKey(DEFAULT_SESSION_CONFIG));
  });
});

describe('parseModeKey', () => {
  it('reads every part of a key', () => {
    expect(parseModeKey('words-50-p10-n0-easy')).toEqual({
      mode: 'words',
      parameter: 50,
      punctuationPercent: 10,
      numbers: false,
      wordList: 'easy',
    });
  });

  it('returns null for foreign keys', () => {
    expect(parseModeKey('bogus')).toBeNull();
  });
});

describe('describeModeKey', () => {
  it('builds a readable label', () => {
    expect(describeModeKey('timed-60-p10-n1-easy')).toBe('Timed 60s, punctuation 10%, numbers, easy');
    expect(describeModeKey('words-50-p0-n0')).toBe('50 words');
  });

  it('falls back to the raw key', () => {
    expect(describeModeKey('bogus')).toBe('bogus');
  });
});
