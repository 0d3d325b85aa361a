import { describe, expect, it, jest } from '@jest/globals';

import { applyMenuChoice, parseMenuChoice, promptMenu, type Prompter } from '@/cli/menu';
import { DEFAULT_SESSION_CONFIG } from '@/config/session.config';

describe('parseMenuChoice', () => {
  it.each([
    ['1', 'timed-60'],
    [' T ', 'timed-60'],
    ['2', 'words-50'],
    ['words', 'words-50'],
    ['3', 'highscores'],
    ['h', 'highscores'],
    ['4', 'quit'],
    ['Q', 'quit'],
  ])('maps %j to %s', (answer, expected) => {
    expect(parseMenuChoice(answer)).toBe(expected);
  });

  it('returns null for anything else', () => {
    expect(parseMenuChoice('5')).toBeNull();
    expect(parseMenuChoice('')).toBeNull();
  });
});

describe('applyMenuChoice', () => {
  const base = { ...DEFAULT_SESSION_CONFIG, numbers: true };

  it('switches to the timed preset', () => {
    expect(applyMenuChoice('timed-60', base)).toEqual({ ...base, mode: { kind: 'timed', durationSeconds: 60 } });
  });

  it('switches to the words preset', () => {
    expect(applyMenuChoice('words-50', base)).toEqual({ ...base, mode: { kind: 'words', count: 50 } });
  });
});

describe('promptMenu', () => {
  it('asks again until the answer is valid', async () => {
    const question = jest
      .fn<Prompter['question']>()
      .mockResolvedValueOnce('nine')
      .mockResolvedValueOnce('')
      .mockResolvedValueOnce('2');

    await expect(promptMenu({ question })).resolves.toBe('words-50');
    expect(question).toHaveBeenCalledTimes(3);
  });
});
