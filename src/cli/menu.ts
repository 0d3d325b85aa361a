import { MENU_TIMED_SECONDS, MENU_WORD_COUNT } from '@/config/session.config';
import type { MenuChoice, SessionConfig } from '@/types';

export const MENU_TEXT = `Typing drill
  1) Timed ${MENU_TIMED_SECONDS}s
  2) Words ${MENU_WORD_COUNT}
  3) Highscores
  4) Quit`;

const MENU_ALIASES: Readonly<Record<string, MenuChoice>> = {
  '1': 'timed-60',
  t: 'timed-60',
  timed: 'timed-60',
  '2': 'words-50',
  w: 'words-50',
  words: 'words-50',
  '3': 'highscores',
  h: 'highscores',
  highscores: 'highscores',
  '4': 'quit',
  q: 'quit',
  quit: 'quit',
};

export const parseMenuChoice = (answer: string): MenuChoice | null =>
  MENU_ALIASES[answer.trim().toLowerCase()] ?? null;

/** Replaces the mode of `base` with the menu's preset; other settings carry over. */
export const applyMenuChoice = (
  choice: Extract<MenuChoice, 'timed-60' | 'words-50'>,
  base: SessionConfig,
): SessionConfig => ({
  ...base,
  mode:
    choice === 'timed-60'
      ? { kind: 'timed', durationSeconds: MENU_TIMED_SECONDS }
      : { kind: 'words', count: MENU_WORD_COUNT },
});

export interface Prompter {
  question(query: string): Promise<string>;
}

export async function promptMenu(prompter: Prompter): Promise<MenuChoice> {
  for (;;) {
    const choice = parseMenuChoice(await prompter.question(`${MENU_TEXT}\nChoose [1-4]: `));
    if (choice) {
      return choice;
    }
  }
}
