/** Styling classes for a rendered word segment. */
export type SegmentStyle = 'correct' | 'wrong' | 'caret' | 'pending';

/** A run of characters sharing one style. */
export interface WordSegment {
  readonly text: string;
  readonly style: SegmentStyle;
}

/** Entries of the interactive start menu. */
export type MenuChoice = 'timed-60' | 'words-50' | 'highscores' | 'quit';

/** How the runner collects input. */
export type InputMode = 'keypress' | 'line';
