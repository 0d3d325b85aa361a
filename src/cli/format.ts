import { PROGRESS_BAR_WIDTH } from '@/config/session.config';
import { describeModeKey } from '@/lib/utils/mode-key';
import type { HighscoreDecision, HighscoreEntry, SegmentStyle, SessionResult, WordSegment } from '@/types';

export const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  underline: '\x1b[4m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  clearScreen: '\x1b[2J\x1b[H',
  bell: '\x07',
} as const;

const STYLE_CODES: Record<SegmentStyle, string> = {
  correct: ANSI.green,
  wrong: ANSI.red,
  caret: ANSI.underline,
  pending: ANSI.dim,
};

const pushSegment = (segments: WordSegment[], text: string, style: SegmentStyle): void => {
  const last = segments[segments.length - 1];
  if (last && last.style === style) {
    segments[segments.length - 1] = { text: last.text + text, style };
  } else {
    segments.push({ text, style });
  }
};

/**
 * Splits the current word into styled runs: typed characters are correct or
 * wrong, the next expected character carries the caret, the rest is pending.
 * Characters typed past the end of the word are shown as wrong.
 */
export function highlightWord(target: string, typed: string): WordSegment[] {
  const expected = Array.from(target);
  const actual = Array.from(typed);
  const segments: WordSegment[] = [];

  expected.forEach((char, index) => {
    const typedChar = actual[index];
    if (typedChar !== undefined) {
      pushSegment(segments, char, typedChar === char ? 'correct' : 'wrong');
    } else if (index === actual.length) {
      pushSegment(segments, char, 'caret');
    } else {
      pushSegment(segments, char, 'pending');
    }
  });

  const extra = actual.slice(expected.length).join('');
  if (extra.length > 0) {
    pushSegment(segments, extra, 'wrong');
  }
  return segments;
}

export const renderSegments = (segments: readonly WordSegment[], color: boolean): string =>
  segments
    .map((segment) => (color ? `${STYLE_CODES[segment.style]}${segment.text}${ANSI.reset}` : segment.text))
    .join('');

export function buildProgressBar(fraction: number, width: number = PROGRESS_BAR_WIDTH): string {
  const clamped = Number.isFinite(fraction) ? Math.min(1, Math.max(0, fraction)) : 0;
  const filled = Math.round(clamped * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`;
}

export interface HeaderInfo {
  readonly modeKey: string;
  readonly elapsedMs: number;
  /** Null outside timed mode. */
  readonly remainingMs: number | null;
  readonly netWpm: number;
  readonly accuracy: number;
  readonly errors: number;
}

const plural = (count: number, noun: string): string => `${count} ${count === 1 ? noun : `${noun}s`}`;

const formatPercent = (ratio: number, digits = 1): string => `${(ratio * 100).toFixed(digits)}%`;

export function buildHeaderLine(info: HeaderInfo): string {
  const time =
    info.remainingMs !== null
      ? `${(info.remainingMs / 1000).toFixed(1)}s left`
      : `${(info.elapsedMs / 1000).toFixed(1)}s`;

  return [
    describeModeKey(info.modeKey),
    time,
    `${Math.round(info.netWpm)} WPM`,
    formatPercent(info.accuracy),
    plural(info.errors, 'error'),
  ].join(' | ');
}

/** Greedy wrap; a word longer than `width` gets a line of its own. */
export function wrapWords(words: readonly string[], width: number): string[] {
  const lines: string[] = [];
  let current = '';
  for (const word of words) {
    if (current.length === 0) {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current = `${current} ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current.length > 0) {
    lines.push(current);
  }
  return lines;
}

export function formatSummary(result: SessionResult): string[] {
  const lines = [
    `Net WPM:      ${result.netWpm.toFixed(2)}`,
    `Raw WPM:      ${result.rawWpm.toFixed(2)}`,
    `Accuracy:     ${formatPercent(result.accuracy, 2)}`,
    `Consistency:  ${result.consistency.toFixed(3)}s`,
    `Errors:       ${result.errors} (${result.mismatches} wrong, ${result.omissions} missed, ${result.extras} extra)`,
    `Words:        ${result.wordsCompleted}`,
    `Time:         ${result.elapsedSeconds.toFixed(1)}s`,
  ];

  return result.completed ? lines : ['Session aborted; not recorded.', ...lines];
}

export function formatDecision(decision: HighscoreDecision): string {
  const label = describeModeKey(decision.modeKey);
  if (decision.accepted) {
    return decision.delta === null
      ? `New highscore! First result for ${label}.`
      : `New highscore! +${decision.delta.toFixed(2)} WPM`;
  }

  const best = decision.previousBest;
  if (!best) {
    return `No highscore recorded for ${label}.`;
  }
  const gap = Math.abs(decision.delta ?? 0).toFixed(2);
  return `Best for ${label}: ${best.netWpm.toFixed(2)} WPM (${gap} WPM short)`;
}

const formatTimestamp = (timestamp: string): string => {
  const date = /^\d+$/.test(timestamp) ? new Date(Number(timestamp)) : new Date(timestamp);
  return Number.isNaN(date.getTime()) ? timestamp : date.toISOString().slice(0, 16).replace('T', ' ');
};

export function formatLeaderboard(modeKey: string, entries: readonly HighscoreEntry[]): string[] {
  const lines = [`${describeModeKey(modeKey)} [${modeKey}]`];
  if (entries.length === 0) {
    return [...lines, '  (no entries)'];
  }

  entries.forEach((entry, index) => {
    lines.push(
      [
        `${String(index + 1).padStart(3)}.`,
        `${entry.netWpm.toFixed(2).padStart(7)} WPM`,
        `raw ${entry.rawWpm.toFixed(2)}`,
        `acc ${formatPercent(entry.accuracy, 2)}`,
        plural(entry.errors, 'error'),
        formatTimestamp(entry.timestamp),
      ].join('  '),
    );
  });
  return lines;
}
