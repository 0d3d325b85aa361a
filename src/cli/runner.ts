import readline, { type Key } from 'node:readline';

import { PREVIEW_WORD_COUNT, TICK_INTERVAL_MS } from '@/config/session.config';
import { countWords, type TypingSession } from '@/lib/engine';
import { silentLogger, type Logger } from '@/lib/utils/logger';
import type { InputMode, SessionResult, SessionSnapshot, WordAttempt } from '@/types';

import {
  ANSI,
  buildHeaderLine,
  buildProgressBar,
  highlightWord,
  renderSegments,
  wrapWords,
} from './format';

export type RunnerInput = NodeJS.ReadableStream & {
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

export interface RunnerOutput {
  write(chunk: string): boolean;
  readonly columns?: number;
}

export interface SessionRunnerOptions {
  readonly session: TypingSession;
  readonly input: RunnerInput;
  readonly output: RunnerOutput;
  readonly mode: InputMode;
  readonly color: boolean;
  /** Rings the terminal bell when a committed word has errors. */
  readonly sound?: boolean;
  readonly logger?: Logger;
  readonly tickIntervalMs?: number;
}

const QUIT_COMMAND = '/quit';
const DEFAULT_COLUMNS = 80;

const isPrintable = (value: string): boolean =>
  Array.from(value).length === 1 && !/[\u0000-\u001f\u007f]/.test(value);

/**
 * Drives a TypingSession from a terminal. Keypress mode reads raw keys
 * (space commits, backspace edits, Esc or Ctrl-C aborts); line mode reads
 * whole lines and treats `/quit` as abort. A timer calls `tick()` in both
 * modes so timed sessions end on their own.
 */
export class SessionRunner {
  private readonly session: TypingSession;
  private readonly input: RunnerInput;
  private readonly output: RunnerOutput;
  private readonly mode: InputMode;
  private readonly color: boolean;
  private readonly sound: boolean;
  private readonly logger: Logger;
  private readonly tickIntervalMs: number;

  constructor(options: SessionRunnerOptions) {
    this.session = options.session;
    this.input = options.input;
    this.output = options.output;
    this.mode = options.mode;
    this.color = options.color;
    this.sound = options.sound ?? false;
    this.logger = options.logger ?? silentLogger;
    this.tickIntervalMs = options.tickIntervalMs ?? TICK_INTERVAL_MS;
  }

  run(): Promise<SessionResult> {
    return new Promise<SessionResult>((resolve, reject) => {
      const cleanups: Array<() => void> = [];
      let settled = false;

      const cleanup = (): void => {
        while (cleanups.length > 0) {
          cleanups.pop()?.();
        }
      };

      const succeed = (result: SessionResult): void => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve(result);
      };

      const fail = (error: unknown): void => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(error);
      };

      /** Runs one step and settles once the session is over. */
      const step = (action: () => void, redraw = true): void => {
        if (settled) return;
        try {
          action();
          if (this.session.status === 'finished') {
            succeed(this.session.getResult());
          } else if (redraw) {
            this.render();
          }
        } catch (error) {
          fail(error);
        }
      };

      try {
        if (this.session.status === 'pending') {
          this.session.start();
        }
        if (this.session.status === 'finished') {
          succeed(this.session.getResult());
          return;
        }

        // Only a full-screen view is redrawn on every tick.
        const redrawOnTick = this.mode === 'keypress' && this.color;
        const timer = setInterval(() => step(() => this.session.tick(), redrawOnTick), this.tickIntervalMs);
        cleanups.push(() => clearInterval(timer));

        if (this.mode === 'keypress') {
          this.attachKeypress(step, cleanups);
        } else {
          this.attachLines(step, cleanups);
        }
        this.render();
      } catch (error) {
        fail(error);
      }
    });
  }

  private attachKeypress(step: (action: () => void) => void, cleanups: Array<() => void>): void {
    readline.emitKeypressEvents(this.input);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
      cleanups.push(() => this.input.setRawMode?.(false));
    }

    const onKeypress = (str: string | undefined, key: Key | undefined): void => {
      step(() => this.handleKey(str, key));
    };
    this.input.on('keypress', onKeypress);
    this.input.resume();
    cleanups.push(() => {
      this.input.removeListener('keypress', onKeypress);
      this.input.pause();
    });
  }

  private handleKey(str: string | undefined, key: Key | undefined): void {
    if ((key?.ctrl && key.name === 'c') || key?.name === 'escape') {
      this.logger.debug('aborted from keyboard');
      this.session.abort();
      return;
    }
    if (key?.name === 'backspace') {
      this.session.backspace();
      return;
    }
    if (key?.name === 'return' || key?.name === 'enter') {
      this.feedback(this.session.commitInput());
      return;
    }
    if (str !== undefined && !key?.ctrl && !key?.meta && isPrintable(str)) {
      this.feedback(this.session.typeCharacter(str));
    }
  }

  private attachLines(step: (action: () => void) => void, cleanups: Array<() => void>): void {
    const rl = readline.createInterface({ input: this.input, terminal: false });

    rl.on('line', (line: string) => {
      step(() => this.handleLine(line));
    });
    // End of input finishes whatever was typed so far.
    rl.on('close', () => {
      step(() => {
        if (this.session.status === 'active') {
          this.session.finish();
        }
      });
    });
    cleanups.push(() => {
      rl.removeAllListeners('close');
      rl.close();
    });
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (trimmed === QUIT_COMMAND) {
      this.session.abort();
      return;
    }

    // A phrase target takes as many words from the line as it holds.
    const words = trimmed.split(/\s+/).filter(Boolean);
    let offset = 0;
    while (offset < words.length && this.session.status === 'active') {
      const size = Math.max(1, countWords(this.session.currentWord ?? ''));
      this.feedback(this.session.submitWord(words.slice(offset, offset + size).join(' ')));
      offset += size;
    }
  }

  private feedback(attempt: WordAttempt | null): void {
    if (this.sound && attempt && attempt.errors > 0) {
      this.output.write(ANSI.bell);
    }
  }

  private progress(snapshot: SessionSnapshot): number {
    const { mode } = this.session.config;
    return mode.kind === 'timed'
      ? snapshot.counters.elapsedMs / (mode.durationSeconds * 1000)
      : snapshot.wordIndex / mode.count;
  }

  private render(): void {
    const snapshot = this.session.snapshot(PREVIEW_WORD_COUNT);
    if (snapshot.status !== 'active' || snapshot.currentWord === null) {
      return;
    }

    const header = buildHeaderLine({
      modeKey: this.session.modeKey,
      elapsedMs: snapshot.counters.elapsedMs,
      remainingMs: snapshot.remainingMs,
      netWpm: snapshot.netWpm,
      accuracy: snapshot.accuracy,
      errors: snapshot.counters.errors,
    });
    const bar = buildProgressBar(this.progress(snapshot));

    if (this.mode === 'line') {
      this.output.write(`${header} ${bar}\n> ${[snapshot.currentWord, ...snapshot.upcoming].join(' ')}\n`);
      return;
    }

    const width = Math.max(20, (this.output.columns ?? DEFAULT_COLUMNS) - 2);
    const current = snapshot.currentWord;
    const [firstLine = current, ...otherLines] = wrapWords([current, ...snapshot.upcoming], width);
    const highlighted =
      renderSegments(highlightWord(current, snapshot.input), this.color) + firstLine.slice(current.length);

    const lines = [
      header,
      bar,
      '',
      highlighted,
      ...otherLines,
      '',
      'space: next word | backspace: edit | esc: quit',
    ];
    const prefix = this.color ? ANSI.clearScreen : '\n';
    this.output.write(`${prefix}${lines.join('\n')}\n`);
  }
}
