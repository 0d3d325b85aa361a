import { ConfigurationError, InvalidStateError } from '@/lib/errors';
import { makeModeKey } from '@/lib/utils/mode-key';
import { silentLogger, type Logger } from '@/lib/utils/logger';
import { sessionConfigSchema } from '@/lib/validators';
import type { WordSequenceSource } from '@/lib/words';
import type {
  SessionConfig,
  SessionCounters,
  SessionEndReason,
  SessionResult,
  SessionSnapshot,
  SessionStatus,
  WordAttempt,
} from '@/types';

import { classifyWord, countCharacters, countWords } from './classify';
import { systemClock, type Clock } from './clock';
import { computeAccuracy, computeNetWpm, computeSessionMetrics, roundTo } from './metrics';
import {
  INITIAL_SESSION_STATE,
  sessionReducer,
  type SessionAction,
  type SessionMachineState,
} from './session-machine';

export interface TypingSessionOptions {
  readonly config: SessionConfig;
  readonly source: WordSequenceSource;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

interface MutableCounters {
  charsTyped: number;
  correctChars: number;
  errors: number;
  mismatches: number;
  omissions: number;
  extras: number;
  wordDurations: number[];
}

const MS_PER_MINUTE = 60_000;

/**
 * Typing session engine: `pending → active → finished`.
 *
 * Words are pulled lazily from the source and classified on submission. The
 * engine never reads the clock on its own; every timing decision happens inside
 * `start`, `submitWord`, `tick`, `finish` and `abort`.
 */
export class TypingSession {
  readonly config: SessionConfig;
  readonly modeKey: string;

  private readonly source: WordSequenceSource;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private state: SessionMachineState = INITIAL_SESSION_STATE;
  private readonly targets: string[] = [];
  private sourceExhausted = false;
  private readonly attemptLog: WordAttempt[] = [];
  private readonly counters: MutableCounters = {
    charsTyped: 0,
    correctChars: 0,
    errors: 0,
    mismatches: 0,
    omissions: 0,
    extras: 0,
    wordDurations: [],
  };

  private wordIndex = 0;
  private input = '';
  private startedAt = 0;
  private wordStartedAt = 0;
  private endedAt: number | null = null;
  private result: SessionResult | null = null;

  constructor(options: TypingSessionOptions) {
    const parsed = sessionConfigSchema.safeParse(options.config);
    if (!parsed.success) {
      throw new ConfigurationError('Invalid session configuration', parsed.error.flatten());
    }

    this.config = options.config;
    this.modeKey = makeModeKey(options.config);
    this.source = options.source;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  get status(): SessionStatus {
    return this.state.status;
  }

  get endReason(): SessionEndReason | null {
    return this.state.endReason;
  }

  /** True once the session ended by any means other than `abort()`. */
  get completed(): boolean {
    return this.state.status === 'finished' && this.state.endReason !== 'aborted';
  }

  get attempts(): readonly WordAttempt[] {
    return [...this.attemptLog];
  }

  get currentWord(): string | null {
    return this.state.status === 'active' ? (this.targets[this.wordIndex] ?? null) : null;
  }

  get currentInput(): string {
    return this.input;
  }

  start(): void {
    this.dispatch({ type: 'START' });
    this.startedAt = this.clock.now();
    this.wordStartedAt = this.startedAt;
    this.logger.debug(`session started (${this.modeKey})`);

    if (!this.ensureTarget(0)) {
      this.complete('words-exhausted', this.startedAt);
    }
  }

  /**
   * Classifies `typed` against the current word and advances. Returns the
   * recorded attempt, or `null` when the time limit had already passed and
   * the session finished instead.
   */
  submitWord(typed: string): WordAttempt | null {
    this.assertActive('submitWord');
    const now = this.clock.now();
    if (this.isExpired(now)) {
      this.complete('time-expired', now);
      return null;
    }

    const target = this.targets[this.wordIndex];
    if (target === undefined) {
      this.complete('words-exhausted', now);
      return null;
    }

    const attempt = this.recordAttempt(target, typed, now, false);
    this.wordIndex++;
    this.input = '';
    this.wordStartedAt = now;

    if (!this.ensureTarget(this.wordIndex)) {
      this.complete('words-exhausted', now);
    }
    return attempt;
  }

  /**
   * Appends a character to the current input. A space commits the word, or,
   * for a phrase target, once the input holds as many words as the phrase.
   */
  typeCharacter(character: string): WordAttempt | null {
    this.assertActive('typeCharacter');
    const whitespace = /^\s$/.test(character);
    if (whitespace && !this.awaitsMoreWords()) {
      return this.commitInput();
    }

    const now = this.clock.now();
    if (this.isExpired(now)) {
      this.complete('time-expired', now);
      return null;
    }

    if (whitespace) {
      // Repeated separators collapse into one.
      if (!/\s$/.test(this.input)) {
        this.input += ' ';
      }
      return null;
    }
    this.input += character;
    return null;
  }

  backspace(): void {
    this.assertActive('backspace');
    const characters = Array.from(this.input);
    characters.pop();
    this.input = characters.join('');
  }

  /** Submits the current input. Empty input is ignored. */
  commitInput(): WordAttempt | null {
    this.assertActive('commitInput');
    if (this.input.length === 0) {
      return null;
    }
    return this.submitWord(this.input);
  }

  /**
   * Expiry check for timed sessions. Safe to call repeatedly; does nothing
   * once the session has finished.
   */
  tick(now: number = this.clock.now()): SessionResult | null {
    if (this.state.status === 'finished') {
      return this.result;
    }
    this.assertActive('tick');

    if (this.isExpired(now)) {
      return this.complete('time-expired', now);
    }
    return null;
  }

  finish(): SessionResult {
    if (this.result) {
      return this.result;
    }
    this.assertActive('finish');

    const now = this.clock.now();
    return this.complete(this.isExpired(now) ? 'time-expired' : 'finished', now);
  }

  /** Ends the session without a result eligible for the leaderboard. */
  abort(): SessionResult {
    if (this.result) {
      return this.result;
    }

    const now = this.clock.now();
    if (this.state.status === 'pending') {
      this.startedAt = now;
    }
    this.dispatch({ type: 'ABORT' });
    this.endedAt = now;
    this.logger.debug(`session aborted after ${this.attemptLog.length} words`);
    return this.buildResult();
  }

  getResult(): SessionResult {
    if (!this.result) {
      throw new InvalidStateError('Session result is only available once finished', this.status);
    }
    return this.result;
  }

  snapshot(previewCount = 0): SessionSnapshot {
    const counters = this.currentCounters();
    const minutes = counters.elapsedMs / MS_PER_MINUTE;
    const upcoming: string[] = [];
    if (this.state.status === 'active') {
      for (let offset = 1; offset <= previewCount; offset++) {
        if (!this.ensureTarget(this.wordIndex + offset)) break;
        const word = this.targets[this.wordIndex + offset];
        if (word !== undefined) upcoming.push(word);
      }
    }

    return {
      status: this.state.status,
      wordIndex: this.wordIndex,
      currentWord: this.currentWord,
      upcoming,
      input: this.input,
      counters,
      remainingMs:
        this.config.mode.kind === 'timed'
          ? Math.max(0, this.config.mode.durationSeconds * 1000 - counters.elapsedMs)
          : null,
      netWpm: computeNetWpm(counters.correctChars, counters.errors, minutes),
      accuracy: computeAccuracy(counters.correctChars, counters.charsTyped),
    };
  }

  private dispatch(action: SessionAction): void {
    this.state = sessionReducer(this.state, action);
  }

  private assertActive(operation: string): void {
    if (this.state.status !== 'active') {
      throw new InvalidStateError(
        `${operation}() requires an active session (currently ${this.state.status})`,
        this.state.status,
      );
    }
  }

  private durationMs(): number | null {
    return this.config.mode.kind === 'timed' ? this.config.mode.durationSeconds * 1000 : null;
  }

  private isExpired(now: number): boolean {
    const limit = this.durationMs();
    return limit !== null && now - this.startedAt >= limit;
  }

  private awaitsMoreWords(): boolean {
    const target = this.targets[this.wordIndex];
    if (target === undefined || this.input.length === 0) {
      return false;
    }
    return countWords(this.input) < countWords(target);
  }

  /** Makes sure `targets[index]` exists; false when the sequence has ended. */
  private ensureTarget(index: number): boolean {
    while (this.targets.length <= index && !this.sourceExhausted) {
      if (this.config.mode.kind === 'words' && this.targets.length >= this.config.mode.count) {
        this.sourceExhausted = true;
        break;
      }
      const next = this.source.next();
      if (next === undefined) {
        this.sourceExhausted = true;
      } else {
        this.targets.push(next);
      }
    }
    return index < this.targets.length;
  }

  private recordAttempt(target: string, typed: string, now: number, partial: boolean): WordAttempt {
    const classification = classifyWord(target, typed);
    const attempt: WordAttempt = {
      ...classification,
      index: this.wordIndex,
      target,
      typed,
      startedAt: this.wordStartedAt,
      endedAt: now,
      partial,
    };

    this.counters.charsTyped += countCharacters(typed);
    this.counters.correctChars += classification.correct;
    this.counters.errors += classification.errors;
    this.counters.mismatches += classification.mismatches;
    this.counters.omissions += classification.omissions;
    this.counters.extras += classification.extras;
    if (!partial) {
      this.counters.wordDurations.push(Math.max(0, now - this.wordStartedAt) / 1000);
    }
    this.attemptLog.push(attempt);
    return attempt;
  }

  private complete(reason: Exclude<SessionEndReason, 'aborted'>, now: number): SessionResult {
    const target = this.targets[this.wordIndex];
    if (this.input.length > 0 && target !== undefined) {
      this.recordAttempt(target, this.input, now, true);
      this.input = '';
    }

    this.dispatch({ type: 'FINISH', reason });
    const limit = this.durationMs();
    this.endedAt = limit === null ? now : Math.min(now, this.startedAt + limit);
    this.logger.debug(`session finished (${reason}) after ${this.attemptLog.length} words`);
    return this.buildResult();
  }

  private elapsedMs(): number {
    const end = this.endedAt ?? (this.state.status === 'active' ? this.clock.now() : this.startedAt);
    return Math.max(0, end - this.startedAt);
  }

  private currentCounters(): SessionCounters {
    return {
      ...this.counters,
      wordDurations: [...this.counters.wordDurations],
      elapsedMs: this.elapsedMs(),
    };
  }

  private buildResult(): SessionResult {
    const counters = this.currentCounters();
    const metrics = computeSessionMetrics({
      charsTyped: counters.charsTyped,
      correctChars: counters.correctChars,
      errors: counters.errors,
      elapsedMinutes: counters.elapsedMs / MS_PER_MINUTE,
      wordDurations: counters.wordDurations,
    });

    const result: SessionResult = {
      rawWpm: roundTo(metrics.rawWpm, 2),
      netWpm: roundTo(metrics.netWpm, 2),
      accuracy: roundTo(metrics.accuracy, 4),
      consistency: roundTo(metrics.consistency, 3),
      errors: counters.errors,
      charsTyped: counters.charsTyped,
      correctChars: counters.correctChars,
      mismatches: counters.mismatches,
      omissions: counters.omissions,
      extras: counters.extras,
      wordsCompleted: counters.wordDurations.length,
      elapsedSeconds: roundTo(counters.elapsedMs / 1000, 3),
      modeKey: this.modeKey,
      timestamp: this.clock.date().toISOString(),
      completed: this.completed,
      endReason: this.state.endReason ?? 'finished',
    };

    this.result = Object.freeze(result);
    return this.result;
  }
}
