import { PassThrough } from 'node:stream';

import { beforeEach, describe, expect, it } from '@jest/globals';

import { SessionRunner, type RunnerOutput } from '@/cli/runner';
import { DEFAULT_SESSION_CONFIG } from '@/config/session.config';
import { TypingSession } from '@/lib/engine';
import type { SessionConfig } from '@/types';

import { listSource, repeatSource } from '../helpers/fixtures';
import { ManualClock } from '../helpers/manual-clock';

class CapturedOutput implements RunnerOutput {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

const wordsConfig = (count: number): SessionConfig => ({
  ...DEFAULT_SESSION_CONFIG,
  mode: { kind: 'words', count },
});

describe('SessionRunner in line mode', () => {
  let clock: ManualClock;
  let input: PassThrough;
  let output: CapturedOutput;

  beforeEach(() => {
    clock = new ManualClock();
    input = new PassThrough();
    output = new CapturedOutput();
  });

  const createRunner = (session: TypingSession, tickIntervalMs = 60_000, sound = false) =>
    new SessionRunner({ session, input, output, mode: 'line', color: false, sound, tickIntervalMs });

  it('submits every word on a line', async () => {
    const session = new TypingSession({ config: wordsConfig(2), source: listSource(['hi', 'yo']), clock });

    const pending = createRunner(session).run();
    input.write('hi yo\n');
    const result = await pending;

    expect(result.completed).toBe(true);
    expect(result.endReason).toBe('words-exhausted');
    expect(result.errors).toBe(0);
    expect(result.wordsCompleted).toBe(2);
  });

  it('shows the header and the upcoming words', async () => {
    const session = new TypingSession({ config: wordsConfig(2), source: listSource(['hi', 'yo']), clock });

    const pending = createRunner(session).run();
    input.write('/quit\n');
    await pending;

    expect(output.chunks[0]).toBe('2 words | 0.0s | 0 WPM | 0.0% | 0 errors [------------------------------]\n> hi yo\n');
  });

  it('aborts on /quit', async () => {
    const session = new TypingSession({ config: wordsConfig(5), source: repeatSource('go'), clock });

    const pending = createRunner(session).run();
    input.write('go\n');
    input.write('/quit\n');
    const result = await pending;

    expect(result.completed).toBe(false);
    expect(result.endReason).toBe('aborted');
  });

  it('finishes when the input ends', async () => {
    const session = new TypingSession({ config: wordsConfig(5), source: repeatSource('go'), clock });

    const pending = createRunner(session).run();
    input.end('go\n');
    const result = await pending;

    expect(result.completed).toBe(true);
    expect(result.endReason).toBe('finished');
    expect(result.wordsCompleted).toBe(1);
  });

  it('submits a phrase target as one attempt', async () => {
    const session = new TypingSession({
      config: wordsConfig(2),
      source: listSource(['the cat sat', 'on a mat']),
      clock,
    });

    const pending = createRunner(session).run();
    input.write('the cat sat on a mat\n');
    const result = await pending;

    expect(result.errors).toBe(0);
    expect(result.correctChars).toBe(19);
    expect(result.wordsCompleted).toBe(2);
    expect(session.attempts.map((attempt) => attempt.typed)).toEqual(['the cat sat', 'on a mat']);
  });

  it('rings the bell for each wrong word when sound is on', async () => {
    const session = new TypingSession({ config: wordsConfig(3), source: listSource(['hi', 'yo', 'ok']), clock });

    const pending = createRunner(session, 60_000, true).run();
    input.write('hx yo oj\n');
    await pending;

    expect(output.chunks.filter((chunk) => chunk === '\x07')).toHaveLength(2);
  });

  it('stays silent without sound', async () => {
    const session = new TypingSession({ config: wordsConfig(1), source: listSource(['hi']), clock });

    const pending = createRunner(session).run();
    input.write('hx\n');
    await pending;

    expect(output.chunks).not.toContain('\x07');
  });

  it('ends a timed session from the timer', async () => {
    const session = new TypingSession({
      config: { ...DEFAULT_SESSION_CONFIG, mode: { kind: 'timed', durationSeconds: 1 } },
      source: repeatSource('go'),
      clock,
    });

    const pending = createRunner(session, 5).run();
    clock.advance(1_500);
    const result = await pending;

    expect(result.endReason).toBe('time-expired');
    expect(result.elapsedSeconds).toBe(1);
  });
});

describe('SessionRunner in keypress mode', () => {
  it('lets a phrase be typed with spaces', async () => {
    const clock = new ManualClock();
    const input = new PassThrough();
    const output = new CapturedOutput();
    const session = new TypingSession({
      config: wordsConfig(2),
      source: listSource(['the cat', 'sat down']),
      clock,
    });

    const pending = new SessionRunner({
      session,
      input,
      output,
      mode: 'keypress',
      color: false,
      tickIntervalMs: 60_000,
    }).run();
    input.write('the cat sat down ');
    const result = await pending;

    expect(result.completed).toBe(true);
    expect(result.errors).toBe(0);
    expect(result.wordsCompleted).toBe(2);
  });
});
