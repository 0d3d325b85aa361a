/** Characters per word in the WPM convention. */
export const CHARS_PER_WORD = 5;

export interface MetricsInput {
  readonly charsTyped: number;
  readonly correctChars: number;
  readonly errors: number;
  readonly elapsedMinutes: number;
  /** Seconds per submitted word. */
  readonly wordDurations: readonly number[];
}

export interface SessionMetrics {
  readonly rawWpm: number;
  readonly netWpm: number;
  readonly accuracy: number;
  readonly consistency: number;
}

export function computeRawWpm(charsTyped: number, elapsedMinutes: number): number {
  if (!(elapsedMinutes > 0)) return 0;
  return charsTyped / CHARS_PER_WORD / elapsedMinutes;
}

export function computeNetWpm(correctChars: number, errors: number, elapsedMinutes: number): number {
  if (!(elapsedMinutes > 0)) return 0;
  return Math.max(0, (correctChars - errors) / CHARS_PER_WORD / elapsedMinutes);
}

export function computeAccuracy(correctChars: number, charsTyped: number): number {
  if (charsTyped <= 0) return 0;
  return Math.max(0, Math.min(1, correctChars / charsTyped));
}

// Population standard deviation; 0 below two samples.
export function computeConsistency(durations: readonly number[]): number {
  const samples = durations.filter((value) => Number.isFinite(value));
  if (samples.length < 2) return 0;
  const mean = samples.reduce((sum, value) => sum + value, 0) / samples.length;
  const variance =
    samples.reduce((sum, value) => sum + (value - mean) * (value - mean), 0) / samples.length;
  return Math.sqrt(variance);
}

export function computeSessionMetrics(input: MetricsInput): SessionMetrics {
  return {
    rawWpm: computeRawWpm(input.charsTyped, input.elapsedMinutes),
    netWpm: computeNetWpm(input.correctChars, input.errors, input.elapsedMinutes),
    accuracy: computeAccuracy(input.correctChars, input.charsTyped),
    consistency: computeConsistency(input.wordDurations),
  };
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
