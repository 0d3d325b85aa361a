import { z } from 'zod';

const timestampSchema = z
  .string()
  .min(1)
  .refine((value) => !Number.isNaN(Date.parse(value)) || /^\d+$/.test(value), {
    message: 'timestamp must be ISO-8601 or epoch milliseconds',
  });

export const highscoreEntrySchema = z.object({
  net_wpm: z.number().min(0),
  raw_wpm: z.number().min(0),
  accuracy: z.number().min(0).max(1),
  errors: z.number().int().min(0),
  timestamp: timestampSchema,
  chars_typed: z.number().int().min(0).optional(),
});

/**
 * Top-level shape only. Boards and rows are validated one by one, so one bad
 * board or row does not discard the rest of the file.
 */
export const highscoreFileSchema = z.record(z.unknown());

export const highscoreBoardSchema = z.array(z.unknown());

export const sessionResultSchema = z.object({
  rawWpm: z.number().min(0),
  netWpm: z.number().min(0),
  accuracy: z.number().min(0).max(1),
  consistency: z.number().min(0),
  errors: z.number().int().min(0),
  charsTyped: z.number().int().min(0),
  correctChars: z.number().int().min(0),
  mismatches: z.number().int().min(0),
  omissions: z.number().int().min(0),
  extras: z.number().int().min(0),
  wordsCompleted: z.number().int().min(0),
  elapsedSeconds: z.number().min(0),
  modeKey: z.string().min(1),
  timestamp: timestampSchema,
  completed: z.boolean(),
  endReason: z.enum(['words-exhausted', 'time-expired', 'finished', 'aborted']),
});

export type HighscoreEntryInput = z.infer<typeof highscoreEntrySchema>;
export type SessionResultInput = z.infer<typeof sessionResultSchema>;
