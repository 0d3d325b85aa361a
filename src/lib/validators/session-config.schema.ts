import { z } from 'zod';

const DURATION_MAX_SECONDS = 3_600;
const WORD_COUNT_MAX = 10_000;
const TOP_N_MAX = 1_000;

const sessionModeSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('timed'),
    durationSeconds: z.number().int().positive().max(DURATION_MAX_SECONDS),
  }),
  z.object({
    kind: z.literal('words'),
    count: z.number().int().positive().max(WORD_COUNT_MAX),
  }),
]);

const bookChunkingSchema = z.enum(['words', 'sentences', 'paragraphs']);

export const wordListSelectionSchema = z.discriminatedUnion('id', [
  z.object({ id: z.literal('default') }),
  z.object({ id: z.literal('easy') }),
  z.object({ id: z.literal('medium') }),
  z.object({ id: z.literal('hard') }),
  z.object({ id: z.literal('programming') }),
  z.object({ id: z.literal('custom'), path: z.string().min(1) }),
  z.object({
    id: z.literal('book'),
    path: z.string().min(1),
    chunking: bookChunkingSchema.optional(),
  }),
]);

export const sessionConfigSchema = z.object({
  mode: sessionModeSchema,
  punctuationProbability: z.number().min(0).max(1),
  numbers: z.boolean(),
  wordList: wordListSelectionSchema,
  topN: z.number().int().positive().max(TOP_N_MAX),
});

/** Flat shape written to `config.json`. */
export const sessionConfigDtoSchema = z
  .object({
    mode: z.enum(['timed', 'words']),
    durationSeconds: z.number().int().positive().max(DURATION_MAX_SECONDS).optional(),
    wordCount: z.number().int().positive().max(WORD_COUNT_MAX).optional(),
    punctuationProbability: z.number().min(0).max(1),
    numbers: z.boolean(),
    wordList: z.enum(['default', 'easy', 'medium', 'hard', 'programming', 'custom', 'book']),
    wordListPath: z.string().min(1).optional(),
    bookChunking: bookChunkingSchema.optional(),
    topN: z.number().int().positive().max(TOP_N_MAX),
  })
  .superRefine((value, ctx) => {
    if (value.mode === 'timed' && value.durationSeconds === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['durationSeconds'],
        message: 'durationSeconds is required in timed mode',
      });
    }

    if (value.mode === 'words' && value.wordCount === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['wordCount'],
        message: 'wordCount is required in words mode',
      });
    }

    if ((value.wordList === 'custom' || value.wordList === 'book') && !value.wordListPath) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['wordListPath'],
        message: 'wordListPath is required for file-backed word lists',
      });
    }
  });

export type SessionConfigInput = z.infer<typeof sessionConfigSchema>;
export type SessionConfigDtoInput = z.infer<typeof sessionConfigDtoSchema>;
