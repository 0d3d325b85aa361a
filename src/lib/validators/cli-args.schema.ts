import { z } from 'zod';

const numericString = (label: string) =>
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/, `${label} must be a number`)
    .transform((value) => Number(value));

const positiveInt = (label: string) =>
  numericString(label).pipe(z.number().int(`${label} must be a whole number`).positive(`${label} must be > 0`));

export const cliArgsSchema = z
  .object({
    timed: positiveInt('--timed').optional(),
    words: positiveInt('--words').optional(),
    list: z.enum(['default', 'easy', 'medium', 'hard', 'programming']).optional(),
    file: z.string().min(1).optional(),
    book: z.string().min(1).optional(),
    chunk: z.enum(['words', 'sentences', 'paragraphs']).optional(),
    punct: numericString('--punct').pipe(z.number().min(0).max(1)).optional(),
    numbers: z.boolean().optional(),
    noNumbers: z.boolean().optional(),
    top: positiveInt('--top').optional(),
    seed: numericString('--seed').pipe(z.number().int()).optional(),
    plain: z.boolean().optional(),
    sound: z.boolean().optional(),
    showHighscores: z.boolean().optional(),
    limit: positiveInt('--limit').optional(),
  })
  .superRefine((value, ctx) => {
    if (value.timed !== undefined && value.words !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['timed'],
        message: '--timed and --words are mutually exclusive',
      });
    }

    if (value.numbers && value.noNumbers) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['numbers'],
        message: '--numbers and --no-numbers are mutually exclusive',
      });
    }

    const sources = [value.list, value.file, value.book].filter((entry) => entry !== undefined);
    if (sources.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['list'],
        message: 'choose only one of --list, --file and --book',
      });
    }

    if (value.chunk !== undefined && value.book === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunk'],
        message: '--chunk only applies to --book',
      });
    }
  });

export type CliArgsInput = z.input<typeof cliArgsSchema>;
export type CliArgs = z.output<typeof cliArgsSchema>;
