import { z } from 'zod';

const flagSchema = z
  .string()
  .trim()
  .transform((value) => ['1', 'true', 'yes', 'on'].includes(value.toLowerCase()));

export const appEnvSchema = z.object({
  TYPING_DRILL_DEBUG: flagSchema.optional(),
  TYPING_DRILL_HOME: z.string().trim().min(1).optional(),
  TYPING_DRILL_HIGHSCORES: z.string().trim().min(1).optional(),
});

export type AppEnv = z.output<typeof appEnvSchema>;
