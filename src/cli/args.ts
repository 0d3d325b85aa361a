import path from 'node:path';
import { parseArgs } from 'node:util';

import { ConfigurationError } from '@/lib/errors';
import { cliArgsSchema, sessionConfigSchema, type CliArgs } from '@/lib/validators';
import type { SessionConfig, WordListSelection } from '@/types';

export const USAGE = `Usage:
  typing-drill [--timed N | --words N] [--list easy|medium|hard|programming]
               [--file PATH] [--book PATH [--chunk words|sentences|paragraphs]]
               [--punct P] [--numbers | --no-numbers] [--top N] [--seed N]
               [--plain] [--sound]
  typing-drill --show-highscores [--limit N]
  typing-drill convert <input> <output> [--strip-punctuation]

Without --timed or --words an interactive menu is shown.`;

export type CliCommand =
  | { readonly kind: 'help' }
  | { readonly kind: 'highscores'; readonly limit?: number }
  | {
      readonly kind: 'convert';
      readonly input: string;
      readonly output: string;
      readonly preservePunctuation: boolean;
    }
  | { readonly kind: 'play'; readonly args: CliArgs; readonly interactive: boolean };

const readRawArgs = (argv: readonly string[]) => {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        timed: { type: 'string' },
        words: { type: 'string' },
        list: { type: 'string' },
        file: { type: 'string' },
        book: { type: 'string' },
        chunk: { type: 'string' },
        punct: { type: 'string' },
        numbers: { type: 'boolean' },
        'no-numbers': { type: 'boolean' },
        top: { type: 'string' },
        seed: { type: 'string' },
        plain: { type: 'boolean' },
        sound: { type: 'boolean' },
        'show-highscores': { type: 'boolean' },
        limit: { type: 'string' },
        'strip-punctuation': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(message);
  }
};

/** Parses `argv` (without the node and script entries) into a command. */
export function parseCli(argv: readonly string[]): CliCommand {
  const { values, positionals } = readRawArgs(argv);

  if (values.help) {
    return { kind: 'help' };
  }

  const [command, ...rest] = positionals;
  if (command === 'convert') {
    const [input, output, ...extra] = rest;
    if (input === undefined || output === undefined || extra.length > 0) {
      throw new ConfigurationError('convert expects <input> and <output> paths');
    }
    return {
      kind: 'convert',
      input,
      output,
      preservePunctuation: !values['strip-punctuation'],
    };
  }
  if (command !== undefined) {
    throw new ConfigurationError(`Unknown command "${command}"`);
  }

  const result = cliArgsSchema.safeParse({
    timed: values.timed,
    words: values.words,
    list: values.list,
    file: values.file,
    book: values.book,
    chunk: values.chunk,
    punct: values.punct,
    numbers: values.numbers,
    noNumbers: values['no-numbers'],
    top: values.top,
    seed: values.seed,
    plain: values.plain,
    sound: values.sound,
    showHighscores: values['show-highscores'],
    limit: values.limit,
  });
  if (!result.success) {
    const flattened = result.error.flatten();
    const first = [...flattened.formErrors, ...Object.values(flattened.fieldErrors).flat()][0];
    throw new ConfigurationError(first ?? 'Invalid arguments', flattened);
  }

  const args = result.data;
  if (args.showHighscores) {
    return { kind: 'highscores', ...(args.limit !== undefined ? { limit: args.limit } : {}) };
  }

  return {
    kind: 'play',
    args,
    interactive: args.timed === undefined && args.words === undefined,
  };
}

const selectWordList = (args: CliArgs, fallback: WordListSelection): WordListSelection => {
  if (args.file) {
    return { id: 'custom', path: path.resolve(args.file) };
  }
  if (args.book) {
    return {
      id: 'book',
      path: path.resolve(args.book),
      ...(args.chunk ? { chunking: args.chunk } : {}),
    };
  }
  if (args.list) {
    return { id: args.list };
  }
  return fallback;
};

/** Overlays command-line flags on a base configuration. */
export function buildSessionConfig(args: CliArgs, base: SessionConfig): SessionConfig {
  const candidate: SessionConfig = {
    mode:
      args.timed !== undefined
        ? { kind: 'timed', durationSeconds: args.timed }
        : args.words !== undefined
          ? { kind: 'words', count: args.words }
          : base.mode,
    punctuationProbability: args.punct ?? base.punctuationProbability,
    numbers: args.numbers ?? (args.noNumbers ? false : base.numbers),
    wordList: selectWordList(args, base.wordList),
    topN: args.top ?? base.topN,
  };

  const result = sessionConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigurationError('Invalid session configuration', result.error.flatten());
  }
  return candidate;
}
