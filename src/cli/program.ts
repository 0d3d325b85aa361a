import { createInterface } from 'node:readline/promises';

import { DEFAULT_TOP_N } from '@/config/session.config';
import { loadAppConfig } from '@/config/app.config';
import { TypingSession } from '@/lib/engine';
import { ensureAppError } from '@/lib/errors';
import { createLogger, type Logger } from '@/lib/utils/logger';
import { buildWordSource, convertBookFile, createRng, loadWordList, seedFromTime } from '@/lib/words';
import type { InputMode, SessionConfig } from '@/types';

import { buildSessionConfig, parseCli, USAGE, type CliCommand } from './args';
import { createAppContext, type AppContext } from './context';
import { formatDecision, formatLeaderboard, formatSummary } from './format';
import { applyMenuChoice, promptMenu, type Prompter } from './menu';
import { SessionRunner, type RunnerInput } from './runner';

export interface ProgramIo {
  readonly stdin: RunnerInput;
  readonly stdout: NodeJS.WritableStream & { readonly isTTY?: boolean; readonly columns?: number };
  readonly env: Readonly<Record<string, string | undefined>>;
}

type PlayCommand = Extract<CliCommand, { kind: 'play' }>;

const writeLines = (io: ProgramIo, lines: readonly string[]): void => {
  io.stdout.write(`${lines.join('\n')}\n`);
};

async function withPrompter<T>(io: ProgramIo, ask: (prompter: Prompter) => Promise<T>): Promise<T> {
  const rl = createInterface({ input: io.stdin, output: io.stdout });
  try {
    return await ask(rl);
  } finally {
    rl.close();
  }
}

async function printHighscores(context: AppContext, io: ProgramIo, limit: number = DEFAULT_TOP_N): Promise<void> {
  const leaderboards = await context.store.getState().loadHighscores();
  const keys = Object.keys(leaderboards).sort();
  if (keys.length === 0) {
    writeLines(io, ['No highscores yet.']);
    return;
  }

  for (const key of keys) {
    writeLines(io, [...formatLeaderboard(key, (leaderboards[key] ?? []).slice(0, limit)), '']);
  }
}

/** Shows the start menu until a session is chosen; null means quit. */
async function chooseFromMenu(
  context: AppContext,
  io: ProgramIo,
  base: SessionConfig,
): Promise<SessionConfig | null> {
  for (;;) {
    const choice = await withPrompter(io, promptMenu);
    if (choice === 'quit') {
      return null;
    }
    if (choice === 'highscores') {
      await printHighscores(context, io);
      continue;
    }
    return applyMenuChoice(choice, base);
  }
}

async function play(context: AppContext, command: PlayCommand, io: ProgramIo): Promise<number> {
  const { store, logger } = context;
  const remembered = await store.getState().loadConfig();
  let config = buildSessionConfig(command.args, remembered);

  // Without a terminal there is nobody to answer the menu; the remembered mode is used.
  if (command.interactive && io.stdin.isTTY) {
    const chosen = await chooseFromMenu(context, io, config);
    if (!chosen) {
      return 0;
    }
    config = chosen;
  }

  await store.getState().saveConfig(config);
  const wordList = await loadWordList(config.wordList);

  const plain = command.args.plain ?? false;
  const mode: InputMode = io.stdin.isTTY && !plain ? 'keypress' : 'line';
  const color = Boolean(io.stdout.isTTY) && !plain;
  let exitCode = 0;

  for (;;) {
    const rng = createRng(command.args.seed ?? seedFromTime());
    const session = new TypingSession({ config, source: buildWordSource(config, wordList, rng), logger });
    const result = await new SessionRunner({
      session,
      input: io.stdin,
      output: io.stdout,
      mode,
      color,
      sound: command.args.sound ?? false,
      logger,
    }).run();

    writeLines(io, ['', ...formatSummary(result)]);
    if (result.completed) {
      try {
        const decision = await store.getState().submitResult(result, config.topN);
        writeLines(io, [formatDecision(decision)]);
      } catch (error) {
        const appError = ensureAppError(error);
        logger.error(`Could not save the highscore: ${appError.message}`);
        exitCode = appError.exitCode;
      }
    }

    if (mode !== 'keypress') {
      return exitCode;
    }
    const answer = await withPrompter(io, (prompter) =>
      prompter.question('Press r and enter to restart, or enter to quit: '),
    );
    if (!answer.trim().toLowerCase().startsWith('r')) {
      return exitCode;
    }
  }
}

/** Runs one invocation and returns the process exit code. */
export async function runProgram(argv: readonly string[], io: ProgramIo): Promise<number> {
  let logger: Logger = createLogger({ scope: 'typing-drill' });

  try {
    const appConfig = loadAppConfig(io.env);
    logger = createLogger({ scope: 'typing-drill', debug: appConfig.debug });
    const command = parseCli(argv);

    if (command.kind === 'help') {
      writeLines(io, [USAGE]);
      return 0;
    }
    if (command.kind === 'convert') {
      const count = await convertBookFile(command.input, command.output, {
        preservePunctuation: command.preservePunctuation,
      });
      writeLines(io, [`Wrote ${count} words to ${command.output}`]);
      return 0;
    }

    const context = createAppContext(appConfig);
    if (command.kind === 'highscores') {
      await printHighscores(context, io, command.limit);
      return 0;
    }
    return await play(context, command, io);
  } catch (error) {
    const appError = ensureAppError(error);
    logger.error(appError.expose ? appError.message : `Unexpected error: ${appError.message}`);
    logger.debug('details', appError.cause ?? appError);
    return appError.exitCode;
  }
}
