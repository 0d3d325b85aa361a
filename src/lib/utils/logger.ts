export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
  readonly scope: string;
  readonly debug?: boolean;
  /** Defaults to the global console. */
  readonly sink?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
}

export const createLogger = ({ scope, debug = false, sink = console }: LoggerOptions): Logger => {
  const tag = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (debug) {
        sink.debug(`${tag} ${message}`, ...details);
      }
    },
    info: (message, ...details) => sink.info(`${tag} ${message}`, ...details),
    warn: (message, ...details) => sink.warn(`${tag} ${message}`, ...details),
    error: (message, ...details) => sink.error(`${tag} ${message}`, ...details),
  };
};

/** Logger that drops everything; used where no output is wanted. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
