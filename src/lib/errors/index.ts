export class AppError extends Error {
  public readonly exitCode: number;
  public readonly code: string;
  public readonly expose: boolean;

  constructor(
    message: string,
    exitCode: number,
    code: string,
    options?: { cause?: unknown; expose?: boolean },
  ) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
    this.code = code;
    this.expose = options?.expose ?? true;
    if (options?.cause) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** An operation was invoked in a session state that forbids it. */
export class InvalidStateError extends AppError {
  public readonly state: string;

  constructor(message: string, state: string) {
    super(message, 1, 'INVALID_STATE');
    this.state = state;
  }
}

export class ConfigurationError extends AppError {
  public readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 2, 'CONFIGURATION_ERROR');
    this.details = details;
  }
}

export class PersistenceError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, 3, 'PERSISTENCE_ERROR', options);
    this.path = path;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 2, 'NOT_FOUND');
  }
}

export const ensureAppError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, 1, 'INTERNAL_ERROR', { cause: error, expose: false });
  }

  return new AppError('Unknown error', 1, 'INTERNAL_ERROR', { expose: false });
};
