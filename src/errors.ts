/**
 * Error taxonomy for a listening-stats run.
 *
 * Everything except TransientAuthError is fatal for the run: the CLI logs it,
 * prints the message and exits non-zero. TransientAuthError never leaves the
 * Spotify API client when the single refresh succeeds.
 */

export abstract class AppError extends Error {
  abstract readonly category: 'config' | 'auth' | 'retrieval';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends AppError {
  readonly category = 'config' as const;

  constructor(public readonly missing: string[]) {
    super(
      `Missing Spotify credential(s): ${missing.join(', ')}. ` +
      'Create a .env file or export the variables in your shell and try again.'
    );
  }
}

export class AuthorizationError extends AppError {
  readonly category = 'auth' as const;

  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

// Access token rejected with 401; recovered by one refresh-and-retry
export class TransientAuthError extends AppError {
  readonly category = 'auth' as const;
}

export class RetrievalError extends AppError {
  readonly category = 'retrieval' as const;

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function describeError(error: unknown): { error: string; stack?: string } {
  return {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined
  };
}

/**
 * One-line message for the terminal when a run fails.
 */
export function failureMessage(error: unknown): string {
  if (error instanceof AppError) {
    return `❌ ${error.message}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `❌ Unexpected error: ${message}. See the log files for details.`;
}
