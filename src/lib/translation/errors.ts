export class TranslationTimeoutError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranslationTimeoutError';
  }
}

export class TranslationConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranslationConnectionError';
  }
}

export class RepositoryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RepositoryError';
  }
}

export function wrapRepositoryError(scope: string, error: unknown): RepositoryError {
  const detail = error instanceof Error ? error.message : String(error);
  return new RepositoryError(`${scope} request failed: ${detail}`, { cause: error });
}
