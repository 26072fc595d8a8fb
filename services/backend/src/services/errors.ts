export type CompletionErrorCode =
  | 'AUTH'
  | 'BAD_REQUEST'
  | 'RATE_LIMIT'
  | 'TRANSIENT'
  | 'EXTRACTION'
  | 'CONFIGURATION';

export class CompletionError extends Error {
  constructor(
    message: string,
    public readonly code: CompletionErrorCode,
    public readonly statusCode?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'CompletionError';
  }
}

export class AuthError extends CompletionError {
  constructor(message = 'Invalid API key. Please check your TOGETHER_API_KEY.', statusCode = 401) {
    super(message, 'AUTH', statusCode);
    this.name = 'AuthError';
  }
}

export class BadRequestError extends CompletionError {
  constructor(public readonly body: string) {
    super(`Invalid request: ${body}`, 'BAD_REQUEST', 400);
    this.name = 'BadRequestError';
  }
}

export class RateLimitExceededError extends CompletionError {
  constructor(public readonly retryAfterSeconds: number) {
    super('Rate limit exceeded. Please try again in a moment.', 'RATE_LIMIT', 429);
    this.name = 'RateLimitExceededError';
  }
}

export class TransientNetworkError extends CompletionError {
  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(message, 'TRANSIENT', statusCode, cause);
    this.name = 'TransientNetworkError';
  }
}

export class ExtractionFailure extends CompletionError {
  constructor(message: string, public readonly raw: string) {
    super(message, 'EXTRACTION');
    this.name = 'ExtractionFailure';
  }
}

export class ConfigurationError extends CompletionError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
