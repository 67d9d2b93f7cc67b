/**
 * Talker error classes.
 *
 * Kept apart from the client so the normalizer, orchestrator and host adapter
 * can share them without importing axios.
 */

export type TalkerErrorCode =
  | 'NETWORK'
  | 'RATE_LIMIT'
  | 'NOT_FOUND'
  | 'PARSE'
  | 'CONFIGURATION'
  | 'API';

export class TalkerError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly code: TalkerErrorCode = 'API',
    public readonly isRetryable: boolean = false,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'TalkerError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Transport failure: connection refused, reset, timed out, or 5xx after the
 * retry budget was spent.
 */
export class NetworkError extends TalkerError {
  constructor(
    source: string,
    message = `Network error connecting to ${source}`,
    public readonly timedOut: boolean = false,
    status?: number
  ) {
    super(message, source, 'NETWORK', true, status);
    this.name = 'NetworkError';
  }
}

/**
 * Thrown when the provider answers 429.
 * Check retryAfter for seconds to wait.
 */
export class RateLimitError extends TalkerError {
  constructor(
    source: string,
    public readonly retryAfter: number = 10,
    message = `${source} rate limit exceeded`
  ) {
    super(message, source, 'RATE_LIMIT', true, 429);
    this.name = 'RateLimitError';
  }
}

export class NotFoundError extends TalkerError {
  constructor(source: string, message = 'Resource not found') {
    super(message, source, 'NOT_FOUND', false, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Malformed provider payload. `field` is the dotted path of the first
 * offending field, e.g. `cover.default`.
 */
export class ParseError extends TalkerError {
  constructor(
    source: string,
    public readonly field: string,
    message = `Invalid ${source} payload at "${field}"`
  ) {
    super(message, source, 'PARSE', false);
    this.name = 'ParseError';
  }
}

/** Missing or invalid endpoint/credential. Fails the whole operation. */
export class ConfigurationError extends TalkerError {
  constructor(source: string, message: string) {
    super(message, source, 'CONFIGURATION', false);
    this.name = 'ConfigurationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
