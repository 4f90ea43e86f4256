/**
 * Error codes returned to HTTP clients and logged by the CLI.
 */
export const ErrorCode = {
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',

  // Pipeline errors
  PLAYER_NOT_FOUND: 'PLAYER_NOT_FOUND',
  UPSTREAM_ERROR: 'UPSTREAM_ERROR',
  UPSTREAM_TIMEOUT: 'UPSTREAM_TIMEOUT',
  MISSING_STAT: 'MISSING_STAT',
  RENDER_ERROR: 'RENDER_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when validation fails (bad query, bad environment)
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, 400, errorCode);
  }
}

/**
 * Thrown when a player name does not resolve to any known player.
 * Not retryable: the same name will keep failing.
 */
export class NotFoundError extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.PLAYER_NOT_FOUND) {
    super(message, 404, errorCode);
  }

  static player(name: string): NotFoundError {
    return new NotFoundError(`Player "${name}" not found`);
  }
}

/**
 * Thrown when the stat source is unreachable or returns malformed data.
 * Wraps the original error and records which source and operation failed.
 */
export class UpstreamError extends AppException {
  public readonly originalError?: Error;
  public readonly sourceName: string;
  public readonly operation: string;

  constructor(
    sourceName: string,
    operation: string,
    message: string,
    statusCode: number = 502,
    originalError?: Error,
    errorCode: ErrorCodeType = ErrorCode.UPSTREAM_ERROR
  ) {
    super(`[${sourceName}] ${operation}: ${message}`, statusCode, errorCode);
    this.sourceName = sourceName;
    this.operation = operation;
    this.originalError = originalError;
  }

  /**
   * Creates an UpstreamError from a caught error.
   */
  static fromError(sourceName: string, operation: string, error: unknown): UpstreamError {
    const originalError = error instanceof Error ? error : new Error(String(error));
    const message = originalError.message || 'Unknown error';
    return new UpstreamError(sourceName, operation, message, 502, originalError);
  }

  static timeout(sourceName: string, operation: string): UpstreamError {
    return new UpstreamError(
      sourceName,
      operation,
      'Request timed out',
      504,
      new Error('Timeout'),
      ErrorCode.UPSTREAM_TIMEOUT
    );
  }

  static malformed(sourceName: string, operation: string, detail: string): UpstreamError {
    return new UpstreamError(sourceName, operation, `Malformed response (${detail})`);
  }
}

/**
 * A single stat is absent for this player and season.
 * Absorbed while building the card: the row renders as "N/A".
 */
export class MissingStatError extends AppException {
  constructor(
    public readonly statKey: string,
    public readonly playerName: string
  ) {
    super(`Stat ${statKey} unavailable for ${playerName}`, 422, ErrorCode.MISSING_STAT);
  }
}

/**
 * Thrown when the card cannot be drawn (missing font, row without a stat definition).
 */
export class RenderError extends AppException {
  constructor(message: string) {
    super(message, 500, ErrorCode.RENDER_ERROR);
  }
}
