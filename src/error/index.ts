/**
 * Error types for the Thunderstore client.
 * @module error
 */

/**
 * Error kinds for categorizing client errors.
 */
export enum ThunderstoreErrorKind {
  // Identifier errors
  InvalidIdent = 'invalid_ident',
  InvalidVersion = 'invalid_version',

  // Configuration errors
  InvalidConfig = 'invalid_config',

  // Authentication and authorization errors
  ApiTokenInvalid = 'api_token_invalid',
  Forbidden = 'forbidden',

  // Request errors
  BadRequest = 'bad_request',
  NotFound = 'not_found',
  RateLimited = 'rate_limited',

  // Server errors
  ServerError = 'server_error',

  // Network errors
  ConnectionFailed = 'connection_failed',
  Timeout = 'timeout',

  // Payload errors
  InvalidResponse = 'invalid_response',
  InvalidProfileData = 'invalid_profile_data',
  MissingETag = 'missing_etag',

  // Local I/O errors
  Io = 'io',

  Unknown = 'unknown',
}

/**
 * Maps HTTP status codes to error kinds.
 */
export function errorKindFromStatus(status: number): ThunderstoreErrorKind {
  switch (status) {
    case 400:
      return ThunderstoreErrorKind.BadRequest;
    case 401:
      return ThunderstoreErrorKind.ApiTokenInvalid;
    case 403:
      return ThunderstoreErrorKind.Forbidden;
    case 404:
      return ThunderstoreErrorKind.NotFound;
    case 408:
      return ThunderstoreErrorKind.Timeout;
    case 429:
      return ThunderstoreErrorKind.RateLimited;
    default:
      if (status >= 500) {
        return ThunderstoreErrorKind.ServerError;
      }
      return ThunderstoreErrorKind.Unknown;
  }
}

/**
 * Checks if an error kind is worth retrying by the caller.
 */
export function isRetryable(kind: ThunderstoreErrorKind): boolean {
  return [
    ThunderstoreErrorKind.RateLimited,
    ThunderstoreErrorKind.ServerError,
    ThunderstoreErrorKind.Timeout,
    ThunderstoreErrorKind.ConnectionFailed,
  ].includes(kind);
}

/**
 * Error options for the ThunderstoreError constructor.
 */
export interface ThunderstoreErrorOptions {
  /** HTTP status code */
  statusCode?: number;
  /** Underlying cause */
  cause?: unknown;
  /** Additional context */
  context?: Record<string, unknown>;
}

/**
 * Error raised by every operation of the client.
 */
export class ThunderstoreError extends Error {
  /** Error kind */
  public readonly kind: ThunderstoreErrorKind;
  /** HTTP status code */
  public readonly statusCode?: number;
  /** Underlying cause */
  public override readonly cause?: unknown;
  /** Additional context */
  public readonly context?: Record<string, unknown>;

  constructor(
    kind: ThunderstoreErrorKind,
    message: string,
    options?: ThunderstoreErrorOptions
  ) {
    super(message);
    this.name = 'ThunderstoreError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.cause = options?.cause;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ThunderstoreError);
    }
  }

  /**
   * Checks if this error is retryable.
   */
  isRetryable(): boolean {
    return isRetryable(this.kind);
  }

  /**
   * Creates a new error with additional context.
   */
  withContext(context: Record<string, unknown>): ThunderstoreError {
    return new ThunderstoreError(this.kind, this.message, {
      statusCode: this.statusCode,
      cause: this.cause,
      context: { ...this.context, ...context },
    });
  }

  /**
   * Formats the error for logging.
   */
  override toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    return result;
  }

  /**
   * Converts to JSON for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      statusCode: this.statusCode,
      context: this.context,
    };
  }

  // Factory methods for common errors

  static invalidIdent(input: string, reason: string): ThunderstoreError {
    return new ThunderstoreError(
      ThunderstoreErrorKind.InvalidIdent,
      `Invalid package or version identifier '${input}': ${reason}`,
      { context: { input } }
    );
  }

  static invalidVersion(version: string): ThunderstoreError {
    return new ThunderstoreError(
      ThunderstoreErrorKind.InvalidVersion,
      `Invalid semantic version: ${version}`,
      { context: { version } }
    );
  }

  static configError(message: string): ThunderstoreError {
    return new ThunderstoreError(ThunderstoreErrorKind.InvalidConfig, message);
  }

  static notFound(resource: string): ThunderstoreError {
    return new ThunderstoreError(
      ThunderstoreErrorKind.NotFound,
      `${resource} not found`,
      { statusCode: 404 }
    );
  }

  static timeout(operation: string, timeoutMs: number): ThunderstoreError {
    return new ThunderstoreError(
      ThunderstoreErrorKind.Timeout,
      `Operation '${operation}' timed out after ${timeoutMs}ms`
    );
  }

  static connectionFailed(url: string, cause: unknown): ThunderstoreError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ThunderstoreError(
      ThunderstoreErrorKind.ConnectionFailed,
      `Request failed: ${reason}`,
      { cause, context: { url } }
    );
  }

  static invalidResponse(reason: string, cause?: unknown): ThunderstoreError {
    return new ThunderstoreError(
      ThunderstoreErrorKind.InvalidResponse,
      `Invalid response: ${reason}`,
      { cause }
    );
  }

  static invalidProfileData(): ThunderstoreError {
    return new ThunderstoreError(
      ThunderstoreErrorKind.InvalidProfileData,
      'Profile data is missing the expected prefix'
    );
  }

  static missingETag(partNumber: number): ThunderstoreError {
    return new ThunderstoreError(
      ThunderstoreErrorKind.MissingETag,
      `Upload of part ${partNumber} returned no ETag header`,
      { context: { partNumber } }
    );
  }

  static io(path: string, cause: unknown): ThunderstoreError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ThunderstoreError(
      ThunderstoreErrorKind.Io,
      `I/O error on '${path}': ${reason}`,
      { cause, context: { path } }
    );
  }

  static fromResponse(status: number, message: string): ThunderstoreError {
    return new ThunderstoreError(errorKindFromStatus(status), message, {
      statusCode: status,
    });
  }
}

/**
 * Type guard for ThunderstoreError.
 */
export function isThunderstoreError(error: unknown): error is ThunderstoreError {
  return error instanceof ThunderstoreError;
}

/**
 * Checks whether `error` is a ThunderstoreError of the given kind.
 */
export function hasErrorKind(error: unknown, kind: ThunderstoreErrorKind): boolean {
  return isThunderstoreError(error) && error.kind === kind;
}
