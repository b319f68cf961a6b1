/**
 * Error types.
 *
 * Only configuration, authentication and lookup errors ever reach a
 * route handler. ProviderError and ExternalSourceUnavailable are
 * raised inside adapters and absorbed by the clients that call them.
 */

export type ErrorStatus = 400 | 401 | 404 | 500 | 502;

export class AppError extends Error {
  public readonly status: ErrorStatus;

  constructor(message: string, status: ErrorStatus) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Unknown persona, malformed data files */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** Request body or form failed validation */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details: unknown = null) {
    super(message, 400);
    this.details = details;
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Invalid email or password') {
    super(message, 401);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

/** LLM provider failed: auth, rate limit, timeout, empty completion */
export class ProviderError extends AppError {
  constructor(provider: string, message: string) {
    super(`${provider}: ${message}`, 502);
  }
}

/** A reference source could not be reached or answered badly */
export class ExternalSourceUnavailable extends AppError {
  constructor(source: string, message: string) {
    super(`${source}: ${message}`, 502);
  }
}
