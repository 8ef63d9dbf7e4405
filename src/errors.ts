export type ServiceErrorCode =
  | 'invalid_request'
  | 'invalid_state'
  | 'upstream_exchange_error'
  | 'upstream_timeout'
  | 'not_connected'
  | 'reauth_required'
  | 'decryption_error'
  | 'unauthorized'
  | 'forbidden'
  | 'rate_limited'
  | 'write_conflict';

export abstract class ServiceError extends Error {
  abstract readonly code: ServiceErrorCode;
  abstract readonly status: number;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Text safe to hand back to the caller. */
  get publicDescription(): string {
    return this.message;
  }
}

export class InvalidRequestError extends ServiceError {
  readonly code = 'invalid_request';
  readonly status = 400;
}

// Tampered, expired, malformed or already used state token.
export class InvalidStateError extends ServiceError {
  readonly code = 'invalid_state';
  readonly status = 400;
}

export class UpstreamExchangeError extends ServiceError {
  readonly code = 'upstream_exchange_error';
  readonly status = 502;
  override readonly retryable = true;

  constructor(
    message: string,
    readonly upstreamStatus?: number,
    readonly upstreamError?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class UpstreamTimeoutError extends ServiceError {
  readonly code = 'upstream_timeout';
  readonly status = 504;
  override readonly retryable = true;
}

/**
 * Google answered a refresh with `invalid_grant`: the refresh token itself is
 * dead. Only the lifecycle manager sees this; it purges the record and turns
 * it into {@link ReauthRequiredError}.
 */
export class RefreshTokenRejectedError extends UpstreamExchangeError {}

export class NotConnectedError extends ServiceError {
  readonly code = 'not_connected';
  readonly status = 404;
}

export class ReauthRequiredError extends ServiceError {
  readonly code = 'reauth_required';
  readonly status = 409;
}

// The store kept a newer row than the one being written.
export class WriteConflictError extends ServiceError {
  readonly code = 'write_conflict';
  readonly status = 409;
  override readonly retryable = true;
}

export class DecryptionError extends ServiceError {
  readonly code = 'decryption_error';
  readonly status = 500;

  override get publicDescription(): string {
    return 'Stored credential could not be read';
  }
}

export class UnauthorizedError extends ServiceError {
  readonly code = 'unauthorized';
  readonly status = 401;

  override get publicDescription(): string {
    return 'Unauthorized';
  }
}

export class ForbiddenError extends ServiceError {
  readonly code = 'forbidden';
  readonly status = 403;

  override get publicDescription(): string {
    return 'Forbidden';
  }
}

export class RateLimitedError extends ServiceError {
  readonly code = 'rate_limited';
  readonly status = 429;
  override readonly retryable = true;

  constructor(readonly retryAfterMs: number) {
    super('Too many requests');
  }

  get retryAfterSeconds(): number {
    return Math.max(1, Math.ceil(this.retryAfterMs / 1000));
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly fieldErrors: Record<string, string[] | undefined> = {},
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
