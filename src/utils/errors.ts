export class HttpError extends Error {
  status: number;

  code: string;

  details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export const unauthorizedError = (message = 'Unauthorized'): HttpError =>
  new HttpError(401, 'UNAUTHORIZED', message);

export const badRequestError = (message: string, details?: unknown): HttpError =>
  new HttpError(400, 'BAD_REQUEST', message, details);

export const notFoundError = (message: string): HttpError =>
  new HttpError(404, 'NOT_FOUND', message);

export type AuthFailureReason = 'invalid_credentials' | 'network' | 'upstream' | 'malformed';

/** Credential exchange with the identity provider failed; no token was cached. */
export class AuthError extends Error {
  readonly reason: AuthFailureReason;

  readonly status?: number;

  constructor(reason: AuthFailureReason, message: string, status?: number) {
    super(message);
    this.name = 'AuthError';
    this.reason = reason;
    this.status = status;
  }
}

export type UpstreamEndpoint = 'realtime' | 'vehicle_info' | 'alias_catalog';

/**
 * Failure of a call to the vehicle cloud.
 *
 * `transient` errors were already retried inside the client. `reauth` asks the caller to
 * drop its token and try again with a fresh one.
 */
export class UpstreamError extends Error {
  readonly endpoint: UpstreamEndpoint;

  readonly transient: boolean;

  readonly reauth: boolean;

  readonly status?: number;

  constructor(
    endpoint: UpstreamEndpoint,
    message: string,
    options: { transient: boolean; reauth?: boolean; status?: number },
  ) {
    super(message);
    this.name = 'UpstreamError';
    this.endpoint = endpoint;
    this.transient = options.transient;
    this.reauth = options.reauth ?? false;
    this.status = options.status;
  }
}

export class CycleTimeoutError extends Error {
  readonly budgetMs: number;

  constructor(budgetMs: number) {
    super(`poll cycle exceeded its ${budgetMs}ms budget`);
    this.name = 'CycleTimeoutError';
    this.budgetMs = budgetMs;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
