/**
 * Error taxonomy shared by every handler.
 *
 * The public part (`publicError`, `publicMessage`, `extras`) is what the
 * caller sees; `message` and `details` only ever reach the logs.
 */

export type ErrorKind =
  | 'validation'
  | 'upstream_unavailable'
  | 'upstream_rejected'
  | 'not_configured'
  | 'malformed_metadata';

export interface AppErrorOptions {
  statusCode?: number;
  publicError?: string;
  publicMessage?: string;
  /** Extra fields merged into the JSON response body */
  extras?: Record<string, unknown>;
  /** Server-side context, logged but never sent */
  details?: Record<string, unknown>;
  cause?: unknown;
}

export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;
  readonly statusCode: number;
  readonly publicError: string;
  readonly publicMessage?: string;
  readonly extras: Record<string, unknown>;
  readonly details: Record<string, unknown>;

  protected constructor(message: string, defaults: { statusCode: number; publicError: string }, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.statusCode = options.statusCode ?? defaults.statusCode;
    this.publicError = options.publicError ?? defaults.publicError;
    this.publicMessage = options.publicMessage;
    this.extras = options.extras ?? {};
    this.details = options.details ?? {};
  }

  toResponse(): Record<string, unknown> {
    return {
      error: this.publicError,
      ...(this.publicMessage !== undefined ? { message: this.publicMessage } : {}),
      ...this.extras,
    };
  }
}

/** Client-correctable input problem */
export class ValidationError extends AppError {
  readonly kind = 'validation';

  constructor(publicError: string, options: AppErrorOptions = {}) {
    super(publicError, { statusCode: 400, publicError }, options);
  }
}

/** Provider or webhook unreachable or timed out */
export class UpstreamUnavailableError extends AppError {
  readonly kind = 'upstream_unavailable';

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { statusCode: 500, publicError: 'Upstream service unavailable' }, options);
  }
}

/** Provider or webhook answered with a failure */
export class UpstreamRejectedError extends AppError {
  readonly kind = 'upstream_rejected';

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { statusCode: 500, publicError: 'Upstream service rejected the request' }, options);
  }
}

/** Required external configuration is missing */
export class NotConfiguredError extends AppError {
  readonly kind = 'not_configured';

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { statusCode: 500, publicError: 'Service not configured' }, options);
  }
}

/** Purchase metadata read back from the provider could not be decoded */
export class MalformedPurchaseMetadataError extends AppError {
  readonly kind = 'malformed_metadata';

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { statusCode: 500, publicError: 'Malformed purchase metadata' }, options);
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
