import {
  AppErrorOptions,
  UpstreamRejectedError,
  UpstreamUnavailableError,
  ValidationError,
} from '../errors/app-error';

export class InvalidProductError extends ValidationError {
  constructor(productName: unknown) {
    super('Invalid product', { details: { productName } });
  }
}

export class MissingPaymentInfoError extends ValidationError {
  constructor(missing: string[]) {
    super('Missing payment information', { details: { missing } });
  }
}

/** The provider answered with an error body or an unusable resource */
export class ProviderRejectedError extends UpstreamRejectedError {
  constructor(
    message: string,
    readonly status: number,
    readonly providerErrorName?: string,
    readonly debugId?: string,
    options: AppErrorOptions = {},
  ) {
    super(message, {
      ...options,
      details: { status, providerErrorName, debugId, ...options.details },
    });
  }
}

export class ProviderUnavailableError extends UpstreamUnavailableError {
  constructor(message: string, cause: unknown) {
    super(message, {
      publicError: 'Payment provider unavailable',
      cause,
    });
  }
}

export class PaymentCreationFailedError extends UpstreamRejectedError {
  constructor(reason: string, options: AppErrorOptions = {}) {
    super(`Payment creation failed: ${reason}`, {
      ...options,
      publicError: 'Payment creation failed',
    });
  }
}

export class PaymentExecutionFailedError extends UpstreamRejectedError {
  constructor(paymentId: string, reason: string, options: AppErrorOptions = {}) {
    super(`Payment execution failed: ${reason}`, {
      ...options,
      publicError: 'Payment execution failed',
      details: { paymentId, ...options.details },
    });
  }
}
