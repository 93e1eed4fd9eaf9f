import { AppConfig } from '../config/env';
import { PaymentProvider } from './types';
import { PayPalClient } from './paypal-client';
import { MockPaymentProvider } from './mock-payment-provider';
import { logger } from '../observability/logger';

/**
 * Factory: PayPal when credentials are set, mock otherwise (never in production).
 */
export function createPaymentProvider(config: AppConfig): PaymentProvider {
  const { clientId, clientSecret, mode, timeoutMs } = config.paypal;

  if (clientId && clientSecret) {
    logger.info({ mode }, 'Using PayPal payment provider');
    return new PayPalClient({ mode, clientId, clientSecret, timeoutMs });
  }

  if (config.isProd) {
    throw new Error('PAYPAL_CLIENT_ID and PAYPAL_CLIENT_SECRET are required in production');
  }

  logger.warn('PayPal credentials not set; using mock payment provider');
  return new MockPaymentProvider();
}
