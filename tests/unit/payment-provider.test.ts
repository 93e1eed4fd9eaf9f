import { loadConfig } from '../../src/config/env';
import { createPaymentProvider } from '../../src/payments/payment-provider';

describe('createPaymentProvider', () => {
  it('should use PayPal when credentials are set', () => {
    const provider = createPaymentProvider(
      loadConfig({ PAYPAL_CLIENT_ID: 'test-client', PAYPAL_CLIENT_SECRET: 'test-secret' }),
    );
    expect(provider.name).toBe('paypal');
  });

  it('should fall back to the mock outside production', () => {
    expect(createPaymentProvider(loadConfig({ NODE_ENV: 'test' })).name).toBe('mock');
  });

  it('should refuse to start in production without credentials', () => {
    expect(() => createPaymentProvider(loadConfig({ NODE_ENV: 'production', PAYPAL_CLIENT_ID: 'test-client' }))).toThrow(
      'PAYPAL_CLIENT_ID and PAYPAL_CLIENT_SECRET are required in production',
    );
  });
});
