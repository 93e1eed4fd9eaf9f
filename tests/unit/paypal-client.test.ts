import { PayPalClient } from '../../src/payments/paypal-client';
import { ProviderRejectedError, ProviderUnavailableError } from '../../src/payments/errors';
import { PaymentIntent } from '../../src/payments/types';

const mockFetch = jest.fn();
global.fetch = mockFetch as unknown as typeof fetch;

const json = (status: number, body: unknown): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const tokenResponse = () => json(200, { access_token: 'test-access-token', token_type: 'Bearer', expires_in: 32400 });

const paymentBody = {
  id: 'PAY-1',
  state: 'created',
  intent: 'sale',
  transactions: [{ amount: { total: '3.00', currency: 'USD' }, custom: 'alice|Mod' }],
  links: [
    { href: 'https://api-m.sandbox.paypal.com/v1/payments/payment/PAY-1', rel: 'self', method: 'GET' },
    { href: 'https://www.sandbox.paypal.com/cgi-bin/webscr?cmd=_express-checkout&token=EC-1', rel: 'approval_url', method: 'REDIRECT' },
  ],
};

const intent: PaymentIntent = {
  intent: 'sale',
  payer: { payment_method: 'paypal' },
  redirect_urls: { return_url: 'https://shop.test/execute-payment', cancel_url: 'https://shop.test/cancel-payment' },
  transactions: [
    {
      item_list: {
        items: [{ name: 'Mod', sku: 'mod', price: '3.00', currency: 'USD', quantity: 1, description: 'Mod kit' }],
      },
      amount: { total: '3.00', currency: 'USD' },
      description: 'Mod purchase for alice',
      custom: 'alice|Mod',
    },
  ],
};

describe('PayPalClient', () => {
  let client: PayPalClient;

  beforeEach(() => {
    mockFetch.mockReset();
    client = new PayPalClient({ mode: 'sandbox', clientId: 'test-client', clientSecret: 'test-secret', timeoutMs: 5000 });
  });

  it('should authenticate and create a payment', async () => {
    mockFetch.mockResolvedValueOnce(tokenResponse()).mockResolvedValueOnce(json(201, paymentBody));

    const payment = await client.createPayment(intent);

    expect(payment.id).toBe('PAY-1');
    expect(payment.links[1].rel).toBe('approval_url');

    const [tokenUrl, tokenInit] = mockFetch.mock.calls[0];
    expect(tokenUrl).toBe('https://api-m.sandbox.paypal.com/v1/oauth2/token');
    expect(tokenInit.method).toBe('POST');
    expect(tokenInit.headers.Authorization).toBe(`Basic ${Buffer.from('test-client:test-secret').toString('base64')}`);
    expect(tokenInit.body).toBe('grant_type=client_credentials');

    const [createUrl, createInit] = mockFetch.mock.calls[1];
    expect(createUrl).toBe('https://api-m.sandbox.paypal.com/v1/payments/payment');
    expect(createInit.method).toBe('POST');
    expect(createInit.headers.Authorization).toBe('Bearer test-access-token');
    expect(JSON.parse(createInit.body)).toEqual(intent);
  });

  it('should use the live base URL in live mode', async () => {
    const live = new PayPalClient({ mode: 'live', clientId: 'test-client', clientSecret: 'test-secret', timeoutMs: 5000 });
    mockFetch.mockResolvedValueOnce(tokenResponse()).mockResolvedValueOnce(json(200, paymentBody));

    await live.findPayment('PAY-1');

    expect(mockFetch.mock.calls[0][0]).toBe('https://api-m.paypal.com/v1/oauth2/token');
    expect(mockFetch.mock.calls[1][0]).toBe('https://api-m.paypal.com/v1/payments/payment/PAY-1');
    expect(mockFetch.mock.calls[1][1].method).toBe('GET');
    expect(mockFetch.mock.calls[1][1].body).toBeUndefined();
  });

  it('should reuse the cached token', async () => {
    mockFetch
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(json(200, paymentBody))
      .mockResolvedValueOnce(json(200, { ...paymentBody, state: 'approved' }));

    await client.findPayment('PAY-1');
    const executed = await client.executePayment('PAY-1', 'PAYER-9');

    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(executed.state).toBe('approved');
    expect(mockFetch.mock.calls[2][0]).toBe('https://api-m.sandbox.paypal.com/v1/payments/payment/PAY-1/execute');
    expect(JSON.parse(mockFetch.mock.calls[2][1].body)).toEqual({ payer_id: 'PAYER-9' });
  });

  it('should map an error body into a rejection', async () => {
    mockFetch.mockResolvedValueOnce(tokenResponse()).mockResolvedValueOnce(
      json(400, {
        name: 'PAYMENT_ALREADY_DONE',
        message: 'Payment has been done already for this cart.',
        debug_id: 'dbg-42',
      }),
    );

    const err = await client.executePayment('PAY-1', 'PAYER-9').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderRejectedError);
    if (!(err instanceof ProviderRejectedError)) throw new Error('Expected rejection');
    expect(err.status).toBe(400);
    expect(err.providerErrorName).toBe('PAYMENT_ALREADY_DONE');
    expect(err.debugId).toBe('dbg-42');
    expect(err.details.providerMessage).toBe('Payment has been done already for this cart.');
  });

  it('should reject a failed authentication', async () => {
    mockFetch.mockResolvedValueOnce(json(401, { error: 'invalid_client', error_description: 'Client Authentication failed' }));

    const err = await client.createPayment(intent).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderRejectedError);
    if (!(err instanceof ProviderRejectedError)) throw new Error('Expected rejection');
    expect(err.message).toBe('PayPal authentication failed');
    expect(err.providerErrorName).toBe('invalid_client');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should fetch a new token after a 401 from the API', async () => {
    mockFetch
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(json(401, { name: 'AUTHENTICATION_FAILURE' }))
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(json(200, paymentBody));

    await expect(client.findPayment('PAY-1')).rejects.toBeInstanceOf(ProviderRejectedError);
    await client.findPayment('PAY-1');

    expect(mockFetch.mock.calls.map((call) => call[0])).toEqual([
      'https://api-m.sandbox.paypal.com/v1/oauth2/token',
      'https://api-m.sandbox.paypal.com/v1/payments/payment/PAY-1',
      'https://api-m.sandbox.paypal.com/v1/oauth2/token',
      'https://api-m.sandbox.paypal.com/v1/payments/payment/PAY-1',
    ]);
  });

  it('should reject a 2xx body that is not a payment resource', async () => {
    mockFetch.mockResolvedValueOnce(tokenResponse()).mockResolvedValueOnce(json(200, { id: 'PAY-1', state: 'created' }));

    await expect(client.findPayment('PAY-1')).rejects.toThrow('returned an unexpected payment resource');
  });

  it('should report an unreachable provider as unavailable', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    const err = await client.findPayment('PAY-1').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderUnavailableError);
    if (!(err instanceof ProviderUnavailableError)) throw new Error('Expected unavailable');
    expect(err.message).toBe('PayPal request failed');
    expect(err.toResponse()).toEqual({ error: 'Payment provider unavailable' });
  });

  it('should report a timeout as unavailable', async () => {
    mockFetch.mockRejectedValueOnce(Object.assign(new Error('aborted'), { name: 'TimeoutError' }));

    await expect(client.findPayment('PAY-1')).rejects.toThrow('PayPal timed out after 5000ms');
  });

  it('should report a timeout while reading the body as unavailable', async () => {
    const stalled = json(201, paymentBody);
    jest
      .spyOn(stalled, 'text')
      .mockRejectedValueOnce(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }));
    mockFetch.mockResolvedValueOnce(tokenResponse()).mockResolvedValueOnce(stalled);

    const err = await client.createPayment(intent).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderUnavailableError);
    if (!(err instanceof ProviderUnavailableError)) throw new Error('Expected unavailable');
    expect(err.message).toBe('PayPal timed out after 5000ms');
  });
});
