import { MOCK_PAYER_ID, MockPaymentProvider } from '../../src/payments/mock-payment-provider';
import { ProviderRejectedError } from '../../src/payments/errors';
import { buildPaymentIntent, findApprovalUrl, redirectUrlsFor } from '../../src/payments/payment-intent';

describe('MockPaymentProvider', () => {
  let provider: MockPaymentProvider;
  const intent = buildPaymentIntent(
    { name: 'Mod', price: 3, description: 'Mod kit' },
    'alice',
    'alice|Mod',
    redirectUrlsFor('http://localhost:5000'),
  );

  beforeEach(() => {
    provider = new MockPaymentProvider();
  });

  it('should create payments with an approval link back to the return URL', async () => {
    const payment = await provider.createPayment(intent);

    expect(payment.id).toBe('PAY-MOCK-1');
    expect(payment.state).toBe('created');
    expect(payment.transactions[0]).toEqual({
      amount: { total: '3.00', currency: 'USD' },
      custom: 'alice|Mod',
      description: 'Mod purchase for alice',
    });

    const approval = new URL(findApprovalUrl(payment.links) ?? '');
    expect(`${approval.origin}${approval.pathname}`).toBe('http://localhost:5000/execute-payment');
    expect(approval.searchParams.get('paymentId')).toBe('PAY-MOCK-1');
    expect(approval.searchParams.get('PayerID')).toBe(MOCK_PAYER_ID);
  });

  it('should execute a payment once', async () => {
    const { id } = await provider.createPayment(intent);

    const executed = await provider.executePayment(id, MOCK_PAYER_ID);
    expect(executed.state).toBe('approved');

    const err = await provider.executePayment(id, MOCK_PAYER_ID).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderRejectedError);
    if (err instanceof ProviderRejectedError) expect(err.providerErrorName).toBe('PAYMENT_ALREADY_DONE');
  });

  it('should reject unknown payment ids', async () => {
    await expect(provider.findPayment('PAY-NOPE')).rejects.toThrow('Payment PAY-NOPE not found');
  });

  it('should hand out copies of stored payments', async () => {
    const { id } = await provider.createPayment(intent);
    const found = await provider.findPayment(id);
    found.transactions[0].custom = 'changed';

    expect((await provider.findPayment(id)).transactions[0].custom).toBe('alice|Mod');
    expect(provider.getIntent(id)).toBe(intent);
  });
});
