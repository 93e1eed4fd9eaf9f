import { PaymentIntent, PaymentProvider, PaymentRecord } from './types';
import { ProviderRejectedError } from './errors';
import { logger } from '../observability/logger';

export const MOCK_PAYER_ID = 'MOCKPAYER';

/**
 * In-memory payment provider for local development and testing.
 * The approval link skips the provider's checkout and points straight back
 * at the return URL, as if the payer had approved.
 */
export class MockPaymentProvider implements PaymentProvider {
  readonly name = 'mock';
  private payments: Map<string, PaymentRecord> = new Map();
  private intents: Map<string, PaymentIntent> = new Map();
  private idCounter = 1;

  async createPayment(intent: PaymentIntent): Promise<PaymentRecord> {
    const id = `PAY-MOCK-${this.idCounter++}`;
    const approvalUrl = new URL(intent.redirect_urls.return_url);
    approvalUrl.searchParams.set('paymentId', id);
    approvalUrl.searchParams.set('token', `EC-MOCK-${id}`);
    approvalUrl.searchParams.set('PayerID', MOCK_PAYER_ID);

    const payment: PaymentRecord = {
      id,
      state: 'created',
      transactions: intent.transactions.map((tx) => ({
        amount: { ...tx.amount },
        custom: tx.custom,
        description: tx.description,
      })),
      links: [
        { href: `https://mock.payments.local/v1/payments/payment/${id}`, rel: 'self', method: 'GET' },
        { href: approvalUrl.toString(), rel: 'approval_url', method: 'REDIRECT' },
        { href: `https://mock.payments.local/v1/payments/payment/${id}/execute`, rel: 'execute', method: 'POST' },
      ],
    };

    this.payments.set(id, payment);
    this.intents.set(id, intent);
    logger.info({ paymentId: id, total: intent.transactions[0]?.amount.total }, '[MOCK] Payment created');
    return clone(payment);
  }

  async findPayment(paymentId: string): Promise<PaymentRecord> {
    return clone(this.require(paymentId));
  }

  async executePayment(paymentId: string, payerId: string): Promise<PaymentRecord> {
    const payment = this.require(paymentId);
    if (payment.state !== 'created') {
      throw new ProviderRejectedError(`Payment ${paymentId} already executed`, 400, 'PAYMENT_ALREADY_DONE');
    }

    payment.state = 'approved';
    logger.info({ paymentId, payerId }, '[MOCK] Payment executed');
    return clone(payment);
  }

  /** Test helper: the intent a payment was created from */
  getIntent(paymentId: string): PaymentIntent | undefined {
    return this.intents.get(paymentId);
  }

  /** Test helper: overwrite a stored payment, e.g. to tamper with its metadata */
  setPayment(payment: PaymentRecord): void {
    this.payments.set(payment.id, clone(payment));
  }

  /** Test helper: reset state */
  reset(): void {
    this.payments.clear();
    this.intents.clear();
    this.idCounter = 1;
  }

  private require(paymentId: string): PaymentRecord {
    const payment = this.payments.get(paymentId);
    if (!payment) {
      throw new ProviderRejectedError(`Payment ${paymentId} not found`, 404, 'INVALID_RESOURCE_ID');
    }
    return payment;
  }
}

function clone(payment: PaymentRecord): PaymentRecord {
  return {
    ...payment,
    transactions: payment.transactions.map((tx) => ({ ...tx, amount: { ...tx.amount } })),
    links: payment.links.map((link) => ({ ...link })),
  };
}
