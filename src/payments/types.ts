/**
 * Payment Types
 *
 * Request and resource shapes follow the PayPal REST payments API (v1).
 */

export interface PaymentLineItem {
  name: string;
  sku: string;
  /** Fixed-point decimal string, e.g. "3.00" */
  price: string;
  currency: string;
  quantity: number;
  description: string;
}

export interface PaymentAmount {
  total: string;
  currency: string;
}

export interface PaymentIntent {
  intent: 'sale';
  payer: { payment_method: 'paypal' };
  redirect_urls: {
    return_url: string;
    cancel_url: string;
  };
  transactions: Array<{
    item_list: { items: PaymentLineItem[] };
    amount: PaymentAmount;
    description: string;
    /** Encoded purchase metadata; see custom-metadata.ts */
    custom: string;
  }>;
}

export interface PaymentLink {
  href: string;
  rel: string;
  method?: string;
}

export interface PaymentRecordTransaction {
  amount: PaymentAmount;
  custom?: string;
  description?: string;
}

/** Payment resource as read back from the provider */
export interface PaymentRecord {
  id: string;
  state: string;
  transactions: PaymentRecordTransaction[];
  links: PaymentLink[];
}

export interface PaymentProvider {
  readonly name: string;
  createPayment(intent: PaymentIntent): Promise<PaymentRecord>;
  findPayment(paymentId: string): Promise<PaymentRecord>;
  executePayment(paymentId: string, payerId: string): Promise<PaymentRecord>;
}

export interface PurchaseMetadata {
  username: string;
  productName: string;
}

export interface CreatedPayment {
  paymentId: string;
  approvalUrl: string;
}

export type NotificationOutcome = 'sent' | 'not_configured' | 'duplicate' | 'failed';

export interface ExecutedPurchase extends PurchaseMetadata {
  paymentId: string;
  amount: number;
  currency: string;
  notification: NotificationOutcome;
}
