/**
 * Payment Broker
 *
 * create: catalog product → provider payment → approval URL for the payer.
 * execute: provider redirect (paymentId + PayerID) → executed payment →
 * decoded purchase metadata → at most one success notification.
 *
 * Order context lives only in the provider's `custom` field; nothing is
 * persisted here beyond the executed-payment claims.
 */

import pino from 'pino';
import { Catalog } from '../catalog/catalog';
import { Notifier } from '../notifier/types';
import { formatPaymentSuccessMessage } from '../notifier/messages';
import { AppError, MalformedPurchaseMetadataError, UpstreamRejectedError, ValidationError, isAppError } from '../errors/app-error';
import { logger } from '../observability/logger';
import { decodeCustomMetadata, encodeCustomMetadata, MAX_CUSTOM_LENGTH } from './custom-metadata';
import { buildPaymentIntent, findApprovalUrl, redirectUrlsFor } from './payment-intent';
import { ExecutedPaymentStore } from './executed-payment-store';
import {
  InvalidProductError,
  MissingPaymentInfoError,
  PaymentCreationFailedError,
  PaymentExecutionFailedError,
  ProviderUnavailableError,
} from './errors';
import { CreatedPayment, ExecutedPurchase, NotificationOutcome, PaymentProvider, PaymentRecord } from './types';

export const DEFAULT_USERNAME = 'Anonymous';

export interface CreatePaymentInput {
  productName: unknown;
  username?: unknown;
  /** Where the provider sends the payer back, e.g. https://shop.example.com */
  baseUrl: string;
}

export interface PaymentBrokerDeps {
  catalog: Catalog;
  provider: PaymentProvider;
  notifier: Notifier;
  executedPayments: ExecutedPaymentStore;
}

export class PaymentBroker {
  private readonly log = logger.child({ component: 'payment-broker' });

  constructor(private readonly deps: PaymentBrokerDeps) {}

  async createPayment(input: CreatePaymentInput, log: pino.Logger = this.log): Promise<CreatedPayment> {
    const { productName } = input;
    if (typeof productName !== 'string' || productName.length === 0) {
      throw new InvalidProductError(productName);
    }
    const product = this.deps.catalog.get(productName);
    if (!product) {
      throw new InvalidProductError(productName);
    }

    const username = normalizeUsername(input.username);
    const custom = encodeCustomMetadata({ username, productName: product.name });
    if (custom.length > MAX_CUSTOM_LENGTH) {
      throw new ValidationError('Username is too long', { details: { length: custom.length } });
    }

    const intent = buildPaymentIntent(product, username, custom, redirectUrlsFor(input.baseUrl));

    let payment: PaymentRecord;
    try {
      payment = await this.deps.provider.createPayment(intent);
    } catch (err) {
      throw toCreationError(err);
    }

    const approvalUrl = findApprovalUrl(payment.links);
    if (!approvalUrl) {
      throw new PaymentCreationFailedError('no approval link in provider response', {
        details: { paymentId: payment.id, rels: payment.links.map((link) => link.rel) },
      });
    }

    log.info({ paymentId: payment.id, product: product.name, username }, 'Payment created');
    return { paymentId: payment.id, approvalUrl };
  }

  async executePayment(paymentId: unknown, payerId: unknown, log: pino.Logger = this.log): Promise<ExecutedPurchase> {
    const missing = [
      ...(typeof paymentId === 'string' && paymentId ? [] : ['paymentId']),
      ...(typeof payerId === 'string' && payerId ? [] : ['PayerID']),
    ];
    if (typeof paymentId !== 'string' || typeof payerId !== 'string' || missing.length > 0) {
      throw new MissingPaymentInfoError(missing);
    }

    let executed: PaymentRecord;
    try {
      const payment = await this.deps.provider.findPayment(paymentId);
      executed = await this.deps.provider.executePayment(payment.id, payerId);
    } catch (err) {
      throw new PaymentExecutionFailedError(paymentId, describe(err), {
        cause: err,
        details: isAppError(err) ? err.details : {},
      });
    }

    const transaction = executed.transactions[0];
    if (!transaction) {
      throw new MalformedPurchaseMetadataError('Executed payment has no transactions', { details: { paymentId } });
    }

    const { username, productName } = decodeCustomMetadata(transaction.custom);
    const amount = Number(transaction.amount.total);
    if (transaction.amount.total.trim() === '' || !Number.isFinite(amount)) {
      throw new MalformedPurchaseMetadataError('Executed payment total is not a number', {
        details: { paymentId, total: transaction.amount.total },
      });
    }

    const notification = await this.notifySuccess(
      { username, productName, amount, transactionId: executed.id },
      log,
    );

    log.info({ paymentId: executed.id, username, product: productName, amount, notification }, 'Payment executed');
    return {
      paymentId: executed.id,
      username,
      productName,
      amount,
      currency: transaction.amount.currency,
      notification,
    };
  }

  /** Never throws: a failed notification must not fail an executed payment */
  private async notifySuccess(
    payment: { username: string; productName: string; amount: number; transactionId: string },
    log: pino.Logger,
  ): Promise<NotificationOutcome> {
    if (!this.deps.notifier.configured) {
      log.debug({ paymentId: payment.transactionId }, 'Notifier not configured; skipping payment notification');
      return 'not_configured';
    }

    if (!(await this.deps.executedPayments.claim(payment.transactionId))) {
      log.warn({ paymentId: payment.transactionId }, 'Payment already notified; skipping duplicate notification');
      return 'duplicate';
    }

    try {
      await this.deps.notifier.notify(formatPaymentSuccessMessage(payment));
      return 'sent';
    } catch (err) {
      log.warn(
        { err, paymentId: payment.transactionId, details: isAppError(err) ? err.details : undefined },
        'Payment notification failed; continuing',
      );
      return 'failed';
    }
  }
}

export function normalizeUsername(raw: unknown): string {
  if (typeof raw !== 'string') return DEFAULT_USERNAME;
  const trimmed = raw.trim();
  return trimmed || DEFAULT_USERNAME;
}

function toCreationError(err: unknown): AppError {
  if (err instanceof ProviderUnavailableError) return err;
  if (err instanceof UpstreamRejectedError) {
    return new PaymentCreationFailedError(err.message, { cause: err, details: err.details });
  }
  return new PaymentCreationFailedError(describe(err), { cause: err });
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
