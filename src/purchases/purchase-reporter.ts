import pino from 'pino';
import { Notifier } from '../notifier/types';
import { formatPurchaseMessage, PurchaseReport } from '../notifier/messages';
import { ValidationError } from '../errors/app-error';
import { logger } from '../observability/logger';
import { parsePurchaseReport } from './purchase-validator';

/**
 * Manual purchase reports: validate, then announce through the notifier.
 * Unlike payment execution, a missing webhook is fatal here.
 */
export class PurchaseReporter {
  private readonly log = logger.child({ component: 'purchase-reporter' });

  constructor(private readonly notifier: Notifier) {}

  async record(body: unknown, log: pino.Logger = this.log): Promise<PurchaseReport> {
    const result = parsePurchaseReport(body);
    if (!result.ok) {
      throw new ValidationError(result.reason, {
        extras: result.requiredFields ? { required_fields: result.requiredFields } : undefined,
      });
    }

    const { purchase } = result;
    await this.notifier.notify(formatPurchaseMessage(purchase));

    log.info(
      { username: purchase.username, item: purchase.item, price: purchase.price.toFixed(2) },
      'Purchase notification sent',
    );
    return purchase;
  }
}
