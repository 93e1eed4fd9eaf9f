/**
 * Discord webhook notifier.
 *
 * One POST per message, bounded by a timeout, no retry.
 */

import { Notifier } from './types';
import {
  NotifierTimeoutError,
  NotifierTransportError,
  NotifierUnexpectedStatusError,
  WebhookNotConfiguredError,
} from './errors';
import { isTimeoutError } from '../utils/format';
import { logger } from '../observability/logger';

const SUCCESS_STATUSES = new Set([200, 204]);

export class DiscordNotifier implements Notifier {
  private readonly log = logger.child({ component: 'discord-notifier' });

  constructor(
    private readonly webhookUrl: string | undefined,
    private readonly timeoutMs: number = 10_000,
  ) {}

  get configured(): boolean {
    return Boolean(this.webhookUrl);
  }

  async notify(message: string): Promise<void> {
    if (!this.webhookUrl) {
      throw new WebhookNotConfiguredError();
    }

    let response: Response;
    try {
      response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ content: message }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (isTimeoutError(err)) {
        throw new NotifierTimeoutError(this.timeoutMs, err);
      }
      throw new NotifierTransportError(err);
    }

    if (!SUCCESS_STATUSES.has(response.status)) {
      const body = await response.text().catch((err: unknown) => {
        this.log.debug({ err }, 'Could not read Discord error body');
        return '';
      });
      throw new NotifierUnexpectedStatusError(response.status, body);
    }

    this.log.debug({ status: response.status }, 'Discord notification delivered');
  }
}
