import { NotConfiguredError, UpstreamRejectedError, UpstreamUnavailableError } from '../errors/app-error';

export class WebhookNotConfiguredError extends NotConfiguredError {
  constructor() {
    super('Discord webhook URL not configured', {
      publicError: 'Discord webhook not configured',
      publicMessage: 'Please set DISCORD_WEBHOOK_URL environment variable',
    });
  }
}

export class NotifierTimeoutError extends UpstreamUnavailableError {
  constructor(timeoutMs: number, cause?: unknown) {
    super(`Discord webhook request timed out after ${timeoutMs}ms`, {
      publicError: 'Discord notification timeout',
      publicMessage: 'The Discord webhook request timed out',
      details: { timeoutMs },
      cause,
    });
  }
}

export class NotifierTransportError extends UpstreamUnavailableError {
  constructor(cause: unknown) {
    super('Discord webhook request failed', {
      publicError: 'Failed to send Discord notification',
      publicMessage: 'Could not connect to Discord webhook',
      cause,
    });
  }
}

export class NotifierUnexpectedStatusError extends UpstreamRejectedError {
  constructor(readonly status: number, readonly body: string) {
    super(`Discord webhook failed with status ${status}`, {
      publicError: 'Failed to send Discord notification',
      publicMessage: `Discord API returned status ${status}`,
      details: { status, body },
    });
  }
}
