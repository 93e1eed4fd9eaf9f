/**
 * PayPal Client
 *
 * REST payments API (v1): create, look up and execute `sale` payments.
 * Authenticates with OAuth 2.0 client credentials; the token is cached
 * until shortly before it expires.
 */

import Ajv from 'ajv';
import { PaymentIntent, PaymentProvider, PaymentRecord } from './types';
import { ProviderRejectedError, ProviderUnavailableError } from './errors';
import { PayPalMode } from '../config/env';
import { isTimeoutError } from '../utils/format';
import { isRecord } from '../utils/guards';
import { logger } from '../observability/logger';

export const PAYPAL_BASE_URLS: Record<PayPalMode, string> = {
  sandbox: 'https://api-m.sandbox.paypal.com',
  live: 'https://api-m.paypal.com',
};

/** Refresh this long before the provider-reported expiry */
const TOKEN_EXPIRY_BUFFER_MS = 5 * 60 * 1000;

export interface PayPalClientConfig {
  mode: PayPalMode;
  clientId: string;
  clientSecret: string;
  timeoutMs: number;
  /** Overrides the mode's base URL */
  baseUrl?: string;
}

interface AccessToken {
  value: string;
  expiresAt: number;
}

const ajv = new Ajv({ allErrors: true });

const validatePaymentRecord = ajv.compile<PaymentRecord>({
  type: 'object',
  required: ['id', 'state', 'transactions', 'links'],
  properties: {
    id: { type: 'string', minLength: 1 },
    state: { type: 'string' },
    transactions: {
      type: 'array',
      items: {
        type: 'object',
        required: ['amount'],
        properties: {
          amount: {
            type: 'object',
            required: ['total', 'currency'],
            properties: {
              total: { type: 'string' },
              currency: { type: 'string' },
            },
          },
          custom: { type: 'string' },
          description: { type: 'string' },
        },
      },
    },
    links: {
      type: 'array',
      items: {
        type: 'object',
        required: ['href', 'rel'],
        properties: {
          href: { type: 'string' },
          rel: { type: 'string' },
          method: { type: 'string' },
        },
      },
    },
  },
});

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

export class PayPalClient implements PaymentProvider {
  readonly name = 'paypal';
  private readonly log = logger.child({ component: 'paypal' });
  private readonly baseUrl: string;
  private token: AccessToken | null = null;

  constructor(private readonly config: PayPalClientConfig) {
    this.baseUrl = (config.baseUrl ?? PAYPAL_BASE_URLS[config.mode]).replace(/\/+$/, '');
  }

  async createPayment(intent: PaymentIntent): Promise<PaymentRecord> {
    this.log.info({ total: intent.transactions[0]?.amount.total }, 'Creating PayPal payment');
    const payment = await this.apiCall('POST', '/v1/payments/payment', intent);
    this.log.info({ paymentId: payment.id, state: payment.state }, 'PayPal payment created');
    return payment;
  }

  async findPayment(paymentId: string): Promise<PaymentRecord> {
    return this.apiCall('GET', `/v1/payments/payment/${encodeURIComponent(paymentId)}`);
  }

  async executePayment(paymentId: string, payerId: string): Promise<PaymentRecord> {
    this.log.info({ paymentId }, 'Executing PayPal payment');
    const payment = await this.apiCall(
      'POST',
      `/v1/payments/payment/${encodeURIComponent(paymentId)}/execute`,
      { payer_id: payerId },
    );
    this.log.info({ paymentId, state: payment.state }, 'PayPal payment executed');
    return payment;
  }

  // ───── OAuth 2.0 Token Management ─────────────────────

  private async getAccessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now() + TOKEN_EXPIRY_BUFFER_MS) {
      return this.token.value;
    }

    this.log.debug('Requesting PayPal access token');
    const credentials = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString('base64');
    const response = await this.send(`${this.baseUrl}/v1/oauth2/token`, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${credentials}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
    });

    const data = await this.readJson(response);
    if (!response.ok) {
      throw this.rejection('PayPal authentication failed', response.status, data);
    }

    const accessToken = isRecord(data) ? readString(data, 'access_token') : undefined;
    if (!accessToken) {
      throw new ProviderRejectedError('PayPal token response carried no access_token', response.status);
    }

    const expiresIn = isRecord(data) && typeof data.expires_in === 'number' ? data.expires_in : 3600;
    this.token = { value: accessToken, expiresAt: Date.now() + expiresIn * 1000 };
    return accessToken;
  }

  // ───── Transport ──────────────────────────────────────

  private async apiCall(method: 'GET' | 'POST', path: string, body?: object): Promise<PaymentRecord> {
    const accessToken = await this.getAccessToken();

    const response = await this.send(`${this.baseUrl}${path}`, {
      method,
      headers: {
        Authorization: `Bearer ${accessToken}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
    });

    const data = await this.readJson(response);
    if (!response.ok) {
      if (response.status === 401) {
        this.token = null;
      }
      throw this.rejection(`PayPal API ${method} ${path} failed`, response.status, data);
    }

    if (!validatePaymentRecord(data)) {
      throw new ProviderRejectedError(`PayPal API ${method} ${path} returned an unexpected payment resource`, response.status, undefined, undefined, {
        details: { problems: ajv.errorsText(validatePaymentRecord.errors) },
      });
    }
    return data;
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(url, { ...init, signal: AbortSignal.timeout(this.config.timeoutMs) });
    } catch (err) {
      throw this.unavailable(err);
    }
  }

  /** The body streams under the same timeout signal as the request */
  private async readJson(response: Response): Promise<unknown> {
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw this.unavailable(err);
    }
    if (!text) return undefined;
    try {
      return JSON.parse(text);
    } catch (err) {
      this.log.warn({ status: response.status, err }, 'PayPal returned a non-JSON body');
      return text;
    }
  }

  private unavailable(err: unknown): ProviderUnavailableError {
    const reason = isTimeoutError(err) ? `timed out after ${this.config.timeoutMs}ms` : 'request failed';
    return new ProviderUnavailableError(`PayPal ${reason}`, err);
  }

  private rejection(message: string, status: number, body: unknown): ProviderRejectedError {
    const errorBody = isRecord(body) ? body : {};
    return new ProviderRejectedError(
      message,
      status,
      readString(errorBody, 'name') ?? readString(errorBody, 'error'),
      readString(errorBody, 'debug_id'),
      {
        details: {
          providerMessage: readString(errorBody, 'message') ?? readString(errorBody, 'error_description'),
          providerDetails: errorBody.details,
        },
      },
    );
  }
}
