import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
export const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

export type PayPalMode = 'sandbox' | 'live';

export interface AppConfig {
  readonly nodeEnv: string;
  readonly port: number;
  readonly shopName: string;
  /** Overrides the request-derived base for provider redirect URLs */
  readonly publicBaseUrl?: string;
  readonly sessionSecret: string;
  readonly catalogPath: string;
  readonly corsOrigins: readonly string[];

  readonly discord: {
    readonly webhookUrl?: string;
    readonly timeoutMs: number;
  };

  readonly paypal: {
    readonly mode: PayPalMode;
    readonly clientId: string;
    readonly clientSecret: string;
    readonly timeoutMs: number;
  };

  readonly redis: {
    readonly url?: string;
    readonly keyPrefix: string;
  };

  readonly isProd: boolean;
}

export const DEV_SESSION_SECRET = 'dev-secret-key-change-in-production';

type EnvSource = Record<string, string | undefined>;

export function loadConfig(source: EnvSource = process.env): AppConfig {
  function optional(key: string, fallback: string): string {
    return source[key] || fallback;
  }

  function optionalUnset(key: string): string | undefined {
    const val = source[key]?.trim();
    return val ? val : undefined;
  }

  function optionalInt(key: string, fallback: number): number {
    const val = source[key];
    if (!val) return fallback;
    const parsed = parseInt(val, 10);
    if (Number.isNaN(parsed)) throw new Error(`Env var ${key} must be an integer, got "${val}"`);
    return parsed;
  }

  const nodeEnv = optional('NODE_ENV', 'development');
  const mode = optional('PAYPAL_MODE', 'sandbox');
  if (mode !== 'sandbox' && mode !== 'live') {
    throw new Error(`Env var PAYPAL_MODE must be "sandbox" or "live", got "${mode}"`);
  }

  const config: AppConfig = {
    nodeEnv,
    port: optionalInt('PORT', 5000),
    shopName: optional('SHOP_NAME', 'The Scrap Shop'),
    publicBaseUrl: optionalUnset('PUBLIC_BASE_URL')?.replace(/\/+$/, ''),
    sessionSecret: optional('SESSION_SECRET', DEV_SESSION_SECRET),
    catalogPath: path.resolve(PROJECT_ROOT, optional('CATALOG_PATH', path.join('config', 'catalog.yaml'))),
    corsOrigins: (optionalUnset('CORS_ORIGINS') ?? '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),

    discord: {
      webhookUrl: optionalUnset('DISCORD_WEBHOOK_URL'),
      timeoutMs: optionalInt('DISCORD_TIMEOUT_MS', 10_000),
    },

    paypal: {
      mode,
      clientId: optional('PAYPAL_CLIENT_ID', ''),
      clientSecret: optional('PAYPAL_CLIENT_SECRET', ''),
      timeoutMs: optionalInt('PAYPAL_TIMEOUT_MS', 30_000),
    },

    redis: {
      url: optionalUnset('REDIS_URL'),
      keyPrefix: optional('REDIS_KEY_PREFIX', 'scrapshop:'),
    },

    isProd: nodeEnv === 'production',
  };

  return Object.freeze(config);
}

/** Load `.env` from the project root into process.env (existing vars win) */
export function loadDotenv(): void {
  dotenv.config({ path: path.join(PROJECT_ROOT, '.env') });
}
