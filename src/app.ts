import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { AppConfig, DEV_SESSION_SECRET } from './config/env';
import { logger } from './observability/logger';
import { registerErrorHandlers } from './errors/error-handler';
import { Catalog, loadCatalog } from './catalog/catalog';
import { Notifier } from './notifier/types';
import { DiscordNotifier } from './notifier/discord-notifier';
import { PaymentProvider } from './payments/types';
import { createPaymentProvider } from './payments/payment-provider';
import { ExecutedPaymentStore, createExecutedPaymentStore } from './payments/executed-payment-store';
import { PaymentBroker } from './payments/payment-broker';
import { PurchaseReporter } from './purchases/purchase-reporter';
import { registerHealthRoutes } from './health/health-routes';
import { registerStorefrontRoutes } from './storefront/storefront-routes';
import { registerPurchaseRoutes } from './purchases/purchase-routes';
import { registerPaymentRoutes } from './payments/payment-routes';

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
}

/** Collaborators that tests (or alternative deployments) supply directly */
export interface AppOverrides {
  catalog?: Catalog;
  notifier?: Notifier;
  paymentProvider?: PaymentProvider;
  executedPayments?: ExecutedPaymentStore;
}

async function connectRedis(url: string): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

function logStartupWarnings(config: AppConfig): void {
  if (!config.discord.webhookUrl) {
    logger.warn('DISCORD_WEBHOOK_URL not set; purchase notifications will not work until it is configured');
  } else {
    logger.info('Discord webhook configured');
  }

  if (config.isProd && config.sessionSecret === DEV_SESSION_SECRET) {
    logger.warn('SESSION_SECRET is the development placeholder; set a real secret in production');
  }
}

export async function buildApp(config: AppConfig, overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 65_536,
  });

  await app.register(cors, {
    origin: config.corsOrigins.length > 0 ? [...config.corsOrigins] : true,
    methods: ['GET', 'POST'],
  });

  registerErrorHandlers(app);
  logStartupWarnings(config);

  const redis = overrides.executedPayments || !config.redis.url ? undefined : await connectRedis(config.redis.url);

  const catalog = overrides.catalog ?? loadCatalog(config.catalogPath);
  const notifier = overrides.notifier ?? new DiscordNotifier(config.discord.webhookUrl, config.discord.timeoutMs);
  const provider = overrides.paymentProvider ?? createPaymentProvider(config);
  const executedPayments = overrides.executedPayments ?? createExecutedPaymentStore(redis, config.redis.keyPrefix);

  const broker = new PaymentBroker({ catalog, provider, notifier, executedPayments });
  const reporter = new PurchaseReporter(notifier);

  registerStorefrontRoutes(app, catalog, config.shopName);
  registerHealthRoutes(app, config.shopName);
  registerPurchaseRoutes(app, reporter);
  registerPaymentRoutes(app, broker, config);

  logger.info({ provider: provider.name, products: catalog.size }, 'Storefront initialized');
  return { app, redis };
}
