import { loadDotenv, loadConfig } from './config/env';

// Before anything reads process.env (the logger does on import)
loadDotenv();

import { buildApp } from './app';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  const config = loadConfig();
  const { app, redis } = await buildApp(config);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    await app.close();
    if (redis) {
      redis.disconnect();
    }
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // Start server
  try {
    await app.listen({ port: config.port, host: '0.0.0.0' });
    logger.info({ port: config.port, env: config.nodeEnv, shop: config.shopName }, 'Storefront started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to initialize storefront');
  process.exit(1);
});
