import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';
import { createLogger, setLogLevel, toError } from './logger';

const logger = createLogger('main');

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);
  logger.info(`Data directory: ${config.dataDir}`);
  logger.info(
    `Cache: ${String(config.maxCacheSizeMb)}MB max, thread TTL ${String(config.cacheTtlMinutes)} min`,
  );

  const app = await createApp(config);
  await app.start();

  const onSignal = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    app
      .shutdown()
      .then(() => {
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error('Shutdown failed', toError(err));
        process.exit(1);
      });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

main().catch((err: unknown) => {
  logger.error('Startup failed', toError(err));
  process.exit(1);
});
