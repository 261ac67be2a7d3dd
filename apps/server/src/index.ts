import { createLogger } from '@socialdraft/shared';
import { createApp } from './app';
import { loadConfig, validateConfig } from './config';
import { initDatabase } from './db';
import { KeyEncryption } from './services/keys/encryption';
import { createCredentialResolver } from './services/publishing/credentials';
import { createDefaultPublisherRegistry } from './services/publishing/registry';
import { PostScheduler } from './services/publishing/scheduler';

const logger = createLogger('server');

async function startServer(): Promise<void> {
  const config = loadConfig();
  for (const warning of validateConfig(config)) {
    logger.warn(warning);
  }

  const db = await initDatabase(config.databaseUrl);
  const encryption = new KeyEncryption(config.encryptionKey, config.secretKey);
  const scheduler = new PostScheduler(
    {
      db,
      publishers: createDefaultPublisherRegistry(),
      resolveCredentials: createCredentialResolver(db, encryption),
    },
    config.scheduler,
  );

  const app = createApp({ db, scheduler, config });
  const server = app.listen(config.port, config.host, () => {
    logger.info(`listening on http://${config.host}:${config.port}`);
  });
  scheduler.start();

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    scheduler.stop();
    server.close(() => {
      db.close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error(`failed to close database: ${String(error)}`);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM');
  });
}

void startServer().catch((error: unknown) => {
  logger.error(`failed to start: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`);
  process.exit(1);
});
