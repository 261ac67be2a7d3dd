import { createLogger } from '@socialdraft/shared';
import { loadConfig } from '../config';
import { initDatabase } from '../db';
import { KeyEncryption } from '../services/keys/encryption';
import { createCredentialResolver } from '../services/publishing/credentials';
import { createDefaultPublisherRegistry } from '../services/publishing/registry';
import { PostScheduler } from '../services/publishing/scheduler';

const logger = createLogger('scheduler-tick');

// One pass over the due posts, without starting the interval timer.
async function main(): Promise<void> {
  const config = loadConfig();
  const db = await initDatabase(config.databaseUrl);
  try {
    const encryption = new KeyEncryption(config.encryptionKey, config.secretKey);
    const scheduler = new PostScheduler(
      {
        db,
        publishers: createDefaultPublisherRegistry(),
        resolveCredentials: createCredentialResolver(db, encryption),
      },
      config.scheduler,
    );

    const summary = await scheduler.checkPendingPosts();
    logger.info(
      `processed ${summary.processed} (posted ${summary.posted}, retried ${summary.retried}, failed ${summary.failed}, skipped ${summary.skipped})`,
    );
  } finally {
    await db.close();
  }
}

void main().catch((error: unknown) => {
  logger.error(`failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
