import { createApp } from './api/app';
import { CONFIG } from './config/constants';
import { initDatabase } from './db/schema';
import { createSnapshotService } from './services/factory';
import { RunHistory } from './services/run-history';
import { createSnapshotJob } from './services/snapshot-job';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  const db = await initDatabase();
  const history = new RunHistory(db);
  const job = createSnapshotJob(createSnapshotService(), history);
  const app = createApp({ history, job });

  const server = app.listen(CONFIG.SERVER.PORT, () => {
    logger.info(`Server running on port ${CONFIG.SERVER.PORT}`);
  });

  // Graceful shutdown
  const shutdown = () => {
    server.close(() => {
      db.close()
        .then(() => process.exit(0))
        .catch((e: unknown) => {
          logger.error('Failed to close run history database:', e);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((e: unknown) => {
  logger.error('Server failed to start:', e);
  process.exit(1);
});
