import 'dotenv/config';
import { loadConfig } from '../../config.js';
import { createPool } from '../db/pool.js';
import { PgUserRepo } from '../db/userRepo.js';
import { createApp } from './app.js';
import { logger } from '../../lib/logger.js';

function start(): void {
  const config = loadConfig();
  const pool = createPool(config.databaseUrl);

  const app = createApp({
    config,
    userRepo: new PgUserRepo(pool),
    probeDatabase: async () => {
      await pool.query('SELECT 1');
    },
  });

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, env: config.env }, `Server running on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      pool
        .end()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to close database pool');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  start();
} catch (error) {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
}
