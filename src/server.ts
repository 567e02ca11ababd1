/**
 * Server Entry Point — Clustering & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * The PRIMARY process serves nothing itself: it forks WEB_CONCURRENCY
 * workers (or one per CPU core when unset) and replaces any worker that
 * dies. Each WORKER runs its own Express app with its own Knex pool, and
 * the OS spreads incoming connections across them on the shared port.
 *
 * The service is stateless and read-only, so workers need no coordination.
 *
 * Graceful shutdown (SIGTERM/SIGINT), per worker:
 *   1. Stop accepting new connections (server.close()).
 *   2. Let in-flight requests finish.
 *   3. Destroy the DB pool.
 *   4. Exit 0.
 */
import cluster from 'node:cluster';
import os from 'node:os';

import { config } from '@core/config';
import { logger } from '@core/logger';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { createApp } from '@interfaces/http/app';

const numWorkers = config.cluster.workers || os.cpus().length;

if (cluster.isPrimary) {
  logger.info(
    { pid: process.pid, workers: numWorkers },
    `Primary process starting >> forking ${numWorkers} workers`,
  );

  for (let i = 0; i < numWorkers; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    logger.warn({ pid: worker.process.pid, code, signal }, 'Worker died — restarting');
    cluster.fork();
  });
} else {
  const app = createApp();

  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Worker listening on :${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close(() => {
      destroyDbConnection()
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
