/**
 * Server Entry Point — Clustering & Graceful Shutdown
 * Layer: Entry Point
 *
 * The primary process brings the schema up to date once, then forks one
 * worker per CPU (or WEB_CONCURRENCY) and replaces any worker that dies. Each
 * worker runs its own Express app with its own connection pool; the OS spreads
 * incoming connections across them.
 *
 * On SIGTERM/SIGINT a worker stops accepting connections, lets in-flight
 * requests finish, destroys its pool and exits.
 */
import cluster from 'node:cluster';
import os from 'node:os';

import { config } from '@core/config';
import { logger } from '@core/logger';
import { destroyDbConnection, getDbConnection } from '@infrastructure/database/connection';
import { runMigrations } from '@infrastructure/database/migrations';
import { createApp } from '@interfaces/http/app';

const numWorkers = config.cluster.workers || os.cpus().length;

async function startPrimary(): Promise<void> {
  const applied = await runMigrations(getDbConnection());
  logger.info({ applied }, 'Database schema is up to date');
  await destroyDbConnection();

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
}

function startWorker(): void {
  const app = createApp();

  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Worker listening on :${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close(() => {
      destroyDbConnection().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Failed to close the database pool');
          process.exit(1);
        },
      );
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (cluster.isPrimary) {
  startPrimary().catch((err: unknown) => {
    logger.fatal({ err }, 'Startup failed');
    process.exit(1);
  });
} else {
  startWorker();
}
