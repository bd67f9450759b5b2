/**
 * Server Entry Point — Clustering & Graceful Shutdown
 * Layer: Entry Point
 *
 * The primary process forks WEB_CONCURRENCY workers (one per CPU when 0)
 * and replaces any that die. Each worker runs its own Express app; the OS
 * spreads connections across them. Requests spend most of their time
 * waiting on the registry and the completion provider, so a single worker
 * already handles many at once; more workers only add CPU headroom.
 *
 * On SIGTERM/SIGINT a worker stops accepting connections, lets in-flight
 * analyses finish (bounded by the provider timeouts), then exits.
 */
import cluster from 'node:cluster';
import os from 'node:os';

import { config } from '@core/config';
import { logger } from '@core/logger';
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

  if (!config.registry.token || !config.completion.apiKey) {
    logger.warn(
      {
        registryConfigured: config.registry.token != null,
        completionConfigured: config.completion.apiKey != null,
      },
      'Provider credentials missing; /analyze will answer 500 until they are set',
    );
  }

  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Worker listening on :${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close(() => {
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
