/**
 * Server Entry Point with Graceful Shutdown
 */

import config from './config/env';
import { buildApp } from './app';
import { createLogger } from './common/logger';
import { startMonitor } from './common/monitor';
import { delay } from './common/utils';

let isShuttingDown = false;

async function start() {
  const logger = createLogger({ level: config.logLevel, nodeEnv: config.nodeEnv });

  try {
    const { app, manager } = await buildApp({ config, logger });

    const stopMonitor = config.nodeEnv === 'production'
      ? startMonitor({
          intervalMs: config.monitorIntervalMs,
          logger,
          sample: () => ({ pool: manager.pool.stats(), jobs: manager.poller.summary() }),
        })
      : () => undefined;

    await app.listen({
      port: config.port,
      host: config.host,
    });

    console.log(`
╔══════════════════════════════════════════════════════════════════╗
║                  Markdown Batch Converter                        ║
╠══════════════════════════════════════════════════════════════════╣
║  Status:      RUNNING                                            ║
║  Port:        ${String(config.port).padEnd(51)}║
║  Environment: ${config.nodeEnv.padEnd(51)}║
║  Workers:     ${String(manager.pool.concurrency).padEnd(51)}║
║  Timeout:     ${`${config.conversionTimeoutSeconds} seconds`.padEnd(51)}║
║  Formats:     ${config.supportedExtensions.join(', ').padEnd(51)}║
╠══════════════════════════════════════════════════════════════════╣
║  Endpoints:                                                      ║
║    - GET  /health           Health check                         ║
║    - GET  /ready            Readiness probe                      ║
║    - GET  /metrics          Memory, pool & job metrics           ║
║    - POST /convert          Queue files by path or wildcard      ║
║    - GET  /status           Per-file job status                  ║
║    - GET  /status/summary   Job counts per status                ║
║    - POST /clear            Clear job history                    ║
╚══════════════════════════════════════════════════════════════════╝
`);

    // ═══════════════════════════════════════════════════════════════
    // GRACEFUL SHUTDOWN
    // ═══════════════════════════════════════════════════════════════
    const shutdown = async (signal: string) => {
      if (isShuttingDown) {
        logger.info('Shutdown already in progress...');
        return;
      }
      isShuttingDown = true;

      logger.info({ signal }, 'Starting graceful shutdown');

      // Stop accepting new submissions
      try {
        await app.close();
        logger.info('HTTP server closed');
      } catch (err) {
        logger.error({ err }, 'Error closing HTTP server');
      }

      stopMonitor();

      // Give running conversions a bounded amount of time to finish
      const { active, pending } = manager.pool.stats();
      logger.info({ active, pending, graceMs: config.shutdownGraceMs }, 'Waiting for running jobs');
      const drained = await Promise.race([
        manager.pool.onIdle().then(() => true),
        delay(config.shutdownGraceMs).then(() => false),
      ]);
      if (!drained) {
        logger.warn('Jobs still running after grace period, exiting anyway');
      }

      logger.info('Shutdown complete');
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    process.on('uncaughtException', (err) => {
      logger.fatal({ err }, 'Uncaught exception');
      void shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
      logger.error({ reason }, 'Unhandled rejection');
    });

  } catch (err) {
    logger.fatal({ err }, 'Failed to start');
    process.exit(1);
  }
}

void start();
