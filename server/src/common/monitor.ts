/**
 * Memory and queue monitoring
 */

import os from 'os';
import type { Logger } from './logger';

export interface MemoryStats {
  heapUsedMB: number;
  heapTotalMB: number;
  rssMB: number;
  externalMB: number;
  freeMemoryMB: number;
  totalMemoryMB: number;
  percentUsed: number;
}

const toMB = (bytes: number) => Math.round(bytes / 1024 / 1024);

export function getMemoryStats(): MemoryStats {
  const mem = process.memoryUsage();
  const freeMemory = os.freemem();
  const totalMemory = os.totalmem();

  return {
    heapUsedMB: toMB(mem.heapUsed),
    heapTotalMB: toMB(mem.heapTotal),
    rssMB: toMB(mem.rss),
    externalMB: toMB(mem.external),
    freeMemoryMB: toMB(freeMemory),
    totalMemoryMB: toMB(totalMemory),
    percentUsed: Math.round((1 - freeMemory / totalMemory) * 100),
  };
}

/**
 * System memory above 90%
 */
export function isMemoryCritical(stats: MemoryStats = getMemoryStats()): boolean {
  return stats.percentUsed > 90;
}

export function isMemoryWarning(stats: MemoryStats = getMemoryStats()): boolean {
  return stats.percentUsed > 80;
}

export interface MonitorOptions {
  intervalMs: number;
  logger: Logger;
  /** Extra fields logged with every sample, e.g. queue depth */
  sample?: () => Record<string, unknown>;
}

/**
 * Log memory (and whatever `sample` returns) every interval.
 * Returns a function that stops the monitor.
 */
export function startMonitor({ intervalMs, logger, sample }: MonitorOptions): () => void {
  const log = logger.child({ module: 'monitor' });
  log.info({ intervalMs }, 'Starting monitor');

  const timer = setInterval(() => {
    const memory = getMemoryStats();
    const fields = { memory, ...sample?.() };

    if (isMemoryCritical(memory)) {
      log.error(fields, 'Memory critical');
    } else if (isMemoryWarning(memory)) {
      log.warn(fields, 'Memory warning');
    } else {
      log.info(fields, 'Monitor sample');
    }
  }, intervalMs);
  timer.unref();

  return () => {
    clearInterval(timer);
    log.info('Monitor stopped');
  };
}
