/**
 * Health check routes with memory and queue monitoring
 */

import { FastifyInstance } from 'fastify';
import { getMemoryStats, isMemoryCritical } from '../../common/monitor';
import type { BatchManager } from '../batch';

export interface HealthRoutesOptions {
  manager: BatchManager;
  /** Resolves true when the conversion tool can be started */
  checkConverter: () => Promise<boolean>;
}

export async function healthRoutes(fastify: FastifyInstance, { manager, checkConverter }: HealthRoutesOptions) {
  /**
   * GET /health - Basic health check (always returns ok if server is running)
   */
  fastify.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  });

  /**
   * GET /ready - Readiness check with converter availability and queue state
   */
  fastify.get('/ready', async () => {
    const converter = await checkConverter();
    const memory = getMemoryStats();
    const memoryOk = !isMemoryCritical(memory);

    return {
      status: converter && memoryOk ? 'ready' : 'degraded',
      checks: {
        converter: converter ? 'ok' : 'unavailable',
        memory: memoryOk ? 'ok' : 'critical',
      },
      pool: manager.pool.stats(),
      memory: {
        heapUsedMB: memory.heapUsedMB,
        rssMB: memory.rssMB,
        systemPercent: memory.percentUsed,
      },
      timestamp: new Date().toISOString(),
    };
  });

  /**
   * GET /metrics - Process, pool and job metrics (for monitoring systems)
   */
  fastify.get('/metrics', async () => {
    return {
      uptime: Math.round(process.uptime()),
      memory: getMemoryStats(),
      pool: manager.pool.stats(),
      jobs: manager.poller.summary(),
      process: {
        pid: process.pid,
        nodeVersion: process.version,
        platform: process.platform,
        arch: process.arch,
      },
      timestamp: new Date().toISOString(),
    };
  });
}
