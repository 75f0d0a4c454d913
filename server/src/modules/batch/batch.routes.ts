/**
 * Batch Conversion Routes - submit patterns, poll status, clear history
 */

import { FastifyError, FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AppError } from '../../common/errors';
import { BatchManager } from './batch.manager';
import { StatusCounts, StatusResponse, SubmitResponse } from './batch.types';

export interface BatchRoutesOptions {
  manager: BatchManager;
}

const submitBodySchema = z.object({
  paths: z.array(z.string({ invalid_type_error: 'paths must contain only strings' }), {
    required_error: 'paths is required',
    invalid_type_error: 'paths must be a list of strings',
  }),
});

function rejected(message: string): SubmitResponse {
  return { success: false, queued: 0, files: [], message };
}

export async function batchRoutes(fastify: FastifyInstance, { manager }: BatchRoutesOptions) {
  const { coordinator, poller } = manager;

  // Rejected submissions (bad JSON, empty lists) keep the submit response shape;
  // everything else goes to the application error handler
  fastify.setErrorHandler((error: FastifyError | AppError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (request.routeOptions.url === '/convert' && statusCode < 500) {
      request.log.warn({ statusCode, message: error.message }, 'Submission rejected');
      return reply.status(statusCode).send(rejected(error.message));
    }
    throw error;
  });

  /**
   * POST /convert - Expand patterns and queue conversions
   */
  fastify.post('/convert', async (request, reply) => {
    const parsed = submitBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      const message = parsed.error.issues.map(issue => issue.message).join('; ');
      return reply.status(400).send(rejected(message));
    }

    const result = await coordinator.submit(parsed.data.paths);
    const response: SubmitResponse = {
      success: true,
      batchId: result.batchId,
      queued: result.queuedCount,
      files: result.queuedFiles,
      unmatched: result.unmatchedPatterns,
    };
    return response;
  });

  /**
   * GET /status - Every job keyed by file path
   */
  fastify.get('/status', async (): Promise<StatusResponse> => poller.poll());

  /**
   * GET /status/summary - Job counts per status
   */
  fastify.get('/status/summary', async (): Promise<StatusCounts> => poller.summary());

  /**
   * POST /clear - Forget every job
   */
  fastify.post('/clear', async () => {
    coordinator.clear();
    return { success: true };
  });
}
