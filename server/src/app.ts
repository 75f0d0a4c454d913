/**
 * Fastify Application Setup
 */

import Fastify, { FastifyBaseLogger, FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import defaultConfig, { AppConfig } from './config/env';
import { AppError } from './common/errors';
import { createLogger, Logger } from './common/logger';
import { BatchManager, batchRoutes, createBatchManager } from './modules/batch';
import { MarkdownConverter, createMarkitdownExtractor, isMarkitdownAvailable } from './modules/conversion';
import type { Converter } from './modules/conversion';
import { healthRoutes } from './modules/health';
import { rateLimitPlugin } from './plugins';

export interface BuildAppOptions {
  config?: AppConfig;
  logger?: Logger;
  /** Replaces the markitdown-backed converter */
  converter?: Converter;
  /** Reuse an existing manager instead of creating one */
  manager?: BatchManager;
  /** Readiness probe for the conversion tool */
  checkConverter?: () => Promise<boolean>;
}

export interface App {
  app: FastifyInstance;
  manager: BatchManager;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<App> {
  const config = options.config ?? defaultConfig;
  const logger = options.logger ?? createLogger({ level: config.logLevel, nodeEnv: config.nodeEnv });

  const converter = options.converter ?? new MarkdownConverter({
    extract: createMarkitdownExtractor({ command: config.markitdownCommand, logger }),
    logger,
  });

  const manager = options.manager ?? createBatchManager({
    converter,
    logger,
    baseDir: config.baseDir,
    supportedExtensions: config.supportedExtensions,
    concurrency: config.maxWorkers,
    timeoutSeconds: config.conversionTimeoutSeconds,
  });

  // Typed as Fastify's base logger so the instance stays a plain FastifyInstance
  const baseLogger: FastifyBaseLogger = logger;
  const app = Fastify({
    logger: baseLogger,
    bodyLimit: 1024 * 1024,
  });

  await app.register(rateLimitPlugin, config.rateLimit);

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError | AppError, _request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const message = error.message || 'Internal Server Error';

    if (statusCode >= 500) {
      app.log.error({ err: error, statusCode }, message);
    } else {
      app.log.warn({ statusCode, message }, 'Request rejected');
    }

    reply.status(statusCode).send({
      success: false,
      error: true,
      message,
      code: error.code ?? 'INTERNAL_ERROR',
    });
  });

  app.setNotFoundHandler((_request, reply) => {
    reply.status(404).send({
      success: false,
      error: true,
      message: 'Not Found',
      code: 'NOT_FOUND',
    });
  });

  await app.register(healthRoutes, {
    manager,
    checkConverter: options.checkConverter ?? (() => isMarkitdownAvailable(config.markitdownCommand)),
  });
  await app.register(batchRoutes, { manager });

  app.get('/', async (_request, reply) => {
    return reply.redirect('/health');
  });

  return { app, manager };
}
