/**
 * Process-wide pino logger
 *
 * Pretty output while developing, JSON lines in production. Fastify is handed
 * the same instance so request logs and job logs share one stream.
 */

import pino, { Logger } from 'pino';

export type { Logger };

interface LoggerOptions {
  level: string;
  nodeEnv: string;
}

export function createLogger({ level, nodeEnv }: LoggerOptions): Logger {
  return pino({
    level,
    transport: nodeEnv !== 'production' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    } : undefined,
  });
}
