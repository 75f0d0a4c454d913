/**
 * Environment configuration
 *
 * Every setting comes from the process environment and is validated once at
 * startup. Invalid values fail fast with one aggregated message.
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_SUPPORTED_EXTENSIONS } from '../common/constants';

const positiveInt = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be greater than 0`);

const envSchema = z.object({
  PORT: positiveInt('PORT').max(65535, 'PORT must be a valid port').default(5555),
  HOST: z.string().min(1).default('0.0.0.0'),
  NODE_ENV: z
    .enum(['development', 'production', 'test'], {
      errorMap: () => ({ message: 'NODE_ENV must be development, production or test' }),
    })
    .default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  MAX_WORKERS: positiveInt('MAX_WORKERS').optional(),
  CONVERSION_TIMEOUT_SECONDS: z.coerce
    .number({ invalid_type_error: 'CONVERSION_TIMEOUT_SECONDS must be a number' })
    .positive('CONVERSION_TIMEOUT_SECONDS must be greater than 0')
    // setTimeout holds at most 2^31-1 ms
    .max(2147483, 'CONVERSION_TIMEOUT_SECONDS must be at most 2147483')
    .default(120),
  SUPPORTED_EXTENSIONS: z.string().default(DEFAULT_SUPPORTED_EXTENSIONS.join(',')),
  BASE_DIR: z.string().optional(),
  MARKITDOWN_COMMAND: z.string().min(1, 'MARKITDOWN_COMMAND must not be empty').default('markitdown'),
  RATE_LIMIT_WINDOW_MS: positiveInt('RATE_LIMIT_WINDOW_MS').default(60000),
  RATE_LIMIT_MAX: positiveInt('RATE_LIMIT_MAX').default(100),
  RATE_LIMIT_SUBMIT_MAX: positiveInt('RATE_LIMIT_SUBMIT_MAX').default(10),
  MONITOR_INTERVAL_MS: positiveInt('MONITOR_INTERVAL_MS').default(60000),
  SHUTDOWN_GRACE_MS: positiveInt('SHUTDOWN_GRACE_MS').default(5000),
});

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  maxWorkers: number;
  conversionTimeoutSeconds: number;
  supportedExtensions: readonly string[];
  baseDir: string;
  markitdownCommand: string;
  rateLimit: {
    windowMs: number;
    maxRequests: number;
    maxSubmissions: number;
  };
  monitorIntervalMs: number;
  shutdownGraceMs: number;
}

/**
 * One slot is left free for the HTTP server and the event loop.
 */
export function defaultWorkerCount(): number {
  return Math.max(1, os.availableParallelism() - 1);
}

function parseExtensions(raw: string): string[] {
  const extensions = raw
    .split(',')
    .map(ext => ext.trim().replace(/^\./, '').toLowerCase())
    .filter(Boolean);

  if (extensions.length === 0) {
    throw new Error('SUPPORTED_EXTENSIONS must list at least one extension');
  }
  return [...new Set(extensions)];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new Error(`Invalid environment configuration. Fix the following: ${issues.join('; ')}`);
  }

  const parsed = result.data;

  return Object.freeze({
    port: parsed.PORT,
    host: parsed.HOST,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    maxWorkers: parsed.MAX_WORKERS ?? defaultWorkerCount(),
    conversionTimeoutSeconds: parsed.CONVERSION_TIMEOUT_SECONDS,
    supportedExtensions: Object.freeze(parseExtensions(parsed.SUPPORTED_EXTENSIONS)),
    baseDir: path.resolve(parsed.BASE_DIR ?? process.cwd()),
    markitdownCommand: parsed.MARKITDOWN_COMMAND,
    rateLimit: Object.freeze({
      windowMs: parsed.RATE_LIMIT_WINDOW_MS,
      maxRequests: parsed.RATE_LIMIT_MAX,
      maxSubmissions: parsed.RATE_LIMIT_SUBMIT_MAX,
    }),
    monitorIntervalMs: parsed.MONITOR_INTERVAL_MS,
    shutdownGraceMs: parsed.SHUTDOWN_GRACE_MS,
  });
}

const config = loadConfig();

export default config;
