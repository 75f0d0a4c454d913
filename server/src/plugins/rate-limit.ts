/**
 * Rate limiting plugin - fixed window per client IP
 *
 * Submissions get their own, smaller budget since each one can enqueue many
 * conversions. Health endpoints are never limited.
 */

import { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  maxSubmissions: number;
  now?: () => number;
}

const EXEMPT_URLS = new Set(['/health', '/ready', '/metrics']);

async function rateLimit(fastify: FastifyInstance, options: RateLimitOptions) {
  const now = options.now ?? Date.now;
  const store = new Map<string, RateLimitEntry>();

  const sweep = setInterval(() => {
    const current = now();
    for (const [key, entry] of store.entries()) {
      if (current > entry.resetTime) {
        store.delete(key);
      }
    }
  }, options.windowMs);
  sweep.unref();

  fastify.addHook('onClose', async () => {
    clearInterval(sweep);
    store.clear();
  });

  fastify.addHook('onRequest', async (request, reply) => {
    const url = request.url.split('?')[0];
    if (EXEMPT_URLS.has(url)) {
      return;
    }

    const isSubmission = url === '/convert' && request.method === 'POST';
    const limit = isSubmission ? options.maxSubmissions : options.maxRequests;
    const key = `${request.ip || 'unknown'}:${isSubmission ? 'submit' : 'general'}`;

    const current = now();
    let entry = store.get(key);

    if (!entry || current > entry.resetTime) {
      entry = { count: 0, resetTime: current + options.windowMs };
      store.set(key, entry);
    }

    entry.count++;

    reply.header('X-RateLimit-Limit', limit);
    reply.header('X-RateLimit-Remaining', Math.max(0, limit - entry.count));
    reply.header('X-RateLimit-Reset', Math.ceil(entry.resetTime / 1000));

    if (entry.count > limit) {
      const retryAfter = Math.ceil((entry.resetTime - current) / 1000);
      reply.header('Retry-After', retryAfter);

      return reply.status(429).send({
        success: false,
        error: true,
        code: 'RATE_LIMIT_EXCEEDED',
        message: `Too many requests. Try again in ${retryAfter} seconds.`,
        retryAfter,
      });
    }
  });
}

export const rateLimitPlugin = fp(rateLimit, {
  name: 'rate-limit-plugin',
});
