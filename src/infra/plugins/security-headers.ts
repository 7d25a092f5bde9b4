/**
 * Security Headers Plugin
 *
 * @fastify/helmet with a same-origin CSP for a JSON API. HSTS is only sent
 * in production.
 */

import helmet from '@fastify/helmet';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

const HSTS_CONFIG = {
  maxAge: 31536000, // 1 year
  includeSubDomains: true,
  preload: false,
};

export async function registerSecurityHeaders(
  fastify: FastifyInstance,
  config: AppConfig
): Promise<void> {
  if (config.server.isTest) {
    fastify.log.debug('Security headers disabled in test environment');
    return;
  }

  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        objectSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    frameguard: { action: 'deny' },
    hsts: config.server.isProduction ? HSTS_CONFIG : false,
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    // Modern browsers rely on CSP
    xssFilter: false,
    crossOriginEmbedderPolicy: false,
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  fastify.log.info('Security headers plugin registered');
}
