/**
 * CORS plugin for Fastify
 *
 * Browsers may call the API only from ALLOWED_ORIGINS; in development any
 * localhost origin is accepted too.
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

export function isOriginAllowed(origin: string | undefined, config: AppConfig): boolean {
  // Server-to-server and same-origin requests carry no Origin header
  if (origin === undefined || origin === '') {
    return true;
  }
  if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
    return true;
  }
  return (config.cors.allowedOrigins ?? []).includes(origin);
}

export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  await fastify.register(cors, {
    origin: (origin, cb) => {
      if (isOriginAllowed(origin, config)) {
        cb(null, true);
        return;
      }
      cb(new Error('CORS origin not allowed'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'authorization', 'accept'],
    credentials: true,
  });
}
