/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),
  APP_BASE_URL: Type.String({ minLength: 1, default: 'http://localhost:3000' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),
  LOG_SERVICE_NAME: Type.String({ minLength: 1, pattern: '^[a-z0-9-]+$', default: 'newsletter' }),

  // Database
  DATABASE_URL: Type.String({ minLength: 1 }),
  DATABASE_POOL_SIZE: Type.Integer({ minimum: 1, default: 10 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),

  // Email (Resend)
  RESEND_API_KEY: Type.Optional(Type.String({ minLength: 1 })),
  EMAIL_FROM_ADDRESS: Type.Optional(Type.String({ minLength: 3 })),

  // Auth (JWT)
  AUTH_JWT_PUBLIC_KEY: Type.Optional(Type.String({ minLength: 1 })),
  AUTH_JWT_ISSUER: Type.Optional(Type.String()),
  AUTH_JWT_AUDIENCE: Type.Optional(Type.String()),

  // Issue delivery
  DELIVERY_MAX_RETRIES: Type.Integer({ minimum: 0, maximum: 255, default: 3 }),
  DELIVERY_RETRY_DELAY_MS: Type.Integer({ minimum: 0, default: 60_000 }),

  // Idempotency
  IDEMPOTENCY_KEY_LIFETIME_MINUTES: Type.Integer({ minimum: 1, default: 1440 }),
  IDEMPOTENCY_CLEANUP_INTERVAL_MS: Type.Integer({ minimum: 1000, default: 600_000 }),
});

export type Env = Static<typeof EnvSchema>;

const parseIntOr = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseIntOr(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    APP_BASE_URL: env['APP_BASE_URL'] ?? 'http://localhost:3000',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    LOG_SERVICE_NAME: env['LOG_SERVICE_NAME'] ?? 'newsletter',
    DATABASE_URL: env['DATABASE_URL'],
    DATABASE_POOL_SIZE: parseIntOr(env['DATABASE_POOL_SIZE'], 10),
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    RESEND_API_KEY: env['RESEND_API_KEY'],
    EMAIL_FROM_ADDRESS: env['EMAIL_FROM_ADDRESS'],
    AUTH_JWT_PUBLIC_KEY: env['AUTH_JWT_PUBLIC_KEY'],
    AUTH_JWT_ISSUER: env['AUTH_JWT_ISSUER'],
    AUTH_JWT_AUDIENCE: env['AUTH_JWT_AUDIENCE'],
    DELIVERY_MAX_RETRIES: parseIntOr(env['DELIVERY_MAX_RETRIES'], 3),
    DELIVERY_RETRY_DELAY_MS: parseIntOr(env['DELIVERY_RETRY_DELAY_MS'], 60_000),
    IDEMPOTENCY_KEY_LIFETIME_MINUTES: parseIntOr(env['IDEMPOTENCY_KEY_LIFETIME_MINUTES'], 1440),
    IDEMPOTENCY_CLEANUP_INTERVAL_MS: parseIntOr(env['IDEMPOTENCY_CLEANUP_INTERVAL_MS'], 600_000),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    baseUrl: env.APP_BASE_URL.replace(/\/$/, ''),
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    serviceName: env.LOG_SERVICE_NAME,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
    poolSize: env.DATABASE_POOL_SIZE,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS?.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
  },
  email: {
    apiKey: env.RESEND_API_KEY,
    fromAddress: env.EMAIL_FROM_ADDRESS,
  },
  auth: {
    /** PEM-encoded SPKI public key used to verify bearer tokens */
    jwtPublicKey: env.AUTH_JWT_PUBLIC_KEY,
    jwtIssuer: env.AUTH_JWT_ISSUER,
    jwtAudience: env.AUTH_JWT_AUDIENCE,
    /** Publishing endpoints reject every request when no key is configured */
    enabled: env.AUTH_JWT_PUBLIC_KEY !== undefined,
  },
  delivery: {
    maxRetries: env.DELIVERY_MAX_RETRIES,
    retryDelayMs: env.DELIVERY_RETRY_DELAY_MS,
  },
  idempotency: {
    keyLifetimeMinutes: env.IDEMPOTENCY_KEY_LIFETIME_MINUTES,
    cleanupIntervalMs: env.IDEMPOTENCY_CLEANUP_INTERVAL_MS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
