import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { NewsletterDatabase } from './types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type NewsletterDbClient = Kysely<NewsletterDatabase>;

/**
 * Create a Kysely instance for a database URL
 */
export const createClient = <T>(connectionString: string, poolSize: number): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: poolSize,
      }),
    }),
  });
};

/**
 * Initialize the newsletter database client
 */
export const initDatabase = (config: AppConfig): NewsletterDbClient => {
  const { database } = config;

  if (database.url === '') {
    throw new Error('Missing configuration for database (DATABASE_URL)');
  }

  return createClient<NewsletterDatabase>(database.url, database.poolSize);
};

export type * from './types.js';
