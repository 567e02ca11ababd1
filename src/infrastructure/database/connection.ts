/**
 * Database Connection Pool — Singleton
 * Layer: Infrastructure
 * Pattern: Singleton
 *
 * One Knex pool per process. In the clustered setup (server.ts forks N
 * workers) each worker calls getDbConnection() independently and gets its
 * own pool, since processes cannot share sockets.
 *
 * Pool sizing comes from config (DB_POOL_MIN / DB_POOL_MAX); keep
 * workers × max under PostgreSQL's max_connections.
 *
 * `destroyDbConnection()` runs during graceful shutdown and test cleanup.
 */
import knex, { Knex } from 'knex';
import { config } from '@core/config';
import { logger } from '@core/logger';

let instance: Knex | null = null;

function buildConnectionConfig(): Knex.PgConnectionConfig {
  return {
    connectionString: config.database.url,
    ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
  };
}

export function getDbConnection(): Knex {
  if (!instance) {
    instance = knex({
      client: 'pg',
      connection: buildConnectionConfig(),
      pool: {
        min: config.database.pool.min,
        max: config.database.pool.max,
      },
      acquireConnectionTimeout: 10000,
    });

    logger.info(
      { ssl: config.database.ssl, pool: config.database.pool },
      'Database connection pool initialized',
    );
  }

  return instance;
}

/** Gracefully tears down the pool (used on SIGTERM / test cleanup). */
export async function destroyDbConnection(): Promise<void> {
  if (instance) {
    await instance.destroy();
    instance = null;
    logger.info('Database connection pool destroyed');
  }
}
