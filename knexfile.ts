/**
 * Knex Configuration (knexfile.ts)
 *
 * Tells the Knex CLI how to reach PostgreSQL and where the migrations live.
 * Connection settings come from the same source of truth as the app
 * (src/core/config.ts), keyed by NODE_ENV.
 *
 * Migrations are TypeScript under src/infrastructure/database/migrations/;
 * the CLI runs under tsx so it can load them. This file imports config by
 * relative path because the Knex CLI does not know the @core alias.
 *
 * Consumed by: `npm run migrate`, `npm run migrate:rollback`, and the seed
 * script when `--migrate` is passed.
 */
import type { Knex } from 'knex';
import path from 'node:path';

import { config } from './src/core/config';

function getConnection(): Knex.PgConnectionConfig {
  return {
    connectionString: config.database.url,
    ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
  };
}

const migrationsDirectory = path.join(__dirname, 'src/infrastructure/database/migrations');

const knexConfig: Record<string, Knex.Config> = {
  development: {
    client: 'pg',
    connection: getConnection(),
    pool: {
      min: config.database.pool.min,
      max: config.database.pool.max,
    },
    migrations: {
      directory: migrationsDirectory,
      extension: 'ts',
    },
  },

  production: {
    client: 'pg',
    connection: getConnection(),
    pool: {
      min: config.database.pool.min,
      max: config.database.pool.max,
    },
    migrations: {
      directory: migrationsDirectory,
      extension: 'ts',
    },
  },
};

export default knexConfig;
