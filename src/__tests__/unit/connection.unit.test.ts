/**
 * Unit Tests — Database Connection Pool
 *
 * Builds the Knex singleton without touching PostgreSQL (the pool connects
 * lazily on first query) and checks its pool settings come straight from
 * config.
 */
import { config } from '@core/config';
import { destroyDbConnection, getDbConnection } from '@infrastructure/database/connection';

afterEach(async () => {
  await destroyDbConnection();
});

describe('getDbConnection()', () => {
  it('should return the same instance until destroyed', async () => {
    const first = getDbConnection();

    expect(getDbConnection()).toBe(first);

    await destroyDbConnection();
    expect(getDbConnection()).not.toBe(first);
  });

  it('should configure only the pool bounds from config', () => {
    const db = getDbConnection();

    expect(db.client.config.pool).toEqual({
      min: config.database.pool.min,
      max: config.database.pool.max,
    });
  });
});
