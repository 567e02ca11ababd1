/**
 * Migration 002 — Trigram Indexes for Substring Search
 * Layer: Infrastructure (Database)
 *
 * Search is `ILIKE '%term%'` on nombre OR direccion. A plain b-tree cannot
 * serve a leading wildcard, so without help every query is a sequential
 * scan. pg_trgm splits each value into 3-character chunks and a GIN index
 * maps chunk → rows; PostgreSQL then answers ILIKE '%term%' (term of three
 * or more characters) from the index and rechecks the candidates.
 *
 * The two ILIKE branches are OR-ed, so the planner combines both indexes
 * with a BitmapOr.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.raw('CREATE EXTENSION IF NOT EXISTS pg_trgm');

  await knex.raw(`
    CREATE INDEX IF NOT EXISTS idx_establecimientos_nombre_trgm
    ON establecimientos USING GIN (nombre gin_trgm_ops)
  `);

  await knex.raw(`
    CREATE INDEX IF NOT EXISTS idx_establecimientos_direccion_trgm
    ON establecimientos USING GIN (direccion gin_trgm_ops)
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.raw('DROP INDEX IF EXISTS idx_establecimientos_direccion_trgm');
  await knex.raw('DROP INDEX IF EXISTS idx_establecimientos_nombre_trgm');
}
