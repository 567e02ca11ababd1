/**
 * Migration 001 — Create the `establecimientos` Table
 * Layer: Infrastructure (Database)
 *
 * One row per establishment. `id` is the serial primary key the API orders
 * by; only `nombre` is required. The b-tree index on `provincia` serves
 * both the exact-match filter and the DISTINCT behind GET /provincias.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('establecimientos', (table) => {
    table.increments('id').primary();
    table.string('nombre', 255).notNullable();
    table.string('direccion', 500);
    table.string('localidad', 255);
    table.string('provincia', 255);

    table.index('provincia', 'idx_establecimientos_provincia');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('establecimientos');
}
