/**
 * Unit Tests — Catalog Query Builder
 *
 * Compiles the Knex builders against the pg dialect without a connection
 * (toSQL only) to pin the SQL shape: the ILIKE pair grouped with OR, the
 * province equality ANDed on, LIKE metacharacters escaped in the bindings.
 */
import { buildCatalogQuery, escapeLike } from '@infrastructure/database/catalogQuery';
import { toRow } from '@infrastructure/repositories/PostgresEstablishmentRepository';
import knex from 'knex';

import { sampleEstablishment } from '../helpers/fixtures';

const db = knex({ client: 'pg' });

afterAll(async () => {
  await db.destroy();
});

describe('buildCatalogQuery()', () => {
  it('should select the whole table when no filter is set', () => {
    const { sql, bindings } = buildCatalogQuery(db, { searchText: null, province: null })
      .select('id')
      .toSQL();

    expect(sql).toBe('select "id" from "establecimientos"');
    expect(bindings).toEqual([]);
  });

  it('should match name OR address inside one group', () => {
    const { sql, bindings } = buildCatalogQuery(db, { searchText: 'central', province: null })
      .select('id')
      .toSQL();

    expect(sql).toContain(
      `where ("nombre" ILIKE ? ESCAPE E'\\\\' or "direccion" ILIKE ? ESCAPE E'\\\\')`,
    );
    expect(bindings).toEqual(['%central%', '%central%']);
  });

  it('should AND the province equality after the text group', () => {
    const { sql, bindings } = buildCatalogQuery(db, { searchText: 'central', province: 'Madrid' })
      .select('id')
      .toSQL();

    expect(sql).toContain(`) and "provincia" = ?`);
    expect(bindings).toEqual(['%central%', '%central%', 'Madrid']);
  });

  it('should filter on province alone', () => {
    const { sql, bindings } = buildCatalogQuery(db, { searchText: null, province: 'Sevilla' })
      .select('id')
      .toSQL();

    expect(sql).toBe('select "id" from "establecimientos" where "provincia" = ?');
    expect(bindings).toEqual(['Sevilla']);
  });

  it('should let the count query reuse the same filters', () => {
    const base = buildCatalogQuery(db, { searchText: null, province: 'Sevilla' });

    const { sql, bindings } = base.clone().count('* as total').toSQL();

    expect(sql).toBe('select count(*) as "total" from "establecimientos" where "provincia" = ?');
    expect(bindings).toEqual(['Sevilla']);
  });

  it('should escape LIKE metacharacters in the pattern', () => {
    const { bindings } = buildCatalogQuery(db, { searchText: '100%_x', province: null })
      .select('id')
      .toSQL();

    expect(bindings).toEqual(['%100\\%\\_x%', '%100\\%\\_x%']);
  });
});

describe('escapeLike()', () => {
  it('should leave plain text unchanged', () => {
    expect(escapeLike('farmacia')).toBe('farmacia');
  });

  it('should escape percent, underscore and backslash', () => {
    expect(escapeLike('a%b_c\\d')).toBe('a\\%b\\_c\\\\d');
  });
});

describe('toRow()', () => {
  it('should map an entity to the Spanish column names', () => {
    const { name, address, locality, province } = sampleEstablishment;

    expect(toRow({ name, address, locality, province })).toEqual({
      nombre: 'Farmacia Central',
      direccion: 'Calle Mayor 1',
      localidad: 'Madrid',
      provincia: 'Madrid',
    });
  });
});
