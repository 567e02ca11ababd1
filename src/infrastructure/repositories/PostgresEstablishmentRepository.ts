/**
 * PostgreSQL Establishment Repository — Data Access Implementation
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IEstablishmentRepository)
 *
 * I implement the domain's IEstablishmentRepository with Knex over the
 * `establecimientos` table. Search runs the page query and an uncapped
 * COUNT(*) in parallel from the same base builder (catalogQuery.ts), both
 * ordered by the primary key so successive skips never repeat or miss a row.
 * @injectable so tsyringe injects Knex and Logger.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { Establishment, EstablishmentRow, NewEstablishment } from '@domain/entities/Establishment';
import type { IEstablishmentRepository } from '@domain/interfaces/IEstablishmentRepository';
import { buildCatalogQuery } from '@infrastructure/database/catalogQuery';
import { CATALOG_TABLE } from '@shared/constants';
import type { CatalogSlice, SearchCriteria } from '@shared/types';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

/** PostgreSQL bind-parameter ceiling divided by the 4 inserted columns, rounded down to a friendly chunk. */
const MAX_ROWS_PER_INSERT = 1000;

@injectable()
export class PostgresEstablishmentRepository implements IEstablishmentRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async search(criteria: SearchCriteria): Promise<CatalogSlice> {
    const startMs = Date.now();
    const base = buildCatalogQuery(this.db, criteria);

    const countQuery = base.clone().count<{ total: string | number }[]>('* as total');
    const dataQuery = base
      .clone()
      .select<EstablishmentRow[]>('id', 'nombre', 'direccion', 'localidad', 'provincia')
      .orderBy('id', 'asc')
      .limit(criteria.limit)
      .offset(criteria.skip);

    const [countRows, rows] = await Promise.all([countQuery, dataQuery]);
    const total = Number(countRows[0]?.total ?? 0);
    const queryTimeMs = Math.round(Date.now() - startMs);

    this.log.debug(
      { criteria, total, returned: rows.length, queryTimeMs },
      'Catalog search executed',
    );

    return { rows: rows.map((row) => this.toDomain(row)), total, queryTimeMs };
  }

  async listProvinces(): Promise<string[]> {
    const rows = await this.db(CATALOG_TABLE)
      .distinct<{ provincia: string }[]>('provincia')
      .whereNotNull('provincia')
      .andWhere('provincia', '<>', '')
      .orderBy('provincia', 'asc');

    return rows.map((row) => row.provincia);
  }

  async ping(): Promise<number> {
    const startMs = Date.now();
    await this.db.raw('SELECT 1');
    return Math.round(Date.now() - startMs);
  }

  async insertMany(rows: NewEstablishment[]): Promise<number> {
    if (rows.length === 0) return 0;

    const records = rows.map(toRow);
    await this.db.transaction(async (trx) => {
      for (let i = 0; i < records.length; i += MAX_ROWS_PER_INSERT) {
        await trx(CATALOG_TABLE).insert(records.slice(i, i + MAX_ROWS_PER_INSERT));
      }
    });

    this.log.debug({ count: records.length }, 'insertMany complete');
    return records.length;
  }

  async truncate(): Promise<void> {
    await this.db(CATALOG_TABLE).truncate();
    this.log.info('Catalog table truncated');
  }

  /** Map a table row to the camelCase Establishment (single place for this conversion). */
  private toDomain(row: EstablishmentRow): Establishment {
    return {
      id: Number(row.id),
      name: row.nombre,
      address: row.direccion ?? null,
      locality: row.localidad ?? null,
      province: row.provincia ?? null,
    };
  }
}

export function toRow(entity: NewEstablishment): Omit<EstablishmentRow, 'id'> {
  return {
    nombre: entity.name,
    direccion: entity.address,
    localidad: entity.locality,
    provincia: entity.province,
  };
}
