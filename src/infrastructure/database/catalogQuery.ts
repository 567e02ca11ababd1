/**
 * Catalog Query Builder
 * Layer: Infrastructure
 *
 * Builds the WHERE clause shared by the page query and the count query so
 * the two can never disagree on what "matching" means:
 *
 *   (nombre ILIKE %term% OR direccion ILIKE %term%) AND provincia = ?
 *
 * Either half is omitted when its filter is absent. The trigram GIN
 * indexes from migration 002 serve the ILIKE branches; the b-tree index on
 * provincia serves the equality.
 */
import { CATALOG_TABLE } from '@shared/constants';
import type { SearchCriteria } from '@shared/types';
import type { Knex } from 'knex';

type Filters = Pick<SearchCriteria, 'searchText' | 'province'>;

export function buildCatalogQuery(db: Knex, filters: Filters): Knex.QueryBuilder {
  const qb = db(CATALOG_TABLE);

  if (filters.searchText) {
    const pattern = `%${escapeLike(filters.searchText)}%`;
    qb.where((inner) => {
      inner
        .whereRaw(`"nombre" ILIKE ? ESCAPE E'\\\\'`, [pattern])
        .orWhereRaw(`"direccion" ILIKE ? ESCAPE E'\\\\'`, [pattern]);
    });
  }

  if (filters.province) {
    qb.where('provincia', filters.province);
  }

  return qb;
}

/** Escape %, _ and \ so they match literally inside ILIKE (backslash as escape). */
export function escapeLike(term: string): string {
  return term.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}
