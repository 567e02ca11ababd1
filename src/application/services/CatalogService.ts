/**
 * Catalog Service — The Orchestrator
 * Layer: Application
 * Pattern: Facade (simplifies access to the catalog store)
 *
 * Three responsibilities:
 *   1. search(): normalizes the raw query (trimmed filters, clamped
 *      skip/limit), asks the repository for one window plus the full match
 *      count, and derives the pagination metadata.
 *   2. listProvinces(): distinct province values for the client's selector.
 *   3. checkHealth(): a round-trip to the store for the health endpoint.
 *
 * Stateless and side-effect free, so any number of requests can run against
 * the shared pool at once. No retries here; a failed read propagates and the
 * error handler turns it into an opaque 500.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { IEstablishmentRepository } from '@domain/interfaces/IEstablishmentRepository';
import { buildPaginationMeta, normalizeFilterText, normalizeWindow } from '@shared/pagination';
import type { CatalogQuery, HealthStatus, ResultPage, SearchCriteria } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class CatalogService {
  constructor(
    @inject(TOKENS.EstablishmentRepository) private repo: IEstablishmentRepository,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async search(query: CatalogQuery): Promise<ResultPage> {
    const window = normalizeWindow(query.skip, query.limit);
    const criteria: SearchCriteria = {
      searchText: normalizeFilterText(query.searchText),
      province: normalizeFilterText(query.province),
      ...window,
    };

    const { rows, total, queryTimeMs } = await this.repo.search(criteria);

    return {
      establishments: rows,
      pagination: buildPaginationMeta(window, rows.length, total),
      filters: { searchText: criteria.searchText, province: criteria.province },
      meta: { queryTimeMs },
    };
  }

  async listProvinces(): Promise<string[]> {
    return this.repo.listProvinces();
  }

  async checkHealth(): Promise<HealthStatus> {
    const latencyMs = await this.repo.ping();
    this.log.debug({ latencyMs }, 'Database health check passed');
    return { database: 'connected', latencyMs };
  }
}
