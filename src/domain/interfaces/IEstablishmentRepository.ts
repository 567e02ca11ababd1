/**
 * Establishment Repository Interface — The Data Access Contract
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * The domain says WHAT reads it needs; the infrastructure layer
 * (PostgresEstablishmentRepository) decides HOW, with ILIKE over trigram
 * indexes. Tests swap in a mock or an in-memory fake behind the same
 * contract.
 *
 * `insertMany` and `truncate` exist only for the offline import step; the
 * HTTP surface never writes.
 */
import type { NewEstablishment } from '@domain/entities/Establishment';
import type { CatalogSlice, SearchCriteria } from '@shared/types';

export interface IEstablishmentRepository {
  /** Page of rows matching the criteria, ordered by id, plus the full match count. */
  search(criteria: SearchCriteria): Promise<CatalogSlice>;

  /** Distinct non-empty province values, alphabetical. */
  listProvinces(): Promise<string[]>;

  /** Round-trip to the store; resolves with the latency in ms or rejects if unreachable. */
  ping(): Promise<number>;

  /** Bulk insert for the import step. Returns the number of rows written. */
  insertMany(rows: NewEstablishment[]): Promise<number>;

  /** Remove every row (import with --truncate). */
  truncate(): Promise<void>;
}
