/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * CatalogQuery is what the controller hands the service: raw optional
 * inputs, already known to be integers where numeric. SearchCriteria is the
 * normalized form (trimmed text or null, clamped window) the repository
 * receives. CatalogSlice is what the repository returns; ResultPage is the
 * service's answer with pagination metadata derived from it.
 */
import type { Establishment } from '@domain/entities/Establishment';

export interface CatalogQuery {
  searchText?: string;
  province?: string;
  skip?: number;
  limit?: number;
}

export interface SearchCriteria {
  /** Case-insensitive substring matched against name OR address. */
  searchText: string | null;
  /** Exact, case-sensitive province match. */
  province: string | null;
  skip: number;
  limit: number;
}

/** One window of matching rows plus the full match count. */
export interface CatalogSlice {
  rows: Establishment[];
  total: number;
  queryTimeMs: number;
}

export interface PaginationMeta {
  total: number;
  skip: number;
  limit: number;
  returned: number;
  hasMore: boolean;
  nextSkip: number;
}

export interface ResultPage {
  establishments: Establishment[];
  pagination: PaginationMeta;
  filters: {
    searchText: string | null;
    province: string | null;
  };
  meta: {
    queryTimeMs: number;
  };
}

export interface HealthStatus {
  database: 'connected';
  latencyMs: number;
}

export interface ImportResult {
  totalRead: number;
  totalInserted: number;
  totalSkipped: number;
  durationMs: number;
}
