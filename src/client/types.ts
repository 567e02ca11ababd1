/**
 * Search Client Types
 *
 * The session talks to the outside world through two seams:
 *   - CatalogGateway: the HTTP API (CatalogApiClient in production, a fake
 *     in tests).
 *   - ResultsView: whatever renders results (DOM, terminal, test recorder).
 *     The session only ever emits DisplayCommands; it never renders.
 */
import type {
  EstablishmentDto,
  EstablishmentsRequest,
  EstablishmentsResponse,
} from '@shared/contracts';

export interface CatalogGateway {
  searchEstablishments(request: EstablishmentsRequest): Promise<EstablishmentsResponse>;
  listProvinces(): Promise<string[]>;
}

export interface ResultsSummary {
  title: string;
  /** Rows consumed so far (skip + returned of the latest page). */
  shown: number;
  total: number;
  /** "Mostrando N de T" */
  countLabel: string;
}

export type DisplayCommand =
  | { type: 'replace'; establishments: EstablishmentDto[]; summary: ResultsSummary }
  | { type: 'append'; establishments: EstablishmentDto[]; summary: ResultsSummary }
  | { type: 'show-empty'; filtered: boolean; message: string }
  | { type: 'show-error'; message: string };

export interface ResultsView {
  render(command: DisplayCommand): void;
  /** Loading indicator; `append` distinguishes "load more" from a fresh search. */
  setLoading(loading: boolean, append: boolean): void;
  /** Options for the province selector. */
  setProvinces(provinces: string[]): void;
  /** Whether the "load more" affordance should be offered. */
  setLoadMoreVisible(visible: boolean): void;
}

export type SessionStatus = 'idle' | 'loading' | 'error';

export interface SessionSnapshot {
  status: SessionStatus;
  /** Only meaningful while loading. */
  loadingAppend: boolean;
  currentSearch: string;
  currentProvince: string;
  currentSkip: number;
  hasMoreResults: boolean;
  generation: number;
}
