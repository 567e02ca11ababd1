/**
 * SearchSession — Client-Side Search State Machine
 * Layer: Client
 *
 * States: idle → loading(append) → idle | error. One session per page.
 *
 *   inputSearch   debounced; on settle resets pagination and replaces results
 *   submitSearch  Enter key; same as a settled input, without the wait
 *   changeProvince  immediate reset + replacing query
 *   loadMore      only from idle/error with hasMoreResults; appends
 *
 * Every query takes a fresh generation number. A response whose generation
 * is no longer current (a newer search superseded it) is dropped before it
 * touches the cursor or the view, so a slow stale page can never overwrite
 * newer results or rewind `currentSkip`.
 */
import { DEFAULT_PAGE_SIZE } from '@shared/constants';
import type { EstablishmentsRequest, EstablishmentsResponse } from '@shared/contracts';
import type { Logger } from 'pino';

import { Debouncer } from './Debouncer';
import { buildSummary, emptyMessage, SEARCH_ERROR_MESSAGE } from './displayText';
import { clientLogger } from './logger';
import type { CatalogGateway, ResultsView, SessionSnapshot, SessionStatus } from './types';

export interface SearchSessionOptions {
  pageSize?: number;
  debouncer?: Debouncer;
  logger?: Logger;
}

export class SearchSession {
  private status: SessionStatus = 'idle';
  private loadingAppend = false;
  private currentSearch = '';
  private currentProvince = '';
  private currentSkip = 0;
  private hasMoreResults = false;
  private generation = 0;
  private inFlight: Promise<void> = Promise.resolve();

  private readonly pageSize: number;
  private readonly debouncer: Debouncer;
  private readonly log: Logger;

  constructor(
    private readonly gateway: CatalogGateway,
    private readonly view: ResultsView,
    options: SearchSessionOptions = {},
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.debouncer = options.debouncer ?? new Debouncer();
    this.log = options.logger ?? clientLogger.child({ component: 'SearchSession' });
  }

  get snapshot(): SessionSnapshot {
    return {
      status: this.status,
      loadingAppend: this.loadingAppend,
      currentSearch: this.currentSearch,
      currentProvince: this.currentProvince,
      currentSkip: this.currentSkip,
      hasMoreResults: this.hasMoreResults,
      generation: this.generation,
    };
  }

  /** Resolves when the most recently issued query has been handled. */
  settled(): Promise<void> {
    return this.inFlight;
  }

  async start(): Promise<void> {
    try {
      this.view.setProvinces(await this.gateway.listProvinces());
    } catch (err) {
      // The selector just stays empty; searching still works.
      this.log.warn({ err }, 'Could not load provinces');
    }
    await this.resetAndQuery();
  }

  inputSearch(text: string): void {
    this.debouncer.schedule(() => {
      this.applySearch(text).catch((err: unknown) => {
        this.log.error({ err }, 'Debounced search failed');
      });
    });
  }

  submitSearch(text: string): Promise<void> {
    this.debouncer.cancel();
    return this.applySearch(text);
  }

  changeProvince(value: string): Promise<void> {
    this.currentProvince = value.trim();
    return this.resetAndQuery();
  }

  loadMore(): Promise<void> {
    if (!this.hasMoreResults || this.status === 'loading') {
      return Promise.resolve();
    }
    return this.issue(true);
  }

  /** Drop a pending debounced search, e.g. when the page goes away. */
  dispose(): void {
    this.debouncer.cancel();
  }

  private applySearch(text: string): Promise<void> {
    this.currentSearch = text.trim();
    return this.resetAndQuery();
  }

  private resetAndQuery(): Promise<void> {
    this.currentSkip = 0;
    this.hasMoreResults = false;
    this.view.setLoadMoreVisible(false);
    return this.issue(false);
  }

  private issue(append: boolean): Promise<void> {
    this.inFlight = this.runQuery(append);
    return this.inFlight;
  }

  private async runQuery(append: boolean): Promise<void> {
    const generation = ++this.generation;
    this.status = 'loading';
    this.loadingAppend = append;
    this.view.setLoading(true, append);

    const request: EstablishmentsRequest = {
      skip: append ? this.currentSkip : 0,
      limit: this.pageSize,
    };
    if (this.currentSearch) request.search = this.currentSearch;
    if (this.currentProvince) request.provincia = this.currentProvince;

    let response: EstablishmentsResponse;
    try {
      response = await this.gateway.searchEstablishments(request);
    } catch (err) {
      if (generation !== this.generation) return;
      this.log.warn({ err, request }, 'Catalog search failed');
      this.status = 'error';
      this.loadingAppend = false;
      this.view.setLoading(false, append);
      this.view.render({ type: 'show-error', message: SEARCH_ERROR_MESSAGE });
      this.view.setLoadMoreVisible(this.hasMoreResults);
      return;
    }

    if (generation !== this.generation) {
      this.log.debug({ generation, current: this.generation }, 'Discarding stale response');
      return;
    }

    this.applyPage(response, append);
  }

  private applyPage(response: EstablishmentsResponse, append: boolean): void {
    const { pagination, establecimientos } = response;
    this.currentSkip = pagination.next_skip;
    this.hasMoreResults = pagination.has_more;
    this.status = 'idle';
    this.loadingAppend = false;
    this.view.setLoading(false, append);

    if (!append && establecimientos.length === 0) {
      const filtered = this.currentSearch !== '' || this.currentProvince !== '';
      this.view.render({ type: 'show-empty', filtered, message: emptyMessage(filtered) });
    } else {
      this.view.render({
        type: append ? 'append' : 'replace',
        establishments: establecimientos,
        summary: buildSummary(this.currentSearch, this.currentProvince, pagination),
      });
    }

    this.view.setLoadMoreVisible(this.hasMoreResults);
  }
}
