/**
 * Catalog API Client
 *
 * Thin axios wrapper over the two read endpoints. Every failure (non-2xx,
 * network error, timeout, unexpected body) surfaces as one
 * CatalogRequestError; the session treats them all the same way.
 *
 * @example
 * ```typescript
 * const api = new CatalogApiClient({ baseUrl: 'http://localhost:3000' });
 * const page = await api.searchEstablishments({ search: 'central', skip: 0, limit: 25 });
 * ```
 */
import axios, { AxiosError, type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import type {
  EstablishmentsRequest,
  EstablishmentsResponse,
  ProvincesResponse,
} from '@shared/contracts';

import type { CatalogGateway } from './types';

export interface CatalogApiClientConfig {
  /** Base URL of the API server, e.g. http://localhost:3000 or http://host/api */
  baseUrl: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Transport override; tests plug an in-process adapter here. */
  adapter?: CreateAxiosDefaults['adapter'];
}

export class CatalogRequestError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number | null = null,
  ) {
    super(message);
    this.name = 'CatalogRequestError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CatalogApiClient implements CatalogGateway {
  private client: AxiosInstance;

  constructor(config: CatalogApiClientConfig) {
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout ?? 10_000,
      headers: { Accept: 'application/json' },
      adapter: config.adapter,
    });
  }

  async searchEstablishments(request: EstablishmentsRequest): Promise<EstablishmentsResponse> {
    const params: Record<string, string | number> = {
      skip: request.skip,
      limit: request.limit,
    };
    if (request.search) params.search = request.search;
    if (request.provincia) params.provincia = request.provincia;

    const data = await this.get<EstablishmentsResponse>('/establecimientos', params);
    if (!Array.isArray(data?.establecimientos) || typeof data.pagination !== 'object') {
      throw new CatalogRequestError('Malformed search response');
    }
    return data;
  }

  async listProvinces(): Promise<string[]> {
    const data = await this.get<ProvincesResponse>('/provincias');
    if (!Array.isArray(data?.provincias)) {
      throw new CatalogRequestError('Malformed provinces response');
    }
    return data.provincias;
  }

  private async get<T>(url: string, params?: Record<string, string | number>): Promise<T> {
    try {
      const response = await this.client.get<T>(url, { params });
      return response.data;
    } catch (err) {
      throw toRequestError(err);
    }
  }
}

function toRequestError(err: unknown): CatalogRequestError {
  if (err instanceof AxiosError) {
    const status = err.response?.status ?? null;
    const message = status != null ? `HTTP error! status: ${status}` : err.message;
    return new CatalogRequestError(message, status);
  }
  return new CatalogRequestError(err instanceof Error ? err.message : String(err));
}
