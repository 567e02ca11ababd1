/**
 * Wire Contracts
 * Layer: Shared
 *
 * The JSON shapes exchanged between the HTTP API and the search client.
 * Field names are part of the public contract (Spanish, snake_case
 * pagination keys) and must not drift; the server presenter builds them and
 * the client consumes them.
 */
export interface EstablishmentDto {
  id: number;
  nombre: string;
  direccion: string | null;
  localidad: string | null;
  provincia: string | null;
}

export interface PaginationDto {
  total: number;
  skip: number;
  limit: number;
  returned: number;
  has_more: boolean;
  next_skip: number;
}

export interface EstablishmentsResponse {
  status: 'success';
  establecimientos: EstablishmentDto[];
  pagination: PaginationDto;
  filters: {
    search: string | null;
    provincia: string | null;
  };
  meta?: {
    queryTimeMs?: number;
    totalTimeMs?: number;
  };
}

export interface ProvincesResponse {
  provincias: string[];
  total: number;
}

export interface ErrorResponse {
  status: 'error';
  message: string;
}

/** Query parameters of GET /establecimientos as the client sends them. */
export interface EstablishmentsRequest {
  search?: string;
  provincia?: string;
  skip: number;
  limit: number;
}
