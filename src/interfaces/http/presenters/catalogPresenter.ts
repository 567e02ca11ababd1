/**
 * Catalog Presenter
 * Layer: Interfaces (HTTP)
 *
 * Domain → wire mapping for the catalog endpoints. The wire keeps the
 * Spanish field names and snake_case pagination keys the client depends on.
 */
import type { Establishment } from '@domain/entities/Establishment';
import type { EstablishmentDto, EstablishmentsResponse, PaginationDto } from '@shared/contracts';
import type { PaginationMeta, ResultPage } from '@shared/types';

export function toEstablishmentDto(entity: Establishment): EstablishmentDto {
  return {
    id: entity.id,
    nombre: entity.name,
    direccion: entity.address,
    localidad: entity.locality,
    provincia: entity.province,
  };
}

export function toPaginationDto(meta: PaginationMeta): PaginationDto {
  return {
    total: meta.total,
    skip: meta.skip,
    limit: meta.limit,
    returned: meta.returned,
    has_more: meta.hasMore,
    next_skip: meta.nextSkip,
  };
}

export function toEstablishmentsResponse(
  page: ResultPage,
  totalTimeMs?: number,
): EstablishmentsResponse {
  return {
    status: 'success',
    establecimientos: page.establishments.map(toEstablishmentDto),
    pagination: toPaginationDto(page.pagination),
    filters: {
      search: page.filters.searchText,
      provincia: page.filters.province,
    },
    meta: {
      queryTimeMs: page.meta.queryTimeMs,
      ...(totalTimeMs != null && { totalTimeMs }),
    },
  };
}
