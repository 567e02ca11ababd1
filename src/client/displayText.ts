/**
 * User-facing text for the results panel. The catalog is Spanish, so is
 * the copy.
 */
import type { PaginationDto } from '@shared/contracts';

import type { ResultsSummary } from './types';

export const SEARCH_ERROR_MESSAGE = 'Error al realizar la búsqueda. Por favor, inténtalo de nuevo.';

export function resultsTitle(search: string, province: string): string {
  if (search && province) return `Resultados para "${search}" en ${province}`;
  if (search) return `Resultados para "${search}"`;
  if (province) return `Establecimientos en ${province}`;
  return 'Establecimientos encontrados';
}

export function emptyMessage(filtered: boolean): string {
  return filtered
    ? 'No se encontraron resultados. Intenta modificar tu búsqueda o cambiar el filtro de provincia.'
    : 'No hay establecimientos disponibles en este momento.';
}

export function buildSummary(
  search: string,
  province: string,
  pagination: PaginationDto,
): ResultsSummary {
  const shown = pagination.skip + pagination.returned;
  return {
    title: resultsTitle(search, province),
    shown,
    total: pagination.total,
    countLabel: `Mostrando ${shown} de ${pagination.total}`,
  };
}
