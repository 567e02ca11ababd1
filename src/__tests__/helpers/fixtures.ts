/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Shared catalog rows so tests don't repeat the same objects. Names and
 * addresses are made up. Ids are deliberately not contiguous with insertion
 * order in `sampleCatalog` to prove ordering comes from the id.
 */
import type { Establishment } from '@domain/entities/Establishment';
import type { EstablishmentDto, EstablishmentsResponse } from '@shared/contracts';
import type { RawEstablishmentRecord } from '@workers/import/JsonDataSourceAdapter';

/** A complete establishment with every optional field present. */
export const sampleEstablishment: Establishment = {
  id: 1,
  name: 'Farmacia Central',
  address: 'Calle Mayor 1',
  locality: 'Madrid',
  province: 'Madrid',
};

/** An establishment with only the required name. */
export const sampleBareEstablishment: Establishment = {
  id: 7,
  name: 'Kiosko Sin Datos',
  address: null,
  locality: null,
  province: null,
};

/** A small catalog covering the match-rule edge cases. */
export const sampleCatalog: Establishment[] = [
  { id: 6, name: 'Café Madrid', address: 'Gran Vía 3', locality: 'Barcelona', province: 'Barcelona' },
  sampleEstablishment,
  { id: 2, name: 'Bar El_Puerto', address: 'Paseo Marítimo 10', locality: 'Cádiz', province: 'Cádiz' },
  { id: 3, name: 'Panadería Sol', address: 'Avenida Central 5', locality: 'Sevilla', province: 'Sevilla' },
  { id: 4, name: 'Librería 100% Libros', address: 'Calle Sierpes 20', locality: 'Sevilla', province: 'Sevilla' },
  { id: 5, name: 'Taller Norte', address: null, locality: 'Bilbao', province: 'Vizcaya' },
  sampleBareEstablishment,
];

/** `count` generated rows with ids 1..count, alternating between two provinces. */
export function generateCatalog(count: number): Establishment[] {
  return Array.from({ length: count }, (_, index) => {
    const id = index + 1;
    return {
      id,
      name: `Tienda ${id}`,
      address: `Calle ${id}`,
      locality: 'Pueblo',
      province: id % 2 === 0 ? 'Toledo' : 'Cuenca',
    };
  });
}

/** A raw import record as it appears in the JSON file. */
export const sampleRawRecord: RawEstablishmentRecord = {
  nombre: '  Farmacia Central ',
  direccion: 'Calle Mayor 1',
  localidad: 'Madrid',
  provincia: 'Madrid',
};

export const sampleDto: EstablishmentDto = {
  id: 1,
  nombre: 'Farmacia Central',
  direccion: 'Calle Mayor 1',
  localidad: 'Madrid',
  provincia: 'Madrid',
};

/** Build a wire page for client tests. */
export function buildResponse(
  establecimientos: EstablishmentDto[],
  pagination: { total: number; skip: number; limit?: number },
): EstablishmentsResponse {
  const limit = pagination.limit ?? 25;
  const returned = establecimientos.length;
  const nextSkip = pagination.skip + returned;
  return {
    status: 'success',
    establecimientos,
    pagination: {
      total: pagination.total,
      skip: pagination.skip,
      limit,
      returned,
      has_more: nextSkip < pagination.total,
      next_skip: nextSkip,
    },
    filters: { search: null, provincia: null },
  };
}

/** `count` DTOs with ids starting at `firstId`. */
export function buildDtos(count: number, firstId = 1): EstablishmentDto[] {
  return Array.from({ length: count }, (_, index) => ({
    ...sampleDto,
    id: firstId + index,
    nombre: `Establecimiento ${firstId + index}`,
  }));
}
