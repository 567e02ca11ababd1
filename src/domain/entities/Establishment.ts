/**
 * Establishment Entity — The Catalog Record
 * Layer: Domain
 *
 * Two shapes for the same concept:
 *
 *   Establishment     — camelCase English names, used by application code.
 *   EstablishmentRow  — the exact column names of the `establecimientos`
 *                       table (Spanish, as loaded by the import step).
 *
 * The row → entity mapping happens in exactly one place, the repository's
 * `toDomain()`. The wire format (also Spanish) is produced by the HTTP
 * presenter, so neither naming leaks into the other layers.
 *
 * Only `name` is required; address, locality and province are free-form
 * text that may be missing. The catalog is flat and read-only at serve time.
 */
export interface Establishment {
  id: number;
  name: string;
  address: string | null;
  locality: string | null;
  province: string | null;
}

export interface EstablishmentRow {
  id: number;
  nombre: string;
  direccion: string | null;
  localidad: string | null;
  provincia: string | null;
}

/** Insert shape used by the import step; `id` is assigned by the store. */
export type NewEstablishment = Omit<Establishment, 'id'>;
