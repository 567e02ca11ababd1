import type { NewEstablishment } from '@domain/entities/Establishment';

/**
 * Data Source Adapter Interface
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * Converts one raw record from an import file into an establishment ready to
 * insert, or `null` when the record is unusable (no name). The import
 * pipeline never looks at the raw shape itself, so a CSV or API source only
 * needs a new adapter.
 */
export interface IDataSourceAdapter<TRaw = unknown> {
  normalize(raw: TRaw): NewEstablishment | null;
}
