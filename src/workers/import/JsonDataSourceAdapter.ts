/**
 * JSON Data Source Adapter — Import Record → NewEstablishment
 * Layer: Workers (Import)
 * Pattern: Adapter Pattern (implements IDataSourceAdapter<RawEstablishmentRecord>)
 *
 * The import file is a JSON document shaped like
 *
 *   { "establecimientos": [{ "nombre": "...", "direccion": "...", ... }] }
 *
 * Source exports are loose: fields may be missing, null, numbers (postal
 * localities) or padded with whitespace. The schema below accepts those and
 * the adapter turns each record into a clean insert shape:
 *   - text is trimmed; blank optional fields become null
 *   - a record with no usable `nombre` is rejected (returns null)
 */
import type { NewEstablishment } from '@domain/entities/Establishment';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import { z } from 'zod/v4';

const looseText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value == null ? null : String(value)));

export const rawEstablishmentSchema = z.object({
  nombre: looseText,
  direccion: looseText,
  localidad: looseText,
  provincia: looseText,
});

export const importFileSchema = z.object({
  establecimientos: z.array(z.unknown()),
});

export type RawEstablishmentRecord = z.input<typeof rawEstablishmentSchema>;

export class JsonDataSourceAdapter implements IDataSourceAdapter<unknown> {
  normalize(raw: unknown): NewEstablishment | null {
    const parsed = rawEstablishmentSchema.safeParse(raw);
    if (!parsed.success) return null;

    const name = clean(parsed.data.nombre);
    if (!name) return null;

    return {
      name,
      address: clean(parsed.data.direccion),
      locality: clean(parsed.data.localidad),
      province: clean(parsed.data.provincia),
    };
  }
}

function clean(value: string | null): string | null {
  if (value == null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
