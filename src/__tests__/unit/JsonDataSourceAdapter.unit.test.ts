/**
 * Unit Tests — JsonDataSourceAdapter
 *
 * The adapter turns one loose import record into a clean insert shape:
 * text trimmed, blank optional fields nulled, nameless records rejected.
 */
import { JsonDataSourceAdapter } from '@workers/import/JsonDataSourceAdapter';

import { sampleRawRecord } from '../helpers/fixtures';

describe('JsonDataSourceAdapter', () => {
  const adapter = new JsonDataSourceAdapter();

  it('should map a complete record to camelCase fields and trim the name', () => {
    expect(adapter.normalize(sampleRawRecord)).toEqual({
      name: 'Farmacia Central',
      address: 'Calle Mayor 1',
      locality: 'Madrid',
      province: 'Madrid',
    });
  });

  it('should turn missing, null and blank optional fields into null', () => {
    const result = adapter.normalize({ nombre: 'Taller Norte', direccion: null, localidad: '   ' });

    expect(result).toEqual({ name: 'Taller Norte', address: null, locality: null, province: null });
  });

  it('should accept numeric values as text', () => {
    const result = adapter.normalize({ nombre: 'Kiosko', localidad: 28001 });

    expect(result?.locality).toBe('28001');
  });

  it.each([
    ['a blank name', { nombre: '   ', provincia: 'Madrid' }],
    ['a missing name', { direccion: 'Calle Falsa 1' }],
    ['a null name', { nombre: null }],
  ])('should reject a record with %s', (_label, raw) => {
    expect(adapter.normalize(raw)).toBeNull();
  });

  it('should reject values that are not records', () => {
    expect(adapter.normalize('Farmacia')).toBeNull();
    expect(adapter.normalize(null)).toBeNull();
  });

  it('should reject a record whose fields have the wrong type', () => {
    expect(adapter.normalize({ nombre: 'Bar', provincia: ['Madrid'] })).toBeNull();
  });

  it('should ignore unknown fields', () => {
    const result = adapter.normalize({ nombre: 'Bar', codigo: 'X-1' });

    expect(result).toEqual({ name: 'Bar', address: null, locality: null, province: null });
  });
});
