/**
 * Unit Tests — Request Validation
 *
 * `skip` and `limit` must be integer text; range is not checked here (the
 * service clamps). Text filters pass through untouched for the service to
 * trim.
 */
import { parseRequest, searchParamsSchema } from '@interfaces/http/middleware/validation';
import { ValidationError } from '@shared/errors/AppError';

describe('parseRequest(searchParamsSchema)', () => {
  it('should accept an empty query', () => {
    expect(parseRequest(searchParamsSchema, {})).toEqual({});
  });

  it('should convert integer text to numbers', () => {
    expect(parseRequest(searchParamsSchema, { skip: '50', limit: ' 25 ' })).toEqual({
      skip: 50,
      limit: 25,
    });
  });

  it('should let out-of-range integers through for the service to clamp', () => {
    expect(parseRequest(searchParamsSchema, { skip: '-5', limit: '1000' })).toEqual({
      skip: -5,
      limit: 1000,
    });
  });

  it('should keep the text filters as given', () => {
    expect(parseRequest(searchParamsSchema, { search: ' bar ', provincia: 'Madrid' })).toEqual({
      search: ' bar ',
      provincia: 'Madrid',
    });
  });

  it.each(['abc', '1.5', '', '10px'])('should reject skip=%p', (skip) => {
    expect(() => parseRequest(searchParamsSchema, { skip })).toThrow(ValidationError);
    expect(() => parseRequest(searchParamsSchema, { skip })).toThrow('skip: must be an integer');
  });

  it('should list every offending field', () => {
    expect(() => parseRequest(searchParamsSchema, { skip: 'x', limit: 'y' })).toThrow(
      'skip: must be an integer; limit: must be an integer',
    );
  });

  it('should pin integers beyond the safe range instead of losing precision', () => {
    expect(
      parseRequest(searchParamsSchema, { skip: '1000000000000000000000', limit: '-100000000000000000000' }),
    ).toEqual({
      skip: Number.MAX_SAFE_INTEGER,
      limit: -Number.MAX_SAFE_INTEGER,
    });
  });

  it('should keep safe integers exact', () => {
    expect(parseRequest(searchParamsSchema, { skip: '9007199254740991' })).toEqual({
      skip: 9007199254740991,
    });
  });

  it('should take the last value of a repeated text filter', () => {
    expect(
      parseRequest(searchParamsSchema, { search: ['bar', 'café'], provincia: ['Madrid', 'Sevilla'] }),
    ).toEqual({ search: 'café', provincia: 'Sevilla' });
  });

  it('should reject a repeated numeric parameter', () => {
    expect(() => parseRequest(searchParamsSchema, { limit: ['10', '20'] })).toThrow(/^limit: /);
  });
});
