/**
 * Unit Tests — Pagination Arithmetic
 *
 * The clamping table and the has_more / next_skip derivation every other
 * layer relies on.
 */
import { buildPaginationMeta, normalizeFilterText, normalizeWindow } from '@shared/pagination';

describe('normalizeWindow()', () => {
  it.each([
    [undefined, undefined, 0, 25],
    [0, 25, 0, 25],
    [-5, 10, 0, 10],
    [40, 0, 40, 25],
    [0, -3, 0, 25],
    [0, 1, 0, 1],
    [0, 100, 0, 100],
    [0, 101, 0, 100],
    [0, 5000, 0, 100],
  ])('skip=%p limit=%p → skip=%p limit=%p', (skip, limit, expectedSkip, expectedLimit) => {
    expect(normalizeWindow(skip, limit)).toEqual({ skip: expectedSkip, limit: expectedLimit });
  });
});

describe('buildPaginationMeta()', () => {
  it('should report more results while the window ends before the total', () => {
    expect(buildPaginationMeta({ skip: 0, limit: 25 }, 25, 60)).toEqual({
      total: 60,
      skip: 0,
      limit: 25,
      returned: 25,
      hasMore: true,
      nextSkip: 25,
    });
  });

  it('should report the last page as exhausted', () => {
    const meta = buildPaginationMeta({ skip: 50, limit: 25 }, 10, 60);

    expect(meta.hasMore).toBe(false);
    expect(meta.nextSkip).toBe(60);
  });

  it('should keep next_skip at skip when skipping past the end', () => {
    const meta = buildPaginationMeta({ skip: 500, limit: 25 }, 0, 60);

    expect(meta.returned).toBe(0);
    expect(meta.hasMore).toBe(false);
    expect(meta.nextSkip).toBe(500);
  });
});

describe('normalizeFilterText()', () => {
  it('should trim surrounding whitespace', () => {
    expect(normalizeFilterText('  central ')).toBe('central');
  });

  it.each([undefined, null, '', '   '])('should treat %p as no filter', (value) => {
    expect(normalizeFilterText(value)).toBeNull();
  });
});
