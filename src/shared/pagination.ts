/**
 * Pagination Arithmetic
 * Layer: Shared
 *
 * Clamping rules for the (skip, limit) window and the derivation of the
 * page metadata. Kept free of I/O so the service, the fakes in tests and
 * the client all agree on the same numbers.
 *
 * Out-of-range values are clamped silently rather than rejected; only
 * non-integer input is a client error, and that is caught at the HTTP
 * boundary before anything here runs.
 */
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from './constants';
import type { PaginationMeta } from './types';

export interface PageWindow {
  skip: number;
  limit: number;
}

export function normalizeWindow(skip?: number, limit?: number): PageWindow {
  const safeSkip = skip === undefined || skip < 0 ? 0 : skip;

  let safeLimit = limit ?? DEFAULT_PAGE_SIZE;
  if (safeLimit < 1) safeLimit = DEFAULT_PAGE_SIZE;
  if (safeLimit > MAX_PAGE_SIZE) safeLimit = MAX_PAGE_SIZE;

  return { skip: safeSkip, limit: safeLimit };
}

export function buildPaginationMeta(
  window: PageWindow,
  returned: number,
  total: number,
): PaginationMeta {
  const nextSkip = window.skip + returned;
  return {
    total,
    skip: window.skip,
    limit: window.limit,
    returned,
    hasMore: nextSkip < total,
    nextSkip,
  };
}

/** Trim free text; blank means "no filter". */
export function normalizeFilterText(value?: string | null): string | null {
  if (value == null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
