/** Page size applied when `limit` is absent or below 1. */
export const DEFAULT_PAGE_SIZE = 25;
export const MAX_PAGE_SIZE = 100;

/** Debounce quantum for search-as-you-type on the client. */
export const SEARCH_DEBOUNCE_MS = 300;

export const CATALOG_TABLE = 'establecimientos';
