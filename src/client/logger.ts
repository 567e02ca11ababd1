/**
 * Search client logger. Built here rather than taken from core so the client
 * loads without the server's config and env schema.
 */
import pino from 'pino';

export const clientLogger = pino({ name: 'search-client', level: 'warn' });
