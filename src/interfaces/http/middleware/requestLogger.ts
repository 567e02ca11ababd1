/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * pino-http logs every request/response pair (method, URL, status, response
 * time) through the shared logger, so the format matches the rest of the
 * app. Health probes are frequent and uninteresting; they are skipped.
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({
  logger,
  autoLogging: {
    ignore: (req) => req.url === '/health' || req.url === '/api/health',
  },
});
