/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a new app instance rather than a singleton: each cluster worker
 * calls createApp(), and integration tests build one after swapping the
 * repository in the container.
 *
 * Middleware ordering is an assembly line:
 *   1. requestTimer     — stamps req.requestStartTime for meta.totalTimeMs.
 *   2. helmet()         — security headers.
 *   3. cors()           — lets the browser client call from another origin.
 *   4. compression()    — gzips response bodies.
 *   5. express.json()   — body parsing.
 *   6. requestLogger    — pino-http request/response logging.
 *   7. Routes           — mounted at `/` and again at `/api`.
 *   8. notFoundHandler  — 404 for anything unmatched.
 *   9. errorHandler     — MUST be last.
 *
 * The `import '@core/container'` side effect bootstraps DI before any
 * route module resolves its controller's dependencies.
 */
import '@core/container';

import { config } from '@core/config';
import { errorHandler, notFoundHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { catalogRoutes } from '@interfaces/http/routes/catalogRoutes';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  // Request timing (must be first)
  app.use(requestTimer);

  // Security & compression
  app.use(helmet());
  app.use(cors({ origin: config.http.corsOrigin }));
  app.use(compression());

  // Body parsing
  app.use(express.json());

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use(['/', '/api'], healthRoutes);
  app.use(['/', '/api'], catalogRoutes);

  // Unmatched routes, then the global error handler (must be registered last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
