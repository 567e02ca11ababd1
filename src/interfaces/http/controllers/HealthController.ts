/**
 * Health Controller
 * Layer: Interfaces (HTTP)
 *
 * Reports whether this worker can reach PostgreSQL. Load balancers and
 * container probes read the status code: 200 when `SELECT 1` succeeds,
 * 503 when it does not. Catalog content plays no part.
 */
import { CatalogService } from '@application/services/CatalogService';
import { container } from '@core/container';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { Request, Response } from 'express';

export class HealthController {
  private service: CatalogService;
  private log: Logger;

  constructor() {
    this.service = container.resolve<CatalogService>(TOKENS.CatalogService);
    this.log = container.resolve<Logger>(TOKENS.Logger);
  }

  check = async (_req: Request, res: Response): Promise<void> => {
    const base = { uptime: process.uptime(), timestamp: new Date().toISOString() };

    try {
      const health = await this.service.checkHealth();
      res.status(200).json({ status: 'ok', ...health, ...base });
    } catch (err) {
      this.log.warn({ err }, 'Health check failed: database unreachable');
      res.status(503).json({ status: 'unhealthy', database: 'disconnected', ...base });
    }
  };
}
