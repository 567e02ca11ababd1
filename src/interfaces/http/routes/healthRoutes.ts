/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /health  →  { status: 'ok', database: 'connected', latencyMs, uptime, timestamp }
 *
 * Answers 503 with `status: 'unhealthy'` when the database cannot be
 * reached, so probes take the worker out of rotation.
 */
import { HealthController } from '@interfaces/http/controllers/HealthController';
import { Router } from 'express';

const router = Router();
const controller = new HealthController();

router.get('/health', controller.check);

export { router as healthRoutes };
