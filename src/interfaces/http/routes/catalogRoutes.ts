/**
 * Catalog Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted at both `/` and `/api` in app.ts, so:
 *
 *   GET /establecimientos?search=central&provincia=Madrid&skip=0&limit=25
 *   GET /provincias
 *
 * are also served as /api/establecimientos and /api/provincias.
 */
import { CatalogController } from '@interfaces/http/controllers/CatalogController';
import { Router } from 'express';

const router = Router();
const controller = new CatalogController();

router.get('/establecimientos', controller.search);
router.get('/provincias', controller.listProvinces);

export { router as catalogRoutes };
