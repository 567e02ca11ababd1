/**
 * Catalog Controller — HTTP Boundary for Search & Province Discovery
 * Layer: Interfaces (HTTP)
 *
 * I keep this thin: parse query params, call CatalogService, send JSON via
 * the presenter. I resolve CatalogService from the container in the
 * constructor. Arrow functions keep `this` bound when Express invokes them
 * as route handlers; Express 5 forwards their rejections to errorHandler.
 */
/// <reference path="../../../shared/express.d.ts" />
import { CatalogService } from '@application/services/CatalogService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { parseRequest, searchParamsSchema } from '@interfaces/http/middleware/validation';
import { toEstablishmentsResponse } from '@interfaces/http/presenters/catalogPresenter';
import type { ProvincesResponse } from '@shared/contracts';
import type { Request, Response } from 'express';

export class CatalogController {
  private service: CatalogService;

  constructor() {
    this.service = container.resolve<CatalogService>(TOKENS.CatalogService);
  }

  search = async (req: Request, res: Response): Promise<void> => {
    const params = parseRequest(searchParamsSchema, req.query);

    const page = await this.service.search({
      searchText: params.search,
      province: params.provincia,
      skip: params.skip,
      limit: params.limit,
    });

    const totalTimeMs =
      req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;

    res.status(200).json(toEstablishmentsResponse(page, totalTimeMs));
  };

  listProvinces = async (_req: Request, res: Response): Promise<void> => {
    const provincias = await this.service.listProvinces();
    const body: ProvincesResponse = { provincias, total: provincias.length };
    res.status(200).json(body);
  };
}
