/**
 * Post Controller — HTTP boundary for location-aware search
 * Layer: Interfaces (HTTP)
 *
 * Thin on purpose: parse query/path params with the Zod schemas, hand a
 * PostSearchCriteria to PostSearchService, send JSON. All three endpoints
 * funnel into the same coordinator, so /nearby and /city/:cityName are just
 * /search with one criterion pinned. Arrow-function fields keep `this` bound
 * when Express calls them as route handlers.
 */
import '@shared/express';

import type { PostSearchService } from '@application/services/PostSearchService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { Post } from '@domain/entities/Post';
import type { PaginatedResult } from '@shared/types';
import type { Request, Response } from 'express';

import { decodeCityParam, parseRequest } from '../validation/parseRequest';
import {
  nearbyQuerySchema,
  paginationQuerySchema,
  searchQuerySchema,
} from '../validation/postQuerySchemas';

export class PostController {
  private service: PostSearchService;

  constructor() {
    this.service = container.resolve<PostSearchService>(TOKENS.PostSearchService);
  }

  search = async (req: Request, res: Response): Promise<void> => {
    const { q, city, lat, lng, radius, page, limit } = parseRequest(searchQuerySchema, req.query);

    const result = await this.service.search({
      text: q,
      city: city || undefined,
      latitude: lat,
      longitude: lng,
      radiusKm: radius,
      page,
      limit,
    });

    sendPage(req, res, result);
  };

  nearby = async (req: Request, res: Response): Promise<void> => {
    const { lat, lng, radius, page, limit } = parseRequest(nearbyQuerySchema, req.query);

    const result = await this.service.search({
      latitude: lat,
      longitude: lng,
      radiusKm: radius,
      page,
      limit,
    });

    sendPage(req, res, result);
  };

  byCity = async (req: Request, res: Response): Promise<void> => {
    const city = decodeCityParam(req.params.cityName);
    const { page, limit } = parseRequest(paginationQuerySchema, req.query);

    const result = await this.service.search({ city, page, limit });

    sendPage(req, res, result);
  };
}

function sendPage(req: Request, res: Response, result: PaginatedResult<Post>): void {
  const totalTimeMs =
    req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;
  const meta = {
    ...result.meta,
    ...(totalTimeMs != null && { totalTimeMs }),
  };

  res.status(200).json({
    status: 'success',
    ...result,
    ...(Object.keys(meta).length > 0 && { meta }),
  });
}
