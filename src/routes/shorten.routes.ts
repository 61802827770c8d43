import { NextFunction, Request, Response, Router } from 'express';
import { ShortenService, toCreateUrlResponse } from '../services/shorten.service';
import { CreateUrlRequest } from '../types';

/**
 * Write service routes
 */
export function createShortenRouter(shortenService: ShortenService, baseUrl: string): Router {
  const router = Router();

  /**
   * POST /api/v1/urls - Create a short URL
   */
  router.post('/api/v1/urls', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { originalUrl } = (req.body ?? {}) as CreateUrlRequest;

      if (typeof originalUrl !== 'string' || originalUrl === '') {
        res.status(400).json({ error: 'originalUrl is required', code: 'VALIDATION_ERROR' });
        return;
      }

      const record = await shortenService.createShortUrl(originalUrl);
      res.status(201).json(toCreateUrlResponse(record, baseUrl));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
