import { NextFunction, Request, Response, Router } from 'express';
import { ResolveService, toUrlRecordResponse } from '../services/resolve.service';

/**
 * Read service routes. Mount after /api routes: `/:shortCode` matches
 * any single path segment.
 */
export function createResolveRouter(resolveService: ResolveService): Router {
  const router = Router();

  /**
   * GET /api/v1/urls/:shortCode - Get the full URL record
   */
  router.get(
    '/api/v1/urls/:shortCode?',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const record = await resolveService.getRecord(req.params.shortCode ?? '');
        res.json(toUrlRecordResponse(record));
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /:shortCode - Redirect to the original URL
   */
  router.get('/:shortCode?', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { originalUrl, source } = await resolveService.resolve(req.params.shortCode ?? '');
      res.setHeader('x-cache', source === 'cache' ? 'HIT' : 'MISS');
      res.redirect(302, originalUrl);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
