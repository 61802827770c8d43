import express, { Application, NextFunction, Request, Response } from 'express';
import { customAlphabet } from 'nanoid';
import { ServiceRole } from './config';
import { AppError, isClientError } from './errors';
import { createLogger, Logger } from './logger';
import { createResolveRouter } from './routes/resolve.routes';
import { createShortenRouter } from './routes/shorten.routes';
import { ResolveService } from './services/resolve.service';
import { ShortenService } from './services/shorten.service';
import { ErrorResponse } from './types';

const requestId = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 12);

export interface AppDeps {
  role: ServiceRole;
  baseUrl: string;
  shortenService?: ShortenService;
  resolveService?: ResolveService;
  logger?: Logger;
}

export function createApp(deps: AppDeps): Application {
  const app: Application = express();
  const logger = deps.logger ?? createLogger('http');

  // Middleware
  app.use(express.json());

  // Trust proxy for accurate IP addresses
  app.set('trust proxy', 1);

  // Request id + access log
  app.use((req: Request, res: Response, next: NextFunction) => {
    const id = req.header('x-request-id') || requestId();
    const start = performance.now();
    res.setHeader('x-request-id', id);
    res.on('finish', () => {
      logger.request(`${req.method} ${req.originalUrl} [${id}]`, res.statusCode, performance.now() - start);
    });
    next();
  });

  // Liveness only: does not check Redis or PostgreSQL
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'up' });
  });

  app.get('/api/ping', (_req: Request, res: Response) => {
    res.json({ message: 'pong' });
  });

  if (deps.role !== 'redirect') {
    if (!deps.shortenService) {
      throw new Error(`role "${deps.role}" requires a shorten service`);
    }
    app.use('/', createShortenRouter(deps.shortenService, deps.baseUrl));
  }

  if (deps.role !== 'convert') {
    if (!deps.resolveService) {
      throw new Error(`role "${deps.role}" requires a resolve service`);
    }
    app.use('/', createResolveRouter(deps.resolveService));
  }

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not Found' });
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response<ErrorResponse>, _next: NextFunction) => {
    if (err instanceof AppError && isClientError(err)) {
      res.status(err.statusCode).json({ error: err.message, code: err.code });
      return;
    }

    // Body parser rejections (malformed JSON, oversized body, bad charset)
    const status = clientStatus(err);
    if (status !== undefined) {
      const message = err instanceof SyntaxError ? 'invalid JSON body' : errorMessage(err);
      res.status(status).json({ error: message, code: 'VALIDATION_ERROR' });
      return;
    }

    logger.error(`${req.method} ${req.originalUrl} failed`, err);
    if (err instanceof AppError) {
      res.status(err.statusCode).json({ error: err.message, code: err.code });
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

/**
 * 4xx status carried by a middleware error (http-errors style), if any
 */
function clientStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status =
    'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'bad request';
}
