// src/app.ts
// What: Express application factory.
// How: JSON body limit, routes from the shared RagService, and the centralized error handler returning
//      { error: { message, code } }. RagErrors map to their HTTP status; body-parser errors keep theirs.

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { AppContext } from './context.js';
import { RagError, errorMessage, httpStatusFor } from './errors.js';
import { createRouter } from './routes/index.js';

function statusOf(err: unknown): number {
  if (err instanceof RagError) return httpStatusFor(err);
  const status: unknown = err instanceof Error ? Reflect.get(err, 'status') : undefined;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : 500;
}

export function createApp(ctx: Pick<AppContext, 'service' | 'logger'>): Express {
  const { logger } = ctx;
  const app = express();
  app.disable('x-powered-by');
  // Text ingestion carries whole documents.
  app.use(express.json({ limit: '10mb' }));

  app.use('/', createRouter(ctx.service));

  // Centralized error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const code = err instanceof RagError ? err.code : undefined;
    const message = status >= 500 && !(err instanceof RagError) ? 'Internal Server Error' : errorMessage(err);
    if (status >= 500) {
      logger.error({ err, status, code }, 'Request failed');
    } else {
      logger.warn({ err: errorMessage(err), status, code }, 'Request rejected');
    }
    res.status(status).json({ error: { message, code } });
  });

  return app;
}
