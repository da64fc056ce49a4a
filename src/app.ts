/**
 * Express application: middleware, routes and error handling.
 * Services are constructed by the caller and passed in.
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { createBatchQuotesRouter } from './routes/batchQuotes';
import { createFullStockRouter } from './routes/fullStock';
import { createHealthRouter } from './routes/health';
import { createSearchRouter } from './routes/search';
import type { StockService } from './services/stockService';
import log from './utils/logger';

export interface AppOptions {
  stockService: StockService;
  eodhdConfigured: boolean;
  // Undefined allows every origin
  allowedOrigins?: string[];
  exposeErrors?: boolean;
}

export function createApp(options: AppOptions): Express {
  const { stockService, allowedOrigins } = options;
  const app: Express = express();

  app.use(express.json());

  app.use(cors({
    origin: (origin, callback) => {
      // Requests with no origin (curl, server-to-server) are always allowed
      if (!origin || !allowedOrigins || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
  }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      log.http(req.method, req.path, res.statusCode, Date.now() - start);
    });
    next();
  });

  app.use('/', createHealthRouter(stockService, { eodhdConfigured: options.eodhdConfigured }));
  app.use('/api/search', createSearchRouter(stockService));
  app.use('/api/fullstock', createFullStockRouter(stockService));
  app.use('/api/batch-quotes', createBatchQuotesRouter(stockService));

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      path: req.path,
    });
  });

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    // body-parser rejects malformed JSON with status 400
    if ('status' in err && err.status === 400) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }

    log.error('Unhandled error', {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
    });
    res.status(500).json({
      error: 'Internal Server Error',
      message: options.exposeErrors ? err.message : undefined,
    });
  });

  return app;
}
