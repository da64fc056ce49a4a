/**
 * Health and diagnostics routes
 */

import { Router, type Request, type Response } from 'express';
import type { StockService } from '../services/stockService';
import log from '../utils/logger';
import { describeError } from '../utils/errors';

export interface HealthOptions {
  eodhdConfigured: boolean;
}

export function createHealthRouter(stockService: StockService, options: HealthOptions): Router {
  const router = Router();

  /**
   * GET /
   * Status summary with active cache entry count
   */
  router.get('/', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service: 'ValueLens API',
      sources: {
        realtime: 'Indian Stock Market API (INR)',
        financials: options.eodhdConfigured ? 'EODHD' : 'Yahoo Finance (INR)',
      },
      cache_entries: stockService.cacheSize,
      eodhd_configured: options.eodhdConfigured,
    });
  });

  /**
   * GET /api/test
   * Live probe of every upstream provider (hits the network)
   */
  router.get('/api/test', async (req: Request, res: Response) => {
    try {
      res.json(await stockService.diagnose());
    } catch (error) {
      log.error('Diagnostics API error', { service: 'HealthRoute', endpoint: 'GET /api/test', error: describeError(error) });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
