/**
 * Full Stock Routes
 */

import { Router, type Request, type Response } from 'express';
import type { StockService } from '../services/stockService';
import log from '../utils/logger';
import { describeError, errorStack } from '../utils/errors';

export function createFullStockRouter(stockService: StockService): Router {
  const router = Router();

  /**
   * GET /api/fullstock/:symbol
   * Merged quote + financials record. Always 200, zero-filled when every provider fails.
   * Example: /api/fullstock/TCS.NS
   */
  router.get('/:symbol', async (req: Request, res: Response) => {
    try {
      const record = await stockService.resolve(req.params.symbol);
      res.json(record);
    } catch (error) {
      log.error('Full stock API error', {
        service: 'FullStockRoute',
        endpoint: 'GET /api/fullstock/:symbol',
        symbol: req.params.symbol,
        error: describeError(error),
        stack: errorStack(error),
      });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
