/**
 * Symbol Search Routes
 */

import { Router, type Request, type Response } from 'express';
import type { StockService } from '../services/stockService';
import log from '../utils/logger';
import { describeError, errorStack } from '../utils/errors';

export function createSearchRouter(stockService: StockService): Router {
  const router = Router();

  /**
   * GET /api/search?q=infosys
   * Up to 15 `{sym, name, sec}` matches; empty array for queries under 2 characters
   */
  router.get('/', async (req: Request, res: Response) => {
    try {
      const { q } = req.query;
      const query = typeof q === 'string' ? q : '';
      res.json(await stockService.search(query));
    } catch (error) {
      log.error('Search API error', {
        service: 'SearchRoute',
        endpoint: 'GET /api/search',
        error: describeError(error),
        stack: errorStack(error),
      });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
