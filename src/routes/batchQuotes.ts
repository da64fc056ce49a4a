/**
 * Batch Quote Routes
 */

import { Router, type Request, type Response } from 'express';
import type { StockService } from '../services/stockService';
import log from '../utils/logger';
import { describeError, errorStack } from '../utils/errors';
import { isRecord } from '../utils/parse';

function symbolsFromBody(body: unknown): string[] {
  if (!isRecord(body) || !Array.isArray(body.symbols)) return [];
  return body.symbols
    .filter((s): s is string => typeof s === 'string')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

export function createBatchQuotesRouter(stockService: StockService): Router {
  const router = Router();

  /**
   * POST /api/batch-quotes
   * Body: { "symbols": ["TCS", "INFY.NS", ...] } - only the first 20 are quoted
   */
  router.post('/', async (req: Request, res: Response) => {
    try {
      const symbols = symbolsFromBody(req.body);
      res.json(await stockService.getBatchQuotes(symbols));
    } catch (error) {
      log.error('Batch quotes API error', {
        service: 'BatchQuotesRoute',
        endpoint: 'POST /api/batch-quotes',
        error: describeError(error),
        stack: errorStack(error),
      });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
