/**
 * ValueLens API Server
 * Indian equity quotes and multi-year financials merged from several upstream providers
 *
 * Data sources, in priority order:
 *   1. Indian Stock Market API - price, PE, market cap, EPS, sector (INR)
 *   2. EODHD - yearly income statements (needs EODHD_API_KEY)
 *   3. Yahoo Finance - yearly income statements when EODHD has nothing
 */

import 'dotenv/config';
import { createApp } from './app';
import { EodhdService } from './services/eodhdService';
import { IndianMarketService } from './services/indianMarketService';
import { StockService } from './services/stockService';
import { YahooFinancialsService } from './services/yahooFinancialsService';
import { CacheStore } from './utils/cache';
import { loadConfig } from './utils/config';
import log from './utils/logger';

const config = loadConfig();

const cache = new CacheStore();
const indianMarket = new IndianMarketService(config.realtimeBaseUrl);
const eodhd = new EodhdService(config.eodhdApiKey);
const yahoo = new YahooFinancialsService();

const stockService = new StockService({
  cache,
  realtime: indianMarket,
  financials: [eodhd, yahoo],
  search: [indianMarket, yahoo],
  batch: indianMarket,
  probes: [indianMarket, yahoo, eodhd],
});

const app = createApp({
  stockService,
  eodhdConfigured: eodhd.configured,
  allowedOrigins: config.allowedOrigins,
  exposeErrors: config.nodeEnv === 'development',
});

const server = app.listen(config.port, () => {
  log.info('Server started', {
    port: config.port,
    environment: config.nodeEnv,
    url: `http://localhost:${config.port}`,
    realtime: config.realtimeBaseUrl,
    financials: eodhd.configured ? 'EODHD' : 'Yahoo Finance',
    eodhd_key: eodhd.configured ? 'set' : 'not set',
    endpoints: [
      'GET /',
      'GET /api/search?q=',
      'GET /api/fullstock/:symbol',
      'POST /api/batch-quotes',
      'GET /api/test',
    ],
  });
});

function shutdown(signal: string): void {
  log.info(`${signal} received, shutting down gracefully`);
  server.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
