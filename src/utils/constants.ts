/**
 * Cache TTL Constants (in seconds)
 */
export const CACHE_TTL = {
  QUOTE: 5 * 60,             // 5 minutes - full records and batch quotes
  SEARCH: 24 * 60 * 60,      // 24 hours - symbol search results
} as const;

export type CacheCategory = 'quote' | 'search';

export const CATEGORY_TTL: Record<CacheCategory, number> = {
  quote: CACHE_TTL.QUOTE,
  search: CACHE_TTL.SEARCH,
};

/**
 * Upstream call timeouts (in milliseconds)
 */
export const TIMEOUT = {
  REALTIME: 15_000,
  SEARCH: 10_000,
  FINANCIALS: 20_000,
  PROBE: 10_000,
} as const;

export const CRORE = 10_000_000;

/**
 * Raw market caps above this are taken to be in rupees and converted to crores;
 * anything at or below it is assumed to already be in crores. This is a
 * workaround for the realtime provider reporting both units, not a general rule.
 */
export const MARKET_CAP_RAW_THRESHOLD = 1_000_000;

export const MAX_FINANCIAL_YEARS = 10;
export const MAX_SEARCH_RESULTS = 15;
export const MAX_BATCH_SYMBOLS = 20;
export const MIN_SEARCH_QUERY_LENGTH = 2;

/**
 * Income statement line items, tried in order. The first one present with a
 * numeric value wins.
 */
export const LINE_ITEMS = {
  revenue: ['totalRevenue', 'operatingRevenue', 'revenue'],
  profit: ['netIncome', 'netIncomeCommonStockholders', 'netIncomeContinuousOperations'],
} as const;

// Symbol used by the diagnostics probe
export const PROBE_SYMBOL = 'TCS';
