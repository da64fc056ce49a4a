/**
 * Stock Service
 * Resolves one merged record per symbol from the realtime and financials
 * providers, and fronts symbol search and batch quotes.
 *
 * Resolution strategy:
 * 1. Check the cache (`full:<SYMBOL>`, 5 minutes)
 * 2. In parallel: realtime quote, and financials from the primary provider
 *    falling back to the secondary one only when the primary has nothing
 * 3. Derive market cap in crores, shares outstanding and CAGR figures
 * 4. Cache and return. Provider failures never surface as errors; the worst
 *    case is a zeroed record with provenance "none"/"none".
 */

import type {
  BatchQuote,
  BatchQuoteProvider,
  FinancialSeries,
  FinancialsProvider,
  MergedStockRecord,
  ProbeableProvider,
  ProbeReport,
  ProviderName,
  ProviderOutcome,
  RealtimeQuote,
  RealtimeQuoteProvider,
  SearchResult,
  SymbolSearchProvider,
} from '../types';
import type { CacheStore } from '../utils/cache';
import { CRORE, MARKET_CAP_RAW_THRESHOLD, MAX_BATCH_SYMBOLS, MIN_SEARCH_QUERY_LENGTH } from '../utils/constants';
import log from '../utils/logger';
import { cagr, roundTo } from '../utils/metrics';
import { normalizeSymbol } from '../utils/symbols';

export interface StockServiceDeps {
  cache: CacheStore;
  realtime: RealtimeQuoteProvider;
  // Tried in order; the first one with data wins
  financials: FinancialsProvider[];
  // Tried in order until one returns matches
  search: SymbolSearchProvider[];
  batch: BatchQuoteProvider;
  probes: ProbeableProvider[];
}

/**
 * Market cap in crores. Raw values above the threshold are rupees; smaller
 * ones are assumed to be crores already.
 */
export function toMarketCapCrores(raw: number): number {
  return raw > MARKET_CAP_RAW_THRESHOLD ? raw / CRORE : raw;
}

export function deriveSharesCrores(mcapCrores: number, price: number): number {
  return price > 0 && mcapCrores > 0 ? mcapCrores / price : 0;
}

/**
 * Combine a realtime quote and a financial series into the published record.
 * Either side may be missing.
 */
export function mergeStockRecord(
  sym: string,
  quote: ProviderOutcome<RealtimeQuote>,
  financials: ProviderOutcome<FinancialSeries> | undefined
): MergedStockRecord {
  const q = quote.ok ? quote.data : undefined;
  const fin = financials?.ok ? financials.data : undefined;

  const cmp = q?.cmp ?? 0;
  const mcapCr = toMarketCapCrores(q?.mcapRaw ?? 0);
  const years = fin?.years ?? [];
  const shr = deriveSharesCrores(mcapCr, cmp);

  return {
    sym,
    name: q?.name || sym,
    sec: q?.sector || 'Unknown',
    industry: q?.industry ?? '',
    cmp,
    shr: roundTo(shr, 2),
    mcapCr: roundTo(mcapCr, 0),
    pe: q?.pe ?? 0,
    eps: q?.eps ?? 0,
    pat: years.length > 0 ? years[0].pat : 0,
    rev: years.length > 0 ? years[0].rev : 0,
    r3: cagr(years, 'rev', 3),
    r5: cagr(years, 'rev', 5),
    p3: cagr(years, 'pat', 3),
    p5: cagr(years, 'pat', 5),
    dayChange: q?.change ?? 0,
    dayChangePct: q?.changePct ?? 0,
    yearHigh: q?.yearHigh ?? 0,
    yearLow: q?.yearLow ?? 0,
    volume: q?.volume ?? 0,
    bookValue: q?.bookValue ?? 0,
    dividendYield: q?.dividendYield ?? 0,
    years,
    _source: {
      realtime: q ? quote.source : 'none',
      financials: financials?.ok ? financials.source : 'none',
      years_available: years.length,
    },
  };
}

export class StockService {
  constructor(private readonly deps: StockServiceDeps) {}

  get cacheSize(): number {
    return this.deps.cache.size();
  }

  async resolve(symbol: string): Promise<MergedStockRecord> {
    const sym = normalizeSymbol(symbol);
    const cacheKey = `full:${sym}`;

    const cached = this.deps.cache.get<MergedStockRecord>(cacheKey);
    if (cached !== undefined) return cached;

    const [quote, financials] = await Promise.all([
      this.deps.realtime.fetchQuote(sym),
      this.fetchFinancials(sym),
    ]);

    const record = mergeStockRecord(sym, quote, financials);

    log.info('Resolved stock record', {
      service: 'StockService',
      symbol: sym,
      cmp: record.cmp,
      mcap_cr: record.mcapCr,
      pe: record.pe,
      pat_cr: record.pat,
      rev_cr: record.rev,
      years: record._source.years_available,
      realtime_source: record._source.realtime,
      financials_source: record._source.financials,
    });

    this.deps.cache.set(cacheKey, record, 'quote');
    return record;
  }

  /**
   * Symbol search. Queries shorter than two characters match nothing and
   * reach no provider. Empty result lists are cached as well.
   */
  async search(query: string): Promise<SearchResult[]> {
    const q = query.trim();
    if (q.length < MIN_SEARCH_QUERY_LENGTH) return [];

    const cacheKey = `search:${q.toLowerCase()}`;
    const cached = this.deps.cache.get<SearchResult[]>(cacheKey);
    if (cached !== undefined) return cached;

    let results: SearchResult[] = [];
    for (const provider of this.deps.search) {
      results = await provider.search(q);
      if (results.length > 0) break;
      log.debug('Search provider had no matches', { service: 'StockService', provider: provider.name, query: q });
    }

    this.deps.cache.set(cacheKey, results, 'search');
    return results;
  }

  /**
   * Lightweight quotes for the first 20 symbols. No per-symbol fallback.
   */
  async getBatchQuotes(symbols: string[]): Promise<BatchQuote[]> {
    const requested = symbols.slice(0, MAX_BATCH_SYMBOLS);
    if (requested.length === 0) return [];

    const cacheKey = `batch:${[...requested].sort().join('_')}`;
    const cached = this.deps.cache.get<BatchQuote[]>(cacheKey);
    if (cached !== undefined) return cached;

    log.batch('Fetching batch quotes', requested.length, { service: 'StockService' });
    const results = await this.deps.batch.fetchBatchQuotes(requested);

    this.deps.cache.set(cacheKey, results, 'quote');
    return results;
  }

  /**
   * Probe every provider's current reachability
   */
  async diagnose(): Promise<{ status: 'ok'; sources: Record<string, ProbeReport> }> {
    const reports = await Promise.all(
      this.deps.probes.map(async (provider): Promise<[ProviderName, ProbeReport]> => [
        provider.name,
        await provider.probe(),
      ])
    );
    return { status: 'ok', sources: Object.fromEntries(reports) };
  }

  private async fetchFinancials(sym: string): Promise<ProviderOutcome<FinancialSeries> | undefined> {
    let last: ProviderOutcome<FinancialSeries> | undefined;

    for (const provider of this.deps.financials) {
      last = await provider.fetchFinancials(sym);
      if (last.ok) return last;
      log.debug('Financials provider had no data, falling back', {
        service: 'StockService', provider: provider.name, symbol: sym, reason: last.reason,
      });
    }

    return last;
  }
}
