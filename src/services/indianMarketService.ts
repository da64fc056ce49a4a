/**
 * Indian Stock Market API Service
 * Realtime quotes, symbol search and batch quotes for NSE/BSE listings.
 *
 * All figures arrive in INR. Every call is best-effort: non-200 answers,
 * a body without `status: "success"`, or a transport failure all mean
 * "no data" and are logged, never thrown.
 */

import axios, { type AxiosInstance } from 'axios';
import type {
  BatchQuote,
  BatchQuoteProvider,
  ProbeableProvider,
  ProbeReport,
  ProviderOutcome,
  RealtimeQuote,
  RealtimeQuoteProvider,
  SearchResult,
  SymbolSearchProvider,
} from '../types';
import { CRORE, MAX_SEARCH_RESULTS, PROBE_SYMBOL, TIMEOUT } from '../utils/constants';
import { describeError } from '../utils/errors';
import log from '../utils/logger';
import { isRecord, numberOr, stringOr } from '../utils/parse';
import { roundTo } from '../utils/metrics';
import { normalizeSymbol } from '../utils/symbols';

const SERVICE = 'IndianMarketService';

function mapQuote(d: Record<string, unknown>): RealtimeQuote {
  return {
    cmp: numberOr(d.last_price),
    mcapRaw: numberOr(d.market_cap),
    pe: numberOr(d.pe_ratio),
    eps: numberOr(d.earnings_per_share),
    sector: stringOr(d.sector),
    industry: stringOr(d.industry),
    name: stringOr(d.company_name),
    change: numberOr(d.change),
    changePct: numberOr(d.percent_change),
    yearHigh: numberOr(d.year_high),
    yearLow: numberOr(d.year_low),
    volume: numberOr(d.volume),
    bookValue: numberOr(d.book_value),
    dividendYield: numberOr(d.dividend_yield),
  };
}

function mapBatchQuote(s: Record<string, unknown>): BatchQuote {
  return {
    sym: stringOr(s.symbol),
    name: stringOr(s.company_name),
    cmp: numberOr(s.last_price),
    pe: numberOr(s.pe_ratio),
    mcapCr: roundTo(numberOr(s.market_cap) / CRORE, 0),
    dayChangePct: numberOr(s.percent_change),
  };
}

export class IndianMarketService
  implements RealtimeQuoteProvider, SymbolSearchProvider, BatchQuoteProvider, ProbeableProvider
{
  readonly name = 'isma' as const;

  constructor(
    private readonly baseUrl: string,
    private readonly http: AxiosInstance = axios.create()
  ) {}

  /**
   * Get a realtime quote for one symbol
   */
  async fetchQuote(symbol: string): Promise<ProviderOutcome<RealtimeQuote>> {
    const clean = normalizeSymbol(symbol);
    const start = Date.now();

    try {
      const response = await this.http.get<unknown>(`${this.baseUrl}/stock`, {
        params: { symbol: clean, res: 'num' },
        timeout: TIMEOUT.REALTIME,
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        log.warn('Realtime provider returned non-success status', {
          service: SERVICE, symbol: clean, status: response.status,
        });
        return { ok: false, source: this.name, reason: `HTTP ${response.status}` };
      }

      const body = response.data;
      if (!isRecord(body) || body.status !== 'success' || !isRecord(body.data)) {
        log.warn('Realtime provider returned no data', { service: SERVICE, symbol: clean });
        return { ok: false, source: this.name, reason: 'no data in response' };
      }

      log.api(SERVICE, '/stock', Date.now() - start, true, { symbol: clean });
      return { ok: true, source: this.name, data: mapQuote(body.data) };
    } catch (error) {
      const reason = describeError(error);
      log.error('Realtime quote fetch failed', { service: SERVICE, symbol: clean, error: reason });
      log.api(SERVICE, '/stock', Date.now() - start, false, { symbol: clean });
      return { ok: false, source: this.name, reason };
    }
  }

  /**
   * Free-text symbol search, at most 15 matches
   */
  async search(query: string): Promise<SearchResult[]> {
    try {
      const response = await this.http.get<unknown>(`${this.baseUrl}/search`, {
        params: { query },
        timeout: TIMEOUT.SEARCH,
        validateStatus: () => true,
      });

      const body = response.data;
      if (response.status !== 200 || !isRecord(body) || body.status !== 'success') {
        log.warn('Search provider returned no data', { service: SERVICE, query, status: response.status });
        return [];
      }

      const results = Array.isArray(body.results) ? body.results : [];
      return results
        .slice(0, MAX_SEARCH_RESULTS)
        .filter(isRecord)
        .map(r => ({
          sym: stringOr(r.symbol),
          name: stringOr(r.company_name),
          sec: 'NSE',
        }));
    } catch (error) {
      log.error('Symbol search failed', { service: SERVICE, query, error: describeError(error) });
      return [];
    }
  }

  /**
   * Lightweight quotes for several symbols in one upstream request.
   * Callers are expected to have capped the list already.
   */
  async fetchBatchQuotes(symbols: string[]): Promise<BatchQuote[]> {
    if (symbols.length === 0) return [];

    const joined = symbols.map(normalizeSymbol).join(',');
    const start = Date.now();

    try {
      const response = await this.http.get<unknown>(`${this.baseUrl}/stock/list`, {
        params: { symbols: joined, res: 'num' },
        timeout: TIMEOUT.REALTIME,
        validateStatus: () => true,
      });

      if (response.status !== 200 || !isRecord(response.data)) {
        log.warn('Batch quote request returned no data', {
          service: SERVICE, symbols: joined, status: response.status,
        });
        return [];
      }

      const stocks = Array.isArray(response.data.stocks) ? response.data.stocks : [];
      log.api(SERVICE, '/stock/list', Date.now() - start, true, { symbols: joined });
      return stocks.filter(isRecord).map(mapBatchQuote);
    } catch (error) {
      log.error('Batch quote fetch failed', { service: SERVICE, symbols: joined, error: describeError(error) });
      return [];
    }
  }

  async probe(): Promise<ProbeReport> {
    const outcome = await this.fetchQuote(PROBE_SYMBOL);
    if (!outcome.ok) {
      return { working: false, tcs_cmp: 0, tcs_mcap_cr: 0, tcs_pe: 0, error: outcome.reason };
    }

    const quote = outcome.data;
    return {
      working: quote.cmp > 0,
      tcs_cmp: quote.cmp,
      tcs_mcap_cr: roundTo(quote.mcapRaw / CRORE, 0),
      tcs_pe: quote.pe,
    };
  }
}
