/**
 * Yahoo Finance Service
 * Secondary source of yearly income statements, plus literal-ticker lookup
 * used when the primary symbol search finds nothing.
 *
 * Line items are picked from the ordered candidate lists in LINE_ITEMS.
 */

import YahooFinance from 'yahoo-finance2';
import type {
  FinancialSeries,
  FinancialYear,
  FinancialsProvider,
  ProbeableProvider,
  ProbeReport,
  ProviderOutcome,
  SearchResult,
  SymbolSearchProvider,
} from '../types';
import { CRORE, LINE_ITEMS, PROBE_SYMBOL, TIMEOUT } from '../utils/constants';
import { describeError, errorStack } from '../utils/errors';
import log from '../utils/logger';
import { isRecord, toDateString, toNumber } from '../utils/parse';
import { roundTo } from '../utils/metrics';
import { withExchangeSuffix } from '../utils/symbols';

const SERVICE = 'YahooFinancialsService';
const NSE_SUFFIX = '.NS';
const HISTORY_YEARS = 10;

export interface YahooCallOptions {
  validateResult: false;
  fetchOptions: { signal: AbortSignal };
}

/**
 * The slice of the yahoo-finance2 client this service calls. Results are
 * treated as unknown and narrowed here.
 */
export interface YahooClient {
  fundamentalsTimeSeries(
    symbol: string,
    query: { period1: Date; type: 'annual'; module: 'financials' },
    moduleOptions: YahooCallOptions
  ): Promise<unknown>;
  quote(symbol: string, queryOptions: Record<string, never>, moduleOptions: YahooCallOptions): Promise<unknown>;
}

export function createYahooClient(): YahooClient {
  return new YahooFinance({ suppressNotices: ['yahooSurvey'] });
}

/**
 * Run one client call with an abort signal, failing after `timeoutMs`
 * whether or not the client honours the signal.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  call: (options: YahooCallOptions) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new Error(`Yahoo Finance request timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      call({ validateResult: false, fetchOptions: { signal: controller.signal } }),
      deadline,
    ]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * First candidate key present with a numeric value, else 0
 */
export function pickLineItem(row: Record<string, unknown>, candidates: readonly string[]): number {
  for (const key of candidates) {
    const value = toNumber(row[key]);
    if (value !== undefined) return value;
  }
  return 0;
}

function mapIncomeRows(rows: Record<string, unknown>[]): FinancialYear[] {
  return rows
    .filter(row => row.periodType === undefined || row.periodType === '12M')
    .map(row => ({ date: toDateString(row.date), row }))
    .filter(({ date }) => date.length >= 4)
    .sort((a, b) => b.date.localeCompare(a.date))
    .map(({ date, row }) => ({
      year: date.slice(0, 4),
      rev: roundTo(pickLineItem(row, LINE_ITEMS.revenue) / CRORE, 2),
      pat: roundTo(pickLineItem(row, LINE_ITEMS.profit) / CRORE, 2),
    }));
}

export class YahooFinancialsService implements FinancialsProvider, SymbolSearchProvider, ProbeableProvider {
  readonly name = 'yfinance' as const;

  constructor(private readonly client: YahooClient = createYahooClient()) {}

  async fetchFinancials(symbol: string): Promise<ProviderOutcome<FinancialSeries>> {
    const ticker = withExchangeSuffix(symbol, NSE_SUFFIX);
    const start = Date.now();

    try {
      const period1 = new Date();
      period1.setFullYear(period1.getFullYear() - HISTORY_YEARS);

      const raw = await withTimeout(TIMEOUT.FINANCIALS, options =>
        this.client.fundamentalsTimeSeries(ticker, { period1, type: 'annual', module: 'financials' }, options)
      );

      const rows = Array.isArray(raw) ? raw.filter(isRecord) : [];
      const years = mapIncomeRows(rows);
      if (years.length === 0) {
        log.warn('Yahoo Finance has no income statement', { service: SERVICE, ticker });
        return { ok: false, source: this.name, reason: 'no income statement' };
      }

      const shares = await this.fetchSharesOutstanding(ticker);

      log.api(SERVICE, 'fundamentalsTimeSeries', Date.now() - start, true, { ticker, years: years.length });
      return { ok: true, source: this.name, data: { years, shares } };
    } catch (error) {
      const reason = describeError(error);
      log.error('Yahoo Finance financials fetch failed', {
        service: SERVICE, ticker, error: reason, stack: errorStack(error),
      });
      log.api(SERVICE, 'fundamentalsTimeSeries', Date.now() - start, false, { ticker });
      return { ok: false, source: this.name, reason };
    }
  }

  /**
   * Treat the query as a literal NSE ticker. Yields one match when Yahoo
   * has a market price for it.
   */
  async search(query: string): Promise<SearchResult[]> {
    const sym = query.trim().toUpperCase();

    try {
      const quote = await withTimeout(TIMEOUT.SEARCH, options =>
        this.client.quote(`${sym}${NSE_SUFFIX}`, {}, options)
      );
      if (!isRecord(quote) || !toNumber(quote.regularMarketPrice)) return [];

      const name = [quote.longName, quote.shortName].find(
        (n): n is string => typeof n === 'string' && n.length > 0
      );
      return [{ sym, name: name ?? sym, sec: 'NSE' }];
    } catch (error) {
      log.warn('Yahoo Finance ticker lookup failed', { service: SERVICE, query, error: describeError(error) });
      return [];
    }
  }

  async probe(): Promise<ProbeReport> {
    const outcome = await this.fetchFinancials(PROBE_SYMBOL);
    if (!outcome.ok) return { working: false, years: 0, error: outcome.reason };
    return { working: true, years: outcome.data.years.length };
  }

  // Share count is optional; failing to read it does not void the statement
  private async fetchSharesOutstanding(ticker: string): Promise<number> {
    try {
      const quote = await withTimeout(TIMEOUT.FINANCIALS, options => this.client.quote(ticker, {}, options));
      return isRecord(quote) ? toNumber(quote.sharesOutstanding) ?? 0 : 0;
    } catch (error) {
      log.warn('Yahoo Finance shares outstanding unavailable', {
        service: SERVICE, ticker, error: describeError(error),
      });
      return 0;
    }
  }
}
