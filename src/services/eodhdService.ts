/**
 * EODHD Fundamentals Service
 * Primary source of yearly income statements. Disabled unless an API key is
 * configured, in which case every lookup reports "no data" and the caller
 * falls back to the secondary provider.
 */

import axios, { type AxiosInstance } from 'axios';
import type {
  FinancialSeries,
  FinancialYear,
  FinancialsProvider,
  ProbeableProvider,
  ProbeReport,
  ProviderOutcome,
} from '../types';
import { CRORE, MAX_FINANCIAL_YEARS, PROBE_SYMBOL, TIMEOUT } from '../utils/constants';
import { describeError } from '../utils/errors';
import log from '../utils/logger';
import { isRecord, numberOr } from '../utils/parse';
import { roundTo } from '../utils/metrics';
import { normalizeSymbol } from '../utils/symbols';

const SERVICE = 'EodhdService';
const EODHD_BASE_URL = 'https://eodhd.com/api';

/**
 * Pull `Income_Statement.yearly` out of the response. With `filter=Financials`
 * the section may come back on its own or still wrapped in `Financials`.
 */
function yearlyIncomeStatements(body: unknown): Record<string, unknown> | undefined {
  if (!isRecord(body)) return undefined;
  const financials = isRecord(body.Financials) ? body.Financials : body;
  const income = financials.Income_Statement;
  if (!isRecord(income) || !isRecord(income.yearly)) return undefined;
  return income.yearly;
}

export class EodhdService implements FinancialsProvider, ProbeableProvider {
  readonly name = 'eodhd' as const;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly http: AxiosInstance = axios.create()
  ) {}

  get configured(): boolean {
    return Boolean(this.apiKey);
  }

  async fetchFinancials(symbol: string): Promise<ProviderOutcome<FinancialSeries>> {
    if (!this.apiKey) {
      return { ok: false, source: this.name, reason: 'EODHD_API_KEY not configured' };
    }

    const ticker = `${normalizeSymbol(symbol)}.NSE`;
    const start = Date.now();

    try {
      const response = await this.http.get<unknown>(`${EODHD_BASE_URL}/fundamentals/${ticker}`, {
        params: { api_token: this.apiKey, fmt: 'json', filter: 'Financials' },
        timeout: TIMEOUT.FINANCIALS,
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        log.warn('EODHD returned non-success status', { service: SERVICE, ticker, status: response.status });
        return { ok: false, source: this.name, reason: `HTTP ${response.status}` };
      }

      const yearly = yearlyIncomeStatements(response.data);
      if (!yearly || Object.keys(yearly).length === 0) {
        log.warn('EODHD response has no income statement', { service: SERVICE, ticker });
        return { ok: false, source: this.name, reason: 'no income statement' };
      }

      const years: FinancialYear[] = Object.entries(yearly)
        .sort(([a], [b]) => b.localeCompare(a))
        .slice(0, MAX_FINANCIAL_YEARS)
        .map(([dateKey, statement]) => {
          const stmt = isRecord(statement) ? statement : {};
          return {
            year: dateKey.slice(0, 4),
            rev: roundTo(numberOr(stmt.totalRevenue) / CRORE, 2),
            pat: roundTo(numberOr(stmt.netIncome) / CRORE, 2),
          };
        });

      log.api(SERVICE, '/fundamentals', Date.now() - start, true, { ticker, years: years.length });
      return { ok: true, source: this.name, data: { years, shares: 0 } };
    } catch (error) {
      const reason = describeError(error);
      log.error('EODHD financials fetch failed', { service: SERVICE, ticker, error: reason });
      log.api(SERVICE, '/fundamentals', Date.now() - start, false, { ticker });
      return { ok: false, source: this.name, reason };
    }
  }

  async probe(): Promise<ProbeReport> {
    if (!this.apiKey) {
      return { configured: false, note: 'Set EODHD_API_KEY env var to enable' };
    }

    try {
      const response = await this.http.get<unknown>(`${EODHD_BASE_URL}/eod/${PROBE_SYMBOL}.NSE`, {
        params: { api_token: this.apiKey, fmt: 'json', limit: 1 },
        timeout: TIMEOUT.PROBE,
        validateStatus: () => true,
      });
      return { working: response.status === 200, key_prefix: `${this.apiKey.slice(0, 5)}...` };
    } catch (error) {
      return { working: false, error: describeError(error) };
    }
  }
}
