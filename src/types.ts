/**
 * Shared domain types for the aggregation API
 */

export type ProviderName = 'isma' | 'eodhd' | 'yfinance';

/**
 * Outcome of a single upstream lookup. Adapters never throw; a failed or
 * empty lookup is reported as `ok: false` with a short reason.
 */
export type ProviderOutcome<T> =
  | { ok: true; source: ProviderName; data: T }
  | { ok: false; source: ProviderName; reason: string };

export interface RealtimeQuote {
  cmp: number;
  mcapRaw: number;
  pe: number;
  eps: number;
  sector: string;
  industry: string;
  name: string;
  change: number;
  changePct: number;
  yearHigh: number;
  yearLow: number;
  volume: number;
  bookValue: number;
  dividendYield: number;
}

// Revenue and profit are in crores
export interface FinancialYear {
  year: string;
  rev: number;
  pat: number;
}

export interface FinancialSeries {
  years: FinancialYear[]; // most recent first
  shares: number;
}

export interface SearchResult {
  sym: string;
  name: string;
  sec: string;
}

export interface BatchQuote {
  sym: string;
  name: string;
  cmp: number;
  pe: number;
  mcapCr: number;
  dayChangePct: number;
}

export interface RecordProvenance {
  realtime: ProviderName | 'none';
  financials: ProviderName | 'none';
  years_available: number;
}

export interface MergedStockRecord {
  sym: string;
  name: string;
  sec: string;
  industry: string;
  cmp: number;
  shr: number;
  mcapCr: number;
  pe: number;
  eps: number;
  pat: number;
  rev: number;
  r3?: number;
  r5?: number;
  p3?: number;
  p5?: number;
  dayChange: number;
  dayChangePct: number;
  yearHigh: number;
  yearLow: number;
  volume: number;
  bookValue: number;
  dividendYield: number;
  years: FinancialYear[];
  _source: RecordProvenance;
}

export type ProbeReport = Record<string, string | number | boolean>;

export interface RealtimeQuoteProvider {
  readonly name: ProviderName;
  fetchQuote(symbol: string): Promise<ProviderOutcome<RealtimeQuote>>;
}

export interface FinancialsProvider {
  readonly name: ProviderName;
  fetchFinancials(symbol: string): Promise<ProviderOutcome<FinancialSeries>>;
}

export interface SymbolSearchProvider {
  readonly name: ProviderName;
  search(query: string): Promise<SearchResult[]>;
}

export interface BatchQuoteProvider {
  readonly name: ProviderName;
  fetchBatchQuotes(symbols: string[]): Promise<BatchQuote[]>;
}

export interface ProbeableProvider {
  readonly name: ProviderName;
  probe(): Promise<ProbeReport>;
}
