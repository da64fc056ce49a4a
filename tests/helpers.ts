import { AxiosHeaders, type AxiosResponse } from 'axios';
import { vi } from 'vitest';
import type {
  BatchQuote,
  FinancialSeries,
  ProviderName,
  ProviderOutcome,
  RealtimeQuote,
  SearchResult,
} from '../src/types';

export function axiosResponse<T>(data: T, status = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

export function quote(overrides: Partial<RealtimeQuote> = {}): RealtimeQuote {
  return {
    cmp: 4000,
    mcapRaw: 14_400_000_000_000,
    pe: 30,
    eps: 133.3,
    sector: 'Information Technology',
    industry: 'IT Services',
    name: 'Test Consultancy Ltd',
    change: 12.5,
    changePct: 0.31,
    yearHigh: 4500,
    yearLow: 3300,
    volume: 1_250_000,
    bookValue: 280,
    dividendYield: 1.2,
    ...overrides,
  };
}

export function series(revs: number[], pats: number[] = revs.map(r => r / 10), shares = 0): FinancialSeries {
  return {
    years: revs.map((rev, i) => ({ year: String(2024 - i), rev, pat: pats[i] })),
    shares,
  };
}

export function fakeRealtime(outcome: ProviderOutcome<RealtimeQuote>) {
  return {
    name: 'isma' as const,
    fetchQuote: vi.fn(async (_symbol: string) => outcome),
  };
}

export function fakeFinancials(name: ProviderName, outcome: ProviderOutcome<FinancialSeries>) {
  return {
    name,
    fetchFinancials: vi.fn(async (_symbol: string) => outcome),
  };
}

export function fakeBatch(results: BatchQuote[]) {
  return {
    name: 'isma' as const,
    fetchBatchQuotes: vi.fn(async (_symbols: string[]) => results),
  };
}

export function fakeSearch(name: ProviderName, results: SearchResult[]) {
  return {
    name,
    search: vi.fn(async (_query: string) => results),
  };
}
