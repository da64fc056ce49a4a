import { describe, it, expect } from 'vitest';
import { cagr, roundTo } from '../src/utils/metrics';

describe('cagr', () => {
  it('computes growth between the latest entry and n years back', () => {
    const rows = [{ rev: 200 }, { rev: 150 }, { rev: 100 }];
    expect(cagr(rows, 'rev', 2)).toBe(41.4);
  });

  it('rounds to one decimal place', () => {
    // (1331/1000)^(1/3) = 1.1 exactly
    const rows = [{ rev: 1331 }, { rev: 1210 }, { rev: 1100 }, { rev: 1000 }];
    expect(cagr(rows, 'rev', 3)).toBe(10);
  });

  it('is undefined when the series is shorter than n + 1', () => {
    expect(cagr([{ rev: 200 }, { rev: 150 }], 'rev', 2)).toBeUndefined();
    expect(cagr([], 'rev', 3)).toBeUndefined();
  });

  it('is undefined when either endpoint is zero or negative', () => {
    expect(cagr([{ pat: 0 }, { pat: 10 }], 'pat', 1)).toBeUndefined();
    expect(cagr([{ pat: 10 }, { pat: -5 }], 'pat', 1)).toBeUndefined();
  });

  it('is undefined when an endpoint lacks the field', () => {
    expect(cagr([{ rev: 10 }, {}], 'rev', 1)).toBeUndefined();
  });

  it('reports shrinking series as negative growth', () => {
    expect(cagr([{ rev: 50 }, { rev: 100 }], 'rev', 1)).toBe(-50);
  });

  it('treats a flat series as zero growth', () => {
    expect(cagr([{ rev: 100 }, { rev: 100 }], 'rev', 1)).toBe(0);
  });
});

describe('roundTo', () => {
  it('rounds to the requested number of decimals', () => {
    expect(roundTo(41.4213, 1)).toBe(41.4);
    expect(roundTo(2.456, 2)).toBe(2.46);
    expect(roundTo(1439.6, 0)).toBe(1440);
  });
});
