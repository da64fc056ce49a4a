const EXCHANGE_SUFFIXES = ['.NS', '.BO'];

/**
 * Upper-case a ticker and drop NSE/BSE suffixes: "tcs.ns" -> "TCS"
 */
export function normalizeSymbol(symbol: string): string {
  let clean = symbol.trim().toUpperCase();
  for (const suffix of EXCHANGE_SUFFIXES) {
    clean = clean.split(suffix).join('');
  }
  return clean;
}

/**
 * Qualify a bare ticker for an exchange, leaving already-qualified ones alone
 */
export function withExchangeSuffix(symbol: string, suffix: string): string {
  return symbol.includes('.') ? symbol : `${symbol}${suffix}`;
}
