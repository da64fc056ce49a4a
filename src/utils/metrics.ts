export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Compound annual growth rate, in percent, between the latest entry
 * (index 0) and the entry `years` positions back.
 *
 * Returns undefined when the series is too short or either endpoint is not
 * strictly positive, so "not computable" stays distinct from 0% growth.
 */
export function cagr<K extends string>(
  series: ReadonlyArray<Partial<Record<K, number>>>,
  field: K,
  years: number
): number | undefined {
  if (years <= 0 || series.length < years + 1) return undefined;

  const latest = series[0][field];
  const earliest = series[years][field];
  if (latest === undefined || earliest === undefined) return undefined;
  if (!(latest > 0) || !(earliest > 0)) return undefined;

  return roundTo((Math.pow(latest / earliest, 1 / years) - 1) * 100, 1);
}
