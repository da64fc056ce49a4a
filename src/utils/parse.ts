/**
 * Narrowing helpers for upstream JSON, which is never trusted to match its documented shape
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Finite number or numeric string, else undefined
 */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function numberOr(value: unknown, fallback = 0): number {
  return toNumber(value) ?? fallback;
}

export function stringOr(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

export function toDateString(value: unknown): string {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? '' : value.toISOString().split('T')[0];
  if (typeof value === 'number') return new Date(value * 1000).toISOString().split('T')[0];
  if (typeof value === 'string') return value.split('T')[0];
  return '';
}
