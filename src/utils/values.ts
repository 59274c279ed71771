export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Empty in the extraction sense: null, false, 0, '', [] or {}. */
export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined || value === false) return true;
  if (typeof value === 'number') return value === 0 || Number.isNaN(value);
  if (typeof value === 'string') return value.length === 0;
  if (Array.isArray(value)) return value.length === 0;
  if (isRecord(value)) return Object.keys(value).length === 0;
  return false;
}

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Reads a SEK amount. Accepts numbers and report-formatted strings such as
 * "1 234 567", "1 234,50" or "-12 000 kr". Returns null when unreadable.
 */
export function toAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const normalized = value
    .replace(/kr\.?$/i, '')
    .replace(/[\s  ]/g, '')
    .replace(/−/g, '-')
    .replace(',', '.');

  return AMOUNT_PATTERN.test(normalized) ? parseFloat(normalized) : null;
}

export const hasField = (record: Record<string, unknown>, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(record, key);
