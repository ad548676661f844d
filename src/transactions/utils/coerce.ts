import type { CellValue } from '../base/types';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export const isMissing = (value: CellValue): value is null | undefined =>
  value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));

/** Cell rendered the way a spreadsheet user would read it. */
export const cellToString = (value: CellValue): string => {
  if (isMissing(value)) return '';
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
};

/**
 * Integer from a numeric cell or an integer-looking string. Fractional numbers
 * are truncated; strings such as "2024.0" are rejected.
 */
export const toInteger = (value: CellValue): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
  }
  return null;
};

/** Float from a cell; anything unparseable becomes NaN. */
export const toNumber = (value: CellValue): number => {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return DECIMAL_PATTERN.test(trimmed) ? Number.parseFloat(trimmed) : NaN;
  }
  return NaN;
};

/** "1,234,567" → 1234567. Returns null for missing or non-integer input. */
export const parseDealAmount = (value: CellValue): number | null => {
  if (isMissing(value)) return null;
  const cleaned = cellToString(value).replace(/,/g, '').trim();
  return INTEGER_PATTERN.test(cleaned) ? Number.parseInt(cleaned, 10) : null;
};
