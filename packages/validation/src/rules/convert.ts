import { tryParseDecimal, type CellValue } from '@framecheck/core';

export type ConversionTarget = 'integer' | 'number' | 'bigint' | 'boolean' | 'date';

const INTEGER_TEXT = /^[+-]?\d+$/;
const BOOLEAN_TEXT = new Set(['true', 'false', 'yes', 'no', '1', '0']);

function isIntegral(value: CellValue): boolean {
  if (typeof value === 'number') return Number.isInteger(value);
  if (typeof value === 'bigint') return true;
  return typeof value === 'string' && INTEGER_TEXT.test(value.trim());
}

/**
 * Conversions `canConvert` checks, each returning whether the cell converts.
 * Integers must fit a JavaScript number exactly; bigints may be any size.
 */
export const CONVERTERS: Record<ConversionTarget, (value: CellValue) => boolean> = {
  bigint: isIntegral,
  boolean: (value) => {
    if (typeof value === 'boolean') return true;
    if (typeof value === 'number') return value === 0 || value === 1;
    return typeof value === 'string' && BOOLEAN_TEXT.has(value.trim().toLowerCase());
  },
  date: (value) => {
    if (value instanceof Date) return !Number.isNaN(value.getTime());
    if (typeof value === 'number') return Number.isFinite(value);
    return typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Date.parse(value));
  },
  integer: (value) => {
    if (!isIntegral(value)) return false;
    const parsed = tryParseDecimal(value);
    return parsed !== undefined && parsed.abs().lte(Number.MAX_SAFE_INTEGER);
  },
  number: (value) => typeof value === 'number' || tryParseDecimal(value) !== undefined,
};
