import { Decimal } from 'decimal.js';

import type { CellValue } from '../table/types.js';

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parse a numeric cell into a Decimal.
 *
 * Numbers, bigints and plain decimal strings (surrounding whitespace allowed)
 * parse; NaN, booleans, dates and everything else do not. Infinite numbers
 * parse to infinite Decimals.
 */
export function tryParseDecimal(value: CellValue): Decimal | undefined {
  if (typeof value === 'number') {
    return Number.isNaN(value) ? undefined : new Decimal(value);
  }
  if (typeof value === 'bigint') {
    return new Decimal(value.toString());
  }
  if (typeof value !== 'string') {
    return undefined;
  }

  const text = value.trim();
  if (!NUMERIC_TEXT.test(text)) {
    return undefined;
  }

  try {
    return new Decimal(text);
  } catch {
    return undefined;
  }
}
