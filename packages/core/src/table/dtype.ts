import type { CellValue, Dtype, DtypeCheck } from './types.js';

function dtypeOf(value: NonNullable<CellValue>): Dtype {
  switch (typeof value) {
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'float';
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    case 'bigint':
      return 'bigint';
    default:
      return 'date';
  }
}

/**
 * Infer a dtype from the non-null values of a column or row.
 * Integers mixed with floats widen to `float`; any other mix is `mixed`.
 */
export function inferDtype(values: readonly CellValue[]): Dtype {
  let result: Dtype = 'empty';

  for (const value of values) {
    if (value === null || value === undefined) continue;

    const current = dtypeOf(value);
    if (result === 'empty' || result === current) {
      result = current;
    } else if ((result === 'integer' && current === 'float') || (result === 'float' && current === 'integer')) {
      result = 'float';
    } else {
      return 'mixed';
    }
  }

  return result;
}

export function dtypeMatches(actual: Dtype, expected: DtypeCheck): boolean {
  if (expected === 'number') {
    return actual === 'integer' || actual === 'float';
  }
  return actual === expected;
}

/**
 * Stable identity for a cell value, used for duplicate detection.
 * Values of different types never share a key (`1` and `'1'` differ).
 */
export function cellKey(value: CellValue): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (value instanceof Date) return `date:${String(value.getTime())}`;
  return `${typeof value}:${String(value)}`;
}
