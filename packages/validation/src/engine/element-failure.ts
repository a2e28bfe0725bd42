import type { CellValue, Series } from '@framecheck/core';

import type { SeriesCheck } from '../nodes/types.js';

/**
 * Thrown by element-wise checks so the evaluator can report which element of
 * the series raised `cause`.
 */
export class ElementFailure extends Error {
  constructor(
    readonly offset: number,
    cause: unknown
  ) {
    super(`Element ${String(offset)} raised an error`, { cause });
    this.name = 'ElementFailure';
  }
}

/** Lift a per-value predicate into a series check. */
export function elementwise(predicate: (value: CellValue) => boolean): SeriesCheck {
  return {
    kind: 'series',
    test: (series: Series) =>
      series.map((value, offset) => {
        try {
          return predicate(value);
        } catch (error) {
          throw new ElementFailure(offset, error);
        }
      }),
  };
}
