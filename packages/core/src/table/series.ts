import type { Axis, CellValue, Dtype, Label } from './types.js';

export interface SeriesInit {
  name: Label;
  axis: Axis;
  labels: readonly Label[];
  positions: readonly number[];
  values: readonly CellValue[];
  dtype: Dtype;
}

/**
 * One-dimensional slice of a table.
 *
 * `axis` 0 runs down a column (labels are row labels, `name` is the column);
 * `axis` 1 runs across a row. `positions` are positions in the source table
 * along `axis`, so results can be mapped back onto it.
 */
export class Series {
  readonly name: Label;
  readonly axis: Axis;
  readonly labels: readonly Label[];
  readonly positions: readonly number[];
  readonly values: readonly CellValue[];
  readonly dtype: Dtype;

  constructor(init: SeriesInit) {
    this.name = init.name;
    this.axis = init.axis;
    this.labels = init.labels;
    this.positions = init.positions;
    this.values = init.values;
    this.dtype = init.dtype;
  }

  get length(): number {
    return this.values.length;
  }

  map<T>(fn: (value: CellValue, offset: number) => T): T[] {
    return this.values.map(fn);
  }
}
