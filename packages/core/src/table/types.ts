export type CellValue = string | number | boolean | bigint | Date | null | undefined;

/** Row or column label. */
export type Label = string | number;

/** 0 runs along rows, 1 along columns. */
export type Axis = 0 | 1;

export type Dtype = 'integer' | 'float' | 'string' | 'boolean' | 'bigint' | 'date' | 'mixed' | 'empty';

/** A concrete dtype, or `number` for either numeric dtype. */
export type DtypeCheck = Dtype | 'number';

/** Strings are quoted, numbers are not: `"age"`, `3`. */
export function formatLabel(label: Label): string {
  return typeof label === 'string' ? `"${label}"` : String(label);
}

export function otherAxis(axis: Axis): Axis {
  return axis === 0 ? 1 : 0;
}
