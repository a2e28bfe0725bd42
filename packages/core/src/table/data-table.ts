import { ConfigurationError } from '../errors/index.js';

import { inferDtype } from './dtype.js';
import { Series } from './series.js';
import { formatLabel, type Axis, type CellValue, type Dtype, type Label } from './types.js';

export interface TableOptions {
  /** Row labels; defaults to `0..n-1`. */
  index?: readonly Label[] | undefined;
  /** Declared dtypes by column label. Undeclared columns are inferred. */
  dtypes?: Readonly<Record<string, Dtype>> | undefined;
}

function range(length: number): number[] {
  return Array.from({ length }, (_, i) => i);
}

/**
 * Immutable in-memory table with labelled rows and columns.
 *
 * Storage is column-major. Column labels are unique; row labels may repeat.
 */
export class DataTable {
  private constructor(
    private readonly columnLabels: readonly Label[],
    private readonly rowLabels: readonly Label[],
    private readonly data: readonly (readonly CellValue[])[],
    private readonly dtypes: readonly Dtype[]
  ) {}

  /**
   * Columns keyed by label, in the object's key order. JavaScript lists
   * integer-like keys (`'2020'`) before all others whatever the literal says;
   * use `fromEntries` when such labels must keep their place.
   *
   * @throws ConfigurationError on ragged columns or a row index of the wrong length
   */
  static fromColumns(columns: Readonly<Record<string, readonly CellValue[]>>, options?: TableOptions): DataTable {
    return DataTable.build(Object.keys(columns), Object.values(columns), options);
  }

  /**
   * Columns as `[label, values]` pairs, kept in the given order.
   * @throws ConfigurationError on ragged columns, duplicate labels or a row index of the wrong length
   */
  static fromEntries(
    entries: readonly (readonly [Label, readonly CellValue[]])[],
    options?: TableOptions
  ): DataTable {
    return DataTable.build(
      entries.map(([label]) => label),
      entries.map(([, values]) => values),
      options
    );
  }

  /**
   * @throws ConfigurationError on rows whose width differs from the column count
   */
  static fromRows(
    columns: readonly Label[],
    rows: readonly (readonly CellValue[])[],
    options?: TableOptions
  ): DataTable {
    rows.forEach((row, i) => {
      if (row.length !== columns.length) {
        throw new ConfigurationError(
          `Row ${String(i)} has ${String(row.length)} values, expected ${String(columns.length)}`
        );
      }
    });

    const data = columns.map((_, c) => rows.map((row) => row[c]));
    return DataTable.build(columns, data, { ...options, index: options?.index ?? range(rows.length) });
  }

  /** Single-column table; the column label defaults to `0`. */
  static fromValues(values: readonly CellValue[], options?: { name?: Label | undefined }): DataTable {
    return DataTable.build([options?.name ?? 0], [values], undefined);
  }

  private static build(
    columns: readonly Label[],
    data: readonly (readonly CellValue[])[],
    options: TableOptions | undefined
  ): DataTable {
    const seen = new Set<Label>();
    for (const label of columns) {
      if (seen.has(label)) {
        throw new ConfigurationError(`Duplicate column label ${formatLabel(label)}`);
      }
      seen.add(label);
    }

    const rowCount = options?.index?.length ?? data[0]?.length ?? 0;
    data.forEach((values, c) => {
      if (values.length !== rowCount) {
        throw new ConfigurationError(
          `Column ${formatLabel(columns[c] ?? c)} has ${String(values.length)} values, expected ${String(rowCount)}`
        );
      }
    });

    const dtypes = columns.map((label, c) => options?.dtypes?.[String(label)] ?? inferDtype(data[c] ?? []));
    return new DataTable([...columns], options?.index ? [...options.index] : range(rowCount), data, dtypes);
  }

  rowCount(): number {
    return this.rowLabels.length;
  }

  columnCount(): number {
    return this.columnLabels.length;
  }

  length(axis: Axis): number {
    return axis === 0 ? this.rowCount() : this.columnCount();
  }

  labels(axis: Axis): readonly Label[] {
    return axis === 0 ? this.rowLabels : this.columnLabels;
  }

  labelAt(axis: Axis, position: number): Label | undefined {
    return this.labels(axis)[position];
  }

  /** Position of the first row or column carrying `label`. */
  findLabel(axis: Axis, label: Label): number | undefined {
    const position = this.labels(axis).indexOf(label);
    return position === -1 ? undefined : position;
  }

  /** Every position carrying `label`; row labels may repeat. */
  findLabels(axis: Axis, label: Label): number[] {
    return this.labels(axis).flatMap((candidate, position) => (candidate === label ? [position] : []));
  }

  cell(row: number, column: number): CellValue {
    return this.data[column]?.[row];
  }

  dtype(column: number): Dtype {
    return this.dtypes[column] ?? 'empty';
  }

  column(position: number): Series {
    return this.vector(0, position);
  }

  row(position: number): Series {
    return this.vector(1, position);
  }

  /**
   * Series running along `axis` at `fixed` on the other axis, restricted to
   * `positions` (all of the axis when omitted).
   *
   * Column series keep the column's dtype; row series infer theirs.
   */
  vector(axis: Axis, fixed: number, positions?: readonly number[]): Series {
    const along = positions ?? range(this.length(axis));
    const values = along.map((p) => (axis === 0 ? this.cell(p, fixed) : this.cell(fixed, p)));
    const labels = this.labels(axis);

    return new Series({
      axis,
      dtype: axis === 0 ? this.dtype(fixed) : inferDtype(values),
      labels: along.map((p) => labels[p] ?? p),
      name: this.labelAt(axis === 0 ? 1 : 0, fixed) ?? fixed,
      positions: along,
      values,
    });
  }

  /** Sub-table of the given row and column positions, in the given order. */
  take(rows: readonly number[], columns: readonly number[]): DataTable {
    return new DataTable(
      columns.map((c) => this.columnLabels[c] ?? c),
      rows.map((r) => this.rowLabels[r] ?? r),
      columns.map((c) => rows.map((r) => this.cell(r, c))),
      columns.map((c) => this.dtype(c))
    );
  }
}
