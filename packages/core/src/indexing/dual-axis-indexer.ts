import { err, ok, type Result } from 'neverthrow';

import { ConfigurationError, type IndexResolutionError } from '../errors/index.js';
import type { DataTable } from '../table/data-table.js';
import type { Series } from '../table/series.js';
import type { Axis, CellValue, Label } from '../table/types.js';

import { AxisIndexer } from './axis-indexer.js';
import type { IndexKind, IndexValue } from './index-value.js';

/** What a DualAxisIndexer selects: one cell, one row or column, or a block. */
export type Selection =
  | {
      readonly kind: 'cell';
      readonly value: CellValue;
      readonly row: Label;
      readonly column: Label;
      readonly rowPosition: number;
      readonly columnPosition: number;
    }
  | { readonly kind: 'series'; readonly series: Series }
  | { readonly kind: 'frame'; readonly frame: DataTable };

export interface ResolvedPositions {
  rows: number[];
  columns: number[];
}

/**
 * Pair of row and column indexers addressing a region of a table.
 */
export class DualAxisIndexer {
  readonly rowIndex: AxisIndexer;
  readonly colIndex: AxisIndexer;

  /**
   * @throws ConfigurationError when an indexer sits on the wrong axis
   */
  constructor(rowIndex: AxisIndexer, colIndex: AxisIndexer) {
    if (rowIndex.axis !== 0 || colIndex.axis !== 1) {
      throw new ConfigurationError(
        `Row index must be on axis 0 and column index on axis 1, got ${String(rowIndex.axis)} and ${String(colIndex.axis)}`
      );
    }
    this.rowIndex = rowIndex;
    this.colIndex = colIndex;
  }

  /** Every row of the selected column(s). */
  static column(index: IndexValue, kind?: IndexKind): DualAxisIndexer {
    return new DualAxisIndexer(AxisIndexer.all(0), AxisIndexer.of(index, 1, kind));
  }

  /** Every column of the selected row(s). */
  static row(index: IndexValue, kind?: IndexKind): DualAxisIndexer {
    return new DualAxisIndexer(AxisIndexer.of(index, 0, kind), AxisIndexer.all(1));
  }

  static all(): DualAxisIndexer {
    return new DualAxisIndexer(AxisIndexer.all(0), AxisIndexer.all(1));
  }

  axisIndexer(axis: Axis): AxisIndexer {
    return axis === 0 ? this.rowIndex : this.colIndex;
  }

  withAxis(axis: Axis, indexer: AxisIndexer): DualAxisIndexer {
    return axis === 0 ? new DualAxisIndexer(indexer, this.colIndex) : new DualAxisIndexer(this.rowIndex, indexer);
  }

  /** Resolve rows first, then columns. */
  resolve(table: DataTable): Result<ResolvedPositions, IndexResolutionError> {
    const rows = this.rowIndex.resolve(table);
    if (rows.isErr()) {
      return err(rows.error);
    }
    const columns = this.colIndex.resolve(table);
    if (columns.isErr()) {
      return err(columns.error);
    }
    return ok({ columns: columns.value, rows: rows.value });
  }

  apply(table: DataTable): Result<Selection, IndexResolutionError> {
    return this.resolve(table).map(({ rows, columns }): Selection => {
      const row = rows[0];
      const column = columns[0];
      const rowScalar = this.rowIndex.isScalar && row !== undefined && rows.length === 1;
      const columnScalar = this.colIndex.isScalar && column !== undefined && columns.length === 1;

      if (rowScalar && columnScalar) {
        return {
          column: table.labelAt(1, column) ?? column,
          columnPosition: column,
          kind: 'cell',
          row: table.labelAt(0, row) ?? row,
          rowPosition: row,
          value: table.cell(row, column),
        };
      }
      if (columnScalar) {
        return { kind: 'series', series: table.vector(0, column, rows) };
      }
      if (rowScalar) {
        return { kind: 'series', series: table.vector(1, row, columns) };
      }
      return { frame: table.take(rows, columns), kind: 'frame' };
    });
  }

  /** Complement the selection on `axis`, leaving the other axis untouched. */
  invert(axis: Axis): Result<DualAxisIndexer, ConfigurationError> {
    return this.axisIndexer(axis)
      .invert()
      .map((inverted) => this.withAxis(axis, inverted));
  }

  /** `Row 2, Column "age"`; undefined when both axes select everything. */
  describe(): string | undefined {
    const parts = [this.rowIndex.describe(), this.colIndex.describe()].filter(
      (part): part is string => part !== undefined
    );
    return parts.length > 0 ? parts.join(', ') : undefined;
  }

  equals(other: DualAxisIndexer): boolean {
    return this.rowIndex.equals(other.rowIndex) && this.colIndex.equals(other.colIndex);
  }
}
