import { describeAt, type DataTable, type ResolvedPositions } from '@framecheck/core';

import type { Scope } from '../nodes/types.js';

import { ValidationWarning } from './validation-warning.js';

export interface MaterializeParams {
  scope: Scope;
  reason: string;
  validation: string;
  /** Failed rows and columns, as resolved from the failed indexer. */
  failed: ResolvedPositions;
  table: DataTable;
}

/** Turn failed positions into warnings shaped by the validation's scope. */
export function materialize({ scope, reason, validation, failed, table }: MaterializeParams): ValidationWarning[] {
  const { rows, columns } = failed;
  if (rows.length === 0 || columns.length === 0) {
    return [];
  }

  const rowLabel = (position: number) => table.labelAt(0, position) ?? position;
  const columnLabel = (position: number) => table.labelAt(1, position) ?? position;

  switch (scope) {
    case 'table':
      return [new ValidationWarning({ message: reason, validation })];

    case 'column':
      return columns.map(
        (c) =>
          new ValidationWarning({
            column: columnLabel(c),
            columnPosition: c,
            message: `${describeAt(1, columnLabel(c))} ${reason}`,
            validation,
          })
      );

    case 'row':
      return rows.map(
        (r) =>
          new ValidationWarning({
            message: `${describeAt(0, rowLabel(r))} ${reason}`,
            row: rowLabel(r),
            rowPosition: r,
            validation,
          })
      );

    case 'cell':
      return rows.flatMap((r) =>
        columns.map(
          (c) =>
            new ValidationWarning({
              column: columnLabel(c),
              columnPosition: c,
              message: reason,
              row: rowLabel(r),
              rowPosition: r,
              validation,
              value: table.cell(r, c),
            })
        )
      );
  }
}
