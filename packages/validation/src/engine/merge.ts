import type { Axis, DataTable } from '@framecheck/core';

import type { Scope } from '../nodes/types.js';
import { ValidationWarning, type WarningInit } from '../warnings/validation-warning.js';

/** A child's contribution to a combinator: its pass mask and its warnings. */
export interface ChildOutcome {
  passed: readonly boolean[];
  warnings: readonly ValidationWarning[];
}

const ANY = '*';

function key(row: number | undefined, column: number | undefined): string {
  return `${row === undefined ? ANY : String(row)}:${column === undefined ? ANY : String(column)}`;
}

/** Warnings keyed by their coordinates; a missing coordinate keys as `*`. */
class WarningLookup {
  private readonly byKey = new Map<string, ValidationWarning>();

  constructor(warnings: readonly ValidationWarning[]) {
    for (const warning of warnings) {
      const k = key(warning.rowPosition, warning.columnPosition);
      if (!this.byKey.has(k)) {
        this.byKey.set(k, warning);
      }
    }
  }

  /** Most specific warning covering the cell. */
  find(row: number, column: number): ValidationWarning | undefined {
    return (
      this.byKey.get(key(row, column)) ??
      this.byKey.get(key(row, undefined)) ??
      this.byKey.get(key(undefined, column)) ??
      this.byKey.get(key(undefined, undefined))
    );
  }
}

const NEEDS_ROW: Readonly<Record<Scope, boolean>> = { cell: true, column: false, row: true, table: false };
const NEEDS_COLUMN: Readonly<Record<Scope, boolean>> = { cell: true, column: true, row: false, table: false };

/**
 * Copies of coordinate-less child warnings, pinned to the cells where the
 * combinator reports them. One copy per warning and location.
 */
class Locator {
  private readonly copies = new Map<ValidationWarning, Map<string, ValidationWarning>>();

  constructor(
    private readonly scope: Scope,
    private readonly table: DataTable
  ) {}

  locate(warning: ValidationWarning, row: number, column: number): ValidationWarning {
    const addRow = NEEDS_ROW[this.scope] && warning.rowPosition === undefined;
    const addColumn = NEEDS_COLUMN[this.scope] && warning.columnPosition === undefined;
    if (!addRow && !addColumn) {
      return warning;
    }

    const rowPosition = addRow ? row : warning.rowPosition;
    const columnPosition = addColumn ? column : warning.columnPosition;
    let byKey = this.copies.get(warning);
    if (byKey === undefined) {
      byKey = new Map();
      this.copies.set(warning, byKey);
    }
    const k = key(rowPosition, columnPosition);
    const cached = byKey.get(k);
    if (cached !== undefined) {
      return cached;
    }

    const init: WarningInit = {
      column: addColumn ? (this.table.labelAt(1, column) ?? column) : warning.column,
      columnPosition,
      message: warning.message,
      row: addRow ? (this.table.labelAt(0, row) ?? row) : warning.row,
      rowPosition,
      validation: warning.validation,
    };
    if (rowPosition !== undefined && columnPosition !== undefined) {
      init.value = this.table.cell(rowPosition, columnPosition);
    }
    const copy = new ValidationWarning(init);
    byKey.set(k, copy);
    return copy;
  }
}

export interface MergeParams {
  operator: 'and' | 'or';
  /** Merged scope of the combinator; shapes the warnings it reports. */
  scope: Scope;
  table: DataTable;
  axis: Axis;
  /** Combined pass mask along `axis`. */
  passed: readonly boolean[];
  /** Positions held fixed on the other axis, shared by both children. */
  fixedPositions: readonly number[];
  left: ChildOutcome;
  right: ChildOutcome;
}

/**
 * Warnings of a combinator, walking its failed positions in ascending order.
 *
 * At each failed cell the warnings of the children that failed there are
 * looked up; a child warning without a coordinate covers every cell where
 * that child failed. Where the combinator's scope asks for a coordinate the
 * child warning lacks, a copy located at the cell stands in for it. When both
 * children failed the two warnings are merged into one, once per pair. Each
 * warning object is emitted at most once.
 */
export function mergeWarnings({
  operator,
  scope,
  table,
  axis,
  passed,
  fixedPositions,
  left,
  right,
}: MergeParams): ValidationWarning[] {
  const leftLookup = new WarningLookup(left.warnings);
  const rightLookup = new WarningLookup(right.warnings);
  const locator = new Locator(scope, table);
  const merged = new Map<ValidationWarning, Map<ValidationWarning, ValidationWarning>>();
  const emitted = new Set<ValidationWarning>();
  const result: ValidationWarning[] = [];

  const mergeOnce = (l: ValidationWarning, r: ValidationWarning): ValidationWarning => {
    let byRight = merged.get(l);
    if (byRight === undefined) {
      byRight = new Map();
      merged.set(l, byRight);
    }
    let warning = byRight.get(r);
    if (warning === undefined) {
      warning = ValidationWarning.merge(operator, l, r);
      byRight.set(r, warning);
    }
    return warning;
  };

  passed.forEach((flag, p) => {
    if (flag) return;

    for (const c of fixedPositions) {
      const row = axis === 0 ? p : c;
      const column = axis === 0 ? c : p;
      const foundLeft = left.passed[p] === false ? leftLookup.find(row, column) : undefined;
      const foundRight = right.passed[p] === false ? rightLookup.find(row, column) : undefined;
      const l = foundLeft && locator.locate(foundLeft, row, column);
      const r = foundRight && locator.locate(foundRight, row, column);

      const warning = l !== undefined && r !== undefined ? mergeOnce(l, r) : (l ?? r);
      if (warning !== undefined && !emitted.has(warning)) {
        emitted.add(warning);
        result.push(warning);
      }
    }
  });

  return result;
}
