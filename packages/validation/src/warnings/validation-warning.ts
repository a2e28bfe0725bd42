import type { CellValue, Label } from '@framecheck/core';

export interface WarningInit {
  message: string;
  /** Name of the rule that produced the warning, or `and`/`or` for merged ones. */
  validation: string;
  row?: Label | undefined;
  column?: Label | undefined;
  rowPosition?: number | undefined;
  columnPosition?: number | undefined;
  /** Set only for cell warnings; the value itself may be null. */
  value?: CellValue;
  children?: readonly [ValidationWarning, ValidationWarning] | undefined;
}

function renderValue(value: CellValue): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

function specificity(warning: ValidationWarning): number {
  return (warning.rowPosition === undefined ? 0 : 1) + (warning.columnPosition === undefined ? 0 : 1);
}

/**
 * A single reported violation, located by row and/or column where the
 * producing validation's scope allows.
 */
export class ValidationWarning {
  readonly message: string;
  readonly validation: string;
  readonly row?: Label | undefined;
  readonly column?: Label | undefined;
  readonly rowPosition?: number | undefined;
  readonly columnPosition?: number | undefined;
  readonly value?: CellValue;
  readonly hasValue: boolean;
  readonly children?: readonly [ValidationWarning, ValidationWarning] | undefined;

  constructor(init: WarningInit) {
    this.message = init.message;
    this.validation = init.validation;
    this.row = init.row;
    this.column = init.column;
    this.rowPosition = init.rowPosition;
    this.columnPosition = init.columnPosition;
    this.hasValue = 'value' in init;
    this.value = init.value;
    this.children = init.children;
  }

  /**
   * Merge the warnings two children of a combinator raised at the same place.
   * Coordinates come from the more specific child (the left one on a tie).
   */
  static merge(operator: 'and' | 'or', left: ValidationWarning, right: ValidationWarning): ValidationWarning {
    const located = specificity(right) > specificity(left) ? right : left;
    const init: WarningInit = {
      children: [left, right],
      column: located.column,
      columnPosition: located.columnPosition,
      message: operator === 'and' ? left.message : `${left.message} and ${right.message}`,
      row: located.row,
      rowPosition: located.rowPosition,
      validation: operator,
    };
    if (located.hasValue) {
      init.value = located.value;
    }
    return new ValidationWarning(init);
  }

  /**
   * `{row: 2, column: "age"}: "-4" was not in the range [0, 130)` for cell
   * warnings; the bare message otherwise.
   */
  render(): string {
    if (this.row !== undefined && this.column !== undefined && this.hasValue) {
      return `{row: ${String(this.row)}, column: "${String(this.column)}"}: "${renderValue(this.value)}" ${this.message}`;
    }
    return this.message;
  }

  toString(): string {
    return this.render();
  }

  toJSON() {
    return {
      column: this.column,
      columnPosition: this.columnPosition,
      message: this.message,
      row: this.row,
      rowPosition: this.rowPosition,
      validation: this.validation,
      value: this.hasValue ? renderValue(this.value) : undefined,
    };
  }
}
