import { DataTable } from '@framecheck/core';
import { describe, expect, it } from 'vitest';

import { materialize } from '../materialize.js';
import { ValidationWarning } from '../validation-warning.js';

describe('ValidationWarning', () => {
  it('should render cell warnings with their coordinates and value', () => {
    const warning = new ValidationWarning({
      column: 'age',
      message: 'was not in the range [0, 130)',
      row: 2,
      validation: 'inRange',
      value: -4,
    });
    expect(warning.render()).toBe('{row: 2, column: "age"}: "-4" was not in the range [0, 130)');
    expect(String(warning)).toBe(warning.render());
  });

  it('should render null values and dates', () => {
    expect(new ValidationWarning({ column: 'a', message: 'm', row: 0, validation: 'v', value: null }).render()).toBe(
      '{row: 0, column: "a"}: "null" m'
    );
    expect(
      new ValidationWarning({ column: 'a', message: 'm', row: 0, validation: 'v', value: new Date(Date.UTC(2020, 0, 2)) }).render()
    ).toBe('{row: 0, column: "a"}: "2020-01-02T00:00:00.000Z" m');
  });

  it('should render only the message without a value', () => {
    const warning = new ValidationWarning({ column: 'a', message: 'Column "a" did not have the dtype "integer"', validation: 'isDtype' });
    expect(warning.hasValue).toBe(false);
    expect(warning.render()).toBe('Column "a" did not have the dtype "integer"');
  });

  it('should serialize to JSON', () => {
    const warning = new ValidationWarning({
      column: 'n',
      columnPosition: 1,
      message: 'is not empty',
      row: 'r3',
      rowPosition: 3,
      validation: 'isEmpty',
      value: BigInt(7),
    });
    expect(warning.toJSON()).toEqual({
      column: 'n',
      columnPosition: 1,
      message: 'is not empty',
      row: 'r3',
      rowPosition: 3,
      validation: 'isEmpty',
      value: '7',
    });
  });

  describe('merge', () => {
    const columnWarning = new ValidationWarning({
      column: 0,
      columnPosition: 0,
      message: 'Column 0 did not have the dtype "integer"',
      validation: 'isDtype',
    });
    const cellWarning = new ValidationWarning({
      column: 0,
      columnPosition: 0,
      message: 'was not in the range [1, 4)',
      row: 1,
      rowPosition: 1,
      validation: 'inRange',
      value: 'five',
    });

    it('should keep the left message for and', () => {
      const merged = ValidationWarning.merge('and', columnWarning, cellWarning);
      expect(merged.message).toBe('Column 0 did not have the dtype "integer"');
      expect(merged.validation).toBe('and');
      expect(merged.children).toEqual([columnWarning, cellWarning]);
    });

    it('should join both messages for or', () => {
      expect(ValidationWarning.merge('or', cellWarning, columnWarning).message).toBe(
        'was not in the range [1, 4) and Column 0 did not have the dtype "integer"'
      );
    });

    it('should take coordinates from the more specific child', () => {
      const merged = ValidationWarning.merge('and', columnWarning, cellWarning);
      expect(merged.rowPosition).toBe(1);
      expect(merged.row).toBe(1);
      expect(merged.value).toBe('five');
      expect(merged.render()).toBe('{row: 1, column: "0"}: "five" Column 0 did not have the dtype "integer"');
    });
  });
});

describe('materialize', () => {
  const table = DataTable.fromColumns({ a: [1, 2, 3], b: ['x', 'y', 'z'] }, { index: ['r0', 'r1', 'r2'] });
  const failed = { columns: [0, 1], rows: [0, 2] };

  it('should return nothing without failures', () => {
    expect(materialize({ failed: { columns: [0], rows: [] }, reason: 'bad', scope: 'cell', table, validation: 'v' })).toEqual([]);
    expect(materialize({ failed: { columns: [], rows: [1] }, reason: 'bad', scope: 'table', table, validation: 'v' })).toEqual([]);
  });

  it('should report a table scope once', () => {
    const warnings = materialize({ failed, reason: 'has a problem', scope: 'table', table, validation: 'v' });
    expect(warnings.map((w) => w.render())).toEqual(['has a problem']);
  });

  it('should report a column scope per column', () => {
    const warnings = materialize({ failed, reason: 'is wrong', scope: 'column', table, validation: 'v' });
    expect(warnings.map((w) => w.message)).toEqual(['Column "a" is wrong', 'Column "b" is wrong']);
    expect(warnings.map((w) => w.columnPosition)).toEqual([0, 1]);
  });

  it('should report a row scope per row', () => {
    const warnings = materialize({ failed, reason: 'is a duplicate row', scope: 'row', table, validation: 'v' });
    expect(warnings.map((w) => w.message)).toEqual(['Row "r0" is a duplicate row', 'Row "r2" is a duplicate row']);
    expect(warnings.map((w) => w.row)).toEqual(['r0', 'r2']);
  });

  it('should report a cell scope row-major with values', () => {
    const warnings = materialize({ failed, reason: 'bad', scope: 'cell', table, validation: 'v' });
    expect(warnings.map((w) => w.render())).toEqual([
      '{row: r0, column: "a"}: "1" bad',
      '{row: r0, column: "b"}: "x" bad',
      '{row: r2, column: "a"}: "3" bad',
      '{row: r2, column: "b"}: "z" bad',
    ]);
  });
});
