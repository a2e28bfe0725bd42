import { describe, expect, it } from 'vitest';

import { assertErr, assertOk } from '../../__tests__/test-utils.js';
import { ConfigurationError } from '../../errors/index.js';
import { DataTable } from '../../table/data-table.js';
import { AxisIndexer } from '../axis-indexer.js';
import { DualAxisIndexer } from '../dual-axis-indexer.js';

const table = DataTable.fromColumns({
  city: ['Oslo', 'Lima', 'Pune'],
  population: [709000, 10000000, 3100000],
});

describe('DualAxisIndexer', () => {
  it('should reject indexers on the wrong axes', () => {
    expect(() => new DualAxisIndexer(AxisIndexer.all(1), AxisIndexer.all(1))).toThrow(ConfigurationError);
  });

  it('should select a single cell', () => {
    const indexer = new DualAxisIndexer(AxisIndexer.of(1, 0), AxisIndexer.of('city', 1));
    expect(assertOk(indexer.apply(table))).toEqual({
      column: 'city',
      columnPosition: 0,
      kind: 'cell',
      row: 1,
      rowPosition: 1,
      value: 'Lima',
    });
  });

  it('should select a column as a series', () => {
    const selection = assertOk(DualAxisIndexer.column('population').apply(table));
    expect(selection.kind).toBe('series');
    if (selection.kind === 'series') {
      expect(selection.series.axis).toBe(0);
      expect(selection.series.values).toEqual([709000, 10000000, 3100000]);
    }
  });

  it('should select part of a column', () => {
    const indexer = new DualAxisIndexer(AxisIndexer.of([2, 0], 0), AxisIndexer.of(0, 1));
    const selection = assertOk(indexer.apply(table));
    if (selection.kind !== 'series') throw new Error(`Expected a series, got ${selection.kind}`);
    expect(selection.series.values).toEqual(['Pune', 'Oslo']);
    expect(selection.series.positions).toEqual([2, 0]);
  });

  it('should select a row as a series', () => {
    const selection = assertOk(DualAxisIndexer.row(2).apply(table));
    if (selection.kind !== 'series') throw new Error(`Expected a series, got ${selection.kind}`);
    expect(selection.series.axis).toBe(1);
    expect(selection.series.name).toBe(2);
    expect(selection.series.values).toEqual(['Pune', 3100000]);
  });

  it('should select every row of a repeated label', () => {
    const visits = DataTable.fromColumns({ city: ['Oslo', 'Lima', 'Pune'] }, { index: ['mon', 'tue', 'mon'] });

    const cells = assertOk(new DualAxisIndexer(AxisIndexer.of('mon', 0), AxisIndexer.of('city', 1)).apply(visits));
    if (cells.kind !== 'series') throw new Error(`Expected a series, got ${cells.kind}`);
    expect(cells.series.values).toEqual(['Oslo', 'Pune']);

    const rows = assertOk(DualAxisIndexer.row('mon').apply(visits));
    if (rows.kind !== 'frame') throw new Error(`Expected a frame, got ${rows.kind}`);
    expect(rows.frame.labels(0)).toEqual(['mon', 'mon']);
  });

  it('should select a block as a frame', () => {
    const selection = assertOk(DualAxisIndexer.all().apply(table));
    if (selection.kind !== 'frame') throw new Error(`Expected a frame, got ${selection.kind}`);
    expect(selection.frame.rowCount()).toBe(3);
    expect(selection.frame.columnCount()).toBe(2);
  });

  it('should resolve rows before columns', () => {
    const indexer = new DualAxisIndexer(AxisIndexer.of(9, 0), AxisIndexer.of('missing', 1));
    expect(assertErr(indexer.resolve(table)).message).toBe('Row position 9 is out of range for length 3');
    expect(assertOk(DualAxisIndexer.column(['population', 'city']).resolve(table))).toEqual({
      columns: [1, 0],
      rows: [0, 1, 2],
    });
  });

  it('should invert one axis only', () => {
    const indexer = new DualAxisIndexer(AxisIndexer.mask([true, false, true], 0), AxisIndexer.of('city', 1));
    const inverted = assertOk(indexer.invert(0));
    expect(inverted.rowIndex.index).toEqual([false, true, false]);
    expect(inverted.colIndex.equals(indexer.colIndex)).toBe(true);
    expect(assertErr(indexer.invert(1))).toBeInstanceOf(ConfigurationError);
  });

  it('should describe both axes', () => {
    expect(new DualAxisIndexer(AxisIndexer.of(2, 0), AxisIndexer.of('city', 1)).describe()).toBe('Row 2, Column "city"');
    expect(DualAxisIndexer.column('city').describe()).toBe('Column "city"');
    expect(DualAxisIndexer.all().describe()).toBeUndefined();
  });

  it('should replace one axis', () => {
    const indexer = DualAxisIndexer.all().withAxis(1, AxisIndexer.of('city', 1));
    expect(indexer.equals(DualAxisIndexer.column('city'))).toBe(true);
    expect(indexer.axisIndexer(0).selectsEverything).toBe(true);
    expect(() => indexer.withAxis(0, AxisIndexer.all(1))).toThrow(ConfigurationError);
  });
});
