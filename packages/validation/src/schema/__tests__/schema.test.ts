import { ConfigurationError, DataTable, EvaluationError } from '@framecheck/core';
import { assertErr, assertOk } from '@framecheck/core/test-utils';
import { describe, expect, it } from 'vitest';

import { or } from '../../nodes/builders.js';
import { distinctRows } from '../../rules/frame-rules.js';
import { customElement, inList, inRange, isDtype, leadingWhitespace } from '../../rules/series-rules.js';
import { Schema } from '../schema.js';

const table = DataTable.fromColumns({
  name: ['ann', ' bob', 'cat'],
  age: [34, 210, null],
  city: ['oslo', 'rome', 'paris'],
});

describe('Schema', () => {
  it('should reject an empty column list', () => {
    expect(() => new Schema([])).toThrow(ConfigurationError);
    expect(() => new Schema([])).toThrow('Invalid schema: columns: A schema needs at least one column');
  });

  it('should reject malformed validations', () => {
    expect(() => Reflect.construct(Schema, [[{ name: 'a', validations: ['not a node'] }]])).toThrow(
      'Invalid schema: 0.validations.0: Expected a validation'
    );
  });

  it('should report a column count mismatch and nothing else', () => {
    const schema = new Schema([{ name: 'name', validations: [leadingWhitespace()] }]);
    const warnings = assertOk(schema.validate(table));

    expect(warnings.map((w) => w.message)).toEqual([
      'Invalid number of columns. The schema specifies 1, but the table has 3',
    ]);
    expect(warnings[0]?.validation).toBe('schema');
  });

  it('should report a schema column missing from the table', () => {
    const schema = new Schema([{ name: 'name' }, { name: 'age' }, { name: 'country' }]);
    expect(assertOk(schema.validate(table)).map((w) => w.message)).toEqual([
      'The column country exists in the schema but not in the table',
    ]);
  });

  it('should validate columns by label and sort warnings by row', () => {
    const schema = new Schema([
      { name: 'city', validations: [inList(['oslo', 'rome'])] },
      { name: 'age', validations: [isDtype('integer'), inRange(0, 150)], allowEmpty: true },
      { name: 'name', validations: [leadingWhitespace()] },
    ]);
    const warnings = assertOk(schema.validate(table));

    expect(warnings.map((w) => w.render())).toEqual([
      '{row: 1, column: "age"}: "210" was not in the range [0, 150) and is not empty',
      '{row: 1, column: "name"}: " bob" contains leading whitespace',
      '{row: 2, column: "city"}: "paris" is not in the list of legal options (oslo, rome)',
    ]);
  });

  it('should warn on empty cells unless the column allows them', () => {
    const strict = new Schema([{ name: 'name' }, { name: 'age', validations: [inRange(0, 150)] }, { name: 'city' }]);
    expect(assertOk(strict.validate(table)).map((w) => w.rowPosition)).toEqual([1, 2]);
  });

  it('should match columns by position when ordered', () => {
    const schema = new Schema(
      [{ name: 'first' }, { allowEmpty: true, name: 'second', validations: [or(inRange(0, 100), inRange(200, 300))] }, { name: 'third' }],
      { ordered: true }
    );
    expect(assertOk(schema.validate(table))).toEqual([]);
  });

  it('should put warnings without a row first', () => {
    const schema = new Schema([
      { name: 'name', validations: [leadingWhitespace()] },
      { name: 'age', validations: [isDtype('string')] },
      { name: 'city' },
    ]);
    expect(assertOk(schema.validate(table)).map((w) => w.message)).toEqual([
      'Column "age" did not have the dtype "string"',
      'contains leading whitespace',
    ]);
  });

  it('should keep validations bound elsewhere on their own columns', () => {
    const schema = new Schema([{ name: 'name', validations: [distinctRows()] }, { name: 'age' }, { name: 'city' }]);
    expect(assertOk(schema.validate(table))).toEqual([]);
  });

  it('should stop at the first evaluation error', () => {
    const schema = new Schema([
      {
        name: 'name',
        validations: [
          customElement(() => {
            throw new Error('no');
          }, 'never'),
        ],
      },
      { name: 'age' },
      { name: 'city' },
    ]);
    const error = assertErr(schema.validate(table));
    expect(error).toBeInstanceOf(EvaluationError);
    expect(error.message).toBe('Validation "customElement" threw: no');
  });
});
