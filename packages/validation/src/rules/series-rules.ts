import { cellKey, dtypeMatches, tryParseDecimal, type CellValue, type DtypeCheck, type Series } from '@framecheck/core';
import { Decimal } from 'decimal.js';

import { elementwise } from '../engine/element-failure.js';
import type { LeafNode, MaskResult } from '../nodes/types.js';

import { CONVERTERS, type ConversionTarget } from './convert.js';
import { compileDateFormat } from './date-format.js';
import { isMissing, rule, toText, type RuleOptions } from './options.js';

/** Any check over a whole series. */
export function customSeries(test: (series: Series) => MaskResult, message: string, options?: RuleOptions): LeafNode {
  return rule('customSeries', { kind: 'series', test }, 'cell', message, options);
}

/** A check over each value; a throw fails the evaluation with the offending row. */
export function customElement(test: (value: CellValue) => boolean, message: string, options?: RuleOptions): LeafNode {
  return rule('customElement', elementwise(test), 'cell', message, options);
}

/** Numeric values with `min <= value < max`. Values that do not parse as numbers fail. */
export function inRange(
  min: number | string = Number.NEGATIVE_INFINITY,
  max: number | string = Number.POSITIVE_INFINITY,
  options?: RuleOptions
): LeafNode {
  const lower = new Decimal(min);
  const upper = new Decimal(max);

  return rule(
    'inRange',
    elementwise((value) => {
      const parsed = tryParseDecimal(value);
      return parsed !== undefined && parsed.gte(lower) && parsed.lt(upper);
    }),
    'cell',
    `was not in the range [${String(min)}, ${String(max)})`,
    options
  );
}

/** The selected series has `dtype`; `number` accepts integers and floats. */
export function isDtype(dtype: DtypeCheck, options?: RuleOptions): LeafNode {
  return rule(
    'isDtype',
    { kind: 'series', test: (series) => dtypeMatches(series.dtype, dtype) },
    'column',
    `did not have the dtype "${dtype}"`,
    options
  );
}

/** Calling `fn` on the value does not throw. */
export function canCall(fn: (value: CellValue) => unknown, options?: RuleOptions): LeafNode {
  return rule(
    'canCall',
    elementwise((value) => {
      try {
        fn(value);
        return true;
      } catch {
        return false;
      }
    }),
    'cell',
    `raised an exception when ${fn.name || 'the function'} was called on it`,
    options
  );
}

export function canConvert(target: ConversionTarget, options?: RuleOptions): LeafNode {
  return rule('canConvert', elementwise(CONVERTERS[target]), 'cell', `cannot be converted to type ${target}`, options);
}

/** The pattern matches somewhere in the value's text. */
export function matchesPattern(pattern: string | RegExp, options?: RuleOptions): LeafNode {
  // g and y make test() stateful
  const regex = typeof pattern === 'string' ? new RegExp(pattern) : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));

  return rule(
    'matchesPattern',
    elementwise((value) => regex.test(toText(value))),
    'cell',
    `does not match the pattern "${regex.source}"`,
    options
  );
}

export function leadingWhitespace(options?: RuleOptions): LeafNode {
  return rule(
    'leadingWhitespace',
    elementwise((value) => !/^\s/.test(toText(value))),
    'cell',
    'contains leading whitespace',
    options
  );
}

export function trailingWhitespace(options?: RuleOptions): LeafNode {
  return rule(
    'trailingWhitespace',
    elementwise((value) => !/\s$/.test(toText(value))),
    'cell',
    'contains trailing whitespace',
    options
  );
}

/** Passes the first occurrence of each value and fails every repeat. */
export function isDistinct(options?: RuleOptions): LeafNode {
  return rule(
    'isDistinct',
    {
      kind: 'series',
      test: (series) => {
        const seen = new Set<string>();
        return series.map((value) => {
          const key = cellKey(value);
          if (seen.has(key)) return false;
          seen.add(key);
          return true;
        });
      },
    },
    'cell',
    'contains values that are not unique',
    options
  );
}

export interface InListOptions extends RuleOptions {
  /** Compare strings with their case. Defaults to true. */
  caseSensitive?: boolean | undefined;
}

export function inList(values: readonly CellValue[], options?: InListOptions): LeafNode {
  const caseSensitive = options?.caseSensitive ?? true;
  const normalize = (value: CellValue) =>
    !caseSensitive && typeof value === 'string' ? `string:${value.toLowerCase()}` : cellKey(value);
  const legal = new Set(values.map(normalize));

  return rule(
    'inList',
    elementwise((value) => legal.has(normalize(value))),
    'cell',
    `is not in the list of legal options (${values.map(toText).join(', ')})`,
    options
  );
}

/**
 * The value's text matches a strptime-style format and names a real date.
 * @throws ConfigurationError on an unsupported directive
 */
export function dateFormat(format: string, options?: RuleOptions): LeafNode {
  const matches = compileDateFormat(format);
  return rule(
    'dateFormat',
    elementwise((value) => matches(toText(value))),
    'cell',
    `does not match the date format string "${format}"`,
    options
  );
}

/** Empty cells: null, undefined, `''` or NaN. */
export function isEmpty(options?: RuleOptions): LeafNode {
  return rule('isEmpty', elementwise(isMissing), 'cell', 'is not empty', options);
}
