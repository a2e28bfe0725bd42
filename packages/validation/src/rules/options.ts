import { DualAxisIndexer, type Axis, type CellValue, type IndexValue } from '@framecheck/core';

import { leaf } from '../nodes/builders.js';
import type { Check, LeafNode, Scope } from '../nodes/types.js';

export interface RuleOptions {
  /** Region to check; a bare index value selects columns. */
  index?: DualAxisIndexer | IndexValue | undefined;
  /** Replaces the rule's own message in warnings. */
  message?: string | undefined;
  /** Free axis of the check; defaults to rows. */
  axis?: Axis | undefined;
}

export function toIndexer(index: RuleOptions['index']): DualAxisIndexer | undefined {
  if (index === undefined || index instanceof DualAxisIndexer) {
    return index;
  }
  return DualAxisIndexer.column(index);
}

export function rule(name: string, check: Check, scope: Scope, message: string, options?: RuleOptions): LeafNode {
  return leaf({
    axis: options?.axis,
    check,
    customMessage: options?.message,
    index: toIndexer(options?.index),
    message,
    name,
    scope,
  });
}

/** Text form of a cell for string rules; missing values read as empty. */
export function toText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/** Empty cells: null, undefined, the empty string and NaN. */
export function isMissing(value: CellValue): boolean {
  return value === null || value === undefined || value === '' || Number.isNaN(value);
}
