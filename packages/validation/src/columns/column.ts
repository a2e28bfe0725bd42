import { DualAxisIndexer, type IndexValue, type Label } from '@framecheck/core';

import { bindIndex, isValidationNode } from '../nodes/builders.js';
import type { ValidationNode } from '../nodes/types.js';
import { optional } from '../rules/optional.js';

export interface ColumnOptions {
  /** Replace indexes the validations already carry. Defaults to false. */
  override?: boolean | undefined;
  /** Bind every leaf of a combinator, not just a bare leaf. Defaults to true. */
  recurse?: boolean | undefined;
  /** Let empty cells pass. Defaults to false. */
  allowEmpty?: boolean | undefined;
}

function toColumnIndexer(index: DualAxisIndexer | IndexValue): DualAxisIndexer {
  return index instanceof DualAxisIndexer ? index : DualAxisIndexer.column(index);
}

function bindOne(node: ValidationNode, index: DualAxisIndexer, options: ColumnOptions | undefined): ValidationNode {
  const override = options?.override ?? false;
  const recurse = options?.recurse ?? true;

  let bound = node;
  if (recurse || node.type === 'leaf') {
    bound = bindIndex(node, index, { override });
  }
  return options?.allowEmpty ? optional(bound) : bound;
}

/**
 * Point validations at a column (or any region, given a DualAxisIndexer).
 * Returns new trees; the inputs are left untouched.
 */
export function column(
  validations: ValidationNode,
  index: DualAxisIndexer | IndexValue,
  options?: ColumnOptions
): ValidationNode;
export function column(
  validations: readonly ValidationNode[],
  index: DualAxisIndexer | IndexValue,
  options?: ColumnOptions
): ValidationNode[];
export function column(
  validations: ValidationNode | readonly ValidationNode[],
  index: DualAxisIndexer | IndexValue,
  options?: ColumnOptions
): ValidationNode | ValidationNode[] {
  const indexer = toColumnIndexer(index);
  if (isValidationNode(validations)) {
    return bindOne(validations, indexer, options);
  }
  return validations.map((node) => bindOne(node, indexer, options));
}

/** Bind the i-th validation to the column at position i. */
export function columnSequence(
  validations: readonly ValidationNode[],
  options?: { override?: boolean | undefined }
): ValidationNode[] {
  return validations.map((node, i) => bindIndex(node, DualAxisIndexer.column(i), options));
}

/**
 * One copy of every validation per column. Numbers select columns by
 * position and strings by label.
 */
export function eachColumn(
  validations: readonly ValidationNode[],
  columns: readonly Label[],
  options?: { override?: boolean | undefined }
): ValidationNode[] {
  return columns.flatMap((label) => {
    const indexer = DualAxisIndexer.column(label);
    return validations.map((node) => bindIndex(node, indexer, options));
  });
}
