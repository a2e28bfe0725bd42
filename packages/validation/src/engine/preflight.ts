import { ConfigurationError, otherAxis, type DataTable, type ValidationEngineError } from '@framecheck/core';
import { err, ok, type Result } from 'neverthrow';

import { fixedIndexer } from '../nodes/builders.js';
import type { CombinatorNode, LeafNode, ValidationNode } from '../nodes/types.js';

const AXIS_NAMES = ['rows', 'columns'] as const;

export function nodeName(node: ValidationNode): string {
  return node.type === 'leaf' ? node.name : node.type;
}

function sameValues(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

function checkLeaf(node: LeafNode): Result<void, ValidationEngineError> {
  if (node.index === undefined) {
    return err(
      new ConfigurationError(`Validation "${node.name}" has no index; bind it to a column or pass an index`, {
        context: { validation: node.name },
      })
    );
  }

  const fixed = node.index.axisIndexer(otherAxis(node.axis));
  if (node.check.kind === 'series' && !fixed.isScalar) {
    return err(
      new ConfigurationError(
        `Validation "${node.name}" checks one series at a time but selects ${fixed.describe() ?? `all ${AXIS_NAMES[fixed.axis]}`}; use eachColumn() to repeat it per column`,
        { context: { validation: node.name } }
      )
    );
  }

  return ok();
}

/**
 * Positions both children of a combinator hold fixed. They must agree, or
 * the two masks would describe different regions.
 */
export function checkFixedPositions(
  node: CombinatorNode,
  left: readonly number[],
  right: readonly number[]
): Result<void, ConfigurationError> {
  if (sameValues(left, right)) {
    return ok();
  }
  return err(
    new ConfigurationError(
      `Cannot combine "${nodeName(node.left)}" and "${nodeName(node.right)}": they select different ${AXIS_NAMES[otherAxis(node.axis)]} (${left.join(', ')} vs ${right.join(', ')})`,
      { context: { left, right } }
    )
  );
}

function checkCombinator(node: CombinatorNode, table: DataTable): Result<void, ValidationEngineError> {
  for (const child of [node.left, node.right]) {
    if (child.axis !== node.axis) {
      return err(
        new ConfigurationError(
          `Cannot combine "${nodeName(child)}" along ${AXIS_NAMES[node.axis]}: it checks along ${AXIS_NAMES[child.axis]}`,
          { context: { axis: node.axis, validation: nodeName(child) } }
        )
      );
    }
  }

  const leftFixed = fixedIndexer(node.left)?.resolve(table);
  const rightFixed = fixedIndexer(node.right)?.resolve(table);
  if (leftFixed === undefined || rightFixed === undefined) {
    return ok();
  }
  if (leftFixed.isErr()) {
    return err(leftFixed.error);
  }
  if (rightFixed.isErr()) {
    return err(rightFixed.error);
  }
  return checkFixedPositions(node, leftFixed.value, rightFixed.value);
}

/**
 * Reject trees that cannot be evaluated against `table` before any predicate
 * runs: unbound leaves, series checks over several series, and combinators
 * whose children disagree on axis or fixed positions.
 */
export function preflight(node: ValidationNode, table: DataTable): Result<void, ValidationEngineError> {
  if (node.type === 'leaf') {
    return checkLeaf(node);
  }

  const left = preflight(node.left, table);
  if (left.isErr()) {
    return left;
  }
  const right = preflight(node.right, table);
  if (right.isErr()) {
    return right;
  }
  return checkCombinator(node, table);
}
