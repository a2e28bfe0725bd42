import {
  AxisIndexer,
  ConfigurationError,
  DualAxisIndexer,
  EvaluationError,
  getErrorMessage,
  otherAxis,
  type Axis,
  type DataTable,
  type Label,
  type ValidationEngineError,
} from '@framecheck/core';
import { getLogger } from '@framecheck/logger';
import { err, ok, type Result } from 'neverthrow';

import { reasonFor } from '../nodes/builders.js';
import type { CombinatorNode, LeafNode, MaskResult, ValidationNode } from '../nodes/types.js';
import { materialize } from '../warnings/materialize.js';
import type { ValidationWarning } from '../warnings/validation-warning.js';

import { ElementFailure } from './element-failure.js';
import { mergeWarnings } from './merge.js';
import { checkFixedPositions, nodeName, preflight } from './preflight.js';

const logger = getLogger('validation-engine');

/** Result of evaluating one node against one table. */
interface NodeOutcome {
  /** Free axis of the node. */
  axis: Axis;
  /** One flag per position along `axis`; unselected positions pass. */
  passed: boolean[];
  fixed: AxisIndexer;
  fixedPositions: number[];
  warnings: ValidationWarning[];
}

function failedPositions(passed: readonly boolean[]): number[] {
  return passed.flatMap((flag, p) => (flag ? [] : [p]));
}

function toIndexers(outcome: NodeOutcome, flags: readonly boolean[]): DualAxisIndexer {
  const mask = AxisIndexer.mask(flags, outcome.axis);
  return outcome.axis === 0 ? new DualAxisIndexer(mask, outcome.fixed) : new DualAxisIndexer(outcome.fixed, mask);
}

/** Where an error raised inside a check on `node` happened, as labels. */
function locate(
  node: LeafNode,
  table: DataTable,
  fixed: number,
  free: number | undefined
): { column?: Label | undefined; row?: Label | undefined } {
  const freeLabel = free === undefined ? undefined : table.labelAt(node.axis, free);
  const fixedLabel = table.labelAt(otherAxis(node.axis), fixed);
  return node.axis === 0 ? { column: fixedLabel, row: freeLabel } : { column: freeLabel, row: fixedLabel };
}

function runCheck(
  node: LeafNode,
  table: DataTable,
  rows: number[],
  columns: number[]
): Result<readonly boolean[], EvaluationError> {
  const freePositions = node.axis === 0 ? rows : columns;
  const fixedPositions = node.axis === 0 ? columns : rows;
  const fixed = fixedPositions[0] ?? 0;

  let result: MaskResult;
  try {
    result =
      node.check.kind === 'series'
        ? node.check.test(table.vector(node.axis, fixed, freePositions))
        : node.check.test(table.take(rows, columns));
  } catch (error) {
    const offset = error instanceof ElementFailure ? error.offset : undefined;
    const cause = error instanceof ElementFailure ? error.cause : error;
    const location =
      node.check.kind === 'series'
        ? locate(node, table, fixed, offset === undefined ? undefined : freePositions[offset])
        : {};
    return err(
      new EvaluationError(`Validation "${node.name}" threw: ${getErrorMessage(cause)}`, {
        cause,
        validation: node.name,
        ...location,
      })
    );
  }

  if (typeof result === 'boolean') {
    const whole = result;
    return ok(freePositions.map(() => whole));
  }
  if (result.length !== freePositions.length) {
    return err(
      new EvaluationError(
        `Validation "${node.name}" returned ${String(result.length)} flags for ${String(freePositions.length)} selected ${node.axis === 0 ? 'rows' : 'columns'}`,
        { validation: node.name }
      )
    );
  }
  return ok(result);
}

function runLeaf(node: LeafNode, table: DataTable): Result<NodeOutcome, ValidationEngineError> {
  if (node.index === undefined) {
    return err(new ConfigurationError(`Validation "${node.name}" has no index`));
  }

  const resolved = node.index.resolve(table);
  if (resolved.isErr()) {
    return err(resolved.error);
  }
  const { rows, columns } = resolved.value;

  const fixedPositions = node.axis === 0 ? columns : rows;
  if (node.check.kind === 'series' && fixedPositions.length > 1) {
    const fixed = node.index.axisIndexer(otherAxis(node.axis));
    return err(
      new ConfigurationError(
        `Validation "${node.name}" checks one series at a time but ${fixed.describe() ?? 'its index'} matches ${String(fixedPositions.length)} ${node.axis === 0 ? 'columns' : 'rows'}`,
        { context: { positions: fixedPositions, validation: node.name } }
      )
    );
  }

  const flags = runCheck(node, table, rows, columns);
  if (flags.isErr()) {
    return err(flags.error);
  }

  const freePositions = node.axis === 0 ? rows : columns;
  const passed = new Array<boolean>(table.length(node.axis)).fill(true);
  flags.value.forEach((flag, i) => {
    const position = freePositions[i];
    if (position !== undefined) {
      passed[position] = flag !== node.negated;
    }
  });

  const failedFree = failedPositions(passed);
  const warnings = materialize({
    failed: node.axis === 0 ? { columns, rows: failedFree } : { columns: failedFree, rows },
    reason: reasonFor(node),
    scope: node.scope,
    table,
    validation: node.name,
  });

  return ok({
    axis: node.axis,
    fixed: node.index.axisIndexer(otherAxis(node.axis)),
    fixedPositions,
    passed,
    warnings,
  });
}

function runCombinator(node: CombinatorNode, table: DataTable): Result<NodeOutcome, ValidationEngineError> {
  const left = run(node.left, table);
  if (left.isErr()) {
    return left;
  }
  const right = run(node.right, table);
  if (right.isErr()) {
    return right;
  }

  const sameFixed = checkFixedPositions(node, left.value.fixedPositions, right.value.fixedPositions);
  if (sameFixed.isErr()) {
    return err(sameFixed.error);
  }

  const rightPassed = right.value.passed;
  const passed = left.value.passed.map((l, p) => {
    const r = rightPassed[p] ?? true;
    return node.type === 'and' ? l && r : l || r;
  });

  return ok({
    axis: node.axis,
    fixed: left.value.fixed,
    fixedPositions: left.value.fixedPositions,
    passed,
    warnings: mergeWarnings({
      axis: node.axis,
      fixedPositions: left.value.fixedPositions,
      left: left.value,
      operator: node.type,
      passed,
      right: right.value,
      scope: node.scope,
      table,
    }),
  });
}

function run(node: ValidationNode, table: DataTable): Result<NodeOutcome, ValidationEngineError> {
  return node.type === 'leaf' ? runLeaf(node, table) : runCombinator(node, table);
}

function evaluateNode(node: ValidationNode, table: DataTable): Result<NodeOutcome, ValidationEngineError> {
  const checked = preflight(node, table);
  if (checked.isErr()) {
    return err(checked.error);
  }
  return run(node, table);
}

/**
 * Evaluate a validation tree against a table.
 *
 * Every node runs once. The result is every warning the root raises, ordered
 * by failed position, or the first error that stopped evaluation.
 */
export function evaluate(node: ValidationNode, table: DataTable): Result<ValidationWarning[], ValidationEngineError> {
  logger.debug(
    { columns: table.columnCount(), rows: table.rowCount(), validation: nodeName(node) },
    'Evaluating validation'
  );

  const outcome = evaluateNode(node, table);
  if (outcome.isErr()) {
    logger.debug({ code: outcome.error.code, error: outcome.error }, 'Validation stopped');
    return err(outcome.error);
  }

  logger.debug({ validation: nodeName(node), warnings: outcome.value.warnings.length }, 'Validation finished');
  return ok(outcome.value.warnings);
}

/** Region where `node` passes: a mask on its free axis, its index on the other. */
export function passedIndex(node: ValidationNode, table: DataTable): Result<DualAxisIndexer, ValidationEngineError> {
  return evaluateNode(node, table).map((outcome) => toIndexers(outcome, outcome.passed));
}

/** Region where `node` fails; positions outside its selection never fail. */
export function failedIndex(node: ValidationNode, table: DataTable): Result<DualAxisIndexer, ValidationEngineError> {
  return evaluateNode(node, table).map((outcome) =>
    toIndexers(
      outcome,
      outcome.passed.map((flag) => !flag)
    )
  );
}
