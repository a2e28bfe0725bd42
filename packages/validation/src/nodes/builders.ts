import {
  ConfigurationError,
  isRecord,
  otherAxis,
  type Axis,
  type AxisIndexer,
  type DualAxisIndexer,
} from '@framecheck/core';

import { mergeScopes } from './scope.js';
import type { AndNode, Check, CombinatorNode, LeafNode, OrNode, Scope, ValidationNode } from './types.js';

export interface LeafInit {
  name: string;
  check: Check;
  scope: Scope;
  message: string;
  index?: DualAxisIndexer | undefined;
  axis?: Axis | undefined;
  negated?: boolean | undefined;
  customMessage?: string | undefined;
}

export function isValidationNode(value: unknown): value is ValidationNode {
  return isRecord(value) && (value['type'] === 'leaf' || value['type'] === 'and' || value['type'] === 'or');
}

export function leaf(init: LeafInit): LeafNode {
  const node: LeafNode = {
    axis: init.axis ?? 0,
    check: init.check,
    customMessage: init.customMessage,
    index: init.index,
    message: init.message,
    name: init.name,
    negated: init.negated ?? false,
    scope: init.scope,
    type: 'leaf',
  };
  return Object.freeze(node);
}

function combine(type: 'and', left: unknown, right: unknown): AndNode;
function combine(type: 'or', left: unknown, right: unknown): OrNode;
function combine(type: CombinatorNode['type'], left: unknown, right: unknown): CombinatorNode;
function combine(type: CombinatorNode['type'], left: unknown, right: unknown): CombinatorNode {
  if (!isValidationNode(left) || !isValidationNode(right)) {
    throw new ConfigurationError(`"${type}" can only combine two validations`, {
      context: { left: typeof left, right: typeof right },
    });
  }

  // Children on different axes cannot be combined; evaluation rejects them.
  const axis: Axis = left.axis === right.axis ? left.axis : 0;
  const scope = mergeScopes(left.scope, right.scope);
  const node: CombinatorNode =
    type === 'and' ? { axis, left, right, scope, type: 'and' } : { axis, left, right, scope, type: 'or' };
  return Object.freeze(node);
}

/**
 * Passes where both validations pass. Combines along the free axis the two
 * share.
 * @throws ConfigurationError when an operand is not a validation
 */
export function and(left: ValidationNode, right: ValidationNode): AndNode {
  return combine('and', left, right);
}

/**
 * Passes where either validation passes.
 * @throws ConfigurationError when an operand is not a validation
 */
export function or(left: ValidationNode, right: ValidationNode): OrNode {
  return combine('or', left, right);
}

/**
 * Inverts a validation. Leaves flip their negation flag; combinators are
 * rewritten with De Morgan's laws, so `not(not(x))` rebuilds `x`.
 */
export function not(node: ValidationNode): ValidationNode {
  if (!isValidationNode(node)) {
    throw new ConfigurationError('"not" can only negate a validation');
  }

  switch (node.type) {
    case 'leaf':
      return Object.freeze({ ...node, negated: !node.negated });
    case 'and':
      return or(not(node.left), not(node.right));
    case 'or':
      return and(not(node.left), not(node.right));
  }
}

/** Rebuild a tree with every leaf replaced by `fn(leaf)`. */
export function mapLeaves(node: ValidationNode, fn: (leaf: LeafNode) => LeafNode): ValidationNode {
  if (node.type === 'leaf') {
    return fn(node);
  }
  return combine(node.type, mapLeaves(node.left, fn), mapLeaves(node.right, fn));
}

/**
 * Set `index` on every leaf that has none, or on every leaf when `override`
 * is set.
 */
export function bindIndex(
  node: ValidationNode,
  index: DualAxisIndexer,
  options?: { override?: boolean | undefined }
): ValidationNode {
  const override = options?.override ?? false;
  return mapLeaves(node, (leafNode) =>
    leafNode.index === undefined || override ? Object.freeze({ ...leafNode, index }) : leafNode
  );
}

/** The leftmost leaf, which a combinator's selection is anchored to. */
export function anchorLeaf(node: ValidationNode): LeafNode {
  return node.type === 'leaf' ? node : anchorLeaf(node.left);
}

/** Indexer on the axis a node holds fixed, once its leaves are bound. */
export function fixedIndexer(node: ValidationNode): AxisIndexer | undefined {
  const anchor = anchorLeaf(node);
  return anchor.index?.axisIndexer(otherAxis(anchor.axis));
}

/** Message a leaf reports: the caller's text, else the rule's, marked when negated. */
export function reasonFor(node: LeafNode): string {
  if (node.customMessage !== undefined) return node.customMessage;
  return node.negated ? `${node.message} <negated>` : node.message;
}
