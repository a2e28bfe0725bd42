import { anchorLeaf, or } from '../nodes/builders.js';
import type { OrNode, ValidationNode } from '../nodes/types.js';

import { isEmpty } from './series-rules.js';

/**
 * Let empty cells pass `node`: `or(node, isEmpty())` over the same selection.
 * The selection is taken from the leaf, or from a combinator's leftmost leaf.
 */
export function optional(node: ValidationNode): OrNode {
  return or(node, isEmpty({ axis: node.axis, index: anchorLeaf(node).index }));
}
