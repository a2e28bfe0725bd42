import type { Scope } from './types.js';

/**
 * Scope of a combinator built from two children.
 *
 * Equal scopes stay, `table` yields to the other, and any mix of `row` and
 * `column` (or anything with `cell`) reports per cell.
 */
export function mergeScopes(left: Scope, right: Scope): Scope {
  if (left === right) return left;
  if (left === 'table') return right;
  if (right === 'table') return left;
  return 'cell';
}
