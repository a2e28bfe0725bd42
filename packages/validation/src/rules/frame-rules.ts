import { cellKey, DualAxisIndexer, type DataTable } from '@framecheck/core';

import type { LeafNode } from '../nodes/types.js';

import { rule, type RuleOptions } from './options.js';

export interface DistinctRowsOptions extends RuleOptions {
  /**
   * Which duplicate passes: the first, the last, or (`false`) none of them.
   * Defaults to `false`.
   */
  keep?: 'first' | 'last' | false | undefined;
}

function rowKeys(frame: DataTable): string[] {
  return Array.from({ length: frame.rowCount() }, (_, r) =>
    frame
      .row(r)
      .values.map(cellKey)
      .join('|')
  );
}

/** Rows that do not repeat an earlier (or later) row of the selection. */
export function distinctRows(options?: DistinctRowsOptions): LeafNode {
  const keep = options?.keep ?? false;

  return rule(
    'distinctRows',
    {
      kind: 'frame',
      test: (frame) => {
        const keys = rowKeys(frame);
        const counts = new Map<string, number>();
        for (const key of keys) counts.set(key, (counts.get(key) ?? 0) + 1);

        const seen = new Set<string>();
        const ordered = keep === 'last' ? [...keys].reverse() : keys;
        const flags = ordered.map((key) => {
          if (keep === false) return counts.get(key) === 1;
          if (seen.has(key)) return false;
          seen.add(key);
          return true;
        });
        return keep === 'last' ? flags.reverse() : flags;
      },
    },
    'row',
    'is a duplicate row',
    { ...options, axis: 0, index: options?.index ?? DualAxisIndexer.all() }
  );
}
