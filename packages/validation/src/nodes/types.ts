import type { Axis, DataTable, DualAxisIndexer, Series } from '@framecheck/core';

/** The shape of region a validation reports on. */
export type Scope = 'table' | 'column' | 'row' | 'cell';

/** Pass/fail for a whole selection, or one flag per element along the free axis. */
export type MaskResult = boolean | readonly boolean[];

export interface SeriesCheck {
  readonly kind: 'series';
  readonly test: (series: Series) => MaskResult;
}

export interface FrameCheck {
  readonly kind: 'frame';
  readonly test: (frame: DataTable) => MaskResult;
}

export type Check = SeriesCheck | FrameCheck;

/**
 * A single predicate over a selection.
 *
 * `axis` is the free axis: the mask the check returns runs along it, and the
 * index on the other axis stays fixed.
 */
export interface LeafNode {
  readonly type: 'leaf';
  readonly name: string;
  readonly check: Check;
  readonly index?: DualAxisIndexer | undefined;
  readonly axis: Axis;
  readonly negated: boolean;
  readonly scope: Scope;
  readonly message: string;
  readonly customMessage?: string | undefined;
}

/**
 * `axis` is the free axis both children share. `scope` is the merged scope of
 * the children: child warnings that are less specific than it are located at
 * each failed position before they are reported.
 */
export interface AndNode {
  readonly type: 'and';
  readonly left: ValidationNode;
  readonly right: ValidationNode;
  readonly axis: Axis;
  readonly scope: Scope;
}

export interface OrNode {
  readonly type: 'or';
  readonly left: ValidationNode;
  readonly right: ValidationNode;
  readonly axis: Axis;
  readonly scope: Scope;
}

export type CombinatorNode = AndNode | OrNode;

export type ValidationNode = LeafNode | CombinatorNode;
