import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { IndexResolutionError } from '../errors/index.js';
import type { Label } from '../table/types.js';

import type { Slice } from './slice.js';

export type IndexKind = 'position' | 'label' | 'mask';

/** Anything an AxisIndexer can be built from. */
export type IndexValue = Label | readonly Label[] | readonly boolean[] | Slice;

/** An index value paired with the way it selects. */
export type IndexSpec =
  | { readonly kind: 'position'; readonly value: number | readonly number[] | Slice }
  | { readonly kind: 'label'; readonly value: Label | readonly Label[] }
  | { readonly kind: 'mask'; readonly value: readonly boolean[] };

const PositionSchema = z.number().int();
const PositionListSchema = z.array(PositionSchema);
const SliceSchema = z
  .object({
    start: z.number().int().optional(),
    step: z.number().int().optional(),
    stop: z.number().int().optional(),
    type: z.literal('slice'),
  })
  .strict();
const PositionIndexSchema = z.union([PositionSchema, PositionListSchema, SliceSchema]);

const LabelSchema = z.union([z.string(), z.number()]);
const LabelIndexSchema = z.union([LabelSchema, z.array(LabelSchema)]);
const InferredLabelSchema = z.union([z.string(), z.array(z.string())]);

const MaskSchema = z.array(z.boolean());

function describeValue(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Classify a runtime index value.
 *
 * Without a kind: integers, integer arrays and slices select by position,
 * strings and string arrays by label, boolean arrays by mask. An empty array
 * selects nothing by position. With a kind, the value must fit it; numeric
 * labels need an explicit `label` kind.
 */
export function classifyIndex(value: unknown, kind?: IndexKind): Result<IndexSpec, IndexResolutionError> {
  if (kind === undefined || kind === 'position') {
    const position = PositionIndexSchema.safeParse(value);
    if (position.success) {
      return ok({ kind: 'position', value: position.data });
    }
  }

  if (kind === 'label') {
    const label = LabelIndexSchema.safeParse(value);
    if (label.success) {
      return ok({ kind: 'label', value: label.data });
    }
  } else if (kind === undefined) {
    const label = InferredLabelSchema.safeParse(value);
    if (label.success) {
      return ok({ kind: 'label', value: label.data });
    }
  }

  if (kind === undefined || kind === 'mask') {
    const mask = MaskSchema.safeParse(value);
    if (mask.success) {
      return ok({ kind: 'mask', value: mask.data });
    }
  }

  return err(
    new IndexResolutionError(
      kind === undefined
        ? `Cannot infer an index kind from ${describeValue(value)}`
        : `${describeValue(value)} is not a valid ${kind} index`,
      { context: { kind } }
    )
  );
}
