import { err, ok, type Result } from 'neverthrow';

import { IndexResolutionError } from '../errors/index.js';

/**
 * Half-open positional range `[start, stop)` with an optional step.
 * Negative bounds count from the end of the axis.
 */
export interface Slice {
  readonly type: 'slice';
  readonly start?: number | undefined;
  readonly stop?: number | undefined;
  readonly step?: number | undefined;
}

export function slice(start?: number, stop?: number, step?: number): Slice {
  const value: Slice = { type: 'slice', start, stop, step };
  return Object.freeze(value);
}

/** True for a slice that selects the whole axis in order, whatever its length: `:`, `0:`, `::1`. */
export function isOpenSlice(value: Slice): boolean {
  return (
    (value.start === undefined || value.start === 0) &&
    value.stop === undefined &&
    (value.step === undefined || value.step === 1)
  );
}

/**
 * True for a slice that selects nothing on any axis, such as `0:0`, `3:1` or
 * `-1:-4`. Bounds of mixed sign depend on the axis length and never count.
 */
export function isEmptySlice(value: Slice): boolean {
  const step = value.step ?? 1;
  if (step === 0) return false;
  if (step > 0 && value.stop === 0) return true;

  const { start, stop } = value;
  if (start === undefined || stop === undefined || (start < 0) !== (stop < 0)) return false;
  return step > 0 ? stop <= start : start <= stop;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function resolveSlice(value: Slice, length: number): Result<number[], IndexResolutionError> {
  const step = value.step ?? 1;
  if (step === 0) {
    return err(new IndexResolutionError('Slice step cannot be zero'));
  }

  const normalize = (bound: number, min: number, max: number) => clamp(bound < 0 ? bound + length : bound, min, max);
  const positions: number[] = [];

  if (step > 0) {
    const start = value.start === undefined ? 0 : normalize(value.start, 0, length);
    const stop = value.stop === undefined ? length : normalize(value.stop, 0, length);
    for (let i = start; i < stop; i += step) positions.push(i);
  } else {
    const start = value.start === undefined ? length - 1 : normalize(value.start, -1, length - 1);
    const stop = value.stop === undefined ? -1 : normalize(value.stop, -1, length - 1);
    for (let i = start; i > stop; i += step) positions.push(i);
  }

  return ok(positions);
}

export function describeSlice(value: Slice): string {
  const bounds = `${value.start === undefined ? '' : String(value.start)}:${value.stop === undefined ? '' : String(value.stop)}`;
  return value.step === undefined || value.step === 1 ? bounds : `${bounds}:${String(value.step)}`;
}
