import { err, ok, type Result } from 'neverthrow';

import { ConfigurationError, IndexResolutionError } from '../errors/index.js';
import type { DataTable } from '../table/data-table.js';
import type { Series } from '../table/series.js';
import { formatLabel, otherAxis, type Axis, type Label } from '../table/types.js';

import { classifyIndex, type IndexKind, type IndexSpec, type IndexValue } from './index-value.js';
import { describeSlice, isEmptySlice, isOpenSlice, resolveSlice, slice, type Slice } from './slice.js';

const AXIS_NAMES: Record<Axis, { plural: string; singular: string }> = {
  0: { plural: 'Rows', singular: 'Row' },
  1: { plural: 'Columns', singular: 'Column' },
};

/** `Row 3`, `Column "age"`: how a single row or column is named in messages. */
export function describeAt(axis: Axis, label: Label): string {
  return `${AXIS_NAMES[axis].singular} ${formatLabel(label)}`;
}

function range(length: number): number[] {
  return Array.from({ length }, (_, i) => i);
}

function sameValues<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

/**
 * Selection along one axis of a table: by position, by label or by boolean
 * mask. Instances are immutable.
 */
export class AxisIndexer {
  private constructor(
    readonly spec: IndexSpec,
    readonly axis: Axis
  ) {}

  /** Classify `index` (or check it against `kind`) and build an indexer. */
  static create(index: unknown, axis: Axis, kind?: IndexKind): Result<AxisIndexer, IndexResolutionError> {
    return classifyIndex(index, kind).map((spec) => new AxisIndexer(spec, axis));
  }

  /**
   * Throwing variant of `create` for typed call sites.
   * @throws IndexResolutionError when the value does not fit the kind
   */
  static of(index: IndexValue, axis: Axis, kind?: IndexKind): AxisIndexer {
    const result = AxisIndexer.create(index, axis, kind);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }

  static all(axis: Axis): AxisIndexer {
    return new AxisIndexer({ kind: 'position', value: slice() }, axis);
  }

  static none(axis: Axis): AxisIndexer {
    return new AxisIndexer({ kind: 'position', value: [] }, axis);
  }

  static mask(flags: readonly boolean[], axis: Axis): AxisIndexer {
    return new AxisIndexer({ kind: 'mask', value: [...flags] }, axis);
  }

  get kind(): IndexKind {
    return this.spec.kind;
  }

  get index(): IndexValue {
    return this.spec.value;
  }

  /** A single position or label, which selects a series rather than a sub-table. */
  get isScalar(): boolean {
    const { value } = this.spec;
    return typeof value === 'number' || typeof value === 'string';
  }

  get selectsEverything(): boolean {
    const { value } = this.spec;
    return this.spec.kind === 'position' && isSlice(value) && isOpenSlice(value);
  }

  get selectsNothing(): boolean {
    const { value } = this.spec;
    if (this.spec.kind === 'mask' || typeof value !== 'object') return false;
    return isSlice(value) ? isEmptySlice(value) : value.length === 0;
  }

  /** Positions along the axis, in selection order. */
  resolve(table: DataTable): Result<number[], IndexResolutionError> {
    const length = table.length(this.axis);
    const spec = this.spec;

    switch (spec.kind) {
      case 'mask': {
        if (spec.value.length !== length) {
          return err(
            new IndexResolutionError(
              `Mask of length ${String(spec.value.length)} does not match ${AXIS_NAMES[this.axis].plural.toLowerCase()} of length ${String(length)}`
            )
          );
        }
        const positions: number[] = [];
        spec.value.forEach((flag, i) => {
          if (flag) positions.push(i);
        });
        return ok(positions);
      }

      case 'label': {
        const labels = typeof spec.value === 'object' ? spec.value : [spec.value];
        const positions: number[] = [];
        for (const label of labels) {
          const found = table.findLabels(this.axis, label);
          if (found.length === 0) {
            return err(
              new IndexResolutionError(`Unknown ${AXIS_NAMES[this.axis].singular.toLowerCase()} label ${formatLabel(label)}`, {
                context: { axis: this.axis, label },
              })
            );
          }
          positions.push(...found);
        }
        return ok(positions);
      }

      case 'position': {
        if (isSlice(spec.value)) {
          return resolveSlice(spec.value, length);
        }
        const positions = typeof spec.value === 'number' ? [spec.value] : [...spec.value];
        const outOfRange = positions.find((p) => p < 0 || p >= length);
        if (outOfRange !== undefined) {
          return err(
            new IndexResolutionError(
              `${AXIS_NAMES[this.axis].singular} position ${String(outOfRange)} is out of range for length ${String(length)}`,
              { context: { axis: this.axis, position: outOfRange } }
            )
          );
        }
        return ok(positions);
      }
    }
  }

  /**
   * Select from `table`. A scalar index that resolves to one position yields
   * the row or column as a Series; anything else, including a row label that
   * repeats, yields the sub-table.
   */
  apply(table: DataTable): Result<Series | DataTable, IndexResolutionError> {
    return this.resolve(table).map((positions) => {
      const first = positions[0];
      if (this.isScalar && first !== undefined && positions.length === 1) {
        return table.vector(otherAxis(this.axis), first);
      }
      const all = range(table.length(otherAxis(this.axis)));
      return this.axis === 0 ? table.take(positions, all) : table.take(all, positions);
    });
  }

  /**
   * Complement of this selection. Only masks and the everything/nothing
   * selections can be inverted without a table.
   */
  invert(): Result<AxisIndexer, ConfigurationError> {
    const spec = this.spec;
    if (spec.kind === 'mask') {
      return ok(AxisIndexer.mask(spec.value.map((flag) => !flag), this.axis));
    }
    if (this.selectsEverything) {
      return ok(AxisIndexer.none(this.axis));
    }
    if (this.selectsNothing) {
      return ok(AxisIndexer.all(this.axis));
    }
    return err(
      new ConfigurationError(`Cannot invert the ${spec.kind} index ${this.describe() ?? ''}; use a boolean mask`, {
        context: { axis: this.axis, kind: spec.kind },
      })
    );
  }

  /** Human-readable selection for messages; undefined when it covers everything. */
  describe(): string | undefined {
    if (this.selectsEverything) return undefined;

    const names = AXIS_NAMES[this.axis];
    const spec = this.spec;
    if (this.selectsNothing) return `No ${names.plural.toLowerCase()}`;

    if (spec.kind === 'position' && isSlice(spec.value)) {
      return `${names.plural} ${describeSlice(spec.value)}`;
    }

    let labels: readonly Label[];
    if (spec.kind === 'mask') {
      labels = spec.value.flatMap((flag, i) => (flag ? [i] : []));
      if (labels.length === 0) return `No ${names.plural.toLowerCase()}`;
    } else if (typeof spec.value === 'object') {
      labels = isSlice(spec.value) ? [] : spec.value;
    } else {
      return describeAt(this.axis, spec.value);
    }

    return `${labels.length === 1 ? names.singular : names.plural} ${labels.map(formatLabel).join(', ')}`;
  }

  equals(other: AxisIndexer): boolean {
    if (this.axis !== other.axis) return false;
    if (this.selectsNothing && other.selectsNothing) return true;
    if (this.selectsEverything && other.selectsEverything) return true;
    if (this.spec.kind !== other.spec.kind) return false;

    const a = this.spec.value;
    const b = other.spec.value;
    if (isSlice(a) || isSlice(b)) {
      return isSlice(a) && isSlice(b) && a.start === b.start && a.stop === b.stop && (a.step ?? 1) === (b.step ?? 1);
    }
    if (typeof a === 'object' && typeof b === 'object') {
      return sameValues<Label | boolean>(a, b);
    }
    return a === b;
  }
}

function isSlice(value: IndexValue): value is Slice {
  return typeof value === 'object' && 'type' in value;
}
