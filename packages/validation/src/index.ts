export type {
  AndNode,
  Check,
  CombinatorNode,
  FrameCheck,
  LeafNode,
  MaskResult,
  OrNode,
  Scope,
  SeriesCheck,
  ValidationNode,
} from './nodes/types.js';
export { mergeScopes } from './nodes/scope.js';
export {
  and,
  bindIndex,
  isValidationNode,
  leaf,
  mapLeaves,
  not,
  or,
  reasonFor,
  type LeafInit,
} from './nodes/builders.js';

export { ValidationWarning, type WarningInit } from './warnings/validation-warning.js';
export { materialize, type MaterializeParams } from './warnings/materialize.js';

export { evaluate, failedIndex, passedIndex } from './engine/evaluate.js';
export { elementwise } from './engine/element-failure.js';
export { preflight } from './engine/preflight.js';

export type { RuleOptions } from './rules/options.js';
export type { ConversionTarget } from './rules/convert.js';
export {
  canCall,
  canConvert,
  customElement,
  customSeries,
  dateFormat,
  inList,
  inRange,
  isDistinct,
  isDtype,
  isEmpty,
  leadingWhitespace,
  matchesPattern,
  trailingWhitespace,
  type InListOptions,
} from './rules/series-rules.js';
export { distinctRows, type DistinctRowsOptions } from './rules/frame-rules.js';
export { optional } from './rules/optional.js';

export { column, columnSequence, eachColumn, type ColumnOptions } from './columns/column.js';
export { Schema, type ColumnDefinition, type SchemaOptions } from './schema/schema.js';
