export {
  ConfigurationError,
  EvaluationError,
  IndexResolutionError,
  ValidationEngineError,
} from './errors/index.js';
export { getErrorMessage, isErrorWithMessage, isRecord } from './utils/type-guard-utils.js';
export { tryParseDecimal } from './utils/decimal-utils.js';

export type { Axis, CellValue, Dtype, DtypeCheck, Label } from './table/types.js';
export { formatLabel, otherAxis } from './table/types.js';
export { cellKey, dtypeMatches, inferDtype } from './table/dtype.js';
export { Series, type SeriesInit } from './table/series.js';
export { DataTable, type TableOptions } from './table/data-table.js';

export { slice, isEmptySlice, isOpenSlice, resolveSlice, describeSlice, type Slice } from './indexing/slice.js';
export { classifyIndex, type IndexKind, type IndexSpec, type IndexValue } from './indexing/index-value.js';
export { AxisIndexer, describeAt } from './indexing/axis-indexer.js';
export { DualAxisIndexer, type ResolvedPositions, type Selection } from './indexing/dual-axis-indexer.js';
