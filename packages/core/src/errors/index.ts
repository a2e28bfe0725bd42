import type { Label } from '../table/types.js';

interface ErrorDetails {
  context?: Record<string, unknown> | undefined;
  cause?: unknown;
}

/**
 * Base class for every error the validation engine reports.
 *
 * Errors travel as values inside neverthrow Results; only misuse of the typed
 * builder API throws them directly.
 */
export abstract class ValidationEngineError extends Error {
  abstract readonly code: string;

  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, details?: ErrorDetails) {
    super(message, details?.cause === undefined ? undefined : { cause: details.cause });
    this.context = details?.context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * A validation tree or table that cannot be evaluated as built: missing leaf
 * index, mismatched combinator operands, an un-invertible index, ragged data.
 */
export class ConfigurationError extends ValidationEngineError {
  readonly code = 'CONFIGURATION_ERROR';
}

/**
 * An index value that cannot be classified, or that does not fit the table it
 * is resolved against.
 */
export class IndexResolutionError extends ValidationEngineError {
  readonly code = 'INDEX_RESOLUTION_ERROR';
}

/**
 * A predicate threw, or returned a mask of the wrong shape.
 */
export class EvaluationError extends ValidationEngineError {
  readonly code = 'EVALUATION_ERROR';

  readonly validation: string;
  readonly row?: Label | undefined;
  readonly column?: Label | undefined;

  constructor(
    message: string,
    details: {
      cause?: unknown;
      column?: Label | undefined;
      row?: Label | undefined;
      validation: string;
    }
  ) {
    super(message, {
      cause: details.cause,
      context: { column: details.column, row: details.row, validation: details.validation },
    });
    this.validation = details.validation;
    this.row = details.row;
    this.column = details.column;
  }
}
