import { ConfigurationError, DualAxisIndexer, type DataTable, type Label, type ValidationEngineError } from '@framecheck/core';
import { getLogger } from '@framecheck/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { column } from '../columns/column.js';
import { evaluate } from '../engine/evaluate.js';
import { isValidationNode } from '../nodes/builders.js';
import type { ValidationNode } from '../nodes/types.js';
import { ValidationWarning } from '../warnings/validation-warning.js';

const logger = getLogger('schema');

const ColumnDefinitionSchema = z.object({
  allowEmpty: z.boolean().optional(),
  name: z.union([z.string(), z.number()]),
  validations: z.array(z.custom<ValidationNode>(isValidationNode, 'Expected a validation')).optional(),
});

const SchemaColumnsSchema = z.array(ColumnDefinitionSchema).min(1, 'A schema needs at least one column');

export interface ColumnDefinition {
  name: Label;
  validations?: readonly ValidationNode[] | undefined;
  /** Let empty cells pass every validation of this column. */
  allowEmpty?: boolean | undefined;
}

export interface SchemaOptions {
  /** Match columns by position instead of by label. Defaults to false. */
  ordered?: boolean | undefined;
}

/**
 * Named column rules checked together against a table.
 */
export class Schema {
  readonly columns: readonly ColumnDefinition[];
  readonly ordered: boolean;

  /**
   * @throws ConfigurationError when `columns` is empty or malformed
   */
  constructor(columns: readonly ColumnDefinition[], options?: SchemaOptions) {
    const parsed = SchemaColumnsSchema.safeParse(columns);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'columns'}: ${issue.message}`);
      throw new ConfigurationError(`Invalid schema: ${issues.join('; ')}`, { context: { issues } });
    }
    this.columns = columns;
    this.ordered = options?.ordered ?? false;
  }

  /**
   * Run every column's validations. Warnings come back sorted by row, with
   * warnings that have no row first; ties keep schema order.
   */
  validate(table: DataTable): Result<ValidationWarning[], ValidationEngineError> {
    if (table.columnCount() !== this.columns.length) {
      logger.info(
        { expected: this.columns.length, actual: table.columnCount() },
        'Column count does not match the schema'
      );
      return ok([
        new ValidationWarning({
          message: `Invalid number of columns. The schema specifies ${String(this.columns.length)}, but the table has ${String(table.columnCount())}`,
          validation: 'schema',
        }),
      ]);
    }

    if (!this.ordered) {
      const missing = this.columns.find((definition) => table.findLabel(1, definition.name) === undefined);
      if (missing !== undefined) {
        logger.info({ column: missing.name }, 'Schema column missing from table');
        return ok([
          new ValidationWarning({
            message: `The column ${String(missing.name)} exists in the schema but not in the table`,
            validation: 'schema',
          }),
        ]);
      }
    }

    const warnings: ValidationWarning[] = [];
    for (const [position, definition] of this.columns.entries()) {
      const index = this.ordered ? DualAxisIndexer.column(position) : DualAxisIndexer.column(definition.name, 'label');
      const nodes = column(definition.validations ?? [], index, { allowEmpty: definition.allowEmpty });

      for (const node of nodes) {
        const result = evaluate(node, table);
        if (result.isErr()) {
          logger.warn({ column: definition.name, error: result.error }, 'Column validation failed to run');
          return err(result.error);
        }
        warnings.push(...result.value);
      }
      logger.debug({ column: definition.name, validations: nodes.length }, 'Column validated');
    }

    logger.info({ columns: this.columns.length, warnings: warnings.length }, 'Schema validated');
    return ok(warnings.sort((a, b) => (a.rowPosition ?? -1) - (b.rowPosition ?? -1)));
  }
}
