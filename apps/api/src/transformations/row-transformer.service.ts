import { Injectable, Logger } from '@nestjs/common';
import { TargetSchema } from '../database/schema-introspector.service';
import { ColumnMapping } from '../mappings/mapping.types';
import { CompiledExpression, compileExpression, TransformationError } from './expression';
import { CoercedValue, coerceValue } from './type-coercion';

export type TransformedRow = Record<string, CoercedValue>;

/** Raised when a row produces nothing the target table can hold. */
export class RowTransformError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RowTransformError';
  }
}

/**
 * A mapping with its expression compiled once for the whole run.
 * `compileError` is set when the expression is unusable; every value it
 * would have produced becomes null.
 */
export interface PreparedMapping {
  mapping: ColumnMapping;
  expression: CompiledExpression | null;
  compileError: string | null;
}

@Injectable()
export class RowTransformer {
  private readonly logger = new Logger(RowTransformer.name);

  prepare(mappings: ColumnMapping[]): PreparedMapping[] {
    return mappings.map((mapping) => {
      const logic = mapping.transformationLogic?.trim();
      if (!logic) {
        return { mapping, expression: null, compileError: null };
      }
      try {
        return { mapping, expression: compileExpression(logic), compileError: null };
      } catch (error) {
        if (!(error instanceof TransformationError)) throw error;
        this.logger.warn(
          `Transformation for ${mapping.targetColumn} is invalid, values will be null: ${error.message}`,
        );
        return { mapping, expression: null, compileError: error.message };
      }
    });
  }

  /**
   * Build one target row from one source row.
   *
   * Target columns missing from the live schema are dropped. Coercion
   * failures propagate and fail the row.
   */
  transform(
    row: Record<string, unknown>,
    mappings: PreparedMapping[],
    schema: TargetSchema,
  ): TransformedRow {
    const columns = new Map(schema.map((column) => [column.name, column]));
    const transformed: TransformedRow = {};

    for (const prepared of mappings) {
      const { mapping } = prepared;
      const target = columns.get(mapping.targetColumn);
      if (!target) continue;

      const value = this.evaluate(prepared, row[mapping.sourceColumn] ?? null);
      transformed[mapping.targetColumn] = coerceValue(value, target);
    }

    if (Object.keys(transformed).length === 0) {
      throw new RowTransformError('No matching columns found for the target table');
    }
    return transformed;
  }

  private evaluate(prepared: PreparedMapping, raw: unknown): unknown {
    if (prepared.compileError !== null) return null;
    if (!prepared.expression) return raw;

    const source = raw === null || raw === undefined ? '' : String(raw);
    try {
      return prepared.expression.evaluate(source);
    } catch (error) {
      if (!(error instanceof TransformationError)) throw error;
      this.logger.warn(
        `Error applying transformation for ${prepared.mapping.targetColumn}: ${error.message}`,
      );
      return null;
    }
  }
}
