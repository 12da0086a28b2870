/**
 * @stratum/query - Physical Operators
 *
 * Executable plan nodes. `execute()` returns a fresh, lazy BatchStream that
 * pulls from the child's stream one batch at a time; no operator buffers
 * more than the batch it is working on.
 */

import {
  ArityMismatchError,
  BatchStream,
  DataBatch,
  TypeMismatchError,
  isConstant,
  type DataSource,
  type TableSchema,
} from '@stratum/core';
import { filterColumn } from './kernels.js';
import { formatProjection } from './logical-plan.js';
import { evaluate, formatPhysicalExpr, type PhysicalExpr } from './physical-expr.js';

/** Physical plan node */
export type PhysicalPlan = ScanExec | FilterExec | ProjectionExec;

// =============================================================================
// ScanExec
// =============================================================================

export class ScanExec {
  readonly kind = 'scan' as const;
  readonly dataSource: DataSource;
  readonly projection: readonly string[];
  private readonly outputSchema: TableSchema;

  constructor(dataSource: DataSource, projection: readonly string[] = []) {
    this.dataSource = dataSource;
    this.projection = Object.freeze([...projection]);
    this.outputSchema = projection.length === 0
      ? dataSource.schema()
      : dataSource.schema().select(projection);
    Object.freeze(this);
  }

  schema(): TableSchema {
    return this.outputSchema;
  }

  children(): readonly PhysicalPlan[] {
    return [];
  }

  execute(): BatchStream {
    return this.dataSource.scan(this.projection);
  }

  toString(): string {
    const source = this.dataSource.name ?? 'DataSource';
    return `ScanExec: projection=${formatProjection(this.projection)}, source=${source}`;
  }
}

// =============================================================================
// FilterExec
// =============================================================================

/**
 * Keeps the rows where the predicate is true. Null counts as false.
 *
 * A constant predicate skips masking entirely: true passes the batch
 * through, false or null yields a zero-row batch built once per operator.
 */
export class FilterExec {
  readonly kind = 'filter' as const;
  readonly input: PhysicalPlan;
  readonly predicate: PhysicalExpr;
  private readonly emptyBatch: DataBatch;

  constructor(input: PhysicalPlan, predicate: PhysicalExpr) {
    this.input = input;
    this.predicate = predicate;
    this.emptyBatch = DataBatch.empty(input.schema());
    Object.freeze(this);
  }

  schema(): TableSchema {
    return this.input.schema();
  }

  children(): readonly PhysicalPlan[] {
    return [this.input];
  }

  execute(): BatchStream {
    return BatchStream.map(this.input.execute(), batch => this.filterBatch(batch));
  }

  private filterBatch(batch: DataBatch): DataBatch {
    const result = evaluate(this.predicate, batch);
    if (result.type !== 'bool') {
      throw new TypeMismatchError(
        `Filter predicate must evaluate to bool, got ${result.type}: ${formatPhysicalExpr(this.predicate)}`,
        { dataType: result.type }
      );
    }

    if (isConstant(result)) {
      return result.value === true ? batch : this.emptyBatch;
    }

    const mask = new Uint8Array(result.length);
    let kept = 0;
    result.values.forEach((value, i) => {
      if (value === true) {
        mask[i] = 1;
        kept++;
      }
    });
    return new DataBatch(
      batch.schema,
      batch.columns.map(column => filterColumn(column, mask, kept))
    );
  }

  toString(): string {
    return `FilterExec: ${formatPhysicalExpr(this.predicate)}`;
  }
}

// =============================================================================
// ProjectionExec
// =============================================================================

export class ProjectionExec {
  readonly kind = 'projection' as const;
  readonly input: PhysicalPlan;
  readonly exprs: readonly PhysicalExpr[];
  private readonly outputSchema: TableSchema;

  /**
   * @throws ArityMismatchError when expression and field counts differ
   */
  constructor(input: PhysicalPlan, exprs: readonly PhysicalExpr[], outputSchema: TableSchema) {
    if (exprs.length !== outputSchema.fields.length) {
      throw new ArityMismatchError(
        `Projection has ${exprs.length} expressions but its schema has ${outputSchema.fields.length} fields`,
        outputSchema.fields.length,
        exprs.length
      );
    }
    this.input = input;
    this.exprs = Object.freeze([...exprs]);
    this.outputSchema = outputSchema;
    Object.freeze(this);
  }

  schema(): TableSchema {
    return this.outputSchema;
  }

  children(): readonly PhysicalPlan[] {
    return [this.input];
  }

  execute(): BatchStream {
    return BatchStream.map(this.input.execute(), batch =>
      new DataBatch(this.outputSchema, this.exprs.map(e => evaluate(e, batch)))
    );
  }

  toString(): string {
    return `ProjectionExec: ${this.exprs.map(formatPhysicalExpr).join(', ')}`;
  }
}
