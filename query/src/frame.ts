/**
 * @stratum/query - Frames
 *
 * LazyFrame builds a logical plan step by step and runs it on demand.
 * DataFrame holds collected batches and offers the same operations eagerly.
 */

import {
  ArrayColumn,
  DataBatch,
  type BatchStream,
  type TableSchema,
  type Value,
} from '@stratum/core';
import type { ExecutionContext } from './context.js';
import { explainLogical, explainPhysical } from './explain.js';
import { col, toExpr, type ExprBuilder } from './expr-builder.js';
import type { LogicalExpr } from './logical-expr.js';
import { Filter, Projection, type LogicalPlan } from './logical-plan.js';
import type { PhysicalPlan } from './physical-plan.js';

/** A projection item: column name, expression or fluent builder */
export type SelectItem = string | LogicalExpr | ExprBuilder;

/** A filter predicate */
export type Predicate = LogicalExpr | ExprBuilder;

function toSelectExpr(item: SelectItem): LogicalExpr {
  return typeof item === 'string' ? col(item) : toExpr(item);
}

// =============================================================================
// LazyFrame
// =============================================================================

export class LazyFrame {
  private readonly context: ExecutionContext;
  private readonly plan: LogicalPlan;

  constructor(context: ExecutionContext, plan: LogicalPlan) {
    this.context = context;
    this.plan = plan;
  }

  /**
   * Project columns. Strings name input columns.
   *
   * @example
   * ```typescript
   * frame.select('first_name', expr(col('id')).mul(2).as('new_id'));
   * ```
   */
  select(...items: SelectItem[]): LazyFrame {
    return new LazyFrame(this.context, new Projection(this.plan, items.map(toSelectExpr)));
  }

  filter(predicate: Predicate): LazyFrame {
    return new LazyFrame(this.context, new Filter(this.plan, toExpr(predicate)));
  }

  /** Alias of `filter` */
  where(predicate: Predicate): LazyFrame {
    return this.filter(predicate);
  }

  schema(): TableSchema {
    return this.plan.schema();
  }

  logicalPlan(): LogicalPlan {
    return this.plan;
  }

  physicalPlan(): PhysicalPlan {
    return this.context.createPhysicalPlan(this.plan);
  }

  /**
   * Start execution and return the lazy batch stream.
   */
  execute(): BatchStream {
    return this.context.execute(this.plan);
  }

  /**
   * Execute and gather every batch.
   */
  collect(): DataFrame {
    return new DataFrame(this.context, this.execute().toArray(), this.schema());
  }

  /**
   * Logical and physical plan trees.
   */
  explain(verbose: boolean = this.context.config.explain.verbose): string {
    return [
      'Logical Plan:',
      explainLogical(this.plan, verbose),
      '',
      'Physical Plan:',
      explainPhysical(this.physicalPlan(), verbose),
    ].join('\n');
  }
}

// =============================================================================
// DataFrame
// =============================================================================

export class DataFrame {
  readonly batches: readonly DataBatch[];
  private readonly context: ExecutionContext;
  private readonly frameSchema: TableSchema;

  constructor(context: ExecutionContext, batches: readonly DataBatch[], schema: TableSchema) {
    this.context = context;
    this.batches = Object.freeze([...batches]);
    this.frameSchema = schema;
  }

  schema(): TableSchema {
    return this.frameSchema;
  }

  rowCount(): number {
    return this.batches.reduce((sum, batch) => sum + batch.rowCount(), 0);
  }

  lazy(): LazyFrame {
    return this.context.fromBatches(this.batches, this.frameSchema);
  }

  select(...items: SelectItem[]): DataFrame {
    return this.lazy().select(...items).collect();
  }

  filter(predicate: Predicate): DataFrame {
    return this.lazy().filter(predicate).collect();
  }

  where(predicate: Predicate): DataFrame {
    return this.filter(predicate);
  }

  toRecords(): Record<string, Value>[] {
    return this.batches.flatMap(batch => batch.toRecords());
  }

  /**
   * All rows as one batch of array columns.
   */
  toBatch(): DataBatch {
    return new DataBatch(
      this.frameSchema,
      this.frameSchema.fields.map(
        (f, i) => new ArrayColumn(f.dataType, this.batches.flatMap(batch => batch.column(i).toArray()))
      )
    );
  }

  toString(): string {
    return this.toBatch().toString();
  }
}
