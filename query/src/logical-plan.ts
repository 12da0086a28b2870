/**
 * @stratum/query - Logical Plans
 *
 * Relational operators over logical expressions. Each node computes its
 * output schema once, at construction, and is frozen afterwards.
 */

import { TableSchema, TypeMismatchError, type DataSource } from '@stratum/core';
import { formatExpr, toField, type LogicalExpr } from './logical-expr.js';

/** Logical plan node */
export type LogicalPlan = Scan | Filter | Projection;

export function formatProjection(projection: readonly string[]): string {
  return projection.length === 0 ? '*' : `[${projection.join(', ')}]`;
}

// =============================================================================
// Scan
// =============================================================================

/**
 * Read from a data source, optionally keeping only the named columns.
 * An empty projection keeps every column.
 */
export class Scan {
  readonly kind = 'scan' as const;
  readonly sourceUri: string;
  readonly dataSource: DataSource;
  readonly projection: readonly string[];
  private readonly outputSchema: TableSchema;

  /**
   * @throws SchemaError when a projected name is not in the source schema
   */
  constructor(sourceUri: string, dataSource: DataSource, projection: readonly string[] = []) {
    this.sourceUri = sourceUri;
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

  children(): readonly LogicalPlan[] {
    return [];
  }

  toString(): string {
    return `Scan: ${this.sourceUri}; projection=${formatProjection(this.projection)}`;
  }
}

// =============================================================================
// Filter
// =============================================================================

/**
 * Keep the rows of `input` for which `predicate` is true.
 */
export class Filter {
  readonly kind = 'filter' as const;
  readonly input: LogicalPlan;
  readonly predicate: LogicalExpr;

  /**
   * @throws TypeMismatchError when the predicate does not resolve to bool
   */
  constructor(input: LogicalPlan, predicate: LogicalExpr) {
    const resolved = toField(predicate, input);
    if (resolved.dataType !== 'bool') {
      throw new TypeMismatchError(
        `Filter predicate must be bool, got ${resolved.dataType}: ${formatExpr(predicate)}`,
        { dataType: resolved.dataType }
      );
    }
    this.input = input;
    this.predicate = predicate;
    Object.freeze(this);
  }

  schema(): TableSchema {
    return this.input.schema();
  }

  children(): readonly LogicalPlan[] {
    return [this.input];
  }

  toString(): string {
    return `Filter: ${formatExpr(this.predicate)}`;
  }
}

// =============================================================================
// Projection
// =============================================================================

/**
 * Compute one output column per expression.
 */
export class Projection {
  readonly kind = 'projection' as const;
  readonly input: LogicalPlan;
  readonly exprs: readonly LogicalExpr[];
  private readonly outputSchema: TableSchema;

  /**
   * @throws SchemaError when two expressions resolve to the same output name
   */
  constructor(input: LogicalPlan, exprs: readonly LogicalExpr[]) {
    this.input = input;
    this.exprs = Object.freeze([...exprs]);
    this.outputSchema = new TableSchema(exprs.map(e => toField(e, input)));
    Object.freeze(this);
  }

  schema(): TableSchema {
    return this.outputSchema;
  }

  children(): readonly LogicalPlan[] {
    return [this.input];
  }

  toString(): string {
    return `Projection: ${this.exprs.map(formatExpr).join(', ')}`;
  }
}
