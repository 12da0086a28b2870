/**
 * @stratum/query - Logical Expressions
 *
 * Immutable expression AST used by logical plans. Column references are
 * symbolic here; the planner binds them to positions.
 *
 * Every expression resolves to a SchemaField against an input schema:
 * its output name (the textual rendering, unless aliased) and its type.
 */

import {
  ColumnNotFoundError,
  assertNever,
  field,
  formatFloat,
  isFloatType,
  type DataType,
  type SchemaField,
  type ScalarValue,
  type TableSchema,
} from '@stratum/core';
import { OP_SYMBOLS, binaryResultType, type BinaryOp } from './operators.js';

// =============================================================================
// Node Types
// =============================================================================

/** Types a literal may carry */
export type LiteralType = 'bool' | 'int64' | 'float32' | 'float64' | 'string';

export interface ColumnByName {
  readonly kind: 'column';
  readonly name: string;
}

export interface ColumnByIndex {
  readonly kind: 'column_index';
  readonly index: number;
}

export interface Literal {
  readonly kind: 'literal';
  readonly value: ScalarValue;
  readonly dataType: LiteralType;
}

export interface Cast {
  readonly kind: 'cast';
  readonly expr: LogicalExpr;
  readonly dataType: DataType;
}

export interface Alias {
  readonly kind: 'alias';
  readonly expr: LogicalExpr;
  readonly name: string;
}

export interface Not {
  readonly kind: 'not';
  readonly expr: LogicalExpr;
}

export interface BinaryExpr {
  readonly kind: 'binary';
  readonly op: BinaryOp;
  readonly left: LogicalExpr;
  readonly right: LogicalExpr;
}

export interface ScalarFunction {
  readonly kind: 'function';
  readonly name: string;
  readonly args: readonly LogicalExpr[];
  readonly returnType: DataType;
}

/**
 * Logical expression tree node.
 */
export type LogicalExpr =
  | ColumnByName
  | ColumnByIndex
  | Literal
  | Cast
  | Alias
  | Not
  | BinaryExpr
  | ScalarFunction;

/**
 * Anything with an output schema an expression can be resolved against.
 */
export interface SchemaProvider {
  schema(): TableSchema;
}

// =============================================================================
// Rendering
// =============================================================================

export function formatLiteral(value: ScalarValue, dataType: DataType): string {
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (isFloatType(dataType)) return formatFloat(value);
  return String(value);
}

/**
 * Textual rendering used for EXPLAIN labels and derived column names.
 *
 * @example
 * ```typescript
 * formatExpr(eq(col('first_name'), lit('Niko'))); // "(#first_name = 'Niko')"
 * ```
 */
export function formatExpr(expr: LogicalExpr): string {
  switch (expr.kind) {
    case 'column':
      return `#${expr.name}`;
    case 'column_index':
      return `#${expr.index}`;
    case 'literal':
      return formatLiteral(expr.value, expr.dataType);
    case 'cast':
      return `CAST(${formatExpr(expr.expr)} AS ${expr.dataType})`;
    case 'alias':
      return `${formatExpr(expr.expr)} AS ${expr.name}`;
    case 'not':
      return `NOT(${formatExpr(expr.expr)})`;
    case 'binary':
      return `(${formatExpr(expr.left)} ${OP_SYMBOLS[expr.op]} ${formatExpr(expr.right)})`;
    case 'function':
      return `${expr.name}(${expr.args.map(formatExpr).join(', ')})`;
    default:
      return assertNever(expr, 'logical expression');
  }
}

// =============================================================================
// Field Resolution
// =============================================================================

/**
 * Resolve the output field of `expr` against `schema`.
 *
 * @throws ColumnNotFoundError when a referenced column does not exist
 */
export function resolveField(expr: LogicalExpr, schema: TableSchema): SchemaField {
  switch (expr.kind) {
    case 'column': {
      const index = schema.indexOf(expr.name);
      if (index < 0) {
        throw new ColumnNotFoundError(expr.name, schema.fieldNames());
      }
      return schema.field(index);
    }
    case 'column_index':
      return schema.field(expr.index);
    case 'literal':
      return field(formatLiteral(expr.value, expr.dataType), expr.dataType);
    case 'cast':
      return field(resolveField(expr.expr, schema).name, expr.dataType);
    case 'alias':
      return field(expr.name, resolveField(expr.expr, schema).dataType);
    case 'not':
      resolveField(expr.expr, schema);
      return field(formatExpr(expr), 'bool');
    case 'binary': {
      const left = resolveField(expr.left, schema);
      resolveField(expr.right, schema);
      return field(formatExpr(expr), binaryResultType(expr.op, left.dataType));
    }
    case 'function':
      for (const arg of expr.args) {
        resolveField(arg, schema);
      }
      return field(formatExpr(expr), expr.returnType);
    default:
      return assertNever(expr, 'logical expression');
  }
}

/**
 * Resolve the output field of `expr` against the output of `input`.
 */
export function toField(expr: LogicalExpr, input: SchemaProvider): SchemaField {
  return resolveField(expr, input.schema());
}
