/**
 * @stratum/query - Physical Expressions
 *
 * Bound expression tree produced by the planner: column references are
 * positions, aliases are gone and scalar functions carry their resolved
 * implementation. `evaluate` computes one ColumnValue per batch.
 */

import {
  ConstantColumn,
  assertNever,
  type ColumnValue,
  type DataBatch,
  type DataType,
  type ScalarValue,
} from '@stratum/core';
import type { ScalarFunctionDef } from './functions.js';
import { applyFunction, binaryCompute, castColumn, invert } from './kernels.js';
import { formatLiteral } from './logical-expr.js';
import { OP_SYMBOLS, type BinaryOp } from './operators.js';

// =============================================================================
// Node Types
// =============================================================================

export interface ColumnAt {
  readonly kind: 'column';
  readonly index: number;
}

export interface BoundLiteral {
  readonly kind: 'literal';
  readonly value: ScalarValue;
  readonly dataType: DataType;
}

export interface BoundCast {
  readonly kind: 'cast';
  readonly expr: PhysicalExpr;
  readonly dataType: DataType;
}

export interface BoundNot {
  readonly kind: 'not';
  readonly expr: PhysicalExpr;
}

export interface BoundBinary {
  readonly kind: 'binary';
  readonly op: BinaryOp;
  readonly left: PhysicalExpr;
  readonly right: PhysicalExpr;
}

export interface BoundFunction {
  readonly kind: 'function';
  readonly fn: ScalarFunctionDef;
  readonly args: readonly PhysicalExpr[];
  readonly returnType: DataType;
}

/** Executable expression node */
export type PhysicalExpr =
  | ColumnAt
  | BoundLiteral
  | BoundCast
  | BoundNot
  | BoundBinary
  | BoundFunction;

// =============================================================================
// Constructors
// =============================================================================

export const physical = {
  column: (index: number): ColumnAt => Object.freeze({ kind: 'column', index }),
  literal: (value: ScalarValue, dataType: DataType): BoundLiteral =>
    Object.freeze({ kind: 'literal', value, dataType }),
  cast: (expr: PhysicalExpr, dataType: DataType): BoundCast =>
    Object.freeze({ kind: 'cast', expr, dataType }),
  not: (expr: PhysicalExpr): BoundNot => Object.freeze({ kind: 'not', expr }),
  binary: (op: BinaryOp, left: PhysicalExpr, right: PhysicalExpr): BoundBinary =>
    Object.freeze({ kind: 'binary', op, left, right }),
  fn: (fn: ScalarFunctionDef, args: readonly PhysicalExpr[], returnType: DataType): BoundFunction =>
    Object.freeze({ kind: 'function', fn, args: Object.freeze([...args]), returnType }),
};

// =============================================================================
// Rendering
// =============================================================================

export function formatPhysicalExpr(expr: PhysicalExpr): string {
  switch (expr.kind) {
    case 'column':
      return `#${expr.index}`;
    case 'literal':
      return formatLiteral(expr.value, expr.dataType);
    case 'cast':
      return `CAST(${formatPhysicalExpr(expr.expr)} AS ${expr.dataType})`;
    case 'not':
      return `NOT(${formatPhysicalExpr(expr.expr)})`;
    case 'binary':
      return `(${formatPhysicalExpr(expr.left)} ${OP_SYMBOLS[expr.op]} ${formatPhysicalExpr(expr.right)})`;
    case 'function':
      return `${expr.fn.name}(${expr.args.map(formatPhysicalExpr).join(', ')})`;
    default:
      return assertNever(expr, 'physical expression');
  }
}

// =============================================================================
// Evaluation
// =============================================================================

/**
 * Evaluate `expr` over every row of `batch`.
 *
 * Column references return the batch's own column without copying;
 * literals become constants sized to the batch.
 */
export function evaluate(expr: PhysicalExpr, batch: DataBatch): ColumnValue {
  switch (expr.kind) {
    case 'column':
      return batch.column(expr.index);
    case 'literal':
      return new ConstantColumn(expr.dataType, expr.value, batch.rowCount());
    case 'cast':
      return castColumn(evaluate(expr.expr, batch), expr.dataType);
    case 'not':
      return invert(evaluate(expr.expr, batch));
    case 'binary':
      return binaryCompute(expr.op, evaluate(expr.left, batch), evaluate(expr.right, batch));
    case 'function':
      return applyFunction(
        expr.fn,
        expr.args.map(arg => evaluate(arg, batch)),
        expr.returnType,
        batch.rowCount()
      );
    default:
      return assertNever(expr, 'physical expression');
  }
}
