/**
 * @stratum/query - Expression DSL
 *
 * Builder functions for logical expressions, plus a fluent wrapper for
 * chaining. Plain JavaScript values passed where an expression is expected
 * become literals.
 *
 * @example
 * ```typescript
 * import { col, lit, eq, mul, alias, expr } from '@stratum/query';
 *
 * const predicate = eq(col('first_name'), lit('Niko'));
 * const doubled = alias(mul(col('id'), 2), 'new_id');
 *
 * // fluent form
 * const same = expr(col('id')).mul(2).as('new_id').build();
 * ```
 */

import type { DataType, ScalarValue } from '@stratum/core';
import type {
  Alias,
  BinaryExpr,
  Cast,
  ColumnByIndex,
  ColumnByName,
  Literal,
  LogicalExpr,
  Not,
  ScalarFunction,
} from './logical-expr.js';
import type { BinaryOp } from './operators.js';

/** Anything accepted where an expression is expected */
export type ExprInput = LogicalExpr | ExprBuilder | ScalarValue;

/**
 * Normalize an expression input to a LogicalExpr.
 */
export function toExpr(input: ExprInput): LogicalExpr {
  if (input instanceof ExprBuilder) return input.build();
  if (typeof input === 'object') return input;
  return lit(input);
}

// =============================================================================
// Leaves
// =============================================================================

export function col(name: string): ColumnByName {
  return Object.freeze({ kind: 'column', name });
}

export function colAt(index: number): ColumnByIndex {
  return Object.freeze({ kind: 'column_index', index });
}

/**
 * Literal typed from its JavaScript value: booleans are bool, strings are
 * string, safe integers int64 and any other number float64.
 */
export function lit(value: ScalarValue): Literal {
  if (typeof value === 'boolean') return Object.freeze({ kind: 'literal', value, dataType: 'bool' });
  if (typeof value === 'string') return Object.freeze({ kind: 'literal', value, dataType: 'string' });
  return Number.isSafeInteger(value) ? litInt(value) : litDouble(value);
}

function litInt(value: number): Literal {
  return Object.freeze({ kind: 'literal', value, dataType: 'int64' });
}

/** Single-precision float literal; the value is rounded to float32 */
export function litFloat(value: number): Literal {
  return Object.freeze({ kind: 'literal', value: Math.fround(value), dataType: 'float32' });
}

/** Double-precision float literal, even for integral values */
export function litDouble(value: number): Literal {
  return Object.freeze({ kind: 'literal', value, dataType: 'float64' });
}

// =============================================================================
// Unary
// =============================================================================

export function cast(input: ExprInput, dataType: DataType): Cast {
  return Object.freeze({ kind: 'cast', expr: toExpr(input), dataType });
}

export function alias(input: ExprInput, name: string): Alias {
  return Object.freeze({ kind: 'alias', expr: toExpr(input), name });
}

export function not(input: ExprInput): Not {
  return Object.freeze({ kind: 'not', expr: toExpr(input) });
}

// =============================================================================
// Binary
// =============================================================================

export function binary(op: BinaryOp, left: ExprInput, right: ExprInput): BinaryExpr {
  return Object.freeze({ kind: 'binary', op, left: toExpr(left), right: toExpr(right) });
}

export const and = (l: ExprInput, r: ExprInput): BinaryExpr => binary('and', l, r);
export const or = (l: ExprInput, r: ExprInput): BinaryExpr => binary('or', l, r);
export const eq = (l: ExprInput, r: ExprInput): BinaryExpr => binary('eq', l, r);
export const neq = (l: ExprInput, r: ExprInput): BinaryExpr => binary('neq', l, r);
export const gt = (l: ExprInput, r: ExprInput): BinaryExpr => binary('gt', l, r);
export const gte = (l: ExprInput, r: ExprInput): BinaryExpr => binary('gte', l, r);
export const lt = (l: ExprInput, r: ExprInput): BinaryExpr => binary('lt', l, r);
export const lte = (l: ExprInput, r: ExprInput): BinaryExpr => binary('lte', l, r);
export const add = (l: ExprInput, r: ExprInput): BinaryExpr => binary('add', l, r);
export const sub = (l: ExprInput, r: ExprInput): BinaryExpr => binary('sub', l, r);
export const mul = (l: ExprInput, r: ExprInput): BinaryExpr => binary('mul', l, r);
export const div = (l: ExprInput, r: ExprInput): BinaryExpr => binary('div', l, r);
export const mod = (l: ExprInput, r: ExprInput): BinaryExpr => binary('mod', l, r);

// =============================================================================
// Functions
// =============================================================================

/**
 * Call to a registered scalar function.
 *
 * @example
 * ```typescript
 * fn('upper', [col('first_name')], 'string');
 * ```
 */
export function fn(name: string, args: readonly ExprInput[], returnType: DataType): ScalarFunction {
  return Object.freeze({
    kind: 'function',
    name,
    args: Object.freeze(args.map(toExpr)),
    returnType,
  });
}

// =============================================================================
// Fluent Builder
// =============================================================================

/**
 * Chainable wrapper around a logical expression.
 */
export class ExprBuilder {
  private readonly expr: LogicalExpr;

  constructor(expr: LogicalExpr) {
    this.expr = expr;
  }

  build(): LogicalExpr {
    return this.expr;
  }

  and(other: ExprInput): ExprBuilder { return new ExprBuilder(and(this.expr, other)); }
  or(other: ExprInput): ExprBuilder { return new ExprBuilder(or(this.expr, other)); }
  eq(other: ExprInput): ExprBuilder { return new ExprBuilder(eq(this.expr, other)); }
  neq(other: ExprInput): ExprBuilder { return new ExprBuilder(neq(this.expr, other)); }
  gt(other: ExprInput): ExprBuilder { return new ExprBuilder(gt(this.expr, other)); }
  gte(other: ExprInput): ExprBuilder { return new ExprBuilder(gte(this.expr, other)); }
  lt(other: ExprInput): ExprBuilder { return new ExprBuilder(lt(this.expr, other)); }
  lte(other: ExprInput): ExprBuilder { return new ExprBuilder(lte(this.expr, other)); }
  add(other: ExprInput): ExprBuilder { return new ExprBuilder(add(this.expr, other)); }
  sub(other: ExprInput): ExprBuilder { return new ExprBuilder(sub(this.expr, other)); }
  mul(other: ExprInput): ExprBuilder { return new ExprBuilder(mul(this.expr, other)); }
  div(other: ExprInput): ExprBuilder { return new ExprBuilder(div(this.expr, other)); }
  mod(other: ExprInput): ExprBuilder { return new ExprBuilder(mod(this.expr, other)); }

  not(): ExprBuilder {
    return new ExprBuilder(not(this.expr));
  }

  cast(dataType: DataType): ExprBuilder {
    return new ExprBuilder(cast(this.expr, dataType));
  }

  as(name: string): ExprBuilder {
    return new ExprBuilder(alias(this.expr, name));
  }
}

/**
 * Start a fluent expression from a column, literal or existing expression.
 */
export function expr(input: ExprInput): ExprBuilder {
  return new ExprBuilder(toExpr(input));
}
