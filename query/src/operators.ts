/**
 * @stratum/query - Binary Operators
 *
 * The closed set of binary operators shared by logical and physical
 * expressions, with their rendering and result typing.
 */

import type { DataType } from '@stratum/core';

export const LOGICAL_OPS = ['and', 'or'] as const;
export const COMPARISON_OPS = ['eq', 'neq', 'gt', 'gte', 'lt', 'lte'] as const;
export const ARITHMETIC_OPS = ['add', 'sub', 'mul', 'div', 'mod'] as const;

export type LogicalOp = (typeof LOGICAL_OPS)[number];
export type ComparisonOp = (typeof COMPARISON_OPS)[number];
export type ArithmeticOp = (typeof ARITHMETIC_OPS)[number];
export type BinaryOp = LogicalOp | ComparisonOp | ArithmeticOp;

export const OP_SYMBOLS: Record<BinaryOp, string> = {
  and: 'AND',
  or: 'OR',
  eq: '=',
  neq: '!=',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
  add: '+',
  sub: '-',
  mul: '*',
  div: '/',
  mod: '%',
};

export function isLogicalOp(op: BinaryOp): op is LogicalOp {
  return op === 'and' || op === 'or';
}

export function isComparisonOp(op: BinaryOp): op is ComparisonOp {
  return COMPARISON_OPS.some(candidate => candidate === op);
}

export function isArithmeticOp(op: BinaryOp): op is ArithmeticOp {
  return ARITHMETIC_OPS.some(candidate => candidate === op);
}

/**
 * Output type of a binary operator.
 *
 * Arithmetic takes the left operand's type; there is no numeric promotion,
 * so `int64 * float64` is int64 and a fractional result fails when stored.
 */
export function binaryResultType(op: BinaryOp, leftType: DataType): DataType {
  return isArithmeticOp(op) ? leftType : 'bool';
}
