/**
 * @stratum/query - Vectorized Kernels
 *
 * Column-at-a-time implementations of the physical expression operators.
 *
 * Binary operators run through a typed kernel chosen once per batch from
 * the operand types: numeric operands are unpacked into a Float64Array with
 * a validity mask, strings and booleans into plain arrays, and a constant
 * operand is broadcast without being materialized. When no kernel exists
 * for the operand types, or the kernel fails, the operator is re-run
 * elementwise over materialized values with per-value type dispatch.
 */

import {
  ArithmeticError,
  ArrayColumn,
  CastError,
  ConstantColumn,
  SizeMismatchError,
  StratumError,
  TypeMismatchError,
  assertNever,
  castValue,
  fitsInteger,
  isConstant,
  isNumericType,
  typeClass,
  wrapInteger,
  type ColumnValue,
  type DataType,
  type NumericType,
  type ScalarValue,
  type Value,
} from '@stratum/core';
import type { ScalarFunctionDef } from './functions.js';
import {
  OP_SYMBOLS,
  binaryResultType,
  isComparisonOp,
  isLogicalOp,
  type ArithmeticOp,
  type BinaryOp,
  type ComparisonOp,
  type LogicalOp,
} from './operators.js';

// =============================================================================
// Operands
// =============================================================================

interface Buffer<T> {
  readonly length: number;
  [index: number]: T;
}

/**
 * Typed view of one side of a binary operator.
 * A null validity mask means every entry is present.
 */
type Operand<T> =
  | { readonly kind: 'vector'; readonly data: Buffer<T>; readonly validity: Uint8Array | null }
  | { readonly kind: 'scalar'; readonly value: T | null };

type Guard<T extends ScalarValue> = (value: ScalarValue) => value is T;

const isNumber: Guard<number> = (v): v is number => typeof v === 'number';
const isString: Guard<string> = (v): v is string => typeof v === 'string';
const isBoolean: Guard<boolean> = (v): v is boolean => typeof v === 'boolean';

function unexpectedValue(column: ColumnValue, row: number): TypeMismatchError {
  return new TypeMismatchError(`Unexpected value in ${column.type} column at row ${row}`, {
    dataType: column.type,
    row,
  });
}

function toOperand<T extends ScalarValue>(
  column: ColumnValue,
  guard: Guard<T>,
  allocate: (length: number) => Buffer<T>
): Operand<T> {
  if (isConstant(column)) {
    const value = column.value;
    if (value === null || guard(value)) {
      return { kind: 'scalar', value };
    }
    throw unexpectedValue(column, 0);
  }

  const length = column.length;
  const data = allocate(length);
  let validity: Uint8Array | null = null;
  for (let i = 0; i < length; i++) {
    const value = column.values[i] ?? null;
    if (value === null) {
      validity ??= new Uint8Array(length).fill(1);
      validity[i] = 0;
    } else if (guard(value)) {
      data[i] = value;
    } else {
      throw unexpectedValue(column, i);
    }
  }
  return { kind: 'vector', data, validity };
}

const numbers = (column: ColumnValue): Operand<number> =>
  toOperand(column, isNumber, length => new Float64Array(length));
const strings = (column: ColumnValue): Operand<string> =>
  toOperand(column, isString, length => new Array<string>(length));
const booleans = (column: ColumnValue): Operand<boolean> =>
  toOperand(column, isBoolean, length => new Array<boolean>(length));

function read<T extends ScalarValue>(operand: Operand<T>, index: number): T | null {
  if (operand.kind === 'scalar') return operand.value;
  if (operand.validity !== null && operand.validity[index] === 0) return null;
  const value = operand.data[index];
  return value === undefined ? null : value;
}

function zip<T extends ScalarValue, R extends ScalarValue>(
  left: Operand<T>,
  right: Operand<T>,
  length: number,
  fn: (a: T, b: T) => R
): Value[] {
  const out = new Array<Value>(length);
  for (let i = 0; i < length; i++) {
    const a = read(left, i);
    const b = read(right, i);
    out[i] = a === null || b === null ? null : fn(a, b);
  }
  return out;
}

// =============================================================================
// Scalar Operators
// =============================================================================

type OrderingOp = Exclude<ComparisonOp, 'eq' | 'neq'>;

function compareNumbers(op: ComparisonOp): (a: number, b: number) => boolean {
  switch (op) {
    case 'eq': return (a, b) => a === b;
    case 'neq': return (a, b) => a !== b;
    case 'gt': return (a, b) => a > b;
    case 'gte': return (a, b) => a >= b;
    case 'lt': return (a, b) => a < b;
    case 'lte': return (a, b) => a <= b;
    default: return assertNever(op, 'comparison');
  }
}

/**
 * Order two strings by Unicode code point. Plain `<` compares UTF-16 code
 * units, which puts characters above U+FFFF before U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a.codePointAt(i) ?? 0;
    const y = b.codePointAt(i) ?? 0;
    if (x !== y) return x - y;
    if (x > 0xffff) i++;
  }
  return a.length - b.length;
}

function compareStrings(op: ComparisonOp): (a: string, b: string) => boolean {
  switch (op) {
    case 'eq': return (a, b) => a === b;
    case 'neq': return (a, b) => a !== b;
    case 'gt': return (a, b) => compareCodePoints(a, b) > 0;
    case 'gte': return (a, b) => compareCodePoints(a, b) >= 0;
    case 'lt': return (a, b) => compareCodePoints(a, b) < 0;
    case 'lte': return (a, b) => compareCodePoints(a, b) <= 0;
    default: return assertNever(op, 'comparison');
  }
}

function compareBooleans(op: ComparisonOp): (a: boolean, b: boolean) => boolean {
  const byNumber = compareNumbers(op);
  return (a, b) => byNumber(Number(a), Number(b));
}

function logical(op: LogicalOp): (a: boolean, b: boolean) => boolean {
  return op === 'and' ? (a, b) => a && b : (a, b) => a || b;
}

function divisionByZero(op: ArithmeticOp): ArithmeticError {
  return new ArithmeticError(`Integer ${op === 'div' ? 'division' : 'modulo'} by zero`, { op });
}

/**
 * Store an arithmetic result in `type`: float32 rounds, integer types wrap
 * to their width and reject fractional or unrepresentable values.
 */
function storeNumber(value: number, type: NumericType): number {
  if (type === 'float32') return Math.fround(value);
  if (type === 'float64') return value;
  if (!Number.isInteger(value)) {
    throw new CastError('float64', type, value);
  }
  const wrapped = wrapInteger(value, type);
  if (!fitsInteger(wrapped, type)) {
    throw new CastError('float64', type, value);
  }
  return wrapped === 0 ? 0 : wrapped;
}

/**
 * Arithmetic on two numbers producing a value of `resultType`.
 * Integer results truncate division toward zero and fail on a zero divisor.
 */
export function arithmetic(op: ArithmeticOp, resultType: NumericType): (a: number, b: number) => number {
  const integer = resultType !== 'float32' && resultType !== 'float64';
  let compute: (a: number, b: number) => number;
  switch (op) {
    case 'add':
      compute = (a, b) => a + b;
      break;
    case 'sub':
      compute = (a, b) => a - b;
      break;
    case 'mul':
      // 32-bit products can exceed 2^53; multiply in 32 bits before wrapping.
      compute = resultType === 'int32' || resultType === 'uint32'
        ? (a, b) => (Number.isInteger(a) && Number.isInteger(b) ? Math.imul(a, b) : a * b)
        : (a, b) => a * b;
      break;
    case 'div':
      compute = integer
        ? (a, b) => {
            if (b === 0) throw divisionByZero(op);
            return Math.trunc(a / b);
          }
        : (a, b) => a / b;
      break;
    case 'mod':
      compute = integer
        ? (a, b) => {
            if (b === 0) throw divisionByZero(op);
            return a % b;
          }
        : (a, b) => a % b;
      break;
    default:
      return assertNever(op, 'arithmetic operator');
  }
  return (a, b) => storeNumber(compute(a, b), resultType);
}

function compareScalars(op: OrderingOp, a: ScalarValue, b: ScalarValue): boolean {
  if (typeof a === 'number' && typeof b === 'number') return compareNumbers(op)(a, b);
  if (typeof a === 'string' && typeof b === 'string') return compareStrings(op)(a, b);
  if (typeof a === 'boolean' && typeof b === 'boolean') return compareBooleans(op)(a, b);
  throw new TypeMismatchError(`Cannot compare ${typeof a} with ${typeof b} using ${OP_SYMBOLS[op]}`, { op });
}

/**
 * Apply a binary operator to two non-null values, dispatching on their
 * runtime kinds.
 *
 * @throws TypeMismatchError when the operator does not apply to the values
 */
export function applyScalar(op: BinaryOp, a: ScalarValue, b: ScalarValue, resultType: DataType): ScalarValue {
  if (isLogicalOp(op)) {
    if (typeof a !== 'boolean' || typeof b !== 'boolean') {
      throw new TypeMismatchError(`${OP_SYMBOLS[op]} requires bool operands, got ${typeof a} and ${typeof b}`, { op });
    }
    return logical(op)(a, b);
  }
  if (op === 'eq') return a === b;
  if (op === 'neq') return a !== b;
  if (isComparisonOp(op)) return compareScalars(op, a, b);

  if (typeof a === 'number' && typeof b === 'number' && isNumericType(resultType)) {
    return arithmetic(op, resultType)(a, b);
  }
  if (op === 'add' && typeof a === 'string' && typeof b === 'string') {
    return a + b;
  }
  throw new TypeMismatchError(
    `Cannot apply ${OP_SYMBOLS[op]} to ${typeof a} and ${typeof b} (result type ${resultType})`,
    { op, resultType }
  );
}

// =============================================================================
// Binary Kernels
// =============================================================================

type Kernel = (left: ColumnValue, right: ColumnValue) => Value[];

function kernel<T extends ScalarValue, R extends ScalarValue>(
  view: (column: ColumnValue) => Operand<T>,
  fn: (a: T, b: T) => R
): Kernel {
  return (left, right) => zip(view(left), view(right), left.length, fn);
}

/**
 * Typed kernel for `op` over the given operand types, or undefined when
 * the pair has none and must be evaluated elementwise.
 */
export function selectKernel(
  op: BinaryOp,
  leftType: DataType,
  rightType: DataType
): Kernel | undefined {
  const left = typeClass(leftType);
  const right = typeClass(rightType);

  if (isLogicalOp(op)) {
    return left === 'bool' && right === 'bool' ? kernel(booleans, logical(op)) : undefined;
  }

  if (isComparisonOp(op)) {
    if (left !== right) return undefined;
    switch (left) {
      case 'numeric': return kernel(numbers, compareNumbers(op));
      case 'string': return kernel(strings, compareStrings(op));
      case 'bool': return kernel(booleans, compareBooleans(op));
      default: return assertNever(left, 'type class');
    }
  }

  if (left === 'numeric' && right === 'numeric' && isNumericType(leftType)) {
    return kernel(numbers, arithmetic(op, leftType));
  }
  if (op === 'add' && left === 'string' && right === 'string') {
    return kernel(strings, (a, b) => a + b);
  }
  return undefined;
}

/**
 * Evaluate `op` value by value over materialized operands.
 */
export function elementwiseBinary(op: BinaryOp, left: ColumnValue, right: ColumnValue): ArrayColumn {
  const resultType = binaryResultType(op, left.type);
  const a = left.toArray();
  const b = right.toArray();
  const out = a.map((x, i) => {
    const y = b[i] ?? null;
    return x === null || y === null ? null : applyScalar(op, x, y, resultType);
  });
  return new ArrayColumn(resultType, out);
}

/**
 * Evaluate a binary operator over two equally long columns.
 *
 * Two constants are combined once into a constant. Otherwise the typed
 * kernel runs, broadcasting a constant side; the elementwise path is the
 * fallback when there is no kernel or the kernel fails.
 *
 * @throws SizeMismatchError when the operands differ in length
 */
export function binaryCompute(op: BinaryOp, left: ColumnValue, right: ColumnValue): ColumnValue {
  if (left.length !== right.length) {
    throw new SizeMismatchError(
      `Operands of ${OP_SYMBOLS[op]} differ in length: ${left.length} vs ${right.length}`,
      left.length,
      right.length
    );
  }
  const resultType = binaryResultType(op, left.type);

  if (isConstant(left) && isConstant(right)) {
    const value = left.value === null || right.value === null
      ? null
      : applyScalar(op, left.value, right.value, resultType);
    return new ConstantColumn(resultType, value, left.length);
  }

  const typed = selectKernel(op, left.type, right.type);
  if (typed !== undefined) {
    try {
      return new ArrayColumn(resultType, typed(left, right));
    } catch (error) {
      // Engine errors fall through to the elementwise path, which
      // raises its own error if the operation really is invalid.
      if (!(error instanceof StratumError)) throw error;
    }
  }
  return elementwiseBinary(op, left, right);
}

// =============================================================================
// Unary Kernels
// =============================================================================

/**
 * Logical negation; null stays null.
 *
 * @throws TypeMismatchError when the column is not bool
 */
export function invert(column: ColumnValue): ColumnValue {
  if (column.type !== 'bool') {
    throw new TypeMismatchError(`NOT requires a bool operand, got ${column.type}`, {
      dataType: column.type,
    });
  }
  if (isConstant(column)) {
    const value = column.value;
    return new ConstantColumn('bool', typeof value === 'boolean' ? !value : null, column.length);
  }
  return new ArrayColumn('bool', column.values.map(v => (typeof v === 'boolean' ? !v : null)));
}

/**
 * Convert a column to `to`, keeping its representation.
 *
 * @throws CastError on an unsupported or lossy conversion
 */
export function castColumn(column: ColumnValue, to: DataType): ColumnValue {
  if (column.type === to) return column;
  if (isConstant(column)) {
    return new ConstantColumn(to, castValue(column.value, column.type, to), column.length);
  }
  return new ArrayColumn(to, column.values.map(v => castValue(v, column.type, to)));
}

/**
 * Apply a scalar function over argument columns of `length` rows.
 * All-constant arguments produce a constant; a null argument yields null.
 */
export function applyFunction(
  def: ScalarFunctionDef,
  args: readonly ColumnValue[],
  returnType: DataType,
  length: number
): ColumnValue {
  for (const arg of args) {
    if (arg.length !== length) {
      throw new SizeMismatchError(
        `Argument of ${def.name}() has length ${arg.length}, expected ${length}`,
        length,
        arg.length
      );
    }
  }

  const call = (row: number): Value => {
    const values: ScalarValue[] = [];
    for (const arg of args) {
      const value = arg.valueAt(row);
      if (value === null) return null;
      values.push(value);
    }
    return def.apply(values);
  };

  if (args.every(isConstant)) {
    return new ConstantColumn(returnType, length === 0 ? null : call(0), length);
  }
  const out = new Array<Value>(length);
  for (let row = 0; row < length; row++) {
    out[row] = call(row);
  }
  return new ArrayColumn(returnType, out);
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Keep the rows of `column` where `mask` is 1. Constants only change length.
 */
export function filterColumn(column: ColumnValue, mask: Uint8Array, kept: number): ColumnValue {
  if (isConstant(column)) {
    return column.withLength(kept);
  }
  const out = new Array<Value>(kept);
  let next = 0;
  for (let i = 0; i < mask.length; i++) {
    if (mask[i] === 1) {
      out[next++] = column.values[i] ?? null;
    }
  }
  return new ArrayColumn(column.type, out);
}
