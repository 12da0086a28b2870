/**
 * @stratum/core - Column Values
 *
 * Dual representation of a column's data:
 * - ArrayColumn: one value per row
 * - ConstantColumn: a single value standing in for `length` rows
 *
 * Operators switch on `kind` so that constants can take fast paths
 * (evaluate once, reduce length on filter) instead of being materialized.
 */

import { isValueOfType, type DataType, type Value } from './data-types.js';
import { IndexOutOfRangeError, TypeMismatchError } from './errors.js';

function checkIndex(index: number, length: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new IndexOutOfRangeError(index, length);
  }
}

/** float32 values are held rounded to single precision */
function storeValue(value: Value, type: DataType): Value {
  return type === 'float32' && typeof value === 'number' ? Math.fround(value) : value;
}

// =============================================================================
// ArrayColumn
// =============================================================================

/**
 * Column backed by an array holding one value per row.
 * Every non-null value must be storable in `type`.
 */
export class ArrayColumn {
  readonly kind = 'array' as const;
  readonly type: DataType;
  readonly values: readonly Value[];

  constructor(type: DataType, values: readonly Value[]) {
    for (let i = 0; i < values.length; i++) {
      const value = values[i];
      if (value !== null && value !== undefined && !isValueOfType(value, type)) {
        throw new TypeMismatchError(`Value at row ${i} is not a valid ${type}: ${JSON.stringify(value)}`, {
          row: i,
          dataType: type,
        });
      }
    }
    this.type = type;
    this.values = Object.freeze(values.map(v => storeValue(v ?? null, type)));
    Object.freeze(this);
  }

  get length(): number {
    return this.values.length;
  }

  valueAt(index: number): Value {
    checkIndex(index, this.values.length);
    return this.values[index] ?? null;
  }

  toArray(): Value[] {
    return [...this.values];
  }
}

// =============================================================================
// ConstantColumn
// =============================================================================

/**
 * Column holding one value repeated `length` times, without materializing it.
 */
export class ConstantColumn {
  readonly kind = 'constant' as const;
  readonly type: DataType;
  readonly value: Value;
  readonly length: number;

  constructor(type: DataType, value: Value, length: number) {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`Constant column length must be a non-negative integer, got ${length}`);
    }
    if (value !== null && !isValueOfType(value, type)) {
      throw new TypeMismatchError(`Constant is not a valid ${type}: ${JSON.stringify(value)}`, {
        dataType: type,
      });
    }
    this.type = type;
    this.value = storeValue(value, type);
    this.length = length;
    Object.freeze(this);
  }

  valueAt(index: number): Value {
    checkIndex(index, this.length);
    return this.value;
  }

  toArray(): Value[] {
    return new Array<Value>(this.length).fill(this.value);
  }

  /**
   * Same value, different logical length.
   */
  withLength(length: number): ConstantColumn {
    return length === this.length ? this : new ConstantColumn(this.type, this.value, length);
  }
}

/** Array-backed or constant column */
export type ColumnValue = ArrayColumn | ConstantColumn;

export function isConstant(column: ColumnValue): column is ConstantColumn {
  return column.kind === 'constant';
}
