/**
 * @stratum/core - Data Types
 *
 * The closed set of column types the engine understands, and the rules for
 * keeping JavaScript values inside the range of their declared type.
 *
 * Numeric columns hold plain `number`s. 64-bit integer types are limited to
 * the safe integer range; narrower integer types wrap to their width the way
 * unchecked fixed-width arithmetic does.
 */

// =============================================================================
// Types
// =============================================================================

export const DATA_TYPES = [
  'bool',
  'int8',
  'int16',
  'int32',
  'int64',
  'uint8',
  'uint16',
  'uint32',
  'uint64',
  'float32',
  'float64',
  'string',
] as const;

/** Column data type */
export type DataType = (typeof DATA_TYPES)[number];

export type IntegerType = 'int8' | 'int16' | 'int32' | 'int64' | 'uint8' | 'uint16' | 'uint32' | 'uint64';
export type FloatType = 'float32' | 'float64';
export type NumericType = IntegerType | FloatType;

/** A single non-null cell value */
export type ScalarValue = boolean | number | string;

/** A cell value; `null` marks an absent entry */
export type Value = ScalarValue | null;

/** Broad family of a data type, used to decide which operators apply */
export type TypeClass = 'bool' | 'numeric' | 'string';

// =============================================================================
// Type Guards
// =============================================================================

export function isDataType(value: string): value is DataType {
  return DATA_TYPES.some(type => type === value);
}

export function isIntegerType(type: DataType): type is IntegerType {
  return type in INTEGER_BOUNDS;
}

export function isFloatType(type: DataType): type is FloatType {
  return type === 'float32' || type === 'float64';
}

export function isNumericType(type: DataType): type is NumericType {
  return isIntegerType(type) || isFloatType(type);
}

export function typeClass(type: DataType): TypeClass {
  if (type === 'bool') return 'bool';
  if (type === 'string') return 'string';
  return 'numeric';
}

// =============================================================================
// Integer Ranges
// =============================================================================

interface IntegerBounds {
  min: number;
  max: number;
  /** Bit width for wrapping; 0 means no wrapping (64-bit types) */
  bits: number;
  signed: boolean;
}

const INTEGER_BOUNDS: Record<IntegerType, IntegerBounds> = {
  int8: { min: -128, max: 127, bits: 8, signed: true },
  int16: { min: -32768, max: 32767, bits: 16, signed: true },
  int32: { min: -2147483648, max: 2147483647, bits: 32, signed: true },
  int64: { min: Number.MIN_SAFE_INTEGER, max: Number.MAX_SAFE_INTEGER, bits: 0, signed: true },
  uint8: { min: 0, max: 255, bits: 8, signed: false },
  uint16: { min: 0, max: 65535, bits: 16, signed: false },
  uint32: { min: 0, max: 4294967295, bits: 32, signed: false },
  uint64: { min: 0, max: Number.MAX_SAFE_INTEGER, bits: 0, signed: false },
};

export function integerBounds(type: IntegerType): { min: number; max: number } {
  const { min, max } = INTEGER_BOUNDS[type];
  return { min, max };
}

/**
 * Check that `value` is an integer inside the range of `type`.
 */
export function fitsInteger(value: number, type: IntegerType): boolean {
  const { min, max } = INTEGER_BOUNDS[type];
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Wrap an integer result to the width of `type` (two's complement for signed types).
 * 64-bit types are returned unchanged.
 */
export function wrapInteger(value: number, type: IntegerType): number {
  const { bits, signed } = INTEGER_BOUNDS[type];
  if (bits === 0) return value;
  if (bits === 32) {
    return signed ? value | 0 : value >>> 0;
  }
  const modulus = 2 ** bits;
  let wrapped = ((value % modulus) + modulus) % modulus;
  if (signed && wrapped >= modulus / 2) {
    wrapped -= modulus;
  }
  return wrapped;
}

// =============================================================================
// Value Helpers
// =============================================================================

/**
 * Check whether a (non-null) JavaScript value is storable in a column of `type`.
 */
export function isValueOfType(value: ScalarValue, type: DataType): boolean {
  switch (typeClass(type)) {
    case 'bool':
      return typeof value === 'boolean';
    case 'string':
      return typeof value === 'string';
    case 'numeric':
      if (typeof value !== 'number') return false;
      if (type === 'float32' || type === 'float64') return true;
      return isIntegerType(type) && fitsInteger(value, type);
  }
}

/**
 * Infer the data type a literal JavaScript value maps to.
 * Integers become int64, other numbers float64.
 */
export function inferDataType(value: ScalarValue): DataType {
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'string') return 'string';
  return Number.isInteger(value) ? 'int64' : 'float64';
}

/**
 * Render a number the way float literals print: always with a fractional part.
 */
export function formatFloat(value: number): string {
  if (Number.isInteger(value)) {
    return `${value}.0`;
  }
  return String(value);
}
