/**
 * @stratum/core - Cast Rules
 *
 * Scalar conversion between data types. Casts are "safe": a conversion
 * that would lose information (fractional float to integer, out-of-range
 * integer, unparsable string) fails with CastError instead of truncating.
 *
 * | from \ to | bool | integer | float | string |
 * |-----------|------|---------|-------|--------|
 * | bool      | =    | 1 / 0   | 1 / 0 | true / false |
 * | integer   | != 0 | range   | yes   | decimal |
 * | float     | != 0 | integral + range | yes | decimal |
 * | string    | true/false/1/0 | digits + range | finite number | = |
 */

import {
  fitsInteger,
  isFloatType,
  isIntegerType,
  type DataType,
  type Value,
} from './data-types.js';
import { CastError } from './errors.js';

const INTEGER_TEXT = /^[+-]?\d+$/;

function toNumber(value: number, from: DataType, to: DataType): number {
  if (to === 'float32') return Math.fround(value);
  if (to === 'float64') return value;
  if (isIntegerType(to) && fitsInteger(value, to)) return value;
  throw new CastError(from, to, value);
}

function parseBool(text: string, from: DataType): boolean {
  switch (text.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new CastError(from, 'bool', text);
  }
}

function parseNumber(text: string, from: DataType, to: DataType): number {
  const trimmed = text.trim();
  if (isIntegerType(to) && !INTEGER_TEXT.test(trimmed)) {
    throw new CastError(from, to, text);
  }
  const parsed = trimmed === '' ? Number.NaN : Number(trimmed);
  if (!Number.isFinite(parsed)) {
    throw new CastError(from, to, text);
  }
  return toNumber(parsed, from, to);
}

/**
 * Convert a single value from `from` to `to`. Null stays null.
 *
 * @throws CastError when the pair is unsupported or the value does not fit
 */
export function castValue(value: Value, from: DataType, to: DataType): Value {
  if (value === null) return null;
  if (from === to) return value;

  if (typeof value === 'boolean') {
    if (to === 'string') return value ? 'true' : 'false';
    return toNumber(value ? 1 : 0, from, to);
  }

  if (typeof value === 'number') {
    if (to === 'bool') return value !== 0;
    if (to === 'string') return String(value);
    return toNumber(value, from, to);
  }

  if (to === 'bool') return parseBool(value, from);
  if (isIntegerType(to) || isFloatType(to)) return parseNumber(value, from, to);
  throw new CastError(from, to, value);
}

