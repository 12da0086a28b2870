/**
 * Typed exception classes for Stratum
 *
 * Error hierarchy:
 * - StratumError: Base error class for all engine errors
 *   - SchemaError: Duplicate field names, unknown projection columns, misaligned batches
 *     - ColumnNotFoundError: Name/index resolution miss during binding
 *   - UnsupportedOperationError: Planner has no lowering for a node kind
 *   - TypeMismatchError: Non-boolean predicate, incompatible operand kinds
 *   - SizeMismatchError: Columns disagree in length
 *   - CastError: Unsupported or lossy cast
 *   - IndexOutOfRangeError: Column access outside [0, length)
 *   - ArityMismatchError: Expression count does not match schema or function arity
 *   - ArithmeticError: Integer division or modulo by zero
 *   - StreamError: Batch stream read past its end or iterated twice
 *   - ConfigValidationError: Engine configuration failed validation
 *
 * All engine errors are fatal: evaluation never retries or returns partial results.
 *
 * @example
 * ```typescript
 * import { StratumError, ColumnNotFoundError, ErrorCode } from '@stratum/core';
 *
 * try {
 *   ctx.createPhysicalPlan(plan);
 * } catch (error) {
 *   if (error instanceof ColumnNotFoundError) {
 *     logger.warn(error.message, { column: error.column });
 *   } else if (error instanceof StratumError && error.code === ErrorCode.CAST_ERROR) {
 *     logger.error('Bad cast', error);
 *   }
 * }
 * ```
 */

import type { LogContext, LogContextValue } from './logging.js';
import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Schema / binding
  SCHEMA_ERROR = 'SCHEMA_ERROR',
  COLUMN_NOT_FOUND = 'COLUMN_NOT_FOUND',

  // Planning
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION',
  ARITY_MISMATCH = 'ARITY_MISMATCH',

  // Evaluation
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  SIZE_MISMATCH = 'SIZE_MISMATCH',
  CAST_ERROR = 'CAST_ERROR',
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',
  ARITHMETIC_ERROR = 'ARITHMETIC_ERROR',

  // Streaming
  STREAM_ERROR = 'STREAM_ERROR',

  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.values(ErrorCode).some(value => value === code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Convert an arbitrary detail value to something a log entry can carry.
 */
function toLogValue(value: unknown): LogContextValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(toLogValue);
  if (typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, item]) => item !== undefined)
        .map(([key, item]) => [key, toLogValue(item)])
    );
  }
  return String(value);
}

/**
 * Base error class for all Stratum errors
 *
 * - Catch every engine error with a single `instanceof StratumError`
 * - Identify errors programmatically through `code`
 * - Attach structured `details` and an optional `suggestion`
 */
export class StratumError extends Error {
  /**
   * Error code for programmatic identification.
   */
  public readonly code: string;

  /**
   * Structured details for debugging (column, types, lengths, ...)
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Helpful suggestion for resolving the error (when applicable)
   */
  public readonly suggestion?: string;

  /**
   * Timestamp when the error was created (milliseconds since epoch)
   */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'StratumError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, StratumError);
  }

  /**
   * Format error for logging with all context.
   */
  toLogContext(): LogContext {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: toLogValue(this.details) }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Format error as a detailed string for debugging.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Schema Errors
// =============================================================================

/**
 * Error thrown when a schema or batch violates its structural invariants
 *
 * @example
 * ```typescript
 * throw SchemaError.duplicateFields(['id']);
 * throw SchemaError.unknownColumns(['age'], ['id', 'name']);
 * ```
 */
export class SchemaError extends StratumError {
  constructor(
    message: string,
    code: string = ErrorCode.SCHEMA_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'SchemaError';
    captureStackTrace(this, SchemaError);
  }

  static duplicateFields(duplicates: string[]): SchemaError {
    return new SchemaError(
      `TableSchema contains duplicate field names: [${duplicates.join(', ')}]`,
      ErrorCode.SCHEMA_ERROR,
      { duplicates },
      'Alias one of the conflicting expressions to give every output column a unique name'
    );
  }

  static unknownColumns(missing: string[], available: string[]): SchemaError {
    const sorted = [...available].sort();
    return new SchemaError(
      `Unknown columns in projection: [${missing.join(', ')}]. Available columns: [${sorted.join(', ')}]`,
      ErrorCode.SCHEMA_ERROR,
      { missing, available: sorted }
    );
  }
}

/**
 * Error thrown when a column reference cannot be resolved against a schema
 */
export class ColumnNotFoundError extends SchemaError {
  /** The unresolved reference: a column name or a positional index */
  public readonly column: string | number;

  constructor(column: string | number, available: string[]) {
    const message = typeof column === 'number'
      ? `Column index out of range: ${column} (schema has ${available.length} fields)`
      : `No column named "${column}" in schema [${available.join(', ')}]`;
    super(message, ErrorCode.COLUMN_NOT_FOUND, { column, available });
    this.name = 'ColumnNotFoundError';
    this.column = column;
    captureStackTrace(this, ColumnNotFoundError);
  }
}

// =============================================================================
// Planning Errors
// =============================================================================

/**
 * Error thrown when the planner meets a node kind it has no lowering for.
 * Signals an incomplete implementation rather than bad data.
 */
export class UnsupportedOperationError extends StratumError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.UNSUPPORTED_OPERATION, details);
    this.name = 'UnsupportedOperationError';
    captureStackTrace(this, UnsupportedOperationError);
  }
}

/**
 * Error thrown when a list of expressions does not line up with what consumes it
 */
export class ArityMismatchError extends StratumError {
  constructor(message: string, expected: number, actual: number) {
    super(message, ErrorCode.ARITY_MISMATCH, { expected, actual });
    this.name = 'ArityMismatchError';
    captureStackTrace(this, ArityMismatchError);
  }
}

// =============================================================================
// Evaluation Errors
// =============================================================================

/**
 * Error thrown when a value's data type is not acceptable where it is used
 */
export class TypeMismatchError extends StratumError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.TYPE_MISMATCH, details);
    this.name = 'TypeMismatchError';
    captureStackTrace(this, TypeMismatchError);
  }
}

/**
 * Error thrown when two columns meant to be aligned disagree in length
 */
export class SizeMismatchError extends StratumError {
  constructor(message: string, expected: number, actual: number) {
    super(message, ErrorCode.SIZE_MISMATCH, { expected, actual });
    this.name = 'SizeMismatchError';
    captureStackTrace(this, SizeMismatchError);
  }
}

/**
 * Error thrown for an unsupported or lossy cast
 */
export class CastError extends StratumError {
  public readonly from: string;
  public readonly to: string;

  constructor(from: string, to: string, value?: unknown) {
    const shown = value === undefined ? '' : ` for value ${JSON.stringify(value)}`;
    super(`Cannot cast ${from} to ${to}${shown}`, ErrorCode.CAST_ERROR, {
      from,
      to,
      ...(value !== undefined && { value }),
    });
    this.name = 'CastError';
    this.from = from;
    this.to = to;
    captureStackTrace(this, CastError);
  }
}

/**
 * Error thrown when a column is read outside of [0, length)
 */
export class IndexOutOfRangeError extends StratumError {
  constructor(index: number, length: number) {
    super(`Index ${index} out of range for column of length ${length}`, ErrorCode.INDEX_OUT_OF_RANGE, {
      index,
      length,
    });
    this.name = 'IndexOutOfRangeError';
    captureStackTrace(this, IndexOutOfRangeError);
  }
}

/**
 * Error thrown for integer division or modulo by zero
 */
export class ArithmeticError extends StratumError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.ARITHMETIC_ERROR, details);
    this.name = 'ArithmeticError';
    captureStackTrace(this, ArithmeticError);
  }
}

// =============================================================================
// Streaming Errors
// =============================================================================

/**
 * Error thrown when a single-pass batch stream is misused
 */
export class StreamError extends StratumError {
  constructor(message: string) {
    super(message, ErrorCode.STREAM_ERROR);
    this.name = 'StreamError';
    captureStackTrace(this, StreamError);
  }

  static exhausted(): StreamError {
    return new StreamError('Batch stream is exhausted');
  }

  static alreadyConsumed(): StreamError {
    return new StreamError('Batch stream is single-pass and has already been iterated');
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * A single configuration problem found during validation
 */
export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Error thrown when an engine configuration fails validation
 */
export class ConfigValidationError extends StratumError {
  public readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    const summary = issues.map(i => `${i.path}: ${i.message}`).join('; ');
    super(`Invalid configuration: ${summary}`, ErrorCode.CONFIG_INVALID, { issues });
    this.name = 'ConfigValidationError';
    this.issues = issues;
    captureStackTrace(this, ConfigValidationError);
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Exhaustiveness check for switches over closed unions.
 */
export function assertNever(value: never, what: string): never {
  throw new UnsupportedOperationError(`Unsupported ${what}: ${describeVariant(value)}`, {
    variant: describeVariant(value),
  });
}

function describeVariant(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return typeof value;
}
