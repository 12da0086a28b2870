// @stratum/core
// Columnar data model, batch streams, errors and logging for the Stratum query engine

// =============================================================================
// Data Types
// =============================================================================

export {
  DATA_TYPES,
  isDataType,
  isIntegerType,
  isFloatType,
  isNumericType,
  typeClass,
  integerBounds,
  fitsInteger,
  wrapInteger,
  isValueOfType,
  inferDataType,
  formatFloat,
  type DataType,
  type IntegerType,
  type FloatType,
  type NumericType,
  type ScalarValue,
  type Value,
  type TypeClass,
} from './data-types.js';

// =============================================================================
// Schema, Columns, Batches
// =============================================================================

export { TableSchema, field, formatField, type SchemaField } from './schema.js';

export { ArrayColumn, ConstantColumn, isConstant, type ColumnValue } from './column.js';

export { castValue } from './cast.js';

export { DataBatch, formatCell } from './batch.js';

// =============================================================================
// Streaming & Sources
// =============================================================================

export { BatchStream, type BatchPull, type StreamObserver } from './stream.js';

export { InMemoryDataSource, type DataSource } from './data-source.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  isErrorCode,
  StratumError,
  SchemaError,
  ColumnNotFoundError,
  UnsupportedOperationError,
  ArityMismatchError,
  TypeMismatchError,
  SizeMismatchError,
  CastError,
  IndexOutOfRangeError,
  ArithmeticError,
  StreamError,
  ConfigValidationError,
  assertNever,
  type ConfigIssue,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging
// =============================================================================

export {
  LogLevels,
  isLogLevel,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
  type LogLevel,
  type LogContext,
  type LogContextValue,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging.js';
