/**
 * @stratum/config - Type Definitions
 *
 * Configuration schema for the Stratum query engine.
 *
 * @packageDocumentation
 * @module @stratum/config
 */

import type { LogLevel } from '@stratum/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Sections
// =============================================================================

/**
 * Execution settings.
 */
export interface ExecutionConfig {
  /** Rows per batch when loading in-memory data through the execution context */
  batchSize: number;
}

export type LogFormat = 'json' | 'pretty';

/**
 * Logging settings for the console logger an execution context creates.
 */
export interface LoggingConfig {
  /** Minimum level written */
  level: LogLevel;

  /** Output format */
  format: LogFormat;
}

export interface ExplainConfig {
  /** Append each node's output schema to EXPLAIN lines */
  verbose: boolean;
}

/**
 * Complete engine configuration.
 *
 * @example
 * ```typescript
 * const config: EngineConfig = {
 *   execution: { batchSize: 1024 },
 *   logging: { level: 'info', format: 'json' },
 *   explain: { verbose: false },
 * };
 * ```
 */
export interface EngineConfig {
  execution: ExecutionConfig;
  logging: LoggingConfig;
  explain: ExplainConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Validation error details.
 */
export interface ValidationError {
  /** Path to the invalid field (e.g., 'execution.batchSize') */
  path: string;

  /** Human-readable error message */
  message: string;

  /** The invalid value */
  value: unknown;
}

/**
 * Validation warning details.
 */
export interface ValidationWarning {
  path: string;
  message: string;
  value: unknown;

  /** Recommended action */
  recommendation?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'STRATUM') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
