/**
 * @stratum/config - Configuration Validation
 *
 * zod schemas describing the configuration shape and its value rules.
 * The shape schema checks types only and is used when configurations are
 * built; the rules schema adds ranges and is used by `validateConfig`.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { ConfigValidationError, type ConfigIssue } from '@stratum/core';
import { MAX_BATCH_SIZE, MIN_RECOMMENDED_BATCH_SIZE } from './defaults.js';
import type {
  EngineConfig,
  ValidationError,
  ValidationResult,
  ValidationWarning,
} from './types.js';

// =============================================================================
// Schemas
// =============================================================================

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const LogFormatSchema = z.enum(['json', 'pretty']);

/**
 * Structural schema: every field present with the right type.
 */
export const EngineConfigShape = z.object({
  execution: z.object({
    batchSize: z.number(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
  }),
  explain: z.object({
    verbose: z.boolean(),
  }),
});

/** Structural schema for partial overrides */
export const PartialEngineConfigShape = EngineConfigShape.deepPartial();

/**
 * Value rules applied on top of the structure.
 */
export const EngineConfigRules = EngineConfigShape.extend({
  execution: z.object({
    batchSize: z
      .number()
      .int('Batch size must be an integer')
      .positive('Batch size must be a positive number')
      .max(MAX_BATCH_SIZE, `Batch size must not exceed ${MAX_BATCH_SIZE}`),
  }),
});

export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path.length === 0 ? '(root)' : path.join('.');
}

/**
 * Convert zod issues to the engine's configuration issue shape.
 */
export function toConfigIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map(issue => ({
    path: formatIssuePath(issue.path),
    message: issue.message,
  }));
}

function valueAtPath(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = root;
  for (const key of path) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate a complete EngineConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 */
export function validateConfig(config: EngineConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  const parsed = EngineConfigRules.safeParse(config);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      errors.push({
        path: formatIssuePath(issue.path),
        message: issue.message,
        value: valueAtPath(config, issue.path),
      });
    }
  }

  const { batchSize } = config.execution;
  if (Number.isInteger(batchSize) && batchSize > 0 && batchSize < MIN_RECOMMENDED_BATCH_SIZE) {
    warnings.push({
      path: 'execution.batchSize',
      message: 'Small batch sizes add per-batch overhead to every operator',
      value: batchSize,
      recommendation: `Use at least ${MIN_RECOMMENDED_BATCH_SIZE} rows per batch`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate and throw on the first invalid configuration.
 *
 * @throws ConfigValidationError listing every error found
 */
export function assertValidConfig(config: EngineConfig): void {
  const result = validateConfig(config);
  if (!result.valid) {
    throw new ConfigValidationError(result.errors.map(({ path, message }) => ({ path, message })));
  }
}
