/**
 * @stratum/config - Engine Configuration
 *
 * @example
 * ```typescript
 * import { createConfig, validateConfig, getConfigFromEnv } from '@stratum/config';
 *
 * const config = createConfig({ execution: { batchSize: 4096 } });
 * const result = validateConfig(config);
 * ```
 *
 * @packageDocumentation
 * @module @stratum/config
 */

// =============================================================================
// Types
// =============================================================================

export type {
  DeepPartial,
  EngineConfig,
  ExecutionConfig,
  LoggingConfig,
  LogFormat,
  ExplainConfig,
  ValidationError,
  ValidationWarning,
  ValidationResult,
  EnvConfigOptions,
} from './types.js';

// =============================================================================
// Defaults
// =============================================================================

export {
  DEFAULT_CONFIG,
  DEFAULT_BATCH_SIZE,
  MAX_BATCH_SIZE,
  MIN_RECOMMENDED_BATCH_SIZE,
} from './defaults.js';

// =============================================================================
// Factory Functions
// =============================================================================

export { createConfig, mergeConfigs, getConfigFromEnv } from './config.js';

// =============================================================================
// Validation
// =============================================================================

export {
  validateConfig,
  assertValidConfig,
  EngineConfigShape,
  EngineConfigRules,
  PartialEngineConfigShape,
} from './validation.js';
