/**
 * @stratum/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and load configurations.
 *
 * @packageDocumentation
 */

import { ConfigValidationError, isLogLevel, type LogLevel } from '@stratum/core';
import { DEFAULT_CONFIG } from './defaults.js';
import type { DeepPartial, EngineConfig, EnvConfigOptions, LogFormat } from './types.js';
import { EngineConfigShape, PartialEngineConfigShape, toConfigIssues } from './validation.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values taking precedence.
 * Undefined source values never override.
 */
function deepMerge(target: object, source: object | null | undefined): PlainObject {
  const result: PlainObject = { ...target };
  if (!source) {
    return result;
  }

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }
    const targetValue = result[key];
    result[key] = isPlainObject(sourceValue) && isPlainObject(targetValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
  }

  return result;
}

/**
 * Deep freeze an object to prevent mutation.
 */
function deepFreeze<T extends object>(obj: T): T {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  Object.freeze(obj);
  return obj;
}

/**
 * Create a complete EngineConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen EngineConfig with all values filled in
 * @throws ConfigValidationError when a merged value has the wrong type
 *
 * @example
 * ```typescript
 * const config = createConfig({ execution: { batchSize: 4096 } });
 *
 * // Build on another config
 * const verbose = createConfig({ explain: { verbose: true } }, config);
 * ```
 */
export function createConfig(
  overrides?: DeepPartial<EngineConfig>,
  base: EngineConfig = DEFAULT_CONFIG
): EngineConfig {
  const parsed = EngineConfigShape.safeParse(deepMerge(base, overrides));
  if (!parsed.success) {
    throw new ConfigValidationError(toConfigIssues(parsed.error));
  }
  return deepFreeze(parsed.data);
}

/**
 * Merge multiple partial configurations. Later configurations win.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs(
 *   { execution: { batchSize: 256 } },
 *   { logging: { level: 'debug' } },
 * );
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<EngineConfig> | null | undefined>
): DeepPartial<EngineConfig> {
  let result: PlainObject = {};
  for (const config of configs) {
    result = deepMerge(result, config);
  }

  const parsed = PartialEngineConfigShape.safeParse(result);
  if (!parsed.success) {
    throw new ConfigValidationError(toConfigIssues(parsed.error));
  }
  return parsed.data;
}

// =============================================================================
// Environment
// =============================================================================

function parseEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function parseEnvLogLevel(value: string | undefined, key: string): LogLevel | undefined {
  if (value === undefined) return undefined;
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigValidationError([{ path: key, message: `Unknown log level "${value}"` }]);
  }
  return level;
}

function parseEnvLogFormat(value: string | undefined, key: string): LogFormat | undefined {
  if (value === undefined) return undefined;
  const format = value.toLowerCase();
  if (format !== 'json' && format !== 'pretty') {
    throw new ConfigValidationError([{ path: key, message: `Unknown log format "${value}"` }]);
  }
  return format;
}

function envKey(prefix: string, ...parts: string[]): string {
  return [prefix, ...parts].join('_').toUpperCase();
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: STRATUM_<SECTION>_<FIELD>
 * - STRATUM_EXECUTION_BATCH_SIZE=4096
 * - STRATUM_LOGGING_LEVEL=debug
 * - STRATUM_LOGGING_FORMAT=pretty
 * - STRATUM_EXPLAIN_VERBOSE=true
 *
 * Unparsable numbers are ignored.
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const custom = getConfigFromEnv({ prefix: 'MYAPP', env: { MYAPP_LOGGING_LEVEL: 'warn' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): EngineConfig {
  const prefix = options.prefix ?? 'STRATUM';
  const env = options.env ?? (typeof process !== 'undefined' ? process.env : {});

  const batchSizeKey = envKey(prefix, 'EXECUTION', 'BATCH', 'SIZE');
  const levelKey = envKey(prefix, 'LOGGING', 'LEVEL');
  const formatKey = envKey(prefix, 'LOGGING', 'FORMAT');
  const verboseKey = envKey(prefix, 'EXPLAIN', 'VERBOSE');

  const batchSize = parseEnvNumber(env[batchSizeKey]);
  const level = parseEnvLogLevel(env[levelKey], levelKey);
  const format = parseEnvLogFormat(env[formatKey], formatKey);
  const verbose = parseEnvBoolean(env[verboseKey]);

  return createConfig({
    execution: { batchSize },
    logging: { level, format },
    explain: { verbose },
  });
}
