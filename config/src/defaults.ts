/**
 * @stratum/config - Default Configuration Values
 *
 * @packageDocumentation
 */

import type { EngineConfig } from './types.js';

export const DEFAULT_BATCH_SIZE = 1024;

/** Upper bound accepted for `execution.batchSize` */
export const MAX_BATCH_SIZE = 1_048_576;

/** Batch sizes below this are accepted with a warning */
export const MIN_RECOMMENDED_BATCH_SIZE = 64;

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: EngineConfig = Object.freeze({
  execution: Object.freeze({
    batchSize: DEFAULT_BATCH_SIZE,
  }),
  logging: Object.freeze({
    level: 'info',
    format: 'json',
  }),
  explain: Object.freeze({
    verbose: false,
  }),
});
