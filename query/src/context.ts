/**
 * @stratum/query - Execution Context
 *
 * Entry point for building and running queries. A context carries the
 * engine configuration, a logger and the function registry; it is an
 * explicit value, so separate contexts never share state.
 *
 * @example
 * ```typescript
 * const ctx = new ExecutionContext();
 * const frame = ctx
 *   .fromColumns({ id: [1, 2, 3], first_name: ['Niko', 'Alice', 'Joy'] })
 *   .filter(eq(col('first_name'), lit('Niko')))
 *   .select(alias(mul(col('id'), 2), 'new_id'), 'first_name');
 *
 * frame.collect().toRecords(); // [{ new_id: 2, first_name: 'Niko' }]
 * ```
 */

import {
  ArrayColumn,
  DataBatch,
  BatchStream,
  InMemoryDataSource,
  SchemaError,
  SizeMismatchError,
  StratumError,
  TableSchema,
  createConsoleLogger,
  field,
  inferDataType,
  withContext,
  type DataSource,
  type DataType,
  type Logger,
  type Value,
} from '@stratum/core';
import { DEFAULT_CONFIG, assertValidConfig, type EngineConfig } from '@stratum/config';
import { LazyFrame } from './frame.js';
import type { FunctionRegistry } from './functions.js';
import { Scan, type LogicalPlan } from './logical-plan.js';
import { Optimizer } from './optimizer.js';
import { Planner } from './planner.js';
import type { PhysicalPlan } from './physical-plan.js';

export interface ExecutionContextOptions {
  /** Engine configuration (default: DEFAULT_CONFIG); validated on construction */
  config?: EngineConfig;

  /** Logger (default: console logger configured from `config.logging`) */
  logger?: Logger;

  /** Scalar functions available to `fn(...)` (default: the built-ins) */
  functions?: FunctionRegistry;
}

/** Source name used for data loaded from memory */
const MEMORY_SOURCE = 'memory';

function inferColumnType(name: string, values: readonly Value[]): DataType {
  let inferred: DataType | undefined;
  for (const value of values) {
    if (value === null) continue;
    const type = inferDataType(value);
    if (inferred === undefined || (inferred === 'int64' && type === 'float64')) {
      inferred = type;
    }
  }
  if (inferred === undefined) {
    throw new SchemaError(
      `Cannot infer the type of column "${name}": it has no non-null values`,
      undefined,
      { column: name },
      'Pass the column type explicitly'
    );
  }
  return inferred;
}

export class ExecutionContext {
  readonly config: EngineConfig;
  readonly logger: Logger;
  private readonly planner: Planner;
  private readonly optimizer = new Optimizer();

  /**
   * @throws ConfigValidationError when `options.config` is invalid
   */
  constructor(options: ExecutionContextOptions = {}) {
    const config = options.config ?? DEFAULT_CONFIG;
    assertValidConfig(config);
    this.config = config;

    const logger = options.logger ?? createConsoleLogger({
      minLevel: config.logging.level,
      format: config.logging.format,
    });
    this.logger = withContext(logger, { service: 'stratum-query' });
    this.planner = new Planner({ functions: options.functions });
  }

  // ===========================================================================
  // Sources
  // ===========================================================================

  /**
   * Query any data source.
   */
  read(source: DataSource, uri: string = source.name ?? 'source'): LazyFrame {
    return new LazyFrame(this, new Scan(uri, source));
  }

  /**
   * Query batches held in memory. The schema is taken from the first batch
   * unless given.
   */
  fromBatches(batches: readonly DataBatch[], schema?: TableSchema): LazyFrame {
    return this.read(new InMemoryDataSource(batches, schema), MEMORY_SOURCE);
  }

  /**
   * Query column arrays, split into batches of `config.execution.batchSize`
   * rows. Types not given are inferred: booleans become bool, strings
   * string, integers int64 and columns holding any other number float64.
   *
   * @throws SizeMismatchError when columns differ in length
   * @throws SchemaError when an all-null column has no explicit type
   */
  fromColumns(
    columns: Readonly<Record<string, readonly Value[]>>,
    types: Readonly<Record<string, DataType>> = {}
  ): LazyFrame {
    const entries = Object.entries(columns);
    const rowCount = entries[0]?.[1].length ?? 0;
    for (const [name, values] of entries) {
      if (values.length !== rowCount) {
        throw new SizeMismatchError(
          `Column "${name}" has ${values.length} values, expected ${rowCount}`,
          rowCount,
          values.length
        );
      }
    }

    const schema = new TableSchema(
      entries.map(([name, values]) => field(name, types[name] ?? inferColumnType(name, values)))
    );

    const batchSize = this.config.execution.batchSize;
    const batches: DataBatch[] = [];
    for (let start = 0; start < rowCount || batches.length === 0; start += batchSize) {
      const end = Math.min(start + batchSize, rowCount);
      batches.push(new DataBatch(
        schema,
        entries.map(([, values], i) => new ArrayColumn(schema.field(i).dataType, values.slice(start, end)))
      ));
    }
    return this.read(new InMemoryDataSource(batches, schema), MEMORY_SOURCE);
  }

  // ===========================================================================
  // Planning & Execution
  // ===========================================================================

  /**
   * Optimize and lower a logical plan.
   */
  createPhysicalPlan(logical: LogicalPlan): PhysicalPlan {
    const optimized = this.optimizer.optimize(logical);
    this.logger.debug('Logical plan optimized', { operation: 'optimize', root: optimized.toString() });

    const physical = this.planner.createPhysicalPlan(optimized);
    this.logger.debug('Physical plan created', { operation: 'plan', root: physical.toString() });
    return physical;
  }

  /**
   * Plan and start executing `logical`. Batches are produced as the returned
   * stream is pulled; completion is logged once the stream is drained.
   */
  execute(logical: LogicalPlan): BatchStream {
    const physical = this.createPhysicalPlan(logical);
    const startedAt = Date.now();
    let batches = 0;
    let rowsProcessed = 0;

    return BatchStream.observe(physical.execute(), {
      onBatch: batch => {
        batches++;
        rowsProcessed += batch.rowCount();
      },
      onEnd: () => {
        this.logger.info('Query execution completed', {
          operation: 'execute',
          batches,
          rowsProcessed,
          durationMs: Date.now() - startedAt,
        });
      },
      onError: error => {
        this.logger.error(
          'Query execution failed',
          error instanceof Error ? error : new Error(String(error)),
          {
            operation: 'execute',
            batches,
            rowsProcessed,
            ...(error instanceof StratumError && { ...error.toLogContext(), errorCode: error.code }),
          }
        );
      },
    });
  }
}
