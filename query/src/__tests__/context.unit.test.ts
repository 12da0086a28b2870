/**
 * @stratum/query - Execution Context and Frame Unit Tests
 *
 * End-to-end queries through ExecutionContext, LazyFrame and DataFrame,
 * including the logging an execution produces.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ArithmeticError,
  ConfigValidationError,
  SchemaError,
  SizeMismatchError,
  UnsupportedOperationError,
  createTestLogger,
  type TestLogger,
} from '@stratum/core';
import { DEFAULT_CONFIG, createConfig } from '@stratum/config';
import { createEmployeeBatch, createEmployeeSource } from '@stratum/test-utils';
import { ExecutionContext } from '../context.js';
import { alias, col, div, eq, expr, fn, gt, lit, litFloat, mul } from '../expr-builder.js';
import { FunctionRegistry } from '../functions.js';

let logger: TestLogger;
let ctx: ExecutionContext;

beforeEach(() => {
  logger = createTestLogger();
  ctx = new ExecutionContext({ logger });
});

// =============================================================================
// End-to-end
// =============================================================================

describe('filter then project', () => {
  const niko = eq(col('first_name'), lit('Niko'));
  const newId = alias(mul(col('id'), lit(2)), 'new_id');

  it('should return the single matching row', () => {
    const frame = ctx.read(createEmployeeSource(), 'employee').filter(niko).select(newId, 'first_name');
    const result = frame.collect();

    expect(result.rowCount()).toBe(1);
    expect(result.toRecords()).toEqual([{ new_id: 2, first_name: 'Niko' }]);
  });

  it('should produce a zero-row batch with the projected schema from an empty source', () => {
    const result = ctx
      .read(createEmployeeSource({ empty: true }), 'employee')
      .filter(niko)
      .select(newId, 'first_name')
      .collect();

    expect(result.batches).toHaveLength(1);
    expect(result.batches[0]?.rowCount()).toBe(0);
    expect(result.batches[0]?.schema.toString()).toBe('new_id:int64, first_name:string');
    expect(result.schema().toString()).toBe('new_id:int64, first_name:string');
  });

  it('should accept fluent builders', () => {
    const result = ctx
      .fromBatches([createEmployeeBatch()])
      .where(expr(col('id')).gt(1))
      .select(expr(col('id')).mul(10).as('scaled'))
      .collect();
    expect(result.toRecords()).toEqual([{ scaled: 20 }, { scaled: 30 }]);
  });

  it('should run scalar functions', () => {
    const result = ctx
      .fromBatches([createEmployeeBatch()])
      .select(alias(fn('upper', [col('first_name')], 'string'), 'name'))
      .collect();
    expect(result.toRecords().map(r => r.name)).toEqual(['NIKO', 'ALICE', 'JOY']);
  });

  it('should run functions from a custom registry', () => {
    const functions = FunctionRegistry.withBuiltins().register({
      name: 'initial',
      arity: 1,
      checkArgs: types => (types[0] === 'string' ? undefined : 'initial() takes a string'),
      returnType: () => 'string',
      apply: ([s]) => (typeof s === 'string' ? s.charAt(0) : ''),
    });
    const custom = new ExecutionContext({ logger, functions });
    const result = custom
      .fromBatches([createEmployeeBatch()])
      .select(alias(fn('initial', [col('first_name')], 'string'), 'i'))
      .collect();
    expect(result.toRecords()).toEqual([{ i: 'N' }, { i: 'A' }, { i: 'J' }]);
  });

  it('should fail planning for an unknown function', () => {
    const frame = ctx.fromBatches([createEmployeeBatch()]).select(fn('nope', [col('id')], 'int64'));
    expect(() => frame.collect()).toThrow(UnsupportedOperationError);
  });
});

// =============================================================================
// Logging
// =============================================================================

describe('logging', () => {
  it('should log planning at debug and completion at info', () => {
    ctx.fromBatches([createEmployeeBatch()]).filter(gt(col('id'), 1)).collect();

    expect(logger.getLogsByLevel('debug').map(e => e.message)).toEqual([
      'Logical plan optimized',
      'Physical plan created',
    ]);
    const [completed] = logger.getLogsByLevel('info');
    expect(completed?.message).toBe('Query execution completed');
    expect(completed?.context).toMatchObject({
      service: 'stratum-query',
      operation: 'execute',
      batches: 1,
      rowsProcessed: 2,
    });
    expect(typeof completed?.context?.durationMs).toBe('number');
  });

  it('should log the plan root being executed', () => {
    ctx.fromBatches([createEmployeeBatch()]).filter(gt(col('id'), 1)).collect();
    const [, created] = logger.getLogsByLevel('debug');
    expect(created?.context).toMatchObject({ operation: 'plan', root: 'FilterExec: (#0 > 1)' });
  });

  it('should not log completion before the stream is drained', () => {
    const stream = ctx.fromBatches([createEmployeeBatch()]).execute();
    expect(logger.getLogsByLevel('info')).toHaveLength(0);
    stream.toArray();
    expect(logger.getLogsByLevel('info')).toHaveLength(1);
  });

  it('should log failures with the error code and rethrow', () => {
    const frame = ctx.fromBatches([createEmployeeBatch()]).select(div(col('id'), 0));
    expect(() => frame.collect()).toThrow(ArithmeticError);

    const [failed] = logger.getLogsByLevel('error');
    expect(failed?.message).toBe('Query execution failed');
    expect(failed?.error).toBeInstanceOf(ArithmeticError);
    expect(failed?.context).toMatchObject({
      errorCode: 'ARITHMETIC_ERROR',
      code: 'ARITHMETIC_ERROR',
      message: 'Integer division by zero',
      details: { op: 'div' },
      batches: 0,
    });
  });
});

// =============================================================================
// Sources
// =============================================================================

describe('fromColumns', () => {
  it('should infer column types', () => {
    const frame = ctx.fromColumns({ a: [1, 2.5], b: ['x', 'y'], c: [true, null], d: [1, 2] });
    expect(frame.schema().toString()).toBe('a:float64, b:string, c:bool, d:int64');
  });

  it('should honour explicit types', () => {
    const frame = ctx.fromColumns({ a: [null, null], b: [1, 2] }, { a: 'string', b: 'int8' });
    expect(frame.schema().toString()).toBe('a:string, b:int8');
  });

  it('should match float32 columns against float32 literals', () => {
    const result = ctx.fromColumns({ x: [0.1, 0.5] }, { x: 'float32' }).filter(eq(col('x'), litFloat(0.1))).collect();
    expect(result.toRecords()).toEqual([{ x: Math.fround(0.1) }]);
  });

  it('should require a type for all-null columns', () => {
    expect(() => ctx.fromColumns({ a: [null] })).toThrow(SchemaError);
    expect(() => ctx.fromColumns({ a: [null] })).toThrow('Cannot infer the type of column "a": it has no non-null values');
  });

  it('should reject columns of different lengths', () => {
    const load = (): unknown => ctx.fromColumns({ a: [1, 2], b: ['x'] });
    expect(load).toThrow(SizeMismatchError);
    expect(load).toThrow('Column "b" has 1 values, expected 2');
  });

  it('should split rows into batches of the configured size', () => {
    const small = new ExecutionContext({ logger, config: createConfig({ execution: { batchSize: 2 } }) });
    const result = small.fromColumns({ n: [1, 2, 3, 4, 5] }).collect();
    expect(result.batches.map(b => b.rowCount())).toEqual([2, 2, 1]);
    expect(result.toRecords().map(r => r.n)).toEqual([1, 2, 3, 4, 5]);
  });

  it('should produce one empty batch for zero rows', () => {
    const result = ctx.fromColumns({ n: [] }, { n: 'int64' }).collect();
    expect(result.batches).toHaveLength(1);
    expect(result.rowCount()).toBe(0);
  });
});

describe('ExecutionContext', () => {
  it('should reject an invalid configuration', () => {
    const config = { ...DEFAULT_CONFIG, execution: { batchSize: 0 } };
    const create = (): ExecutionContext => new ExecutionContext({ config, logger });
    expect(create).toThrow(ConfigValidationError);
    expect(create).toThrow('Invalid configuration: execution.batchSize: Batch size must be a positive number');
  });

  it('should keep separate contexts independent', () => {
    const other = createTestLogger();
    const second = new ExecutionContext({ logger: other });
    second.fromColumns({ n: [1] }).collect();
    expect(logger.getLogs()).toHaveLength(0);
    expect(other.getLogs()).toHaveLength(3);
  });
});

// =============================================================================
// Frames
// =============================================================================

describe('LazyFrame', () => {
  it('should not execute anything while building', () => {
    ctx.fromColumns({ n: [1, 2] }).filter(gt(col('n'), 1)).select('n');
    expect(logger.getLogs()).toHaveLength(0);
  });

  it('should explain the logical and physical plans', () => {
    const frame = ctx.fromColumns({ id: [1, 2] }).filter(gt(col('id'), 1));
    expect(frame.explain()).toBe(
      [
        'Logical Plan:',
        'Filter: (#id > 1)',
        '└── Scan: memory; projection=*',
        '',
        'Physical Plan:',
        'FilterExec: (#0 > 1)',
        '└── ScanExec: projection=*, source=InMemoryDataSource',
      ].join('\n')
    );
  });

  it('should default to the configured verbosity', () => {
    const verbose = new ExecutionContext({ logger, config: createConfig({ explain: { verbose: true } }) });
    const frame = verbose.fromColumns({ id: [1] });
    expect(frame.explain()).toBe(
      [
        'Logical Plan:',
        'Scan: memory; projection=*  [id:int64]',
        '',
        'Physical Plan:',
        'ScanExec: projection=*, source=InMemoryDataSource  [id:int64]',
      ].join('\n')
    );
    expect(frame.explain(false)).not.toContain('[id:int64]');
  });

  it('should expose its logical and physical plans', () => {
    const frame = ctx.fromColumns({ id: [1] }).select('id');
    expect(frame.logicalPlan().kind).toBe('projection');
    expect(frame.physicalPlan().kind).toBe('projection');
  });
});

describe('DataFrame', () => {
  const load = (): ReturnType<ExecutionContext['fromColumns']> =>
    ctx.fromColumns({ id: [1, 2, 3], state: ['CO', 'CA', 'NY'] });

  it('should filter and select eagerly', () => {
    const frame = load().collect();
    const filtered = frame.filter(eq(col('state'), 'CA'));
    expect(filtered.toRecords()).toEqual([{ id: 2, state: 'CA' }]);
    expect(frame.where(gt(col('id'), 2)).select('state').toRecords()).toEqual([{ state: 'NY' }]);
  });

  it('should keep its schema with no rows', () => {
    const empty = load().filter(lit(false)).collect();
    expect(empty.rowCount()).toBe(0);
    expect(empty.schema().toString()).toBe('id:int64, state:string');
    expect(empty.select('id').schema().toString()).toBe('id:int64');
  });

  it('should render as a table', () => {
    expect(load().select('id').collect().toString()).toBe(
      ['Rows:    3', 'Columns: 1', 'Data:', '----', 'id', '----', '1', '2', '3'].join('\n')
    );
  });

  it('should concatenate batches into one', () => {
    const small = new ExecutionContext({ logger, config: createConfig({ execution: { batchSize: 1 } }) });
    const frame = small.fromColumns({ n: [1, 2, 3] }).collect();
    expect(frame.batches).toHaveLength(3);
    expect(frame.toBatch().column(0).toArray()).toEqual([1, 2, 3]);
  });
});
