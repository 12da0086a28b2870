/**
 * @stratum/test-utils
 *
 * Shared fixtures and fast-check arbitraries for Stratum tests:
 * - Employee table fixture (the canonical three-row example)
 * - Column and batch builders
 * - A data source that records how far it has been pulled
 * - Arbitraries for values, columns and batches of any data type
 */

import * as fc from 'fast-check';
import {
  ArrayColumn,
  BatchStream,
  DataBatch,
  InMemoryDataSource,
  TableSchema,
  field,
  integerBounds,
  isIntegerType,
  type DataSource,
  type DataType,
  type Value,
} from '@stratum/core';

// =============================================================================
// Builders
// =============================================================================

/** Column description for `createBatch` */
export interface ColumnSpec {
  type: DataType;
  values: Value[];
}

/**
 * Build a batch of array columns from named column specs, in key order.
 *
 * @example
 * ```ts
 * const batch = createBatch({
 *   id: { type: 'int64', values: [1, 2, 3] },
 *   name: { type: 'string', values: ['a', null, 'c'] },
 * });
 * ```
 */
export function createBatch(columns: Record<string, ColumnSpec>): DataBatch {
  const entries = Object.entries(columns);
  return new DataBatch(
    new TableSchema(entries.map(([name, spec]) => field(name, spec.type))),
    entries.map(([, spec]) => new ArrayColumn(spec.type, spec.values))
  );
}

// =============================================================================
// Employee Fixture
// =============================================================================

export const EMPLOYEE_SCHEMA = new TableSchema([
  field('id', 'int64'),
  field('first_name', 'string'),
  field('state', 'string'),
]);

export function createEmployeeBatch(): DataBatch {
  return createBatch({
    id: { type: 'int64', values: [1, 2, 3] },
    first_name: { type: 'string', values: ['Niko', 'Alice', 'Joy'] },
    state: { type: 'string', values: ['CO', 'CA', 'NY'] },
  });
}

/**
 * Employee source with one three-row batch, or one zero-row batch when
 * `empty` is set.
 */
export function createEmployeeSource(options: { empty?: boolean } = {}): InMemoryDataSource {
  const batch = options.empty ? DataBatch.empty(EMPLOYEE_SCHEMA) : createEmployeeBatch();
  return new InMemoryDataSource([batch], EMPLOYEE_SCHEMA);
}

// =============================================================================
// Recording Source
// =============================================================================

/**
 * Wraps a data source and counts scans and batches pulled through it.
 */
export class RecordingDataSource implements DataSource {
  readonly name = 'RecordingDataSource';
  scans = 0;
  pulls = 0;
  private readonly inner: DataSource;

  constructor(inner: DataSource) {
    this.inner = inner;
  }

  schema(): TableSchema {
    return this.inner.schema();
  }

  scan(projection: readonly string[]): BatchStream {
    this.scans++;
    const stream = this.inner.scan(projection);
    return new BatchStream(() => {
      if (!stream.hasNext()) return undefined;
      this.pulls++;
      return stream.next();
    });
  }
}

// =============================================================================
// Arbitraries
// =============================================================================

function nonNullArbitrary(type: DataType): fc.Arbitrary<Value> {
  if (isIntegerType(type)) {
    const { min, max } = integerBounds(type);
    return fc.integer({ min: Math.max(min, -1_000_000_000), max: Math.min(max, 1_000_000_000) });
  }
  switch (type) {
    case 'bool':
      return fc.boolean();
    case 'float32':
      return fc.float({ noNaN: true, noDefaultInfinity: true }).map(v => (v === 0 ? 0 : v));
    case 'float64':
      return fc.double({ noNaN: true, noDefaultInfinity: true }).map(v => (v === 0 ? 0 : v));
    case 'string':
      return fc.string({ maxLength: 12 });
    default:
      return fc.constant(null);
  }
}

/**
 * Values of `type`, null about one time in six.
 */
export function valueArbitrary(type: DataType): fc.Arbitrary<Value> {
  return fc.option(nonNullArbitrary(type), { nil: null, freq: 5 });
}

export function columnArbitrary(type: DataType, length: number): fc.Arbitrary<ArrayColumn> {
  return fc
    .array(valueArbitrary(type), { minLength: length, maxLength: length })
    .map(values => new ArrayColumn(type, values));
}

/**
 * Batches of `schema` with up to `maxRows` rows.
 */
export function batchArbitrary(schema: TableSchema, maxRows: number = 40): fc.Arbitrary<DataBatch> {
  return fc.integer({ min: 0, max: maxRows }).chain(rows =>
    fc
      .tuple(...schema.fields.map(f => columnArbitrary(f.dataType, rows)))
      .map(columns => new DataBatch(schema, columns))
  );
}
