/**
 * @stratum/query - Property-Based Tests
 *
 * Operator invariants checked over generated batches.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { InMemoryDataSource, TableSchema, field, type DataBatch } from '@stratum/core';
import { batchArbitrary, columnArbitrary } from '@stratum/test-utils';
import { binaryCompute, elementwiseBinary } from '../kernels.js';
import { physical } from '../physical-expr.js';
import type { BinaryOp } from '../operators.js';
import { FilterExec, ProjectionExec, ScanExec } from '../physical-plan.js';

const schema = new TableSchema([field('a', 'int64'), field('b', 'string'), field('c', 'bool')]);

function scanOf(batch: DataBatch): ScanExec {
  return new ScanExec(new InMemoryDataSource([batch]));
}

describe('FilterExec', () => {
  it('should keep exactly the rows whose predicate is true', () => {
    fc.assert(
      fc.property(batchArbitrary(schema), fc.integer({ min: -100, max: 100 }), (batch, threshold) => {
        const predicate = physical.binary('gt', physical.column(0), physical.literal(threshold, 'int64'));
        const out = new FilterExec(scanOf(batch), predicate).execute().toArray();

        const expected = batch.toRecords().filter(r => typeof r.a === 'number' && r.a > threshold);
        expect(out.flatMap(b => b.toRecords())).toEqual(expected);
      })
    );
  });

  it('should preserve the schema for every predicate outcome', () => {
    fc.assert(
      fc.property(batchArbitrary(schema), batch => {
        const [out] = new FilterExec(scanOf(batch), physical.column(2)).execute().toArray();
        expect(out?.schema.equals(schema)).toBe(true);
        expect(out?.rowCount()).toBe(batch.column(2).toArray().filter(v => v === true).length);
      })
    );
  });

  it('should return the input for a constant true predicate', () => {
    fc.assert(
      fc.property(batchArbitrary(schema), batch => {
        const [out] = new FilterExec(scanOf(batch), physical.literal(true, 'bool')).execute().toArray();
        expect(out).toBe(batch);
      })
    );
  });
});

describe('ProjectionExec', () => {
  it('should preserve the row count', () => {
    fc.assert(
      fc.property(batchArbitrary(schema), batch => {
        const projection = new ProjectionExec(
          scanOf(batch),
          [physical.column(1), physical.literal(1, 'int64')],
          new TableSchema([field('b', 'string'), field('one', 'int64')])
        );
        const [out] = projection.execute().toArray();
        expect(out?.rowCount()).toBe(batch.rowCount());
      })
    );
  });
});

describe('binaryCompute', () => {
  const pair = fc
    .integer({ min: 0, max: 30 })
    .chain(n => fc.tuple(columnArbitrary('int32', n), columnArbitrary('int32', n)));

  it('should agree with the elementwise path', () => {
    fc.assert(
      fc.property(pair, fc.constantFrom<BinaryOp>('add', 'sub', 'mul', 'eq', 'neq', 'gt', 'lte'), ([left, right], op) => {
        expect(binaryCompute(op, left, right).toArray()).toEqual(elementwiseBinary(op, left, right).toArray());
      })
    );
  });
});
