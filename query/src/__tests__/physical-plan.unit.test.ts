/**
 * @stratum/query - Physical Operator Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ArityMismatchError,
  ArrayColumn,
  ConstantColumn,
  DataBatch,
  InMemoryDataSource,
  TableSchema,
  TypeMismatchError,
  field,
  isConstant,
} from '@stratum/core';
import {
  EMPLOYEE_SCHEMA,
  RecordingDataSource,
  createEmployeeBatch,
  createEmployeeSource,
} from '@stratum/test-utils';
import { physical } from '../physical-expr.js';
import { FilterExec, ProjectionExec, ScanExec } from '../physical-plan.js';

describe('ScanExec', () => {
  it('should read every column without a projection', () => {
    const source = createEmployeeSource();
    const all = new ScanExec(source).execute().toArray();
    const listed = new ScanExec(source, ['id', 'first_name', 'state']).execute().toArray();

    expect(new ScanExec(source).schema().equals(source.schema())).toBe(true);
    expect(all.flatMap(b => b.toRecords())).toEqual(listed.flatMap(b => b.toRecords()));
  });

  it('should narrow to the projection', () => {
    const scan = new ScanExec(createEmployeeSource(), ['state']);
    expect(scan.schema().toString()).toBe('state:string');
    expect(scan.execute().toArray()[0]?.toRecords()).toEqual([{ state: 'CO' }, { state: 'CA' }, { state: 'NY' }]);
  });

  it('should name its source', () => {
    expect(new ScanExec(createEmployeeSource()).toString()).toBe('ScanExec: projection=*, source=InMemoryDataSource');
    expect(new ScanExec(createEmployeeSource(), ['id']).toString()).toBe(
      'ScanExec: projection=[id], source=InMemoryDataSource'
    );
  });

  it('should not touch the source until pulled', () => {
    const source = new RecordingDataSource(createEmployeeSource());
    const stream = new ScanExec(source).execute();
    expect(source.scans).toBe(1);
    expect(source.pulls).toBe(0);
    expect(stream.hasNext()).toBe(true);
    expect(source.pulls).toBe(1);
  });
});

describe('FilterExec', () => {
  const batch = createEmployeeBatch();
  const scan = new ScanExec(new InMemoryDataSource([batch]));

  it('should pass batches through unchanged for a constant true predicate', () => {
    const [out] = new FilterExec(scan, physical.literal(true, 'bool')).execute().toArray();
    expect(out).toBe(batch);
  });

  it('should return empty batches with the same schema for a constant false predicate', () => {
    const [out] = new FilterExec(scan, physical.literal(false, 'bool')).execute().toArray();
    expect(out?.rowCount()).toBe(0);
    expect(out?.schema.equals(EMPLOYEE_SCHEMA)).toBe(true);
  });

  it('should keep rows where the predicate is true', () => {
    const predicate = physical.binary('neq', physical.column(2), physical.literal('CA', 'string'));
    const [out] = new FilterExec(scan, predicate).execute().toArray();
    expect(out?.toRecords()).toEqual([
      { id: 1, first_name: 'Niko', state: 'CO' },
      { id: 3, first_name: 'Joy', state: 'NY' },
    ]);
  });

  it('should drop rows where the predicate is null', () => {
    const schema = new TableSchema([field('flag', 'bool')]);
    const input = new DataBatch(schema, [new ArrayColumn('bool', [true, null, false])]);
    const [out] = new FilterExec(new ScanExec(new InMemoryDataSource([input])), physical.column(0))
      .execute()
      .toArray();
    expect(out?.toRecords()).toEqual([{ flag: true }]);
  });

  it('should keep constant columns constant', () => {
    const schema = new TableSchema([field('n', 'int64'), field('tag', 'string')]);
    const input = new DataBatch(schema, [new ArrayColumn('int64', [1, 2, 3]), new ConstantColumn('string', 'x', 3)]);
    const predicate = physical.binary('gt', physical.column(0), physical.literal(1, 'int64'));
    const [out] = new FilterExec(new ScanExec(new InMemoryDataSource([input])), predicate).execute().toArray();

    const tag = out?.column(1);
    expect(tag !== undefined && isConstant(tag)).toBe(true);
    expect(tag?.length).toBe(2);
    expect(out?.column(0).toArray()).toEqual([2, 3]);
  });

  it('should reject a predicate that is not bool when run', () => {
    const stream = new FilterExec(scan, physical.column(0)).execute();
    expect(() => stream.toArray()).toThrow(TypeMismatchError);
    expect(() => new FilterExec(scan, physical.column(0)).execute().toArray()).toThrow(
      'Filter predicate must evaluate to bool, got int64: #0'
    );
  });
});

describe('ProjectionExec', () => {
  const scan = new ScanExec(createEmployeeSource());

  it('should require one expression per output field', () => {
    const build = (): ProjectionExec => new ProjectionExec(scan, [physical.column(0)], EMPLOYEE_SCHEMA);
    expect(build).toThrow(ArityMismatchError);
    expect(build).toThrow('Projection has 1 expressions but its schema has 3 fields');
  });

  it('should evaluate each expression against the input batch', () => {
    const schema = new TableSchema([field('new_id', 'int64'), field('one', 'int64')]);
    const projection = new ProjectionExec(
      scan,
      [physical.binary('mul', physical.column(0), physical.literal(2, 'int64')), physical.literal(1, 'int64')],
      schema
    );
    const [out] = projection.execute().toArray();
    expect(out?.schema).toBe(schema);
    expect(out?.column(0).toArray()).toEqual([2, 4, 6]);
    const one = out?.column(1);
    expect(one !== undefined && isConstant(one)).toBe(true);
    expect(one?.length).toBe(3);
  });

  it('should be executable more than once', () => {
    const projection = new ProjectionExec(scan, [physical.column(1)], new TableSchema([field('first_name', 'string')]));
    const first = projection.execute().toArray();
    const second = projection.execute().toArray();
    expect(second[0]?.toRecords()).toEqual(first[0]?.toRecords());
  });

  it('should pull lazily through the whole chain', () => {
    const batch = createEmployeeBatch();
    const source = new RecordingDataSource(new InMemoryDataSource([batch, batch]));
    const plan = new ProjectionExec(
      new FilterExec(new ScanExec(source), physical.literal(true, 'bool')),
      [physical.column(0)],
      new TableSchema([field('id', 'int64')])
    );
    const stream = plan.execute();
    expect(source.pulls).toBe(0);
    stream.next();
    expect(source.pulls).toBe(1);
    stream.next();
    expect(source.pulls).toBe(2);
    expect(stream.hasNext()).toBe(false);
  });
});
