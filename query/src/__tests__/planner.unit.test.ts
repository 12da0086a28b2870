/**
 * @stratum/query - Planner Unit Tests
 *
 * Binding of column names to positions, lowering of every node kind and
 * evaluation of the resulting physical expressions.
 */

import { describe, it, expect } from 'vitest';
import {
  ArityMismatchError,
  ColumnNotFoundError,
  TypeMismatchError,
  UnsupportedOperationError,
  isConstant,
} from '@stratum/core';
import { EMPLOYEE_SCHEMA, createEmployeeBatch, createEmployeeSource } from '@stratum/test-utils';
import { alias, cast, col, colAt, eq, fn, lit, mul, not } from '../expr-builder.js';
import { FunctionRegistry } from '../functions.js';
import { Filter, Projection, Scan } from '../logical-plan.js';
import { evaluate, formatPhysicalExpr } from '../physical-expr.js';
import { Planner, createPhysicalExpr, createPhysicalPlan } from '../planner.js';

describe('createPhysicalExpr', () => {
  it('should bind column names to positions', () => {
    expect(createPhysicalExpr(col('state'), EMPLOYEE_SCHEMA)).toEqual({ kind: 'column', index: 2 });
    expect(createPhysicalExpr(colAt(1), EMPLOYEE_SCHEMA)).toEqual({ kind: 'column', index: 1 });
  });

  it('should fail for unresolvable columns', () => {
    expect(() => createPhysicalExpr(col('zip'), EMPLOYEE_SCHEMA)).toThrow(ColumnNotFoundError);
    expect(() => createPhysicalExpr(colAt(7), EMPLOYEE_SCHEMA)).toThrow(ColumnNotFoundError);
  });

  it('should drop aliases', () => {
    expect(createPhysicalExpr(alias(col('id'), 'x'), EMPLOYEE_SCHEMA)).toEqual({ kind: 'column', index: 0 });
  });

  it('should lower nested expressions', () => {
    const lowered = createPhysicalExpr(not(eq(cast(col('id'), 'string'), lit('2'))), EMPLOYEE_SCHEMA);
    expect(formatPhysicalExpr(lowered)).toBe("NOT((CAST(#0 AS string) = '2'))");
  });

  describe('functions', () => {
    it('should look functions up case-insensitively', () => {
      const lowered = createPhysicalExpr(fn('UPPER', [col('first_name')], 'string'), EMPLOYEE_SCHEMA);
      expect(formatPhysicalExpr(lowered)).toBe('upper(#1)');
    });

    it('should reject unknown functions', () => {
      const lower = (): unknown => createPhysicalExpr(fn('nope', [col('id')], 'int64'), EMPLOYEE_SCHEMA);
      expect(lower).toThrow(UnsupportedOperationError);
      expect(lower).toThrow('Unknown scalar function: nope');
    });

    it('should check the argument count', () => {
      const lower = (): unknown =>
        createPhysicalExpr(fn('upper', [col('first_name'), col('state')], 'string'), EMPLOYEE_SCHEMA);
      expect(lower).toThrow(ArityMismatchError);
      expect(lower).toThrow('upper() takes 1 arguments, got 2');
    });

    it('should check the argument types', () => {
      const lower = (): unknown => createPhysicalExpr(fn('upper', [col('id')], 'string'), EMPLOYEE_SCHEMA);
      expect(lower).toThrow(TypeMismatchError);
      expect(lower).toThrow('upper() argument 1 must be string, got int64');
    });

    it('should check the declared return type', () => {
      const lower = (): unknown => createPhysicalExpr(fn('length', [col('first_name')], 'string'), EMPLOYEE_SCHEMA);
      expect(lower).toThrow(TypeMismatchError);
      expect(lower).toThrow('length() returns int64, but the call declares string');
      expect(formatPhysicalExpr(createPhysicalExpr(fn('length', [col('first_name')], 'int64'), EMPLOYEE_SCHEMA))).toBe(
        'length(#1)'
      );
    });

    it('should use the registry it was given', () => {
      const functions = new FunctionRegistry().register({
        name: 'twice',
        arity: 1,
        checkArgs: () => undefined,
        returnType: () => 'int64',
        apply: ([v]) => (typeof v === 'number' ? v * 2 : 0),
      });
      const planner = new Planner({ functions });
      const lowered = planner.createPhysicalExpr(fn('twice', [col('id')], 'int64'), EMPLOYEE_SCHEMA);
      expect(evaluate(lowered, createEmployeeBatch()).toArray()).toEqual([2, 4, 6]);
      expect(() => planner.createPhysicalExpr(fn('upper', [col('first_name')], 'string'), EMPLOYEE_SCHEMA)).toThrow(
        UnsupportedOperationError
      );
    });
  });
});

describe('createPhysicalPlan', () => {
  const scan = new Scan('employee', createEmployeeSource());
  const filter = new Filter(scan, eq(col('first_name'), lit('Niko')));
  const projection = new Projection(filter, [alias(mul(col('id'), 2), 'new_id'), col('first_name')]);

  it('should mirror the logical tree', () => {
    const plan = createPhysicalPlan(projection);
    expect(plan.kind).toBe('projection');
    const [child] = plan.children();
    expect(child?.kind).toBe('filter');
    expect(child?.children()[0]?.kind).toBe('scan');
  });

  it('should keep the logical output schema', () => {
    expect(createPhysicalPlan(projection).schema()).toBe(projection.schema());
    expect(createPhysicalPlan(filter).schema().equals(filter.schema())).toBe(true);
  });

  it('should carry the scan projection', () => {
    const plan = createPhysicalPlan(new Scan('employee', createEmployeeSource(), ['state']));
    expect(plan.schema().toString()).toBe('state:string');
  });
});

describe('evaluate', () => {
  const batch = createEmployeeBatch();

  it('should return the bound column itself', () => {
    expect(evaluate(createPhysicalExpr(col('id'), EMPLOYEE_SCHEMA), batch)).toBe(batch.column(0));
  });

  it('should broadcast literals to the batch length', () => {
    const result = evaluate(createPhysicalExpr(lit(7), EMPLOYEE_SCHEMA), batch);
    expect(isConstant(result)).toBe(true);
    expect(result.length).toBe(3);
  });

  it('should compute arithmetic, casts and functions', () => {
    const at = (e: Parameters<typeof createPhysicalExpr>[0]): unknown[] =>
      evaluate(createPhysicalExpr(e, EMPLOYEE_SCHEMA), batch).toArray();
    expect(at(mul(col('id'), 2))).toEqual([2, 4, 6]);
    expect(at(cast(col('id'), 'string'))).toEqual(['1', '2', '3']);
    expect(at(fn('lower', [col('state')], 'string'))).toEqual(['co', 'ca', 'ny']);
    expect(at(not(eq(col('state'), 'CA')))).toEqual([true, false, true]);
  });
});
