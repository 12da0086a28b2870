/**
 * @stratum/query - Planner
 *
 * Lowers logical plans and expressions to their physical counterparts,
 * binding column names to positions in the input schema.
 */

import {
  ArityMismatchError,
  ColumnNotFoundError,
  TypeMismatchError,
  UnsupportedOperationError,
  assertNever,
  type TableSchema,
} from '@stratum/core';
import { FunctionRegistry } from './functions.js';
import { resolveField, type LogicalExpr, type ScalarFunction } from './logical-expr.js';
import type { LogicalPlan } from './logical-plan.js';
import { physical, type PhysicalExpr } from './physical-expr.js';
import { FilterExec, ProjectionExec, ScanExec, type PhysicalPlan } from './physical-plan.js';

export interface PlannerOptions {
  /** Functions `fn(...)` calls may bind to (default: the built-ins) */
  functions?: FunctionRegistry;
}

export class Planner {
  private readonly functions: FunctionRegistry;

  constructor(options: PlannerOptions = {}) {
    this.functions = options.functions ?? FunctionRegistry.withBuiltins();
  }

  /**
   * Lower a logical plan tree. Projection output schemas are reused from
   * the logical nodes rather than inferred again.
   */
  createPhysicalPlan(plan: LogicalPlan): PhysicalPlan {
    switch (plan.kind) {
      case 'scan':
        return new ScanExec(plan.dataSource, plan.projection);
      case 'filter': {
        const input = this.createPhysicalPlan(plan.input);
        const predicate = this.createPhysicalExpr(plan.predicate, plan.input.schema());
        return new FilterExec(input, predicate);
      }
      case 'projection': {
        const input = this.createPhysicalPlan(plan.input);
        const schema = plan.input.schema();
        const exprs = plan.exprs.map(e => this.createPhysicalExpr(e, schema));
        return new ProjectionExec(input, exprs, plan.schema());
      }
      default:
        return assertNever(plan, 'logical plan');
    }
  }

  /**
   * Lower an expression against the schema of its input.
   *
   * @throws ColumnNotFoundError when a column reference does not resolve
   * @throws UnsupportedOperationError for an unregistered function
   */
  createPhysicalExpr(expr: LogicalExpr, input: TableSchema): PhysicalExpr {
    switch (expr.kind) {
      case 'literal':
        return physical.literal(expr.value, expr.dataType);
      case 'column_index':
        input.field(expr.index);
        return physical.column(expr.index);
      case 'column': {
        const index = input.indexOf(expr.name);
        if (index < 0) {
          throw new ColumnNotFoundError(expr.name, input.fieldNames());
        }
        return physical.column(index);
      }
      case 'alias':
        return this.createPhysicalExpr(expr.expr, input);
      case 'cast':
        return physical.cast(this.createPhysicalExpr(expr.expr, input), expr.dataType);
      case 'not':
        return physical.not(this.createPhysicalExpr(expr.expr, input));
      case 'binary':
        return physical.binary(
          expr.op,
          this.createPhysicalExpr(expr.left, input),
          this.createPhysicalExpr(expr.right, input)
        );
      case 'function':
        return this.lowerFunction(expr, input);
      default:
        return assertNever(expr, 'logical expression');
    }
  }

  private lowerFunction(expr: ScalarFunction, input: TableSchema): PhysicalExpr {
    const def = this.functions.get(expr.name);
    if (def === undefined) {
      throw new UnsupportedOperationError(`Unknown scalar function: ${expr.name}`, {
        function: expr.name,
        available: this.functions.names(),
      });
    }
    if (expr.args.length !== def.arity) {
      throw new ArityMismatchError(
        `${def.name}() takes ${def.arity} arguments, got ${expr.args.length}`,
        def.arity,
        expr.args.length
      );
    }
    const argTypes = expr.args.map(arg => resolveField(arg, input).dataType);
    const problem = def.checkArgs(argTypes);
    if (problem !== undefined) {
      throw new TypeMismatchError(problem, { function: def.name });
    }
    const returnType = def.returnType(argTypes);
    if (returnType !== expr.returnType) {
      throw new TypeMismatchError(
        `${def.name}() returns ${returnType}, but the call declares ${expr.returnType}`,
        { function: def.name, expected: returnType, actual: expr.returnType }
      );
    }
    return physical.fn(
      def,
      expr.args.map(arg => this.createPhysicalExpr(arg, input)),
      expr.returnType
    );
  }
}

/**
 * Lower a logical plan with the built-in functions.
 */
export function createPhysicalPlan(plan: LogicalPlan): PhysicalPlan {
  return new Planner().createPhysicalPlan(plan);
}

/**
 * Lower an expression with the built-in functions.
 */
export function createPhysicalExpr(expr: LogicalExpr, input: TableSchema): PhysicalExpr {
  return new Planner().createPhysicalExpr(expr, input);
}
