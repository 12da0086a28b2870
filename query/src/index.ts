/**
 * @stratum/query - Query Planning and Execution
 *
 * Logical plans and expressions, the planner, vectorized physical
 * operators, EXPLAIN rendering and the execution context.
 *
 * @example
 * ```typescript
 * import { ExecutionContext, col, lit, eq, expr } from '@stratum/query';
 *
 * const ctx = new ExecutionContext();
 * const result = ctx
 *   .fromColumns({ id: [1, 2, 3], state: ['CO', 'CA', 'NY'] })
 *   .filter(eq(col('state'), lit('CO')))
 *   .select(expr(col('id')).mul(2).as('new_id'))
 *   .collect();
 * ```
 *
 * @packageDocumentation
 * @module @stratum/query
 */

// =============================================================================
// Operators
// =============================================================================

export {
  LOGICAL_OPS,
  COMPARISON_OPS,
  ARITHMETIC_OPS,
  OP_SYMBOLS,
  isLogicalOp,
  isComparisonOp,
  isArithmeticOp,
  binaryResultType,
  type LogicalOp,
  type ComparisonOp,
  type ArithmeticOp,
  type BinaryOp,
} from './operators.js';

// =============================================================================
// Logical Layer
// =============================================================================

export {
  formatExpr,
  formatLiteral,
  resolveField,
  toField,
  type LogicalExpr,
  type LiteralType,
  type ColumnByName,
  type ColumnByIndex,
  type Literal,
  type Cast,
  type Alias,
  type Not,
  type BinaryExpr,
  type ScalarFunction,
  type SchemaProvider,
} from './logical-expr.js';

export { Scan, Filter, Projection, formatProjection, type LogicalPlan } from './logical-plan.js';

export {
  col,
  colAt,
  lit,
  litFloat,
  litDouble,
  cast,
  alias,
  not,
  binary,
  and,
  or,
  eq,
  neq,
  gt,
  gte,
  lt,
  lte,
  add,
  sub,
  mul,
  div,
  mod,
  fn,
  expr,
  toExpr,
  ExprBuilder,
  type ExprInput,
} from './expr-builder.js';

// =============================================================================
// Planning
// =============================================================================

export { Planner, createPhysicalPlan, createPhysicalExpr, type PlannerOptions } from './planner.js';

export { Optimizer } from './optimizer.js';

export { FunctionRegistry, BUILTIN_FUNCTIONS, type ScalarFunctionDef } from './functions.js';

// =============================================================================
// Physical Layer
// =============================================================================

export {
  evaluate,
  formatPhysicalExpr,
  type PhysicalExpr,
  type ColumnAt,
  type BoundLiteral,
  type BoundCast,
  type BoundNot,
  type BoundBinary,
  type BoundFunction,
} from './physical-expr.js';

export { ScanExec, FilterExec, ProjectionExec, type PhysicalPlan } from './physical-plan.js';

// =============================================================================
// EXPLAIN
// =============================================================================

export { explainTree, explainLogical, explainPhysical, formatSchema, type ExplainNode } from './explain.js';

// =============================================================================
// Execution
// =============================================================================

export { ExecutionContext, type ExecutionContextOptions } from './context.js';

export { LazyFrame, DataFrame, type SelectItem, type Predicate } from './frame.js';
