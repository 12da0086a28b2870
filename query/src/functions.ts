/**
 * @stratum/query - Scalar Functions
 *
 * Registry of scalar functions the planner can bind `fn(...)` calls to.
 * Implementations work on non-null scalars; a null argument yields null
 * without calling the implementation. String lengths count code points.
 */

import {
  TypeMismatchError,
  isNumericType,
  type DataType,
  type ScalarValue,
} from '@stratum/core';

/**
 * A scalar function implementation.
 */
export interface ScalarFunctionDef {
  readonly name: string;
  readonly arity: number;

  /**
   * Check argument types at planning time.
   * Returns a description of the problem, or undefined when accepted.
   */
  checkArgs(argTypes: readonly DataType[]): string | undefined;

  /** Type of the values `apply` returns for accepted argument types */
  returnType(argTypes: readonly DataType[]): DataType;

  apply(args: readonly ScalarValue[]): ScalarValue;
}

function stringArg(value: ScalarValue | undefined, fnName: string): string {
  if (typeof value !== 'string') {
    throw new TypeMismatchError(`${fnName}() expects a string argument`, { function: fnName });
  }
  return value;
}

function numberArg(value: ScalarValue | undefined, fnName: string): number {
  if (typeof value !== 'number') {
    throw new TypeMismatchError(`${fnName}() expects a numeric argument`, { function: fnName });
  }
  return value;
}

function requireTypes(
  name: string,
  argTypes: readonly DataType[],
  accepts: (type: DataType) => boolean,
  expected: string
): string | undefined {
  const bad = argTypes.findIndex(t => !accepts(t));
  if (bad < 0) return undefined;
  return `${name}() argument ${bad + 1} must be ${expected}, got ${argTypes[bad]}`;
}

const isString = (type: DataType): boolean => type === 'string';

// =============================================================================
// Built-ins
// =============================================================================

export const BUILTIN_FUNCTIONS: readonly ScalarFunctionDef[] = [
  {
    name: 'upper',
    arity: 1,
    checkArgs: types => requireTypes('upper', types, isString, 'string'),
    returnType: () => 'string',
    apply: ([s]) => stringArg(s, 'upper').toUpperCase(),
  },
  {
    name: 'lower',
    arity: 1,
    checkArgs: types => requireTypes('lower', types, isString, 'string'),
    returnType: () => 'string',
    apply: ([s]) => stringArg(s, 'lower').toLowerCase(),
  },
  {
    name: 'length',
    arity: 1,
    checkArgs: types => requireTypes('length', types, isString, 'string'),
    returnType: () => 'int64',
    apply: ([s]) => [...stringArg(s, 'length')].length,
  },
  {
    name: 'abs',
    arity: 1,
    checkArgs: types => requireTypes('abs', types, isNumericType, 'numeric'),
    returnType: ([type]) => type ?? 'float64',
    apply: ([n]) => Math.abs(numberArg(n, 'abs')),
  },
  {
    name: 'concat',
    arity: 2,
    checkArgs: types => requireTypes('concat', types, isString, 'string'),
    returnType: () => 'string',
    apply: ([a, b]) => stringArg(a, 'concat') + stringArg(b, 'concat'),
  },
];

// =============================================================================
// Registry
// =============================================================================

/**
 * Case-insensitive lookup of scalar functions by name.
 *
 * @example
 * ```typescript
 * const registry = FunctionRegistry.withBuiltins().register({
 *   name: 'initial',
 *   arity: 1,
 *   checkArgs: () => undefined,
 *   returnType: () => 'string',
 *   apply: ([s]) => String(s).charAt(0),
 * });
 * ```
 */
export class FunctionRegistry {
  private readonly functions = new Map<string, ScalarFunctionDef>();

  static withBuiltins(): FunctionRegistry {
    const registry = new FunctionRegistry();
    for (const def of BUILTIN_FUNCTIONS) {
      registry.register(def);
    }
    return registry;
  }

  /** Register a function, replacing any with the same name */
  register(def: ScalarFunctionDef): this {
    this.functions.set(def.name.toLowerCase(), def);
    return this;
  }

  get(name: string): ScalarFunctionDef | undefined {
    return this.functions.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.functions.has(name.toLowerCase());
  }

  names(): string[] {
    return [...this.functions.keys()].sort();
  }
}
