/**
 * @stratum/query - Scalar Function Registry Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { BUILTIN_FUNCTIONS, FunctionRegistry, type ScalarFunctionDef } from '../functions.js';

function get(name: string): ScalarFunctionDef {
  const def = FunctionRegistry.withBuiltins().get(name);
  if (def === undefined) throw new Error(`missing builtin ${name}`);
  return def;
}

describe('FunctionRegistry', () => {
  it('should register the built-ins', () => {
    const registry = FunctionRegistry.withBuiltins();
    expect(registry.names()).toEqual(['abs', 'concat', 'length', 'lower', 'upper']);
    expect(registry.names()).toHaveLength(BUILTIN_FUNCTIONS.length);
  });

  it('should look names up case-insensitively', () => {
    const registry = FunctionRegistry.withBuiltins();
    expect(registry.has('Upper')).toBe(true);
    expect(registry.get('LOWER')?.name).toBe('lower');
    expect(registry.get('missing')).toBeUndefined();
  });

  it('should let a later registration replace an earlier one', () => {
    const replacement: ScalarFunctionDef = {
      name: 'ABS',
      arity: 1,
      checkArgs: () => undefined,
      returnType: () => 'int64',
      apply: () => 0,
    };
    const registry = FunctionRegistry.withBuiltins().register(replacement);
    expect(registry.get('abs')).toBe(replacement);
    expect(registry.names()).toHaveLength(5);
  });
});

describe('built-ins', () => {
  it('should apply to values', () => {
    expect(get('upper').apply(['abc'])).toBe('ABC');
    expect(get('lower').apply(['AbC'])).toBe('abc');
    expect(get('length').apply(['abcd'])).toBe(4);
    expect(get('length').apply(['a\u{1F600}'])).toBe(2);
    expect(get('abs').apply([-3.5])).toBe(3.5);
    expect(get('concat').apply(['a', 'b'])).toBe('ab');
  });

  it('should describe argument type problems', () => {
    expect(get('upper').checkArgs(['string'])).toBeUndefined();
    expect(get('abs').checkArgs(['string'])).toBe('abs() argument 1 must be numeric, got string');
    expect(get('concat').checkArgs(['string', 'int64'])).toBe('concat() argument 2 must be string, got int64');
  });

  it('should report their result types', () => {
    expect(get('length').returnType(['string'])).toBe('int64');
    expect(get('abs').returnType(['int8'])).toBe('int8');
    expect(get('abs').returnType(['float32'])).toBe('float32');
    expect(get('concat').returnType(['string', 'string'])).toBe('string');
  });

  it('should reject values of the wrong kind', () => {
    expect(() => get('length').apply([3])).toThrow('length() expects a string argument');
    expect(() => get('abs').apply(['x'])).toThrow('abs() expects a numeric argument');
  });
});
