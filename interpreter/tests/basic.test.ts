/**
 * Basic tests for the Lox runtime.
 *
 * These tests exercise environments, values and errors directly,
 * without going through the scanner or parser.
 */

import { Environment } from '../src/environment';
import { NativeFunction } from '../src/callable';
import { CLOCK } from '../src/builtins';
import { Interpreter } from '../src/interpreter';
import {
  mkNumber,
  mkString,
  mkBool,
  mkNil,
  mkNative,
  isTruthy,
  stringify,
  valuesEqual,
  typeName,
} from '../src/values';
import {
  ArityMismatchError,
  DivisionByZeroError,
  JsonAstError,
  LoxRuntimeError,
  LoxSyntaxError,
  UndefinedVariableError,
} from '../src/errors';

// ==================================================================
// Environment tests
// ==================================================================

describe('Environment', () => {
  test('define and get a variable', () => {
    const env = new Environment();
    env.define('x', mkNumber(42));
    expect(env.get('x')).toEqual(mkNumber(42));
  });

  test('undefined variable throws UndefinedVariableError', () => {
    const env = new Environment();
    expect(() => env.get('unknown')).toThrow(UndefinedVariableError);
  });

  test('define overwrites a binding in the same scope', () => {
    const env = new Environment();
    env.define('x', mkNumber(1));
    env.define('x', mkString('one'));
    expect(env.get('x')).toEqual(mkString('one'));
  });

  test('child scope inherits parent variables', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(10));
    const child = parent.child();
    expect(child.get('x')).toEqual(mkNumber(10));
  });

  test('child scope can shadow parent variables', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(10));
    const child = parent.child();
    child.define('x', mkNumber(20));
    expect(child.get('x')).toEqual(mkNumber(20));
    expect(parent.get('x')).toEqual(mkNumber(10));
  });

  test('assign updates the ancestor binding seen by every holder', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(1));
    const first = parent.child();
    const second = parent.child();
    first.assign('x', mkNumber(2));
    expect(parent.get('x')).toEqual(mkNumber(2));
    expect(second.get('x')).toEqual(mkNumber(2));
    expect(first.names()).toEqual([]);
  });

  test('assign to an unknown name fails and creates nothing', () => {
    const env = new Environment();
    expect(() => env.assign('ghost', mkNumber(1))).toThrow(UndefinedVariableError);
    expect(env.names()).toEqual([]);
  });

  test('getAt and assignAt address an exact ancestor', () => {
    const outer = new Environment();
    outer.define('x', mkString('outer'));
    const middle = outer.child();
    middle.define('x', mkString('middle'));
    const inner = middle.child();

    expect(inner.getAt(1, 'x')).toEqual(mkString('middle'));
    expect(inner.getAt(2, 'x')).toEqual(mkString('outer'));

    inner.assignAt(2, 'x', mkString('changed'));
    expect(outer.get('x')).toEqual(mkString('changed'));
    expect(middle.get('x')).toEqual(mkString('middle'));
  });

  test('getAt does not fall back to other scopes', () => {
    const outer = new Environment();
    outer.define('x', mkNumber(1));
    const inner = outer.child();
    expect(() => inner.getAt(0, 'x')).toThrow(UndefinedVariableError);
    expect(() => inner.getAt(5, 'x')).toThrow(UndefinedVariableError);
  });

  test('root environment holds the natives', () => {
    const env = Environment.root();
    expect(env.names()).toEqual(['clock']);
    expect(env.get('clock')).toEqual(mkNative(CLOCK));
    expect(env.parent).toBeNull();
  });

  test('undefined variable error carries the name and location', () => {
    const env = new Environment();
    try {
      env.get('missing', { line: 4, column: 9 });
      throw new Error('expected a failure');
    } catch (e) {
      expect(e).toBeInstanceOf(UndefinedVariableError);
      if (e instanceof UndefinedVariableError) {
        expect(e.variable).toBe('missing');
        expect(e.kind).toBe('UndefinedVariable');
        expect(e.line).toBe(4);
        expect(e.column).toBe(9);
        expect(e.message).toBe("RuntimeError [line 4, col 9]: Undefined variable 'missing'.");
      }
    }
  });
});

// ==================================================================
// Value tests
// ==================================================================

describe('Values', () => {
  test('only nil and false are falsy', () => {
    expect(isTruthy(mkNil())).toBe(false);
    expect(isTruthy(mkBool(false))).toBe(false);
    expect(isTruthy(mkBool(true))).toBe(true);
    expect(isTruthy(mkNumber(0))).toBe(true);
    expect(isTruthy(mkString(''))).toBe(true);
    expect(isTruthy(mkNative(CLOCK))).toBe(true);
  });

  test('stringify numbers', () => {
    expect(stringify(mkNumber(7))).toBe('7');
    expect(stringify(mkNumber(-3))).toBe('-3');
    expect(stringify(mkNumber(2.5))).toBe('2.5');
    expect(stringify(mkNumber(1e20))).toBe('100000000000000000000');
    expect(stringify(mkNumber(-0))).toBe('-0');
    expect(stringify(mkNumber(0))).toBe('0');
  });

  test('stringify other values', () => {
    expect(stringify(mkString('hi'))).toBe('hi');
    expect(stringify(mkBool(true))).toBe('true');
    expect(stringify(mkNil())).toBe('nil');
    expect(stringify(mkNative(CLOCK))).toBe('<native fn clock>');
  });

  test('equality is by value for primitives', () => {
    expect(valuesEqual(mkNumber(1), mkNumber(1))).toBe(true);
    expect(valuesEqual(mkString('a'), mkString('a'))).toBe(true);
    expect(valuesEqual(mkNil(), mkNil())).toBe(true);
    expect(valuesEqual(mkNumber(1), mkString('1'))).toBe(false);
    expect(valuesEqual(mkNil(), mkBool(false))).toBe(false);
  });

  test('equality is by identity for callables', () => {
    const other = new NativeFunction('clock', 0, () => mkNumber(0));
    expect(valuesEqual(mkNative(CLOCK), mkNative(CLOCK))).toBe(true);
    expect(valuesEqual(mkNative(CLOCK), mkNative(other))).toBe(false);
  });

  test('type names', () => {
    expect(typeName(mkNumber(1))).toBe('Number');
    expect(typeName(mkString(''))).toBe('String');
    expect(typeName(mkBool(false))).toBe('Boolean');
    expect(typeName(mkNil())).toBe('Nil');
    expect(typeName(mkNative(CLOCK))).toBe('NativeFunction');
  });
});

// ==================================================================
// Error tests
// ==================================================================

describe('Errors', () => {
  test('runtime errors format their location', () => {
    expect(new DivisionByZeroError({ line: 3, column: 5 }).message)
      .toBe('RuntimeError [line 3, col 5]: Division by zero.');
    expect(new DivisionByZeroError().message).toBe('RuntimeError: Division by zero.');
  });

  test('arity mismatch records both counts', () => {
    const err = new ArityMismatchError('f', 0, 1);
    expect(err).toBeInstanceOf(LoxRuntimeError);
    expect(err.kind).toBe('ArityMismatch');
    expect(err.tooFew).toBe(false);
    expect(err.message).toBe("RuntimeError: Expected 0 arguments but got 1 in call to 'f' (too many arguments).");
    expect(new ArityMismatchError('g', 2, 1).tooFew).toBe(true);
  });

  test('syntax error lists every diagnostic', () => {
    const err = new LoxSyntaxError([
      { message: 'Unterminated string.', line: 1, column: 7 },
      { message: "Error at end: Expect ';' after value.", line: 2, column: 1 },
    ]);
    expect(err.message).toBe(
      "SyntaxError: 2 errors\n  Line 1, Col 7: Unterminated string.\n  Line 2, Col 1: Error at end: Expect ';' after value.",
    );
  });

  test('json ast error joins issues', () => {
    const err = new JsonAstError([
      { path: '', message: 'Expected array' },
      { path: '0.name', message: 'Expected an identifier' },
    ]);
    expect(err.message).toBe('JsonAstError: <root>: Expected array; 0.name: Expected an identifier');
  });
});

// ==================================================================
// Native function tests
// ==================================================================

describe('Natives', () => {
  test('clock returns seconds as a number', () => {
    const before = Date.now() / 1000;
    const value = CLOCK.call(new Interpreter(), []);
    expect(value.kind).toBe('number');
    if (value.kind === 'number') {
      expect(value.value).toBeGreaterThanOrEqual(before - 1);
    }
  });

  test('natives check their arity', () => {
    expect(() => CLOCK.call(new Interpreter(), [mkNumber(1)])).toThrow(ArityMismatchError);
  });
});
