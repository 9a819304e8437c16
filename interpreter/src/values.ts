/**
 * Runtime value representations for the Lox interpreter.
 */

import type { FunctionObject, NativeFunction } from './callable';
import type { LiteralValue } from './ast';

export type LoxValue =
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'nil' }
  | { kind: 'native'; fn: NativeFunction }
  | { kind: 'function'; fn: FunctionObject };

export type CallableValue = Extract<LoxValue, { kind: 'native' | 'function' }>;

// ---- Value constructors ----

export function mkNumber(value: number): LoxValue {
  return { kind: 'number', value };
}

export function mkString(value: string): LoxValue {
  return { kind: 'string', value };
}

export function mkBool(value: boolean): LoxValue {
  return { kind: 'bool', value };
}

const NIL: LoxValue = { kind: 'nil' };

export function mkNil(): LoxValue {
  return NIL;
}

export function mkNative(fn: NativeFunction): LoxValue {
  return { kind: 'native', fn };
}

export function mkFunction(fn: FunctionObject): LoxValue {
  return { kind: 'function', fn };
}

export function fromLiteral(literal: LiteralValue): LoxValue {
  if (literal === null) return mkNil();
  if (typeof literal === 'number') return mkNumber(literal);
  if (typeof literal === 'string') return mkString(literal);
  return mkBool(literal);
}

// ---- Value utilities ----

/**
 * nil and false are falsy; everything else, including 0 and "", is truthy.
 */
export function isTruthy(v: LoxValue): boolean {
  switch (v.kind) {
    case 'nil': return false;
    case 'bool': return v.value;
    default: return true;
  }
}

export function isCallable(v: LoxValue): v is CallableValue {
  return v.kind === 'native' || v.kind === 'function';
}

function formatNumber(n: number): string {
  if (Object.is(n, -0)) return '-0';
  if (Number.isInteger(n)) {
    // Avoid exponent notation for large integral values
    return Math.abs(n) < 1e21 ? n.toFixed(0) : String(n);
  }
  return String(n);
}

export function stringify(v: LoxValue): string {
  switch (v.kind) {
    case 'number': return formatNumber(v.value);
    case 'string': return v.value;
    case 'bool': return String(v.value);
    case 'nil': return 'nil';
    case 'native': return `<native fn ${v.fn.name}>`;
    case 'function': return `<fn ${v.fn.name}>`;
  }
}

/**
 * Structural equality for primitives, identity for callables.
 */
export function valuesEqual(a: LoxValue, b: LoxValue): boolean {
  switch (a.kind) {
    case 'number':
      return b.kind === 'number' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'nil':
      return b.kind === 'nil';
    case 'native':
      return b.kind === 'native' && a.fn === b.fn;
    case 'function':
      return b.kind === 'function' && a.fn === b.fn;
  }
}

/**
 * Short type name used in error messages.
 */
export function typeName(v: LoxValue): string {
  switch (v.kind) {
    case 'number': return 'Number';
    case 'string': return 'String';
    case 'bool': return 'Boolean';
    case 'nil': return 'Nil';
    case 'native': return 'NativeFunction';
    case 'function': return 'Function';
  }
}
