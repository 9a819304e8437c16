/**
 * Error types for the Lox interpreter.
 */

import type { LoxValue } from './values';

export interface SourceLocation {
  /** 1-based line number */
  line: number;
  /** 1-based column */
  column: number;
}

export interface SyntaxDiagnostic {
  message: string;
  line: number;
  column: number;
}

function formatLocation(at?: SourceLocation): string {
  return at !== undefined ? ` [line ${at.line}, col ${at.column}]` : '';
}

export class LoxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LoxError';
  }
}

/**
 * Raised when source text cannot be scanned or parsed.
 */
export class LoxSyntaxError extends LoxError {
  public readonly diagnostics: SyntaxDiagnostic[];

  constructor(diagnostics: SyntaxDiagnostic[]) {
    const lines = diagnostics.map(d => `  Line ${d.line}, Col ${d.column}: ${d.message}`);
    super(`SyntaxError: ${diagnostics.length} error${diagnostics.length === 1 ? '' : 's'}\n${lines.join('\n')}`);
    this.name = 'LoxSyntaxError';
    this.diagnostics = diagnostics;
  }
}

export interface JsonAstIssue {
  path: string;
  message: string;
}

/**
 * Raised when a JSON syntax tree does not match the expected shape.
 */
export class JsonAstError extends LoxError {
  public readonly issues: JsonAstIssue[];

  constructor(issues: JsonAstIssue[]) {
    super(`JsonAstError: ${issues.map(i => `${i.path || '<root>'}: ${i.message}`).join('; ')}`);
    this.name = 'JsonAstError';
    this.issues = issues;
  }
}

export type RuntimeErrorKind =
  | 'UndefinedVariable'
  | 'UnsupportedOperator'
  | 'DivisionByZero'
  | 'ArityMismatch'
  | 'NotCallable';

export class LoxRuntimeError extends LoxError {
  public readonly kind: RuntimeErrorKind;
  public readonly line: number | undefined;
  public readonly column: number | undefined;

  constructor(kind: RuntimeErrorKind, message: string, at?: SourceLocation) {
    super(`RuntimeError${formatLocation(at)}: ${message}`);
    this.name = 'LoxRuntimeError';
    this.kind = kind;
    this.line = at?.line;
    this.column = at?.column;
  }
}

export class UndefinedVariableError extends LoxRuntimeError {
  public readonly variable: string;

  constructor(name: string, at?: SourceLocation) {
    super('UndefinedVariable', `Undefined variable '${name}'.`, at);
    this.name = 'UndefinedVariableError';
    this.variable = name;
  }
}

export class UnsupportedOperatorError extends LoxRuntimeError {
  constructor(description: string, at?: SourceLocation) {
    super('UnsupportedOperator', `Unsupported operator: ${description}.`, at);
    this.name = 'UnsupportedOperatorError';
  }
}

export class DivisionByZeroError extends LoxRuntimeError {
  constructor(at?: SourceLocation) {
    super('DivisionByZero', 'Division by zero.', at);
    this.name = 'DivisionByZeroError';
  }
}

export class ArityMismatchError extends LoxRuntimeError {
  public readonly callee: string;
  public readonly expected: number;
  public readonly received: number;

  constructor(callee: string, expected: number, received: number, at?: SourceLocation) {
    const detail = received < expected ? 'too few arguments' : 'too many arguments';
    super('ArityMismatch', `Expected ${expected} arguments but got ${received} in call to '${callee}' (${detail}).`, at);
    this.name = 'ArityMismatchError';
    this.callee = callee;
    this.expected = expected;
    this.received = received;
  }

  get tooFew(): boolean {
    return this.received < this.expected;
  }
}

export class NotCallableError extends LoxRuntimeError {
  constructor(description: string, at?: SourceLocation) {
    super('NotCallable', `Can only call functions, got ${description}.`, at);
    this.name = 'NotCallableError';
  }
}

/**
 * Outcome of executing a statement.
 * A pending return is not an error. It travels as a value and is
 * unwrapped at the call boundary.
 */
export type Completion =
  | { type: 'normal' }
  | { type: 'return'; value: LoxValue };

export const NORMAL: Completion = { type: 'normal' };

export function returnWith(value: LoxValue): Completion {
  return { type: 'return', value };
}
