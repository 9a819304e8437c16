/**
 * Static resolver for Lox programs.
 *
 * Walks the syntax tree in two passes:
 *   1. Global collection: natives plus every top-level `var` and `fun`
 *   2. Resolution: records, for every variable read and assignment,
 *      whether it binds to a local scope (and how many scopes up) or to
 *      a global, and accumulates diagnostics along the way
 *
 * The result is a side table keyed by node id; the tree is not touched.
 * Scope layering matches the interpreter exactly: one scope per block,
 * and one per function call holding both parameters and body. Function
 * names in a local scope are bound before its statements are resolved,
 * like globals, so local functions may be mutually recursive.
 */

import {
  Expr,
  NATIVES,
  NodeId,
  Resolution,
  SourceLocation,
  Stmt,
  StmtOf,
  VariableAccess,
} from '../../interpreter/src';
import { Scope } from './scope';
import { Diagnostic } from './diagnostics';

export interface ResolveOptions {
  /** Names already bound in the global scope; defaults to the natives */
  globals?: Iterable<string>;
  /**
   * Report reads of names that are neither local nor known globals.
   * Default true; the REPL turns it off since a later input may define them.
   */
  reportUndefined?: boolean;
}

export interface ResolveResult {
  resolutions: Map<NodeId, Resolution>;
  diagnostics: Diagnostic[];
  hasErrors: boolean;
}

export function resolve(statements: readonly Stmt[], options: ResolveOptions = {}): ResolveResult {
  return new Resolver(options).resolve(statements);
}

export class Resolver {
  private readonly globals: Set<string>;
  private readonly reportUndefined: boolean;
  private resolutions = new Map<NodeId, Resolution>();
  private diagnostics: Diagnostic[] = [];
  private functionDepth = 0;

  constructor(options: ResolveOptions = {}) {
    this.globals = new Set(options.globals ?? NATIVES.map(native => native.name));
    this.reportUndefined = options.reportUndefined ?? true;
  }

  resolve(statements: readonly Stmt[]): ResolveResult {
    this.resolutions = new Map();
    this.diagnostics = [];
    this.functionDepth = 0;

    // Pass 1: collect globals
    this.collectGlobals(statements);
    // Pass 2: resolve
    for (const stmt of statements) {
      this.resolveStmt(stmt, null);
    }

    return {
      resolutions: this.resolutions,
      diagnostics: this.diagnostics,
      hasErrors: this.diagnostics.length > 0,
    };
  }

  // =========================================================================
  // Pass 1: global collection
  // =========================================================================

  private collectGlobals(statements: readonly Stmt[]): void {
    for (const stmt of statements) {
      if (stmt.kind === 'var' || stmt.kind === 'function') {
        this.globals.add(stmt.name);
      }
    }
  }

  // =========================================================================
  // Pass 2: statements
  // =========================================================================

  /**
   * `scope` is null at the top level, where bindings are globals.
   */
  private resolveStmt(stmt: Stmt, scope: Scope | null): void {
    switch (stmt.kind) {
      case 'expression':
      case 'print':
        this.resolveExpr(stmt.expression, scope);
        break;

      case 'var':
        this.declare(stmt.name, scope, stmt.loc);
        if (stmt.initializer !== null) this.resolveExpr(stmt.initializer, scope);
        scope?.define(stmt.name);
        break;

      case 'block':
        this.resolveBody(stmt.statements, new Scope(scope));
        break;

      case 'if':
        this.resolveExpr(stmt.condition, scope);
        this.resolveStmt(stmt.thenBranch, scope);
        if (stmt.elseBranch !== null) this.resolveStmt(stmt.elseBranch, scope);
        break;

      case 'while':
        this.resolveExpr(stmt.condition, scope);
        this.resolveStmt(stmt.body, scope);
        break;

      case 'function':
        // Defined before the body so the function can refer to itself
        this.declare(stmt.name, scope, stmt.loc);
        scope?.define(stmt.name);
        this.resolveFunction(stmt, scope);
        break;

      case 'return':
        if (this.functionDepth === 0) {
          this.report("Can't return from top-level code.", stmt.loc);
        }
        if (stmt.value !== null) this.resolveExpr(stmt.value, scope);
        break;
    }
  }

  private resolveFunction(fn: StmtOf<'function'>, scope: Scope | null): void {
    const fnScope = new Scope(scope);
    for (const param of fn.params) {
      if (!fnScope.declare(param)) {
        this.report(`Duplicate parameter '${param}' in function '${fn.name}'.`, fn.loc);
      }
      fnScope.define(param);
    }

    this.functionDepth++;
    this.resolveBody(fn.body, fnScope);
    this.functionDepth--;
  }

  private resolveBody(statements: readonly Stmt[], scope: Scope): void {
    for (const stmt of statements) {
      if (stmt.kind === 'function') scope.hoist(stmt.name);
    }
    for (const stmt of statements) {
      this.resolveStmt(stmt, scope);
    }
  }

  private declare(name: string, scope: Scope | null, loc: SourceLocation): void {
    // Redeclaring a global is allowed; it just overwrites the binding
    if (scope === null) return;
    if (!scope.declare(name)) {
      this.report(`Already a variable named '${name}' in this scope.`, loc);
    }
  }

  // =========================================================================
  // Pass 2: expressions
  // =========================================================================

  private resolveExpr(expr: Expr, scope: Scope | null): void {
    switch (expr.kind) {
      case 'literal':
        break;
      case 'grouping':
        this.resolveExpr(expr.expression, scope);
        break;
      case 'unary':
        this.resolveExpr(expr.operand, scope);
        break;
      case 'binary':
      case 'logical':
        this.resolveExpr(expr.left, scope);
        this.resolveExpr(expr.right, scope);
        break;
      case 'call':
        this.resolveExpr(expr.callee, scope);
        for (const arg of expr.args) {
          this.resolveExpr(arg, scope);
        }
        break;
      case 'variable':
        this.resolveAccess(expr, scope);
        break;
      case 'assign':
        this.resolveExpr(expr.value, scope);
        this.resolveAccess(expr, scope);
        break;
    }
  }

  private resolveAccess(expr: VariableAccess, scope: Scope | null): void {
    const depth = scope?.lookup(expr.name) ?? null;
    if (depth !== null) {
      this.resolutions.set(expr.id, { scope: 'local', depth });
      return;
    }
    if (this.reportUndefined && !this.globals.has(expr.name)) {
      this.report(`Undefined variable '${expr.name}'.`, expr.loc);
    }
    this.resolutions.set(expr.id, { scope: 'global' });
  }

  private report(message: string, loc: SourceLocation): void {
    this.diagnostics.push({ severity: 'error', message, line: loc.line, column: loc.column });
  }
}
