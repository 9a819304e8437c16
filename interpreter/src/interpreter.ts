/**
 * Tree-walking interpreter for Lox.
 *
 * Statements return a Completion (normal, or a pending return with its
 * value); failures are thrown as LoxRuntimeError subclasses and are
 * never caught here. The only state besides the globals is the output
 * sink and the resolver's side table, so natives may re-enter the
 * interpreter freely.
 */

import { Environment } from './environment';
import { FunctionObject } from './callable';
import {
  Expr,
  ExprOf,
  Resolution,
  Resolutions,
  NodeId,
  Stmt,
  VariableAccess,
} from './ast';
import {
  LoxValue,
  mkBool,
  mkFunction,
  mkNil,
  mkNumber,
  mkString,
  fromLiteral,
  isCallable,
  isTruthy,
  stringify,
  typeName,
  valuesEqual,
} from './values';
import {
  Completion,
  DivisionByZeroError,
  NotCallableError,
  NORMAL,
  SourceLocation,
  UnsupportedOperatorError,
  returnWith,
} from './errors';

/**
 * Destination of `print` statements.
 */
export interface OutputSink {
  print(text: string): void;
}

export const stdoutSink: OutputSink = {
  print(text: string): void {
    process.stdout.write(text + '\n');
  },
};

/**
 * Collects printed lines in memory.
 */
export class BufferSink implements OutputSink {
  public readonly lines: string[] = [];

  print(text: string): void {
    this.lines.push(text);
  }
}

export interface InterpreterOptions {
  output?: OutputSink;
  /** Global scope to run in; defaults to a fresh root environment */
  globals?: Environment;
  /** Resolver output; without it every lookup searches the chain */
  resolutions?: Resolutions;
}

export class Interpreter {
  public readonly globals: Environment;
  private readonly output: OutputSink;
  private readonly resolutions = new Map<NodeId, Resolution>();

  constructor(options: InterpreterOptions = {}) {
    this.globals = options.globals ?? Environment.root();
    this.output = options.output ?? stdoutSink;
    if (options.resolutions) this.addResolutions(options.resolutions);
  }

  /**
   * Merge resolver output for more code (e.g. the next REPL input).
   */
  addResolutions(resolutions: Resolutions): void {
    for (const [id, resolution] of resolutions) {
      this.resolutions.set(id, resolution);
    }
  }

  /**
   * Run top-level statements in the global scope, in order.
   * The first runtime error stops the run; whatever earlier statements
   * did stays done. A top-level `return` ends the run quietly.
   */
  interpret(statements: readonly Stmt[]): void {
    for (const stmt of statements) {
      const completion = this.execute(stmt, this.globals);
      if (completion.type === 'return') return;
    }
  }

  // ==================================================================
  // Statements
  // ==================================================================

  execute(stmt: Stmt, env: Environment): Completion {
    switch (stmt.kind) {
      case 'expression':
        this.evaluate(stmt.expression, env);
        return NORMAL;

      case 'print':
        this.output.print(stringify(this.evaluate(stmt.expression, env)));
        return NORMAL;

      case 'var': {
        const value = stmt.initializer !== null ? this.evaluate(stmt.initializer, env) : mkNil();
        env.define(stmt.name, value);
        return NORMAL;
      }

      case 'block':
        return this.executeBlock(stmt.statements, env.child());

      case 'if':
        if (isTruthy(this.evaluate(stmt.condition, env))) {
          return this.execute(stmt.thenBranch, env);
        }
        return stmt.elseBranch !== null ? this.execute(stmt.elseBranch, env) : NORMAL;

      case 'while':
        while (isTruthy(this.evaluate(stmt.condition, env))) {
          const completion = this.execute(stmt.body, env);
          if (completion.type === 'return') return completion;
        }
        return NORMAL;

      case 'function':
        // Bound in the same environment it captures, so it can call itself
        env.define(stmt.name, mkFunction(new FunctionObject(stmt, env)));
        return NORMAL;

      case 'return':
        return returnWith(stmt.value !== null ? this.evaluate(stmt.value, env) : mkNil());
    }
  }

  /**
   * Run statements in an environment the caller has already created.
   * Stops at the first pending return.
   */
  executeBlock(statements: readonly Stmt[], env: Environment): Completion {
    for (const stmt of statements) {
      const completion = this.execute(stmt, env);
      if (completion.type === 'return') return completion;
    }
    return NORMAL;
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  evaluate(expr: Expr, env: Environment = this.globals): LoxValue {
    switch (expr.kind) {
      case 'literal':
        return fromLiteral(expr.value);
      case 'grouping':
        return this.evaluate(expr.expression, env);
      case 'variable':
        return this.lookUpVariable(expr, env);
      case 'assign': {
        const value = this.evaluate(expr.value, env);
        this.assignVariable(expr, value, env);
        return value;
      }
      case 'logical':
        return this.evalLogical(expr, env);
      case 'unary':
        return this.evalUnary(expr, env);
      case 'binary':
        return this.evalBinary(expr, env);
      case 'call':
        return this.evalCall(expr, env);
    }
  }

  /**
   * Invoke a callable value. Exposed for natives that call back into Lox.
   */
  call(callee: LoxValue, args: LoxValue[], at?: SourceLocation): LoxValue {
    if (!isCallable(callee)) {
      throw new NotCallableError(`${typeName(callee)} '${stringify(callee)}'`, at);
    }
    return callee.fn.call(this, args, at);
  }

  private evalCall(expr: ExprOf<'call'>, env: Environment): LoxValue {
    const callee = this.evaluate(expr.callee, env);
    const args = expr.args.map(arg => this.evaluate(arg, env));
    return this.call(callee, args, expr.loc);
  }

  private evalLogical(expr: ExprOf<'logical'>, env: Environment): LoxValue {
    const left = this.evaluate(expr.left, env);
    if (expr.operator === 'or' ? isTruthy(left) : !isTruthy(left)) {
      return left;
    }
    return this.evaluate(expr.right, env);
  }

  private evalUnary(expr: ExprOf<'unary'>, env: Environment): LoxValue {
    const operand = this.evaluate(expr.operand, env);
    if (expr.operator === '!') {
      return mkBool(!isTruthy(operand));
    }
    if (operand.kind === 'number') {
      return mkNumber(-operand.value);
    }
    throw new UnsupportedOperatorError(`${expr.operator}${typeName(operand)}`, expr.loc);
  }

  private evalBinary(expr: ExprOf<'binary'>, env: Environment): LoxValue {
    const left = this.evaluate(expr.left, env);
    const right = this.evaluate(expr.right, env);
    const op = expr.operator;

    if (op === '==') return mkBool(valuesEqual(left, right));
    if (op === '!=') return mkBool(!valuesEqual(left, right));

    if (op === '+' && left.kind === 'string' && right.kind === 'string') {
      return mkString(left.value + right.value);
    }

    if (left.kind !== 'number' || right.kind !== 'number') {
      throw new UnsupportedOperatorError(`${typeName(left)} ${op} ${typeName(right)}`, expr.loc);
    }

    const l = left.value;
    const r = right.value;
    switch (op) {
      case '+': return mkNumber(l + r);
      case '-': return mkNumber(l - r);
      case '*': return mkNumber(l * r);
      case '/':
        if (r === 0) throw new DivisionByZeroError(expr.loc);
        return mkNumber(l / r);
      case '%':
        if (r === 0) throw new DivisionByZeroError(expr.loc);
        return mkNumber(l % r);
      case '>': return mkBool(l > r);
      case '>=': return mkBool(l >= r);
      case '<': return mkBool(l < r);
      case '<=': return mkBool(l <= r);
    }
  }

  // ==================================================================
  // Variable resolution
  // ==================================================================

  private lookUpVariable(expr: ExprOf<'variable'>, env: Environment): LoxValue {
    const resolution = this.resolutions.get(expr.id);
    if (resolution === undefined) return env.get(expr.name, expr.loc);
    if (resolution.scope === 'global') return this.globals.get(expr.name, expr.loc);
    return env.getAt(resolution.depth, expr.name, expr.loc);
  }

  private assignVariable(expr: VariableAccess, value: LoxValue, env: Environment): void {
    const resolution = this.resolutions.get(expr.id);
    if (resolution === undefined) {
      env.assign(expr.name, value, expr.loc);
    } else if (resolution.scope === 'global') {
      this.globals.assign(expr.name, value, expr.loc);
    } else {
      env.assignAt(resolution.depth, expr.name, value, expr.loc);
    }
  }
}
