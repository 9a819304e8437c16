/**
 * Callable values: native functions and interpreted (user-defined)
 * functions share one contract so the call site does not care which
 * kind it is invoking.
 */

import type { Environment } from './environment';
import type { Interpreter } from './interpreter';
import type { Stmt, StmtOf } from './ast';
import { LoxValue, mkNil } from './values';
import { ArityMismatchError, SourceLocation } from './errors';

export interface Callable {
  readonly name: string;
  arity(): number;
  call(interpreter: Interpreter, args: LoxValue[], at?: SourceLocation): LoxValue;
}

function checkArity(callable: Callable, args: LoxValue[], at?: SourceLocation): void {
  if (args.length !== callable.arity()) {
    throw new ArityMismatchError(callable.name, callable.arity(), args.length, at);
  }
}

export type NativeImpl = (interpreter: Interpreter, args: LoxValue[]) => LoxValue;

/**
 * A host-provided function with a fixed arity. Descriptors live for the
 * whole process; two values are equal only if they hold the same one.
 */
export class NativeFunction implements Callable {
  constructor(
    public readonly name: string,
    private readonly paramCount: number,
    private readonly impl: NativeImpl,
  ) {}

  arity(): number {
    return this.paramCount;
  }

  call(interpreter: Interpreter, args: LoxValue[], at?: SourceLocation): LoxValue {
    checkArity(this, args, at);
    return this.impl(interpreter, args);
  }
}

/**
 * A function declared in Lox source, bundled with the environment that
 * was active where it was declared.
 */
export class FunctionObject implements Callable {
  public readonly name: string;
  public readonly params: readonly string[];
  public readonly body: readonly Stmt[];
  public readonly closure: Environment;

  constructor(declaration: StmtOf<'function'>, closure: Environment) {
    this.name = declaration.name;
    this.params = declaration.params;
    this.body = declaration.body;
    this.closure = closure;
  }

  arity(): number {
    return this.params.length;
  }

  /**
   * Bind parameters in one fresh child of the closure and run the body
   * there. The parameter scope is also the body's block scope.
   */
  call(interpreter: Interpreter, args: LoxValue[], at?: SourceLocation): LoxValue {
    checkArity(this, args, at);

    const env = this.closure.child();
    this.params.forEach((param, i) => env.define(param, args[i]));

    const completion = interpreter.executeBlock(this.body, env);
    return completion.type === 'return' ? completion.value : mkNil();
  }
}
