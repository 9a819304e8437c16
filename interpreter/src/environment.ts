/**
 * Lexical scoping environment for the Lox interpreter.
 *
 * Each environment holds a map of variable bindings and a reference
 * to its parent scope. Environments are shared by reference: a closure
 * keeps the environment it was defined in, and writes made through any
 * holder are seen by all of them.
 */

import { LoxValue } from './values';
import { UndefinedVariableError, SourceLocation } from './errors';
import type { NativeFunction } from './callable';
import { registerBuiltins, NATIVES } from './builtins';

export class Environment {
  private readonly vars = new Map<string, LoxValue>();
  public readonly parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.parent = parent;
  }

  /**
   * Create a parentless environment holding every native function.
   */
  static root(natives: readonly NativeFunction[] = NATIVES): Environment {
    const env = new Environment();
    registerBuiltins(env, natives);
    return env;
  }

  /**
   * Define or overwrite a variable in this scope only.
   */
  define(name: string, value: LoxValue): void {
    this.vars.set(name, value);
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  get(name: string, at?: SourceLocation): LoxValue {
    const value = this.vars.get(name);
    if (value !== undefined) return value;
    if (this.parent !== null) return this.parent.get(name, at);
    throw new UndefinedVariableError(name, at);
  }

  /**
   * Reassign the nearest existing binding. Never creates a new one.
   */
  assign(name: string, value: LoxValue, at?: SourceLocation): void {
    if (this.vars.has(name)) {
      this.vars.set(name, value);
      return;
    }
    if (this.parent !== null) {
      this.parent.assign(name, value, at);
      return;
    }
    throw new UndefinedVariableError(name, at);
  }

  /**
   * Read a binding from the ancestor exactly `distance` links up.
   */
  getAt(distance: number, name: string, at?: SourceLocation): LoxValue {
    const value = this.ancestor(distance, name, at).vars.get(name);
    if (value === undefined) throw new UndefinedVariableError(name, at);
    return value;
  }

  assignAt(distance: number, name: string, value: LoxValue, at?: SourceLocation): void {
    const target = this.ancestor(distance, name, at);
    if (!target.vars.has(name)) throw new UndefinedVariableError(name, at);
    target.vars.set(name, value);
  }

  /**
   * Names bound directly in this scope, in definition order.
   */
  names(): string[] {
    return [...this.vars.keys()];
  }

  /**
   * Create a child scope.
   */
  child(): Environment {
    return new Environment(this);
  }

  private ancestor(distance: number, name: string, at?: SourceLocation): Environment {
    let env: Environment = this;
    for (let i = 0; i < distance; i++) {
      if (env.parent === null) throw new UndefinedVariableError(name, at);
      env = env.parent;
    }
    return env;
  }
}
