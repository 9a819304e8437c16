/**
 * Static scope tracking for the resolver.
 *
 * Scopes form a chain via the `parent` pointer, one per local scope the
 * interpreter will create at run time. The top level has no Scope:
 * globals are tracked separately because they are late-bound.
 */

type VariableState = 'declared' | 'defined';

export class Scope {
  private readonly variables = new Map<string, VariableState>();
  /** Function names bound ahead of their declaration, not yet reached */
  private readonly hoisted = new Set<string>();
  public readonly parent: Scope | null;

  constructor(parent?: Scope | null) {
    this.parent = parent ?? null;
  }

  /**
   * Mark a name as declared in this scope. Returns false if the scope
   * already has a variable with that name.
   */
  declare(name: string): boolean {
    if (this.hoisted.delete(name)) return true;
    if (this.variables.has(name)) return false;
    this.variables.set(name, 'declared');
    return true;
  }

  /**
   * Define a function name before its declaration is reached, so that
   * sibling functions can call each other. The declaration itself then
   * claims the slot instead of counting as a redeclaration.
   */
  hoist(name: string): void {
    if (this.variables.has(name)) return;
    this.variables.set(name, 'defined');
    this.hoisted.add(name);
  }

  /** Mark a name as ready for use (its initializer has been resolved). */
  define(name: string): void {
    this.variables.set(name, 'defined');
  }

  /**
   * Number of scope hops to the nearest scope where `name` is defined,
   * or null if no local scope has it. A name that is declared but not
   * yet defined is skipped, so `var a = a;` reads the outer `a`.
   */
  lookup(name: string): number | null {
    if (this.variables.get(name) === 'defined') return 0;
    if (this.parent === null) return null;
    const depth = this.parent.lookup(name);
    return depth === null ? null : depth + 1;
  }

  /** Create a child scope whose parent is this scope. */
  child(): Scope {
    return new Scope(this);
  }
}
