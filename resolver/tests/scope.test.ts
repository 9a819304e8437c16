import { Scope } from '../src/scope';

describe('Scope', () => {
  test('defined names are found at depth 0', () => {
    const scope = new Scope();
    scope.declare('x');
    scope.define('x');
    expect(scope.lookup('x')).toBe(0);
  });

  test('declared but undefined names are skipped', () => {
    const outer = new Scope();
    outer.declare('x');
    outer.define('x');
    const inner = outer.child();
    inner.declare('x');
    expect(inner.lookup('x')).toBe(1);
  });

  test('lookup counts hops to the defining scope', () => {
    const outer = new Scope();
    outer.declare('x');
    outer.define('x');
    const inner = outer.child().child();
    expect(inner.lookup('x')).toBe(2);
    expect(inner.parent?.parent).toBe(outer);
  });

  test('unknown names are null', () => {
    expect(new Scope().child().lookup('nope')).toBeNull();
  });

  test('hoisted names are visible before their declaration', () => {
    const scope = new Scope();
    scope.hoist('f');
    expect(scope.child().lookup('f')).toBe(1);
    expect(scope.declare('f')).toBe(true);
    expect(scope.declare('f')).toBe(false);
  });

  test('declare refuses duplicates in one scope', () => {
    const scope = new Scope();
    expect(scope.declare('x')).toBe(true);
    expect(scope.declare('x')).toBe(false);
    expect(scope.child().declare('x')).toBe(true);
  });
});
