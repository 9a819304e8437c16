/**
 * Tests for the Lox resolver.
 *
 * Parses real Lox code, runs the Resolver and asserts on the side
 * table, the diagnostics, and on what the interpreter does with them.
 */

import {
  BufferSink,
  Expr,
  Interpreter,
  Stmt,
  parseOrThrow,
} from '../../interpreter/src';
import { Resolver, resolve } from '../src/resolver';
import { Diagnostic, formatDiagnostics } from '../src/diagnostics';

/** Helper: resolve Lox source and return diagnostics. */
function check(source: string): Diagnostic[] {
  return resolve(parseOrThrow(source)).diagnostics;
}

/** Resolve, then interpret with the resolutions; returns printed lines. */
function runResolved(source: string): string[] {
  const statements = parseOrThrow(source);
  const output = new BufferSink();
  const interpreter = new Interpreter({ output });
  const result = resolve(statements, { globals: interpreter.globals.names() });
  expect(result.diagnostics).toEqual([]);
  interpreter.addResolutions(result.resolutions);
  interpreter.interpret(statements);
  return output.lines;
}

/** Collect every variable and assignment node in source order. */
function accesses(statements: readonly Stmt[]): Expr[] {
  const found: Expr[] = [];
  const visitExpr = (expr: Expr): void => {
    switch (expr.kind) {
      case 'variable': found.push(expr); break;
      case 'assign': visitExpr(expr.value); found.push(expr); break;
      case 'binary': case 'logical': visitExpr(expr.left); visitExpr(expr.right); break;
      case 'grouping': visitExpr(expr.expression); break;
      case 'unary': visitExpr(expr.operand); break;
      case 'call': visitExpr(expr.callee); expr.args.forEach(visitExpr); break;
      case 'literal': break;
    }
  };
  const visitStmt = (stmt: Stmt): void => {
    switch (stmt.kind) {
      case 'expression': case 'print': visitExpr(stmt.expression); break;
      case 'var': if (stmt.initializer) visitExpr(stmt.initializer); break;
      case 'block': stmt.statements.forEach(visitStmt); break;
      case 'if':
        visitExpr(stmt.condition);
        visitStmt(stmt.thenBranch);
        if (stmt.elseBranch) visitStmt(stmt.elseBranch);
        break;
      case 'while': visitExpr(stmt.condition); visitStmt(stmt.body); break;
      case 'function': stmt.body.forEach(visitStmt); break;
      case 'return': if (stmt.value) visitExpr(stmt.value); break;
    }
  };
  statements.forEach(visitStmt);
  return found;
}

describe('Resolver', () => {
  describe('side table', () => {
    test('globals resolve to the global scope', () => {
      const statements = parseOrThrow('var a = 1; print a;');
      const { resolutions } = resolve(statements);
      const [read] = accesses(statements);
      expect(resolutions.get(read.id)).toEqual({ scope: 'global' });
    });

    test('locals record how many scopes up they live', () => {
      const statements = parseOrThrow('{ var a = 1; { print a; a = 2; } print a; }');
      const { resolutions } = resolve(statements);
      const [innerRead, innerAssign, outerRead] = accesses(statements);
      expect(resolutions.get(innerRead.id)).toEqual({ scope: 'local', depth: 1 });
      expect(resolutions.get(innerAssign.id)).toEqual({ scope: 'local', depth: 1 });
      expect(resolutions.get(outerRead.id)).toEqual({ scope: 'local', depth: 0 });
    });

    test('parameters and body share one scope', () => {
      const statements = parseOrThrow('fun f(x) { var y = x; print y; }');
      const { resolutions } = resolve(statements);
      const [x, y] = accesses(statements);
      expect(resolutions.get(x.id)).toEqual({ scope: 'local', depth: 0 });
      expect(resolutions.get(y.id)).toEqual({ scope: 'local', depth: 0 });
    });

    test('a closure reaches through the enclosing call scope', () => {
      const statements = parseOrThrow('fun outer() { var i = 0; fun inner() { print i; } }');
      const { resolutions } = resolve(statements);
      const [i] = accesses(statements);
      expect(resolutions.get(i.id)).toEqual({ scope: 'local', depth: 1 });
    });

    test('a local function can reach a sibling declared after it', () => {
      const statements = parseOrThrow('{ fun first() { return second(); } fun second() { return 1; } }');
      const { resolutions, diagnostics } = resolve(statements);
      const [second] = accesses(statements);
      expect(diagnostics).toEqual([]);
      expect(resolutions.get(second.id)).toEqual({ scope: 'local', depth: 1 });
    });

    test('a variable is not visible in its own initializer', () => {
      const statements = parseOrThrow('var a = "outer"; { var a = a; print a; }');
      const { resolutions, diagnostics } = resolve(statements);
      const [initializerRead, printRead] = accesses(statements);
      expect(diagnostics).toEqual([]);
      expect(resolutions.get(initializerRead.id)).toEqual({ scope: 'global' });
      expect(resolutions.get(printRead.id)).toEqual({ scope: 'local', depth: 0 });
    });
  });

  describe('diagnostics', () => {
    test('clean program has no diagnostics', () => {
      expect(check('fun add(a, b) { return a + b; } print add(1, clock());')).toEqual([]);
    });

    test('redeclaring a local is an error', () => {
      expect(check('{ var a = 1; var a = 2; }')).toEqual([
        { severity: 'error', message: "Already a variable named 'a' in this scope.", line: 1, column: 14 },
      ]);
    });

    test('redeclaring a global is allowed', () => {
      expect(check('var a = 1; var a = 2;')).toEqual([]);
    });

    test('redeclaring a local function is still an error', () => {
      expect(check('{ fun f() {} fun f() {} }')).toEqual([
        { severity: 'error', message: "Already a variable named 'f' in this scope.", line: 1, column: 14 },
      ]);
    });

    test('duplicate parameters are an error', () => {
      const ds = check('fun f(a, a) {}');
      expect(ds.map(d => d.message)).toEqual(["Duplicate parameter 'a' in function 'f'."]);
    });

    test('top-level return is an error', () => {
      expect(check('return 1;')).toEqual([
        { severity: 'error', message: "Can't return from top-level code.", line: 1, column: 1 },
      ]);
    });

    test('return inside a function is fine', () => {
      expect(check('fun f() { { return; } }')).toEqual([]);
    });

    test('undefined names are reported', () => {
      expect(check('print missing;')).toEqual([
        { severity: 'error', message: "Undefined variable 'missing'.", line: 1, column: 7 },
      ]);
    });

    test('globals declared later in the file are known', () => {
      expect(check('fun f() { return g(); } fun g() { return 1; }')).toEqual([]);
    });

    test('extra globals can be supplied', () => {
      const statements = parseOrThrow('print answer;');
      expect(resolve(statements, { globals: ['answer'] }).diagnostics).toEqual([]);
    });

    test('undefined reporting can be turned off', () => {
      const result = resolve(parseOrThrow('print later;'), { reportUndefined: false });
      expect(result.hasErrors).toBe(false);
    });

    test('diagnostics format sorted by position', () => {
      const ds = check('{ var a; var a; }\nprint nope;');
      expect(formatDiagnostics(ds)).toBe(
        "ERROR [1:10] Already a variable named 'a' in this scope.\nERROR [2:7] Undefined variable 'nope'.",
      );
    });

    test('a resolver can be reused', () => {
      const resolver = new Resolver();
      expect(resolver.resolve(parseOrThrow('return;')).hasErrors).toBe(true);
      expect(resolver.resolve(parseOrThrow('print 1;')).hasErrors).toBe(false);
    });
  });

  describe('resolved execution', () => {
    test('closures keep the binding visible at their definition', () => {
      const source = `
        var a = "global";
        {
          fun showA() {
            print a;
          }
          showA();
          var a = "block";
          showA();
        }
      `;
      expect(runResolved(source)).toEqual(['global', 'global']);
    });

    test('the counter closure', () => {
      const source = `
        fun makeCounter() {
          var i = 0;
          fun count() {
            i = i + 1;
            return i;
          }
          return count;
        }
        var counter = makeCounter();
        counter();
        print counter();
      `;
      expect(runResolved(source)).toEqual(['2']);
    });

    test('mutually recursive functions in a block', () => {
      const source = `
        {
          fun isEven(n) {
            if (n == 0) return true;
            return isOdd(n - 1);
          }
          fun isOdd(n) {
            if (n == 0) return false;
            return isEven(n - 1);
          }
          print isEven(4);
          print isOdd(3);
        }
      `;
      expect(runResolved(source)).toEqual(['true', 'true']);
    });

    test('mutually recursive functions inside a function body', () => {
      const source = `
        fun parity(n) {
          fun even(k) { if (k == 0) return "even"; return odd(k - 1); }
          fun odd(k) { if (k == 0) return "odd"; return even(k - 1); }
          return even(n);
        }
        print parity(5);
      `;
      expect(runResolved(source)).toEqual(['odd']);
    });

    test('recursion and loops', () => {
      const source = `
        fun sum(n) {
          if (n <= 0) return 0;
          return n + sum(n - 1);
        }
        var total = 0;
        for (var i = 1; i <= 4; i = i + 1) {
          total = total + sum(i);
        }
        print total;
      `;
      // 1 + 3 + 6 + 10
      expect(runResolved(source)).toEqual(['20']);
    });

    test('shadowing in nested blocks', () => {
      expect(runResolved('var a = 1; var b = 2; { var a = 3; var b = 4; print a + b; } print a + b;'))
        .toEqual(['7', '3']);
    });
  });
});
