/**
 * Syntax tree for Lox programs.
 *
 * Statements and expressions are closed discriminated unions. Every
 * node gets a unique numeric id at construction time; the resolver
 * keys its side table on these ids so the tree itself never changes
 * after parsing.
 */

import type { SourceLocation } from './errors';

export type NodeId = number;

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '%'
  | '>' | '>=' | '<' | '<='
  | '==' | '!=';

export type UnaryOperator = '-' | '!';

export type LogicalOperator = 'and' | 'or';

export type LiteralValue = number | string | boolean | null;

// ---- Expression node types ----

export type Expr =
  | { kind: 'binary'; id: NodeId; loc: SourceLocation; left: Expr; operator: BinaryOperator; right: Expr }
  | { kind: 'grouping'; id: NodeId; loc: SourceLocation; expression: Expr }
  | { kind: 'literal'; id: NodeId; loc: SourceLocation; value: LiteralValue }
  | { kind: 'unary'; id: NodeId; loc: SourceLocation; operator: UnaryOperator; operand: Expr }
  | { kind: 'variable'; id: NodeId; loc: SourceLocation; name: string }
  | { kind: 'assign'; id: NodeId; loc: SourceLocation; name: string; value: Expr }
  | { kind: 'logical'; id: NodeId; loc: SourceLocation; left: Expr; operator: LogicalOperator; right: Expr }
  | { kind: 'call'; id: NodeId; loc: SourceLocation; callee: Expr; args: Expr[] };

// ---- Statement node types ----

export type Stmt =
  | { kind: 'expression'; id: NodeId; loc: SourceLocation; expression: Expr }
  | { kind: 'print'; id: NodeId; loc: SourceLocation; expression: Expr }
  | { kind: 'var'; id: NodeId; loc: SourceLocation; name: string; initializer: Expr | null }
  | { kind: 'block'; id: NodeId; loc: SourceLocation; statements: Stmt[] }
  | { kind: 'if'; id: NodeId; loc: SourceLocation; condition: Expr; thenBranch: Stmt; elseBranch: Stmt | null }
  | { kind: 'while'; id: NodeId; loc: SourceLocation; condition: Expr; body: Stmt }
  | { kind: 'function'; id: NodeId; loc: SourceLocation; name: string; params: string[]; body: Stmt[] }
  | { kind: 'return'; id: NodeId; loc: SourceLocation; value: Expr | null };

export type ExprOf<K extends Expr['kind']> = Extract<Expr, { kind: K }>;
export type StmtOf<K extends Stmt['kind']> = Extract<Stmt, { kind: K }>;

/** A variable reference or assignment: the nodes the resolver annotates. */
export type VariableAccess = ExprOf<'variable'> | ExprOf<'assign'>;

let lastNodeId = 0;

export function nextNodeId(): NodeId {
  lastNodeId += 1;
  return lastNodeId;
}

// ---- Expression constructors ----

export function mkBinary(left: Expr, operator: BinaryOperator, right: Expr, loc: SourceLocation): Expr {
  return { kind: 'binary', id: nextNodeId(), loc, left, operator, right };
}

export function mkGrouping(expression: Expr, loc: SourceLocation): Expr {
  return { kind: 'grouping', id: nextNodeId(), loc, expression };
}

export function mkLiteral(value: LiteralValue, loc: SourceLocation): Expr {
  return { kind: 'literal', id: nextNodeId(), loc, value };
}

export function mkUnary(operator: UnaryOperator, operand: Expr, loc: SourceLocation): Expr {
  return { kind: 'unary', id: nextNodeId(), loc, operator, operand };
}

export function mkVariable(name: string, loc: SourceLocation): Expr {
  return { kind: 'variable', id: nextNodeId(), loc, name };
}

export function mkAssign(name: string, value: Expr, loc: SourceLocation): Expr {
  return { kind: 'assign', id: nextNodeId(), loc, name, value };
}

export function mkLogical(left: Expr, operator: LogicalOperator, right: Expr, loc: SourceLocation): Expr {
  return { kind: 'logical', id: nextNodeId(), loc, left, operator, right };
}

export function mkCall(callee: Expr, args: Expr[], loc: SourceLocation): Expr {
  return { kind: 'call', id: nextNodeId(), loc, callee, args };
}

// ---- Statement constructors ----

export function mkExpressionStmt(expression: Expr, loc: SourceLocation): Stmt {
  return { kind: 'expression', id: nextNodeId(), loc, expression };
}

export function mkPrint(expression: Expr, loc: SourceLocation): Stmt {
  return { kind: 'print', id: nextNodeId(), loc, expression };
}

export function mkVar(name: string, initializer: Expr | null, loc: SourceLocation): Stmt {
  return { kind: 'var', id: nextNodeId(), loc, name, initializer };
}

export function mkBlock(statements: Stmt[], loc: SourceLocation): Stmt {
  return { kind: 'block', id: nextNodeId(), loc, statements };
}

export function mkIf(condition: Expr, thenBranch: Stmt, elseBranch: Stmt | null, loc: SourceLocation): Stmt {
  return { kind: 'if', id: nextNodeId(), loc, condition, thenBranch, elseBranch };
}

export function mkWhile(condition: Expr, body: Stmt, loc: SourceLocation): Stmt {
  return { kind: 'while', id: nextNodeId(), loc, condition, body };
}

export function mkFunctionDecl(name: string, params: string[], body: Stmt[], loc: SourceLocation): Stmt {
  return { kind: 'function', id: nextNodeId(), loc, name, params, body };
}

export function mkReturn(value: Expr | null, loc: SourceLocation): Stmt {
  return { kind: 'return', id: nextNodeId(), loc, value };
}

// ---- Resolution side table ----

/**
 * Where a variable access finds its binding: a local scope a fixed
 * number of links up from the current environment, or the globals.
 */
export type Resolution =
  | { scope: 'local'; depth: number }
  | { scope: 'global' };

export type Resolutions = ReadonlyMap<NodeId, Resolution>;
