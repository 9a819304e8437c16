/**
 * JSON form of the syntax tree.
 *
 * Lets a tree produced elsewhere (another parser, a tool, a test
 * fixture) be validated and handed to the interpreter, and lets the
 * CLI dump what the parser produced. Node ids are not part of the JSON
 * form; fresh ones are assigned when a tree is loaded.
 */

import { z } from 'zod';
import {
  BinaryOperator,
  Expr,
  LiteralValue,
  LogicalOperator,
  Stmt,
  UnaryOperator,
  mkAssign,
  mkBinary,
  mkBlock,
  mkCall,
  mkExpressionStmt,
  mkFunctionDecl,
  mkGrouping,
  mkIf,
  mkLiteral,
  mkLogical,
  mkPrint,
  mkReturn,
  mkUnary,
  mkVar,
  mkVariable,
  mkWhile,
} from './ast';
import { JsonAstError, SourceLocation } from './errors';

export interface LocJson {
  line: number;
  column: number;
}

export type ExprJson =
  | { type: 'binary'; left: ExprJson; operator: BinaryOperator; right: ExprJson; loc?: LocJson }
  | { type: 'grouping'; expression: ExprJson; loc?: LocJson }
  | { type: 'literal'; value: LiteralValue; loc?: LocJson }
  | { type: 'unary'; operator: UnaryOperator; operand: ExprJson; loc?: LocJson }
  | { type: 'variable'; name: string; loc?: LocJson }
  | { type: 'assign'; name: string; value: ExprJson; loc?: LocJson }
  | { type: 'logical'; left: ExprJson; operator: LogicalOperator; right: ExprJson; loc?: LocJson }
  | { type: 'call'; callee: ExprJson; args: ExprJson[]; loc?: LocJson };

export type StmtJson =
  | { type: 'expression'; expression: ExprJson; loc?: LocJson }
  | { type: 'print'; expression: ExprJson; loc?: LocJson }
  | { type: 'var'; name: string; initializer?: ExprJson; loc?: LocJson }
  | { type: 'block'; statements: StmtJson[]; loc?: LocJson }
  | { type: 'if'; condition: ExprJson; thenBranch: StmtJson; elseBranch?: StmtJson; loc?: LocJson }
  | { type: 'while'; condition: ExprJson; body: StmtJson; loc?: LocJson }
  | { type: 'function'; name: string; params: string[]; body: StmtJson[]; loc?: LocJson }
  | { type: 'return'; value?: ExprJson; loc?: LocJson };

// ---- Schemas ----

const locSchema = z.object({
  line: z.number().int().nonnegative(),
  column: z.number().int().nonnegative(),
}).optional();

const identifierSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Expected an identifier');

const binaryOperatorSchema = z.enum(['+', '-', '*', '/', '%', '>', '>=', '<', '<=', '==', '!=']);

export const exprSchema: z.ZodType<ExprJson> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('binary'), left: exprSchema, operator: binaryOperatorSchema, right: exprSchema, loc: locSchema }),
    z.object({ type: z.literal('grouping'), expression: exprSchema, loc: locSchema }),
    z.object({ type: z.literal('literal'), value: z.union([z.number(), z.string(), z.boolean(), z.null()]), loc: locSchema }),
    z.object({ type: z.literal('unary'), operator: z.enum(['-', '!']), operand: exprSchema, loc: locSchema }),
    z.object({ type: z.literal('variable'), name: identifierSchema, loc: locSchema }),
    z.object({ type: z.literal('assign'), name: identifierSchema, value: exprSchema, loc: locSchema }),
    z.object({ type: z.literal('logical'), left: exprSchema, operator: z.enum(['and', 'or']), right: exprSchema, loc: locSchema }),
    z.object({ type: z.literal('call'), callee: exprSchema, args: z.array(exprSchema), loc: locSchema }),
  ]),
);

export const stmtSchema: z.ZodType<StmtJson> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('expression'), expression: exprSchema, loc: locSchema }),
    z.object({ type: z.literal('print'), expression: exprSchema, loc: locSchema }),
    z.object({ type: z.literal('var'), name: identifierSchema, initializer: exprSchema.optional(), loc: locSchema }),
    z.object({ type: z.literal('block'), statements: z.array(stmtSchema), loc: locSchema }),
    z.object({ type: z.literal('if'), condition: exprSchema, thenBranch: stmtSchema, elseBranch: stmtSchema.optional(), loc: locSchema }),
    z.object({ type: z.literal('while'), condition: exprSchema, body: stmtSchema, loc: locSchema }),
    z.object({ type: z.literal('function'), name: identifierSchema, params: z.array(identifierSchema), body: z.array(stmtSchema), loc: locSchema }),
    z.object({ type: z.literal('return'), value: exprSchema.optional(), loc: locSchema }),
  ]),
);

export const programSchema = z.array(stmtSchema);

// ---- JSON -> tree ----

const UNKNOWN_LOCATION: SourceLocation = { line: 0, column: 0 };

function locFrom(loc: LocJson | undefined): SourceLocation {
  return loc ?? UNKNOWN_LOCATION;
}

function exprFromJson(json: ExprJson): Expr {
  const loc = locFrom(json.loc);
  switch (json.type) {
    case 'binary': return mkBinary(exprFromJson(json.left), json.operator, exprFromJson(json.right), loc);
    case 'grouping': return mkGrouping(exprFromJson(json.expression), loc);
    case 'literal': return mkLiteral(json.value, loc);
    case 'unary': return mkUnary(json.operator, exprFromJson(json.operand), loc);
    case 'variable': return mkVariable(json.name, loc);
    case 'assign': return mkAssign(json.name, exprFromJson(json.value), loc);
    case 'logical': return mkLogical(exprFromJson(json.left), json.operator, exprFromJson(json.right), loc);
    case 'call': return mkCall(exprFromJson(json.callee), json.args.map(exprFromJson), loc);
  }
}

function stmtFromJson(json: StmtJson): Stmt {
  const loc = locFrom(json.loc);
  switch (json.type) {
    case 'expression': return mkExpressionStmt(exprFromJson(json.expression), loc);
    case 'print': return mkPrint(exprFromJson(json.expression), loc);
    case 'var': return mkVar(json.name, json.initializer ? exprFromJson(json.initializer) : null, loc);
    case 'block': return mkBlock(json.statements.map(stmtFromJson), loc);
    case 'if': return mkIf(
      exprFromJson(json.condition),
      stmtFromJson(json.thenBranch),
      json.elseBranch ? stmtFromJson(json.elseBranch) : null,
      loc,
    );
    case 'while': return mkWhile(exprFromJson(json.condition), stmtFromJson(json.body), loc);
    case 'function': return mkFunctionDecl(json.name, json.params, json.body.map(stmtFromJson), loc);
    case 'return': return mkReturn(json.value ? exprFromJson(json.value) : null, loc);
  }
}

/**
 * Validate an unknown JSON value and build a program from it.
 * Throws JsonAstError listing every schema violation.
 */
export function programFromJson(input: unknown): Stmt[] {
  const result = programSchema.safeParse(input);
  if (!result.success) {
    throw new JsonAstError(result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    })));
  }
  return result.data.map(stmtFromJson);
}

// ---- tree -> JSON ----

export function exprToJson(expr: Expr): ExprJson {
  const loc = { line: expr.loc.line, column: expr.loc.column };
  switch (expr.kind) {
    case 'binary': return { type: 'binary', left: exprToJson(expr.left), operator: expr.operator, right: exprToJson(expr.right), loc };
    case 'grouping': return { type: 'grouping', expression: exprToJson(expr.expression), loc };
    case 'literal': return { type: 'literal', value: expr.value, loc };
    case 'unary': return { type: 'unary', operator: expr.operator, operand: exprToJson(expr.operand), loc };
    case 'variable': return { type: 'variable', name: expr.name, loc };
    case 'assign': return { type: 'assign', name: expr.name, value: exprToJson(expr.value), loc };
    case 'logical': return { type: 'logical', left: exprToJson(expr.left), operator: expr.operator, right: exprToJson(expr.right), loc };
    case 'call': return { type: 'call', callee: exprToJson(expr.callee), args: expr.args.map(exprToJson), loc };
  }
}

export function stmtToJson(stmt: Stmt): StmtJson {
  const loc = { line: stmt.loc.line, column: stmt.loc.column };
  switch (stmt.kind) {
    case 'expression': return { type: 'expression', expression: exprToJson(stmt.expression), loc };
    case 'print': return { type: 'print', expression: exprToJson(stmt.expression), loc };
    case 'var':
      return stmt.initializer !== null
        ? { type: 'var', name: stmt.name, initializer: exprToJson(stmt.initializer), loc }
        : { type: 'var', name: stmt.name, loc };
    case 'block': return { type: 'block', statements: stmt.statements.map(stmtToJson), loc };
    case 'if':
      return stmt.elseBranch !== null
        ? { type: 'if', condition: exprToJson(stmt.condition), thenBranch: stmtToJson(stmt.thenBranch), elseBranch: stmtToJson(stmt.elseBranch), loc }
        : { type: 'if', condition: exprToJson(stmt.condition), thenBranch: stmtToJson(stmt.thenBranch), loc };
    case 'while': return { type: 'while', condition: exprToJson(stmt.condition), body: stmtToJson(stmt.body), loc };
    case 'function': return { type: 'function', name: stmt.name, params: [...stmt.params], body: stmt.body.map(stmtToJson), loc };
    case 'return':
      return stmt.value !== null
        ? { type: 'return', value: exprToJson(stmt.value), loc }
        : { type: 'return', loc };
  }
}

export function programToJson(statements: readonly Stmt[]): StmtJson[] {
  return statements.map(stmtToJson);
}
