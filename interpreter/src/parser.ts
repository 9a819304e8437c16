/**
 * Parser module: recursive descent over the scanner's tokens.
 *
 * Syntax errors are collected. After an error the parser skips to the
 * next statement boundary and keeps going, so one call reports every
 * problem in the source.
 */

import { scan } from './lexer';
import { Token, TokenType } from './tokens';
import {
  Expr,
  Stmt,
  BinaryOperator,
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
import { LoxSyntaxError, SourceLocation, SyntaxDiagnostic } from './errors';

export const MAX_ARGUMENTS = 255;

export interface ParseResult {
  statements: Stmt[];
  hasErrors: boolean;
  errors: SyntaxDiagnostic[];
}

/**
 * Parse Lox source code into a list of statements.
 *
 * Scanner and parser errors are both reported in `errors`; the
 * statements that did parse are still returned.
 */
export function parse(source: string): ParseResult {
  const scanned = scan(source);
  const parser = new Parser(scanned.tokens);
  const statements = parser.parse();
  const errors = [...scanned.errors, ...parser.errors];
  return { statements, hasErrors: errors.length > 0, errors };
}

/**
 * Parse source code, throwing a LoxSyntaxError if anything is wrong.
 */
export function parseOrThrow(source: string): Stmt[] {
  const result = parse(source);
  if (result.hasErrors) {
    throw new LoxSyntaxError(result.errors);
  }
  return result.statements;
}

/** Unwinds to the nearest declaration after a syntax error. */
class ParseFailure {}

const BINARY_TOKENS: Partial<Record<TokenType, BinaryOperator>> = {
  PLUS: '+',
  MINUS: '-',
  STAR: '*',
  SLASH: '/',
  PERCENT: '%',
  GREATER: '>',
  GREATER_EQUAL: '>=',
  LESS: '<',
  LESS_EQUAL: '<=',
  EQUAL_EQUAL: '==',
  BANG_EQUAL: '!=',
};

function locOf(token: Token): SourceLocation {
  return { line: token.line, column: token.column };
}

export class Parser {
  public readonly errors: SyntaxDiagnostic[] = [];
  private readonly tokens: Token[];
  private current = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): Stmt[] {
    const statements: Stmt[] = [];
    while (!this.isAtEnd()) {
      const stmt = this.declaration();
      if (stmt !== null) statements.push(stmt);
    }
    return statements;
  }

  // ==================================================================
  // Declarations
  // ==================================================================

  private declaration(): Stmt | null {
    try {
      if (this.match('FUN')) return this.functionDeclaration();
      if (this.match('VAR')) return this.varDeclaration();
      return this.statement();
    } catch (e) {
      if (e instanceof ParseFailure) {
        this.synchronize();
        return null;
      }
      throw e;
    }
  }

  private functionDeclaration(): Stmt {
    const keyword = this.previous();
    const name = this.consume('IDENTIFIER', 'Expect function name.');
    this.consume('LEFT_PAREN', "Expect '(' after function name.");

    const params: string[] = [];
    if (!this.check('RIGHT_PAREN')) {
      do {
        if (params.length >= MAX_ARGUMENTS) {
          this.report(this.peek(), `Can't have more than ${MAX_ARGUMENTS} parameters.`);
        }
        params.push(this.consume('IDENTIFIER', 'Expect parameter name.').lexeme);
      } while (this.match('COMMA'));
    }
    this.consume('RIGHT_PAREN', "Expect ')' after parameters.");

    this.consume('LEFT_BRACE', "Expect '{' before function body.");
    const body = this.blockStatements();
    return mkFunctionDecl(name.lexeme, params, body, locOf(keyword));
  }

  private varDeclaration(): Stmt {
    const keyword = this.previous();
    const name = this.consume('IDENTIFIER', 'Expect variable name.');
    const initializer = this.match('EQUAL') ? this.expression() : null;
    this.consume('SEMICOLON', "Expect ';' after variable declaration.");
    return mkVar(name.lexeme, initializer, locOf(keyword));
  }

  // ==================================================================
  // Statements
  // ==================================================================

  private statement(): Stmt {
    if (this.match('PRINT')) return this.printStatement();
    if (this.match('LEFT_BRACE')) {
      const brace = this.previous();
      return mkBlock(this.blockStatements(), locOf(brace));
    }
    if (this.match('IF')) return this.ifStatement();
    if (this.match('WHILE')) return this.whileStatement();
    if (this.match('FOR')) return this.forStatement();
    if (this.match('RETURN')) return this.returnStatement();
    return this.expressionStatement();
  }

  private printStatement(): Stmt {
    const keyword = this.previous();
    const value = this.expression();
    this.consume('SEMICOLON', "Expect ';' after value.");
    return mkPrint(value, locOf(keyword));
  }

  private expressionStatement(): Stmt {
    const start = this.peek();
    const expr = this.expression();
    this.consume('SEMICOLON', "Expect ';' after expression.");
    return mkExpressionStmt(expr, locOf(start));
  }

  private blockStatements(): Stmt[] {
    const statements: Stmt[] = [];
    while (!this.check('RIGHT_BRACE') && !this.isAtEnd()) {
      const stmt = this.declaration();
      if (stmt !== null) statements.push(stmt);
    }
    this.consume('RIGHT_BRACE', "Expect '}' after block.");
    return statements;
  }

  private ifStatement(): Stmt {
    const keyword = this.previous();
    this.consume('LEFT_PAREN', "Expect '(' after 'if'.");
    const condition = this.expression();
    this.consume('RIGHT_PAREN', "Expect ')' after if condition.");
    const thenBranch = this.statement();
    const elseBranch = this.match('ELSE') ? this.statement() : null;
    return mkIf(condition, thenBranch, elseBranch, locOf(keyword));
  }

  private whileStatement(): Stmt {
    const keyword = this.previous();
    this.consume('LEFT_PAREN', "Expect '(' after 'while'.");
    const condition = this.expression();
    this.consume('RIGHT_PAREN', "Expect ')' after condition.");
    const body = this.statement();
    return mkWhile(condition, body, locOf(keyword));
  }

  /**
   * `for` has no node of its own: it becomes an initializer block
   * wrapped around a `while` whose body runs the increment last.
   */
  private forStatement(): Stmt {
    const loc = locOf(this.previous());
    this.consume('LEFT_PAREN', "Expect '(' after 'for'.");

    let initializer: Stmt | null;
    if (this.match('SEMICOLON')) {
      initializer = null;
    } else if (this.match('VAR')) {
      initializer = this.varDeclaration();
    } else {
      initializer = this.expressionStatement();
    }

    const condition = this.check('SEMICOLON') ? mkLiteral(true, locOf(this.peek())) : this.expression();
    this.consume('SEMICOLON', "Expect ';' after loop condition.");

    const increment = this.check('RIGHT_PAREN') ? null : this.expression();
    this.consume('RIGHT_PAREN', "Expect ')' after for clauses.");

    let body = this.statement();
    if (increment !== null) {
      body = mkBlock([body, mkExpressionStmt(increment, increment.loc)], body.loc);
    }
    body = mkWhile(condition, body, loc);
    if (initializer !== null) {
      body = mkBlock([initializer, body], loc);
    }
    return body;
  }

  private returnStatement(): Stmt {
    const keyword = this.previous();
    const value = this.check('SEMICOLON') ? null : this.expression();
    this.consume('SEMICOLON', "Expect ';' after return value.");
    return mkReturn(value, locOf(keyword));
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  private expression(): Expr {
    return this.assignment();
  }

  private assignment(): Expr {
    const expr = this.or();

    if (this.match('EQUAL')) {
      const equals = this.previous();
      // Right-associative
      const value = this.assignment();
      if (expr.kind === 'variable') {
        return mkAssign(expr.name, value, expr.loc);
      }
      // Reported but not thrown: the parser is not confused about where it is
      this.report(equals, 'Invalid assignment target.');
    }

    return expr;
  }

  private or(): Expr {
    let expr = this.and();
    while (this.match('OR')) {
      const operator = this.previous();
      expr = mkLogical(expr, 'or', this.and(), locOf(operator));
    }
    return expr;
  }

  private and(): Expr {
    let expr = this.equality();
    while (this.match('AND')) {
      const operator = this.previous();
      expr = mkLogical(expr, 'and', this.equality(), locOf(operator));
    }
    return expr;
  }

  private equality(): Expr {
    return this.binaryLevel(['BANG_EQUAL', 'EQUAL_EQUAL'], () => this.comparison());
  }

  private comparison(): Expr {
    return this.binaryLevel(['GREATER', 'GREATER_EQUAL', 'LESS', 'LESS_EQUAL'], () => this.term());
  }

  private term(): Expr {
    return this.binaryLevel(['MINUS', 'PLUS'], () => this.factor());
  }

  private factor(): Expr {
    return this.binaryLevel(['SLASH', 'STAR', 'PERCENT'], () => this.unary());
  }

  /**
   * One left-associative precedence level.
   */
  private binaryLevel(types: TokenType[], operand: () => Expr): Expr {
    let expr = operand();
    while (this.match(...types)) {
      const token = this.previous();
      const operator = BINARY_TOKENS[token.type];
      if (operator === undefined) {
        throw this.error(token, `Unknown binary operator '${token.lexeme}'.`);
      }
      expr = mkBinary(expr, operator, operand(), locOf(token));
    }
    return expr;
  }

  private unary(): Expr {
    if (this.match('BANG', 'MINUS')) {
      const token = this.previous();
      const operand = this.unary();
      return mkUnary(token.type === 'BANG' ? '!' : '-', operand, locOf(token));
    }
    return this.call();
  }

  private call(): Expr {
    let expr = this.primary();
    while (this.match('LEFT_PAREN')) {
      expr = this.finishCall(expr);
    }
    return expr;
  }

  private finishCall(callee: Expr): Expr {
    const paren = this.previous();
    const args: Expr[] = [];
    if (!this.check('RIGHT_PAREN')) {
      do {
        if (args.length >= MAX_ARGUMENTS) {
          this.report(this.peek(), `Can't have more than ${MAX_ARGUMENTS} arguments.`);
        }
        args.push(this.expression());
      } while (this.match('COMMA'));
    }
    this.consume('RIGHT_PAREN', "Expect ')' after arguments.");
    return mkCall(callee, args, locOf(paren));
  }

  private primary(): Expr {
    const token = this.peek();
    const loc = locOf(token);

    if (this.match('FALSE')) return mkLiteral(false, loc);
    if (this.match('TRUE')) return mkLiteral(true, loc);
    if (this.match('NIL')) return mkLiteral(null, loc);
    if (this.match('NUMBER', 'STRING')) return mkLiteral(token.literal, loc);
    if (this.match('IDENTIFIER')) return mkVariable(token.lexeme, loc);

    if (this.match('LEFT_PAREN')) {
      const expr = this.expression();
      this.consume('RIGHT_PAREN', "Expect ')' after expression.");
      return mkGrouping(expr, loc);
    }

    throw this.error(token, 'Expect expression.');
  }

  // ==================================================================
  // Token helpers
  // ==================================================================

  private match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private check(type: TokenType): boolean {
    return !this.isAtEnd() && this.peek().type === type;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === 'EOF';
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(this.peek(), message);
  }

  private report(token: Token, message: string): void {
    const where = token.type === 'EOF' ? 'at end' : `at '${token.lexeme}'`;
    this.errors.push({ message: `Error ${where}: ${message}`, line: token.line, column: token.column });
  }

  private error(token: Token, message: string): ParseFailure {
    this.report(token, message);
    return new ParseFailure();
  }

  /**
   * Discard tokens until the start of what is probably the next statement.
   */
  private synchronize(): void {
    this.advance();
    while (!this.isAtEnd()) {
      if (this.previous().type === 'SEMICOLON') return;
      switch (this.peek().type) {
        case 'CLASS':
        case 'FUN':
        case 'VAR':
        case 'FOR':
        case 'IF':
        case 'WHILE':
        case 'PRINT':
        case 'RETURN':
          return;
        default:
          this.advance();
      }
    }
  }
}
