/**
 * Scanner: turns Lox source text into a flat token list.
 *
 * Errors are collected rather than thrown so that a single pass
 * reports every bad character or unterminated string.
 */

import { Token, TokenType, KEYWORDS } from './tokens';
import type { SyntaxDiagnostic } from './errors';

export interface ScanResult {
  tokens: Token[];
  errors: SyntaxDiagnostic[];
}

export function scan(source: string): ScanResult {
  return new Scanner(source).scanTokens();
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isAlpha(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isAlphaNumeric(ch: string): boolean {
  return isAlpha(ch) || isDigit(ch);
}

export class Scanner {
  private readonly source: string;
  private readonly tokens: Token[] = [];
  private readonly errors: SyntaxDiagnostic[] = [];
  private start = 0;
  private current = 0;
  private line = 1;
  /** Offset of the first character of the current line */
  private lineStart = 0;
  private startLine = 1;
  private startColumn = 1;

  constructor(source: string) {
    this.source = source;
  }

  scanTokens(): ScanResult {
    while (!this.isAtEnd()) {
      this.start = this.current;
      this.startLine = this.line;
      this.startColumn = this.current - this.lineStart + 1;
      this.scanToken();
    }

    this.tokens.push({
      type: 'EOF',
      lexeme: '',
      literal: null,
      line: this.line,
      column: this.current - this.lineStart + 1,
    });
    return { tokens: this.tokens, errors: this.errors };
  }

  private scanToken(): void {
    const ch = this.advance();
    switch (ch) {
      case '(': this.addToken('LEFT_PAREN'); break;
      case ')': this.addToken('RIGHT_PAREN'); break;
      case '{': this.addToken('LEFT_BRACE'); break;
      case '}': this.addToken('RIGHT_BRACE'); break;
      case ',': this.addToken('COMMA'); break;
      case '.': this.addToken('DOT'); break;
      case '-': this.addToken('MINUS'); break;
      case '+': this.addToken('PLUS'); break;
      case ';': this.addToken('SEMICOLON'); break;
      case '*': this.addToken('STAR'); break;
      case '%': this.addToken('PERCENT'); break;
      case '!': this.addToken(this.match('=') ? 'BANG_EQUAL' : 'BANG'); break;
      case '=': this.addToken(this.match('=') ? 'EQUAL_EQUAL' : 'EQUAL'); break;
      case '<': this.addToken(this.match('=') ? 'LESS_EQUAL' : 'LESS'); break;
      case '>': this.addToken(this.match('=') ? 'GREATER_EQUAL' : 'GREATER'); break;
      case '/':
        if (this.match('/')) {
          // Line comment runs to the end of the line
          while (this.peek() !== '\n' && !this.isAtEnd()) this.advance();
        } else {
          this.addToken('SLASH');
        }
        break;
      case ' ':
      case '\r':
      case '\t':
        break;
      case '\n':
        this.newLine();
        break;
      case '"':
        this.string();
        break;
      default:
        if (isDigit(ch)) {
          this.number();
        } else if (isAlpha(ch)) {
          this.identifier();
        } else {
          this.error(`Unexpected character '${ch}'.`);
        }
    }
  }

  private string(): void {
    while (this.peek() !== '"' && !this.isAtEnd()) {
      if (this.advance() === '\n') this.newLine();
    }

    if (this.isAtEnd()) {
      this.error('Unterminated string.');
      return;
    }

    this.advance(); // closing quote
    this.addToken('STRING', this.source.slice(this.start + 1, this.current - 1));
  }

  private number(): void {
    while (isDigit(this.peek())) this.advance();

    if (this.peek() === '.' && isDigit(this.peekNext())) {
      this.advance();
      while (isDigit(this.peek())) this.advance();
    }

    this.addToken('NUMBER', Number(this.source.slice(this.start, this.current)));
  }

  private identifier(): void {
    while (isAlphaNumeric(this.peek())) this.advance();
    const text = this.source.slice(this.start, this.current);
    this.addToken(KEYWORDS.get(text) ?? 'IDENTIFIER');
  }

  // ---- Cursor helpers ----

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  private advance(): string {
    return this.source.charAt(this.current++);
  }

  private match(expected: string): boolean {
    if (this.isAtEnd() || this.source.charAt(this.current) !== expected) return false;
    this.current++;
    return true;
  }

  private peek(): string {
    return this.isAtEnd() ? '\0' : this.source.charAt(this.current);
  }

  private peekNext(): string {
    return this.current + 1 >= this.source.length ? '\0' : this.source.charAt(this.current + 1);
  }

  private newLine(): void {
    this.line++;
    this.lineStart = this.current;
  }

  private addToken(type: TokenType, literal: number | string | null = null): void {
    this.tokens.push({
      type,
      lexeme: this.source.slice(this.start, this.current),
      literal,
      line: this.startLine,
      column: this.startColumn,
    });
  }

  private error(message: string): void {
    this.errors.push({ message, line: this.startLine, column: this.startColumn });
  }
}
