/**
 * Token definitions shared by the scanner and parser.
 */

export type TokenType =
  // Single-character tokens
  | 'LEFT_PAREN' | 'RIGHT_PAREN' | 'LEFT_BRACE' | 'RIGHT_BRACE'
  | 'COMMA' | 'DOT' | 'MINUS' | 'PLUS' | 'SEMICOLON' | 'SLASH' | 'STAR' | 'PERCENT'
  // One or two character tokens
  | 'BANG' | 'BANG_EQUAL' | 'EQUAL' | 'EQUAL_EQUAL'
  | 'GREATER' | 'GREATER_EQUAL' | 'LESS' | 'LESS_EQUAL'
  // Literals
  | 'IDENTIFIER' | 'STRING' | 'NUMBER'
  // Keywords
  | 'AND' | 'CLASS' | 'ELSE' | 'FALSE' | 'FUN' | 'FOR' | 'IF' | 'NIL' | 'OR'
  | 'PRINT' | 'RETURN' | 'SUPER' | 'THIS' | 'TRUE' | 'VAR' | 'WHILE'
  | 'EOF';

export interface Token {
  type: TokenType;
  lexeme: string;
  /** Parsed value for NUMBER and STRING tokens */
  literal: number | string | null;
  line: number;
  column: number;
}

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ['and', 'AND'],
  ['class', 'CLASS'],
  ['else', 'ELSE'],
  ['false', 'FALSE'],
  ['for', 'FOR'],
  ['fun', 'FUN'],
  ['if', 'IF'],
  ['nil', 'NIL'],
  ['or', 'OR'],
  ['print', 'PRINT'],
  ['return', 'RETURN'],
  ['super', 'SUPER'],
  ['this', 'THIS'],
  ['true', 'TRUE'],
  ['var', 'VAR'],
  ['while', 'WHILE'],
]);
