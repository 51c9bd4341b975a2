/**
 * Token types, the keyword table and the statement-boundary set.
 */

import { RiteValue, valueToString } from './values';

export enum TokenType {
  // Punctuation
  ParenOpen = 'ParenOpen',
  ParenClose = 'ParenClose',
  SquareOpen = 'SquareOpen',
  SquareClose = 'SquareClose',
  BraceOpen = 'BraceOpen',
  BraceClose = 'BraceClose',
  Comma = 'Comma',
  Dot = 'Dot',

  // Operators
  Equal = 'Equal',
  Plus = 'Plus',
  PlusPlus = 'PlusPlus',
  PlusEqual = 'PlusEqual',
  Minus = 'Minus',
  MinusMinus = 'MinusMinus',
  MinusEqual = 'MinusEqual',
  Multiply = 'Multiply',
  Divide = 'Divide',
  Less = 'Less',
  LessEqual = 'LessEqual',
  Greater = 'Greater',
  GreaterEqual = 'GreaterEqual',

  // Print markers
  DollarLess = 'DollarLess',
  DollarGreater = 'DollarGreater',

  // Literals
  String = 'String',
  Number = 'Number',
  Identifier = 'Identifier',

  // Keywords
  And = 'And',
  Class = 'Class',
  Else = 'Else',
  End = 'End',
  False = 'False',
  For = 'For',
  If = 'If',
  Is = 'Is',
  None = 'None',
  Not = 'Not',
  Offering = 'Offering',
  Or = 'Or',
  Return = 'Return',
  Ritual = 'Ritual',
  Super = 'Super',
  This = 'This',
  True = 'True',
  While = 'While',

  // Synthetic
  StatementEnd = 'StatementEnd',
  EOF = 'EOF',
}

export interface Token {
  readonly type: TokenType;
  readonly lexeme: string;
  /** Set for number and string tokens only. */
  readonly literal: RiteValue | null;
  /** 1-based source line. */
  readonly line: number;
}

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['and', TokenType.And],
  ['class', TokenType.Class],
  ['else', TokenType.Else],
  ['end', TokenType.End],
  ['false', TokenType.False],
  ['for', TokenType.For],
  ['if', TokenType.If],
  ['is', TokenType.Is],
  ['none', TokenType.None],
  ['not', TokenType.Not],
  ['offering', TokenType.Offering],
  ['or', TokenType.Or],
  ['return', TokenType.Return],
  ['ritual', TokenType.Ritual],
  ['super', TokenType.Super],
  ['this', TokenType.This],
  ['true', TokenType.True],
  ['while', TokenType.While],
]);

/**
 * Token types after which a newline (outside brackets) ends the statement.
 */
const STATEMENT_END_CANDIDATES: ReadonlySet<TokenType> = new Set([
  TokenType.BraceClose,
  TokenType.ParenClose,
  TokenType.SquareClose,
  TokenType.True,
  TokenType.False,
  TokenType.Number,
  TokenType.String,
  TokenType.None,
  TokenType.End,
  TokenType.Identifier,
]);

export function canEndStatement(type: TokenType): boolean {
  return STATEMENT_END_CANDIDATES.has(type);
}

export function mkToken(type: TokenType, lexeme: string, line: number, literal: RiteValue | null = null): Token {
  return { type, lexeme, literal, line };
}

/**
 * One-line rendering used by token dumps: line, type, lexeme and literal.
 */
export function tokenToString(t: Token): string {
  const literal = t.literal !== null ? `\t${valueToString(t.literal)}` : '';
  return `${t.line}\t${t.type}\t${JSON.stringify(t.lexeme)}${literal}`;
}

export const isDigit = (ch: string): boolean => ch >= '0' && ch <= '9';
export const isIdStart = (ch: string): boolean => /[A-Za-z_]/.test(ch);
export const isIdPart = (ch: string): boolean => /[A-Za-z0-9_]/.test(ch);
