/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table (checked before single characters) */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '!=': TOKEN_TYPES.NE,
  '==': TOKEN_TYPES.EQ,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  ',': TOKEN_TYPES.COMMA,
  '.': TOKEN_TYPES.DOT,
  '-': TOKEN_TYPES.MINUS,
  '+': TOKEN_TYPES.PLUS,
  ';': TOKEN_TYPES.SEMICOLON,
  '/': TOKEN_TYPES.SLASH,
  '*': TOKEN_TYPES.STAR,
  '!': TOKEN_TYPES.BANG,
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
};

/** Keyword lookup table */
export const KEYWORDS: Record<string, TokenType> = {
  and: TOKEN_TYPES.AND,
  break: TOKEN_TYPES.BREAK,
  class: TOKEN_TYPES.CLASS,
  continue: TOKEN_TYPES.CONTINUE,
  else: TOKEN_TYPES.ELSE,
  false: TOKEN_TYPES.FALSE,
  for: TOKEN_TYPES.FOR,
  fun: TOKEN_TYPES.FUN,
  if: TOKEN_TYPES.IF,
  nil: TOKEN_TYPES.NIL,
  or: TOKEN_TYPES.OR,
  print: TOKEN_TYPES.PRINT,
  return: TOKEN_TYPES.RETURN,
  super: TOKEN_TYPES.SUPER,
  this: TOKEN_TYPES.THIS,
  true: TOKEN_TYPES.TRUE,
  var: TOKEN_TYPES.VAR,
  while: TOKEN_TYPES.WHILE,
};
