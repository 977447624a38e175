/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read a string literal. Strings may span lines and have no escapes.
 * An unterminated string is reported at its opening quote and yields no token.
 */
export function readString(state: LexerState): Token | null {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    value += advance(state);
  }

  if (isAtEnd(state)) {
    state.errors.push(new LexerError('LOX-L002', {}, start));
    return null;
  }

  advance(state); // consume closing "
  const end = currentLocation(state);
  return makeToken(
    TOKEN_TYPES.STRING,
    state.source.slice(start.offset, end.offset),
    start,
    end,
    value
  );
}

/**
 * Read an integer or decimal literal.
 * A '.' directly after the integer part must be followed by a digit.
 */
export function readNumber(state: LexerState): Token | null {
  const start = currentLocation(state);

  while (isDigit(peek(state))) {
    advance(state);
  }

  if (peek(state) === '.') {
    advance(state); // consume .
    if (!isDigit(peek(state))) {
      const lexeme = state.source.slice(start.offset, state.pos);
      state.errors.push(new LexerError('LOX-L003', { lexeme }, start));
      return null;
    }
    while (isDigit(peek(state))) {
      advance(state);
    }
  }

  const end = currentLocation(state);
  const lexeme = state.source.slice(start.offset, end.offset);
  return makeToken(TOKEN_TYPES.NUMBER, lexeme, start, end, Number(lexeme));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);

  while (isIdentifierChar(peek(state))) {
    advance(state);
  }

  const end = currentLocation(state);
  const lexeme = state.source.slice(start.offset, end.offset);
  const keyword = Object.hasOwn(KEYWORDS, lexeme) ? KEYWORDS[lexeme] : undefined;
  return makeToken(keyword ?? TOKEN_TYPES.IDENTIFIER, lexeme, start, end);
}
