/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

/** Result of scanning a whole source text */
export interface ScanResult {
  readonly tokens: Token[];
  /** Lexical errors in source order (empty on success) */
  readonly errors: LexerError[];
}

/** Skip whitespace and // line comments */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (isWhitespace(ch)) {
      advance(state);
    } else if (peekString(state, 2) === '//') {
      while (!isAtEnd(state) && peek(state) !== '\n') {
        advance(state);
      }
    } else {
      return;
    }
  }
}

/**
 * Read the next token. Returns null when the characters consumed did not
 * produce a token (the error has been recorded in state.errors).
 */
export function nextToken(state: LexerState): Token | null {
  skipTrivia(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '"') {
    return readString(state);
  }

  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Two-character operators (lookup table)
  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  // Single-character operators (lookup table)
  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  // Unrecognized character: report, skip, keep scanning
  advance(state);
  state.errors.push(new LexerError('LOX-L001', { char: ch }, start));
  return null;
}

/**
 * Scan source text into tokens, collecting every lexical error.
 * The token list always ends with EOF.
 */
export function scan(source: string): ScanResult {
  const state = createLexerState(source);
  const tokens: Token[] = [];

  for (;;) {
    const token = nextToken(state);
    if (token === null) continue;
    tokens.push(token);
    if (token.type === TOKEN_TYPES.EOF) break;
  }

  return { tokens, errors: state.errors };
}

/**
 * Tokenize source text.
 * Throws the first LexerError when the source has lexical errors.
 */
export function tokenize(source: string): Token[] {
  const { tokens, errors } = scan(source);
  const first = errors[0];
  if (first) throw first;
  return tokens;
}
