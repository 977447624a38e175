/**
 * Parser State
 * Core state management and token navigation utilities
 */

import { ParseError } from '../error-classes.js';
import type {
  SourceLocation,
  SourceSpan,
  Token,
  TokenType,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Deepest nesting of statements and expressions the parser accepts */
export const MAX_NESTING = 200;

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Recovery mode: collect errors instead of throwing */
  readonly recoveryMode: boolean;
  /** Errors collected during recovery mode parsing */
  readonly errors: ParseError[];
  /** Statements and expressions currently open */
  depth: number;
}

export interface ParserStateOptions {
  /** Record errors and resynchronize instead of throwing */
  recoveryMode?: boolean;
}

export function createParserState(
  tokens: Token[],
  options: ParserStateOptions = {}
): ParserState {
  return {
    tokens,
    pos: 0,
    recoveryMode: options.recoveryMode ?? false,
    errors: [],
    depth: 0,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** Most recently consumed token (the current one before any advance) */
export function previous(state: ParserState): Token {
  return state.tokens[state.pos - 1] ?? current(state);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Consume the current token when it has one of the given types */
export function match(state: ParserState, ...types: TokenType[]): boolean {
  if (!check(state, ...types)) return false;
  advance(state);
  return true;
}

/**
 * Consume a token of the given type or throw.
 * `expected` completes the message "Expect {expected}."
 */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string
): Token {
  if (check(state, type)) return advance(state);
  throw errorAt(current(state), 'LOX-P002', { expected });
}

// ============================================================
// ERRORS
// ============================================================

/** Build a ParseError positioned at `token` ("at end" for EOF) */
export function errorAt(
  token: Token,
  errorId: string,
  context: Record<string, unknown> = {}
): ParseError {
  const where = token.type === TOKEN_TYPES.EOF ? null : token.lexeme;
  return new ParseError(errorId, context, token.span.start, where);
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Span from `start` to the end of the last consumed token */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  return makeSpan(start, previous(state).span.end);
}
