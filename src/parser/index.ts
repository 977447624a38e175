/**
 * treelox Parser
 * Main entry point and re-exports
 */

import type { LexerError } from '../lexer/index.js';
import { scan, tokenize } from '../lexer/index.js';
import type { ParseError } from '../error-classes.js';
import type { ProgramNode } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-expr.js';

/** Result of parsing with error recovery */
export interface ParseResult {
  /** Program built from every declaration that parsed */
  readonly ast: ProgramNode;
  /** Lexical errors first, then syntax errors in order of discovery */
  readonly errors: (LexerError | ParseError)[];
  readonly success: boolean;
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse source code into an AST.
 *
 * Throws the first LexerError or ParseError.
 *
 * @example
 * ```typescript
 * const ast = parse('print 1 + 2;');
 * ```
 */
export function parse(source: string): ProgramNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens, { recoveryMode: false });
  return parser.parse();
}

/**
 * Parse source code, collecting every lexical and syntax error.
 *
 * After a syntax error the parser skips to the next statement boundary and
 * continues, so one pass reports all errors.
 *
 * @example
 * ```typescript
 * const result = parseWithRecovery(source);
 * if (!result.success) {
 *   for (const error of result.errors) console.error(error.message);
 * }
 * ```
 */
export function parseWithRecovery(source: string): ParseResult {
  const { tokens, errors: lexErrors } = scan(source);
  const parser = new Parser(tokens, { recoveryMode: true });
  const ast = parser.parse();
  const errors = [...lexErrors, ...parser.errors];
  return { ast, errors, success: errors.length === 0 };
}

export { Parser } from './parser.js';
export { MAX_ARITY } from './parser-functions.js';
export { MAX_NESTING } from './state.js';
