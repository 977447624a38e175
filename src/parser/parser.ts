/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ParseError } from '../error-classes.js';
import type { ProgramNode, Token } from '../types.js';
import {
  type ParserState,
  createParserState,
  current,
  errorAt,
  MAX_NESTING,
} from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, declarations, simple statements, recovery
 * - parser-control.ts: Blocks, conditionals, loops, jumps
 * - parser-functions.ts: Function and class declarations, calls, properties
 * - parser-expr.ts: Assignment and the operator precedence chain
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens, { recoveryMode: false });
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens, position, and error collection */
  state: ParserState;

  constructor(tokens: Token[], options?: { recoveryMode?: boolean }) {
    this.state = createParserState(tokens, {
      recoveryMode: options?.recoveryMode ?? false,
    });
  }

  /**
   * Parse tokens into a complete AST.
   */
  parse(): ProgramNode {
    return this.parseProgram();
  }

  /**
   * Get collected errors (for recovery mode).
   */
  get errors(): ParseError[] {
    return this.state.errors;
  }

  /**
   * Report an error that does not need resynchronization.
   * Recovery mode records it and parsing carries on; otherwise it is thrown.
   */
  report(error: ParseError): void {
    if (!this.state.recoveryMode) throw error;
    this.state.errors.push(error);
  }

  /**
   * Parse `body` one nesting level deeper.
   * Throws "Too much nesting." once MAX_NESTING levels are open.
   */
  nested<T>(body: () => T): T {
    if (this.state.depth >= MAX_NESTING) {
      throw errorAt(current(this.state), 'LOX-P005');
    }
    this.state.depth++;
    try {
      return body();
    } finally {
      this.state.depth--;
    }
  }
}
