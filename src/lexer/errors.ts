/**
 * Lexer Errors
 */

import { LoxError } from '../error-classes.js';
import type { SourceLocation } from '../types.js';

export class LexerError extends LoxError {
  // Override to make location required (lexer errors always have location)
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    super(errorId, 'lexer', context, location);
    this.name = 'LexerError';
    this.location = location;
  }
}
