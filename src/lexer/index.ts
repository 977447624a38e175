/**
 * treelox Lexer
 * Converts source text into tokens
 */

export { LexerError } from './errors.js';
export { scan, tokenize, nextToken, type ScanResult } from './tokenizer.js';
export { createLexerState, type LexerState } from './state.js';
