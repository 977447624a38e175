/**
 * treelox Module
 * Exports lexer, parser, resolver, runtime, and AST types
 */

export { LexerError, scan, tokenize, type ScanResult } from './lexer/index.js';
export {
  MAX_ARITY,
  MAX_NESTING,
  parse,
  parseWithRecovery,
  type ParseResult,
} from './parser/index.js';
export {
  resolve,
  Resolver,
  type Locals,
  type ResolveResult,
} from './resolver/index.js';
export * from './runtime/index.js';
export * from './types.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  CATEGORY_PREFIXES,
  createErrorRegistry,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  InternalError,
  LoxError,
  type LoxErrorData,
  ParseError,
  ResolveError,
  RuntimeError,
} from './error-classes.js';
