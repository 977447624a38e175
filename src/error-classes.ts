/**
 * treelox Error Classes
 * Structured error types with registry-based error ids
 */

import type { SourceLocation, SourceSpan } from './types.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LoxErrorData {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all treelox errors.
 * The message is rendered from the registry template for `errorId`.
 */
export class LoxError extends Error {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly location?: SourceLocation | undefined;
  readonly context: Record<string, unknown>;

  constructor(
    errorId: string,
    expectedCategory: ErrorCategory,
    context: Record<string, unknown> = {},
    location?: SourceLocation
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== expectedCategory) {
      throw new TypeError(
        `Expected ${expectedCategory} error ID, got: ${errorId}`
      );
    }

    super(renderMessage(definition.messageTemplate, context));
    this.name = 'LoxError';
    this.errorId = errorId;
    this.category = definition.category;
    this.location = location;
    this.context = context;
  }

  /** Source line of the error, or 0 when unknown */
  get line(): number {
    return this.location?.line ?? 0;
  }

  /** Get structured error data for custom formatting */
  toData(): LoxErrorData {
    return {
      errorId: this.errorId,
      category: this.category,
      message: this.message,
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LoxErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Parse-time errors. `where` is the offending lexeme, or null at end of input */
export class ParseError extends LoxError {
  override readonly location: SourceLocation;
  readonly where: string | null;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation,
    where: string | null
  ) {
    super(errorId, 'parse', context, location);
    this.name = 'ParseError';
    this.location = location;
    this.where = where;
  }
}

/** Static errors found by the resolver */
export class ResolveError extends LoxError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    super(errorId, 'static', context, location);
    this.name = 'ResolveError';
    this.location = location;
  }

  /** Create from an AST node */
  static fromNode(
    errorId: string,
    node: { span: SourceSpan },
    context: Record<string, unknown> = {}
  ): ResolveError {
    return new ResolveError(errorId, context, node.span.start);
  }
}

/** Runtime execution errors; the first one halts the run */
export class RuntimeError extends LoxError {
  constructor(
    errorId: string,
    context: Record<string, unknown> = {},
    location?: SourceLocation
  ) {
    super(errorId, 'runtime', context, location);
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    errorId: string,
    node?: { span: SourceSpan },
    context: Record<string, unknown> = {}
  ): RuntimeError {
    return new RuntimeError(errorId, context, node?.span.start);
  }
}

/**
 * Violated interpreter invariant (e.g. a resolver depth that does not match
 * the environment chain). Never caused by user code.
 */
export class InternalError extends LoxError {
  constructor(reason: string, location?: SourceLocation) {
    super('LOX-I001', 'internal', { reason }, location);
    this.name = 'InternalError';
  }
}

/** V8 reports native stack exhaustion as a RangeError */
export function isHostStackOverflow(err: unknown): boolean {
  return err instanceof RangeError && /call stack/i.test(err.message);
}
