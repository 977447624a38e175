/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides context access, call-depth accounting and the dispatch entry
 * points that every mixin relies on.
 *
 * @internal
 */

import { InternalError, RuntimeError } from '../../../error-classes.js';
import type {
  ASTNode,
  ExprNode,
  SourceLocation,
  StmtNode,
} from '../../../types.js';
import type { Environment } from '../environment.js';
import type { ExecOutcome } from '../signals.js';
import type { RuntimeContext } from '../types.js';
import type { LoxValue } from '../values.js';

/**
 * Base class for the evaluator.
 * Contains shared utilities used by all mixins.
 */
export class EvaluatorBase {
  constructor(public ctx: RuntimeContext) {}

  /**
   * Get source location from an AST node.
   * Used for error reporting with precise location information.
   */
  getNodeLocation(node?: ASTNode): SourceLocation | undefined {
    return node?.span.start;
  }

  /**
   * Run `body` one call level deeper.
   * Throws "Stack overflow." once the configured depth is exceeded.
   */
  withCallFrame<T>(node: ASTNode, body: () => T): T {
    if (this.ctx.callDepth >= this.ctx.maxCallDepth) {
      throw RuntimeError.fromNode('LOX-R011', node);
    }
    this.ctx.callDepth++;
    try {
      return body();
    } finally {
      this.ctx.callDepth--;
    }
  }

  /**
   * Execute `statements` with `environment` as the current scope,
   * restoring the previous scope afterwards.
   */
  executeIn(
    statements: readonly StmtNode[],
    environment: Environment
  ): ExecOutcome {
    const previous = this.ctx.environment;
    this.ctx.environment = environment;
    try {
      return this.executeStatements(statements);
    } finally {
      this.ctx.environment = previous;
    }
  }

  /**
   * Evaluate an expression.
   *
   * NOTE: Stub implementation - the dispatch lives in Evaluator.
   */
  evaluate(_expr: ExprNode): LoxValue {
    throw new InternalError('evaluate requires full Evaluator composition');
  }

  /**
   * Execute a statement.
   *
   * NOTE: Stub implementation - the dispatch lives in Evaluator.
   */
  execute(_stmt: StmtNode): ExecOutcome {
    throw new InternalError('execute requires full Evaluator composition');
  }

  /**
   * Execute statements in order in the current scope.
   *
   * NOTE: Stub implementation - actual implementation requires ControlFlowMixin.
   */
  executeStatements(_statements: readonly StmtNode[]): ExecOutcome {
    throw new InternalError(
      'executeStatements requires full Evaluator composition with ControlFlowMixin'
    );
  }
}
