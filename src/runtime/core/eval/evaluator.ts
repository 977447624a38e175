/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins, plus the node
 * dispatch that ties them together.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Context access, call frames, scope switching
 * 2. VariablesMixin - Declaration, lookup, assignment
 * 3. ExpressionsMixin - Unary, binary, logical operators
 * 4. ControlFlowMixin - Blocks, conditionals, loops, jumps, print
 * 5. ClosuresMixin - Function declarations and calls
 * 6. ClassesMixin - Class declarations, properties, this, super
 *
 * The order ensures that each mixin can depend on the methods provided
 * by mixins below it in the stack.
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { VariablesMixin } from './mixins/variables.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { ClosuresMixin } from './mixins/closures.js';
import { ClassesMixin } from './mixins/classes.js';
import type { ExprNode, StmtNode } from '../../../types.js';
import type { ExecOutcome } from '../signals.js';
import type { RuntimeContext } from '../types.js';
import type { LoxValue } from '../values.js';

/**
 * Complete Evaluator class composed from all mixins.
 */
export class Evaluator extends ClassesMixin(
  ClosuresMixin(ControlFlowMixin(ExpressionsMixin(VariablesMixin(EvaluatorBase))))
) {
  override evaluate(expr: ExprNode): LoxValue {
    switch (expr.type) {
      case 'Literal':
        return this.evaluateLiteral(expr);
      case 'Grouping':
        return this.evaluateGrouping(expr);
      case 'Unary':
        return this.evaluateUnary(expr);
      case 'Binary':
        return this.evaluateBinary(expr);
      case 'Logical':
        return this.evaluateLogical(expr);
      case 'Variable':
        return this.evaluateVariable(expr);
      case 'Assign':
        return this.evaluateAssign(expr);
      case 'Call':
        return this.evaluateCall(expr);
      case 'Get':
        return this.evaluateGet(expr);
      case 'Set':
        return this.evaluateSet(expr);
      case 'This':
        return this.evaluateThis(expr);
      case 'Super':
        return this.evaluateSuper(expr);
    }
  }

  override execute(stmt: StmtNode): ExecOutcome {
    switch (stmt.type) {
      case 'ExpressionStmt':
        return this.executeExpressionStmt(stmt);
      case 'PrintStmt':
        return this.executePrint(stmt);
      case 'VarStmt':
        return this.executeVar(stmt);
      case 'Block':
        return this.executeBlock(stmt);
      case 'IfStmt':
        return this.executeIf(stmt);
      case 'WhileStmt':
        return this.executeWhile(stmt);
      case 'BreakStmt':
        return this.executeBreak();
      case 'ContinueStmt':
        return this.executeContinue();
      case 'ReturnStmt':
        return this.executeReturn(stmt);
      case 'FunctionStmt':
        return this.executeFunction(stmt);
      case 'ClassStmt':
        return this.executeClass(stmt);
    }
  }
}

/**
 * WeakMap cache for evaluator instances.
 *
 * Cache eviction happens automatically when the RuntimeContext is
 * garbage collected, since WeakMap keys don't prevent GC.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create an evaluator instance for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
