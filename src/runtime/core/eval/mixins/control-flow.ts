/**
 * ControlFlowMixin: Statements, Blocks, Conditionals and Loops
 *
 * Every statement returns an ExecOutcome. Sequences stop at the first
 * outcome that is not normal; loops consume break and continue.
 *
 * @internal
 */

import type {
  BlockNode,
  ExpressionStmtNode,
  IfStmtNode,
  PrintStmtNode,
  ReturnStmtNode,
  StmtNode,
  WhileStmtNode,
} from '../../../../types.js';
import { Environment } from '../../environment.js';
import {
  BREAK,
  CONTINUE,
  NORMAL,
  returnOutcome,
  type ExecOutcome,
} from '../../signals.js';
import { formatValue, isTruthy } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function ControlFlowMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class ControlFlowEvaluator extends Base {
    override executeStatements(statements: readonly StmtNode[]): ExecOutcome {
      for (const stmt of statements) {
        const outcome = this.execute(stmt);
        if (outcome.kind !== 'normal') return outcome;
      }
      return NORMAL;
    }

    executeBlock(node: BlockNode): ExecOutcome {
      return this.executeIn(
        node.statements,
        new Environment(this.ctx.environment)
      );
    }

    executeExpressionStmt(node: ExpressionStmtNode): ExecOutcome {
      this.evaluate(node.expression);
      return NORMAL;
    }

    executePrint(node: PrintStmtNode): ExecOutcome {
      const value = this.evaluate(node.expression);
      this.ctx.callbacks.onPrint(formatValue(value));
      return NORMAL;
    }

    executeIf(node: IfStmtNode): ExecOutcome {
      if (isTruthy(this.evaluate(node.condition))) {
        return this.execute(node.thenBranch);
      }
      if (node.elseBranch) {
        return this.execute(node.elseBranch);
      }
      return NORMAL;
    }

    /**
     * The increment of a desugared `for` runs after the body completes
     * normally or with `continue`.
     */
    executeWhile(node: WhileStmtNode): ExecOutcome {
      while (isTruthy(this.evaluate(node.condition))) {
        const outcome = this.execute(node.body);
        if (outcome.kind === 'break') break;
        if (outcome.kind === 'return') return outcome;
        if (node.increment) {
          this.evaluate(node.increment);
        }
      }
      return NORMAL;
    }

    executeReturn(node: ReturnStmtNode): ExecOutcome {
      return returnOutcome(node.value ? this.evaluate(node.value) : null);
    }

    executeBreak(): ExecOutcome {
      return BREAK;
    }

    executeContinue(): ExecOutcome {
      return CONTINUE;
    }
  };
}
