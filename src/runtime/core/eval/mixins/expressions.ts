/**
 * ExpressionsMixin: Operators
 *
 * Unary, binary and logical operators. Arithmetic and comparison take
 * numbers only; `+` also concatenates two strings. There is no implicit
 * conversion between kinds.
 *
 * @internal
 */

import { RuntimeError } from '../../../../error-classes.js';
import type {
  BinaryNode,
  GroupingNode,
  LiteralNode,
  LogicalNode,
  UnaryNode,
} from '../../../../types.js';
import { isEqual, isTruthy, type LoxValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function ExpressionsMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class ExpressionsEvaluator extends Base {
    evaluateLiteral(node: LiteralNode): LoxValue {
      return node.value;
    }

    evaluateGrouping(node: GroupingNode): LoxValue {
      return this.evaluate(node.expression);
    }

    evaluateUnary(node: UnaryNode): LoxValue {
      const operand = this.evaluate(node.operand);

      switch (node.op) {
        case '!':
          return !isTruthy(operand);
        case '-':
          if (typeof operand !== 'number') {
            throw RuntimeError.fromNode('LOX-R003', node);
          }
          return -operand;
      }
    }

    evaluateBinary(node: BinaryNode): LoxValue {
      const left = this.evaluate(node.left);
      const right = this.evaluate(node.right);

      switch (node.op) {
        case '==':
          return isEqual(left, right);
        case '!=':
          return !isEqual(left, right);
        case '+':
          if (typeof left === 'number' && typeof right === 'number') {
            return left + right;
          }
          if (typeof left === 'string' && typeof right === 'string') {
            return left + right;
          }
          throw RuntimeError.fromNode('LOX-R005', node);
        case '-': {
          const [a, b] = this.numberOperands(node, left, right);
          return a - b;
        }
        case '*': {
          const [a, b] = this.numberOperands(node, left, right);
          return a * b;
        }
        case '/': {
          // IEEE division: x / 0 is Infinity or NaN, not an error
          const [a, b] = this.numberOperands(node, left, right);
          return a / b;
        }
        case '<': {
          const [a, b] = this.numberOperands(node, left, right);
          return a < b;
        }
        case '<=': {
          const [a, b] = this.numberOperands(node, left, right);
          return a <= b;
        }
        case '>': {
          const [a, b] = this.numberOperands(node, left, right);
          return a > b;
        }
        case '>=': {
          const [a, b] = this.numberOperands(node, left, right);
          return a >= b;
        }
      }
    }

    numberOperands(
      node: BinaryNode,
      left: LoxValue,
      right: LoxValue
    ): [number, number] {
      if (typeof left !== 'number' || typeof right !== 'number') {
        throw RuntimeError.fromNode('LOX-R004', node);
      }
      return [left, right];
    }

    /** Short-circuits; the result is the operand that decided it */
    evaluateLogical(node: LogicalNode): LoxValue {
      const left = this.evaluate(node.left);

      if (node.op === 'or') {
        if (isTruthy(left)) return left;
      } else if (!isTruthy(left)) {
        return left;
      }

      return this.evaluate(node.right);
    }
  };
}
