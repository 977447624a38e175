/**
 * VariablesMixin: Variable Declaration, Lookup and Assignment
 *
 * Locals are read at the scope depth the resolver recorded for the node;
 * names the resolver left unrecorded are globals.
 *
 * @internal
 */

import type {
  AssignNode,
  ResolvableNode,
  VariableNode,
  VarStmtNode,
} from '../../../../types.js';
import { NORMAL, type ExecOutcome } from '../../signals.js';
import type { LoxValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function VariablesMixin<TBase extends EvaluatorConstructor>(Base: TBase) {
  return class VariablesEvaluator extends Base {
    lookUpVariable(name: string, node: ResolvableNode): LoxValue {
      const depth = this.ctx.locals.get(node);
      if (depth === undefined) {
        return this.ctx.globals.get(name, this.getNodeLocation(node));
      }
      return this.ctx.environment.getAt(depth, name);
    }

    evaluateVariable(node: VariableNode): LoxValue {
      return this.lookUpVariable(node.name, node);
    }

    /** Assignment is an expression; its value is the assigned value */
    evaluateAssign(node: AssignNode): LoxValue {
      const value = this.evaluate(node.value);
      const depth = this.ctx.locals.get(node);
      if (depth === undefined) {
        this.ctx.globals.assign(node.name, value, this.getNodeLocation(node));
      } else {
        this.ctx.environment.assignAt(depth, node.name, value);
      }
      return value;
    }

    executeVar(node: VarStmtNode): ExecOutcome {
      const value = node.initializer ? this.evaluate(node.initializer) : null;
      this.ctx.environment.define(node.name, value);
      return NORMAL;
    }
  };
}
