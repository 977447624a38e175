/**
 * ClosuresMixin: Function Declarations and Calls
 *
 * A call checks the callee and its arity, then runs one call level deeper.
 * A function body executes in a fresh environment parented to the closure;
 * a bound method adds a scope binding `this` between the two.
 *
 * @internal
 */

import {
  InternalError,
  isHostStackOverflow,
  RuntimeError,
} from '../../../../error-classes.js';
import type { CallNode, FunctionStmtNode } from '../../../../types.js';
import {
  arityOf,
  findMethod,
  isCallable,
  type LoxCallable,
  type LoxClass,
  type LoxFunction,
} from '../../callable.js';
import { Environment } from '../../environment.js';
import { NORMAL, type ExecOutcome } from '../../signals.js';
import type { LoxInstance, LoxValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function ClosuresMixin<TBase extends EvaluatorConstructor>(Base: TBase) {
  return class ClosuresEvaluator extends Base {
    executeFunction(node: FunctionStmtNode): ExecOutcome {
      const fn: LoxFunction = {
        __type: 'callable',
        kind: 'function',
        name: node.name,
        declaration: node,
        closure: this.ctx.environment,
        isInitializer: false,
      };
      this.ctx.environment.define(node.name, fn);
      return NORMAL;
    }

    evaluateCall(node: CallNode): LoxValue {
      const callee = this.evaluate(node.callee);
      const args = node.args.map((arg) => this.evaluate(arg));
      return this.callValue(callee, args, node);
    }

    callValue(callee: LoxValue, args: LoxValue[], node: CallNode): LoxValue {
      if (!isCallable(callee)) {
        throw RuntimeError.fromNode('LOX-R006', node);
      }

      const expected = arityOf(callee);
      if (args.length !== expected) {
        throw RuntimeError.fromNode('LOX-R007', node, {
          expected,
          actual: args.length,
        });
      }

      try {
        return this.withCallFrame(node, () =>
          this.invokeCallable(callee, args, node)
        );
      } catch (err) {
        if (isHostStackOverflow(err)) {
          throw RuntimeError.fromNode('LOX-R011', node);
        }
        throw err;
      }
    }

    invokeCallable(
      callee: LoxCallable,
      args: LoxValue[],
      node: CallNode
    ): LoxValue {
      switch (callee.kind) {
        case 'function':
          return this.callFunction(callee, args, null);
        case 'bound':
          return this.callFunction(callee.method, args, callee.receiver);
        case 'class':
          return this.instantiate(callee, args);
        case 'native':
          return callee.fn(args, this.ctx, this.getNodeLocation(node));
      }
    }

    callFunction(
      fn: LoxFunction,
      args: LoxValue[],
      receiver: LoxInstance | null
    ): LoxValue {
      let closure = fn.closure;
      if (receiver) {
        closure = new Environment(closure);
        closure.define('this', receiver);
      }

      const environment = new Environment(closure);
      fn.declaration.params.forEach((param, i) => {
        environment.define(param.name, args[i] ?? null);
      });

      const outcome = this.executeIn(fn.declaration.body, environment);

      // An initializer always yields its instance, even after a bare return
      if (fn.isInitializer) return receiver;

      switch (outcome.kind) {
        case 'return':
          return outcome.value;
        case 'normal':
          return null;
        default:
          throw new InternalError(
            `'${outcome.kind}' escaped the body of ${fn.name}`
          );
      }
    }

    instantiate(klass: LoxClass, args: LoxValue[]): LoxInstance {
      const instance: LoxInstance = {
        __type: 'instance',
        klass,
        fields: new Map(),
      };

      const initializer = findMethod(klass, 'init');
      if (initializer) {
        this.callFunction(initializer, args, instance);
      }

      return instance;
    }
  };
}
