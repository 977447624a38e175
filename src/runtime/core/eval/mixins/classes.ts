/**
 * ClassesMixin: Class Declarations, Properties, this and super
 *
 * Property reads check the instance's own fields first, then methods along
 * the class chain; methods come back bound to the instance they were read
 * from. Writes always go to the instance's own fields.
 *
 * @internal
 */

import { InternalError, RuntimeError } from '../../../../error-classes.js';
import type {
  ClassStmtNode,
  GetNode,
  ResolvableNode,
  SetNode,
  SuperNode,
  ThisNode,
  VariableNode,
} from '../../../../types.js';
import {
  bindMethod,
  findMethod,
  isClass,
  type LoxClass,
  type LoxFunction,
} from '../../callable.js';
import { Environment } from '../../environment.js';
import { NORMAL, type ExecOutcome } from '../../signals.js';
import { isInstance, type LoxValue } from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

/** Provided by VariablesMixin */
export interface VariableAccess {
  lookUpVariable(name: string, node: ResolvableNode): LoxValue;
  evaluateVariable(node: VariableNode): LoxValue;
}

export function ClassesMixin<
  TBase extends EvaluatorConstructor<EvaluatorBase & VariableAccess>,
>(Base: TBase) {
  return class ClassesEvaluator extends Base {
    executeClass(node: ClassStmtNode): ExecOutcome {
      let superclass: LoxClass | null = null;
      if (node.superclass) {
        const value = this.evaluateVariable(node.superclass);
        if (!isClass(value)) {
          throw RuntimeError.fromNode('LOX-R010', node.superclass);
        }
        superclass = value;
      }

      this.ctx.environment.define(node.name, null);

      // Methods of a subclass close over a scope that binds `super`
      let closure = this.ctx.environment;
      if (superclass) {
        closure = new Environment(closure);
        closure.define('super', superclass);
      }

      const methods = new Map<string, LoxFunction>();
      for (const method of node.methods) {
        methods.set(method.name, {
          __type: 'callable',
          kind: 'function',
          name: method.name,
          declaration: method,
          closure,
          isInitializer: method.name === 'init',
        });
      }

      const klass: LoxClass = {
        __type: 'callable',
        kind: 'class',
        name: node.name,
        superclass,
        methods,
      };
      this.ctx.environment.define(node.name, klass);
      return NORMAL;
    }

    evaluateGet(node: GetNode): LoxValue {
      const object = this.evaluate(node.object);
      if (!isInstance(object)) {
        throw RuntimeError.fromNode('LOX-R008', node);
      }

      if (object.fields.has(node.name)) {
        return object.fields.get(node.name) ?? null;
      }

      const method = findMethod(object.klass, node.name);
      if (method) return bindMethod(method, object);

      throw RuntimeError.fromNode('LOX-R002', node, { name: node.name });
    }

    evaluateSet(node: SetNode): LoxValue {
      const object = this.evaluate(node.object);
      if (!isInstance(object)) {
        throw RuntimeError.fromNode('LOX-R009', node);
      }

      const value = this.evaluate(node.value);
      object.fields.set(node.name, value);
      return value;
    }

    evaluateThis(node: ThisNode): LoxValue {
      return this.lookUpVariable('this', node);
    }

    /**
     * `super` sits one scope above the method's `this` scope, so the
     * receiver is read one level closer than the superclass.
     */
    evaluateSuper(node: SuperNode): LoxValue {
      const depth = this.ctx.locals.get(node);
      if (depth === undefined || depth < 1) {
        throw new InternalError(
          "unresolved 'super' expression",
          this.getNodeLocation(node)
        );
      }

      const superclass = this.ctx.environment.getAt(depth, 'super');
      const receiver = this.ctx.environment.getAt(depth - 1, 'this');
      if (!isClass(superclass) || !isInstance(receiver)) {
        throw new InternalError(
          "'super' scope does not hold a class and instance",
          this.getNodeLocation(node)
        );
      }

      const method = findMethod(superclass, node.method);
      if (!method) {
        throw RuntimeError.fromNode('LOX-R002', node, { name: node.method });
      }
      return bindMethod(method, receiver);
    }
  };
}
