/**
 * Callable Types
 *
 * Unified representation for all callable values:
 * - LoxFunction: functions and methods declared in source
 * - LoxClass: calling a class constructs an instance
 * - BoundMethod: a method paired with the instance it was read from
 * - NativeFunction: built-ins and host application functions
 *
 * Public API for host applications.
 */

import type { SourceLocation, FunctionStmtNode } from '../../types.js';
import type { Environment } from './environment.js';
import type { RuntimeContext } from './types.js';
import type { LoxInstance, LoxValue } from './values.js';

/**
 * Native function signature.
 * Throw a RuntimeError to reject arguments; `location` is the call site.
 */
export type NativeFn = (
  args: LoxValue[],
  ctx: RuntimeContext,
  location?: SourceLocation
) => LoxValue;

interface CallableBase {
  readonly __type: 'callable';
  readonly name: string;
}

/** Function or method declared in source, with the environment it closes over */
export interface LoxFunction extends CallableBase {
  readonly kind: 'function';
  readonly declaration: FunctionStmtNode;
  readonly closure: Environment;
  /** True for a class's `init` method: calls always yield the instance */
  readonly isInitializer: boolean;
}

export interface LoxClass extends CallableBase {
  readonly kind: 'class';
  readonly superclass: LoxClass | null;
  readonly methods: ReadonlyMap<string, LoxFunction>;
}

export interface BoundMethod extends CallableBase {
  readonly kind: 'bound';
  readonly method: LoxFunction;
  readonly receiver: LoxInstance;
}

export interface NativeFunction extends CallableBase {
  readonly kind: 'native';
  readonly arity: number;
  /** Shown by `help` */
  readonly description: string;
  readonly fn: NativeFn;
}

export type LoxCallable = LoxFunction | LoxClass | BoundMethod | NativeFunction;

/** Host-provided function registration */
export interface HostFunctionDefinition {
  /** Exact number of arguments the function takes */
  readonly arity: number;
  readonly fn: NativeFn;
  readonly description?: string;
}

export const NO_DOCUMENTATION = 'No documentation available.';

/**
 * Create a native callable.
 *
 * @example
 * ```typescript
 * const double = callable('double', 1, ([x]) => (typeof x === 'number' ? x * 2 : null));
 * ```
 */
export function callable(
  name: string,
  arity: number,
  fn: NativeFn,
  description: string = NO_DOCUMENTATION
): NativeFunction {
  return { __type: 'callable', kind: 'native', name, arity, fn, description };
}

export function isCallable(value: LoxValue): value is LoxCallable {
  return (
    typeof value === 'object' && value !== null && value.__type === 'callable'
  );
}

export function isClass(value: LoxValue): value is LoxClass {
  return isCallable(value) && value.kind === 'class';
}

/** Look up a method on a class or, failing that, along its superclass chain */
export function findMethod(
  klass: LoxClass,
  name: string
): LoxFunction | undefined {
  for (let k: LoxClass | null = klass; k !== null; k = k.superclass) {
    const method = k.methods.get(name);
    if (method) return method;
  }
  return undefined;
}

export function bindMethod(
  method: LoxFunction,
  receiver: LoxInstance
): BoundMethod {
  return {
    __type: 'callable',
    kind: 'bound',
    name: method.name,
    method,
    receiver,
  };
}

/** Number of arguments a call must supply */
export function arityOf(fn: LoxCallable): number {
  switch (fn.kind) {
    case 'function':
      return fn.declaration.params.length;
    case 'bound':
      return fn.method.declaration.params.length;
    case 'native':
      return fn.arity;
    case 'class': {
      const init = findMethod(fn, 'init');
      return init ? init.declaration.params.length : 0;
    }
  }
}

/** Documentation text for `help` */
export function describeCallable(fn: LoxCallable): string {
  return fn.kind === 'native' ? fn.description : NO_DOCUMENTATION;
}
