/**
 * Environment
 *
 * Lexical scope chain. Each function call and each block gets one
 * environment parented to the scope it was created in; closures share the
 * environment they were declared in rather than copying it.
 */

import { InternalError, RuntimeError } from '../../error-classes.js';
import type { SourceLocation } from '../../types.js';
import type { LoxValue } from './values.js';

export class Environment {
  readonly enclosing: Environment | null;
  private readonly values = new Map<string, LoxValue>();

  constructor(enclosing: Environment | null = null) {
    this.enclosing = enclosing;
  }

  /** Bind `name` in this scope, replacing any existing binding */
  define(name: string, value: LoxValue): void {
    this.values.set(name, value);
  }

  /** True when `name` is bound in this scope (enclosing scopes not searched) */
  has(name: string): boolean {
    return this.values.has(name);
  }

  /** Names bound in this scope */
  names(): string[] {
    return [...this.values.keys()];
  }

  /** Read `name` from the nearest scope that binds it */
  get(name: string, location?: SourceLocation): LoxValue {
    for (let env: Environment | null = this; env; env = env.enclosing) {
      if (env.values.has(name)) {
        return env.values.get(name) ?? null;
      }
    }
    throw new RuntimeError('LOX-R001', { name }, location);
  }

  /** Overwrite `name` in the nearest scope that binds it */
  assign(name: string, value: LoxValue, location?: SourceLocation): void {
    for (let env: Environment | null = this; env; env = env.enclosing) {
      if (env.values.has(name)) {
        env.values.set(name, value);
        return;
      }
    }
    throw new RuntimeError('LOX-R001', { name }, location);
  }

  /** The environment `depth` links up the chain */
  ancestor(depth: number): Environment {
    let env: Environment = this;
    for (let i = 0; i < depth; i++) {
      if (!env.enclosing) {
        throw new InternalError(`scope depth ${depth} exceeds environment chain`);
      }
      env = env.enclosing;
    }
    return env;
  }

  /** Read a resolved local exactly `depth` scopes up */
  getAt(depth: number, name: string): LoxValue {
    const env = this.ancestor(depth);
    if (!env.values.has(name)) {
      throw new InternalError(`'${name}' not found at scope depth ${depth}`);
    }
    return env.values.get(name) ?? null;
  }

  assignAt(depth: number, name: string, value: LoxValue): void {
    const env = this.ancestor(depth);
    if (!env.values.has(name)) {
      throw new InternalError(`'${name}' not found at scope depth ${depth}`);
    }
    env.values.set(name, value);
  }
}
