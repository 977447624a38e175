/**
 * treelox Resolver
 * Static scope resolution entry point
 */

import type { ResolveError } from '../error-classes.js';
import type { ProgramNode } from '../types.js';
import { type Locals, Resolver } from './resolver.js';

export interface ResolveResult {
  readonly locals: Locals;
  /** Static errors in order of discovery */
  readonly errors: ResolveError[];
  readonly success: boolean;
}

/**
 * Resolve every local variable reference in `program`.
 *
 * Pass an existing `locals` table to extend it; an interactive session
 * keeps one table for all of its inputs.
 */
export function resolve(
  program: ProgramNode,
  locals: Locals = new WeakMap()
): ResolveResult {
  const resolver = new Resolver(locals);
  resolver.resolveProgram(program);
  return {
    locals,
    errors: resolver.errors,
    success: resolver.errors.length === 0,
  };
}

export { Resolver, type Locals } from './resolver.js';
