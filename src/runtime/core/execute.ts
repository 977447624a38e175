/**
 * Script Execution
 *
 * Public API for running source text: parse, resolve, then execute, with
 * each failure class reported as a distinct RunResult status.
 */

import {
  InternalError,
  isHostStackOverflow,
  RuntimeError,
} from '../../error-classes.js';
import { parseWithRecovery } from '../../parser/index.js';
import { resolve } from '../../resolver/index.js';
import type { ProgramNode } from '../../types.js';
import { createRuntimeContext } from './context.js';
import { getEvaluator } from './eval/evaluator.js';
import type { RunResult, RuntimeContext, RuntimeOptions } from './types.js';
import { formatValue } from './values.js';

/** Process exit codes used by the command-line driver */
export const EXIT_CODES = {
  ok: 0,
  usage: 64,
  dataError: 65,
  noInput: 66,
  software: 70,
  config: 78,
} as const;

/**
 * Execute a parsed and resolved program.
 *
 * @param program The parsed AST (from parse())
 * @param context The runtime context whose `locals` holds the program's resolution
 * @throws RuntimeError on the first runtime failure
 */
export function execute(program: ProgramNode, context: RuntimeContext): void {
  const outcome = getEvaluator(context).executeStatements(program.statements);
  if (outcome.kind !== 'normal') {
    throw new InternalError(`'${outcome.kind}' escaped to top level`);
  }
}

function runInContext(
  source: string,
  context: RuntimeContext,
  echo: boolean
): RunResult {
  const parsed = parseWithRecovery(source);
  if (!parsed.success) {
    return { status: 'syntax-error', errors: parsed.errors };
  }

  const resolved = resolve(parsed.ast, context.locals);
  if (!resolved.success) {
    return { status: 'static-error', errors: resolved.errors };
  }

  try {
    const [only, ...rest] = parsed.ast.statements;
    if (echo && only?.type === 'ExpressionStmt' && rest.length === 0) {
      const value = getEvaluator(context).evaluate(only.expression);
      context.callbacks.onPrint(formatValue(value));
    } else {
      execute(parsed.ast, context);
    }
    return { status: 'ok' };
  } catch (err) {
    if (err instanceof RuntimeError) {
      return { status: 'runtime-error', error: err };
    }
    throw err;
  }
}

/**
 * Run one input, reporting host stack exhaustion outside a call as
 * "Stack overflow."
 */
function runGuarded(
  source: string,
  context: RuntimeContext,
  echo: boolean
): RunResult {
  try {
    return runInContext(source, context, echo);
  } catch (err) {
    if (isHostStackOverflow(err)) {
      return { status: 'runtime-error', error: new RuntimeError('LOX-R011') };
    }
    throw err;
  }
}

/**
 * Run a complete program with a fresh interpreter.
 *
 * @example
 * ```typescript
 * const result = run('print 1 + 2;', {
 *   callbacks: { onPrint: (text) => lines.push(text) },
 * });
 * ```
 */
export function run(source: string, options: RuntimeOptions = {}): RunResult {
  return runGuarded(source, createRuntimeContext(options), false);
}

export interface SessionOptions extends RuntimeOptions {
  /** Print the value of an input that is a single expression statement */
  echo?: boolean;
}

/** Interpreter that keeps globals and resolution between inputs */
export interface Session {
  readonly context: RuntimeContext;
  /** Run one top-level input unit */
  run(source: string): RunResult;
}

/**
 * Create a persistent interpreter session for interactive use.
 * Definitions from earlier inputs stay visible to later ones, including
 * after an input fails.
 */
export function createSession(options: SessionOptions = {}): Session {
  const context = createRuntimeContext(options);
  const echo = options.echo ?? false;
  return {
    context,
    run: (source) => runGuarded(source, context, echo),
  };
}

/** Exit code for a run: 0 success, 65 syntax or static errors, 70 runtime error */
export function exitCodeFor(result: RunResult): number {
  switch (result.status) {
    case 'ok':
      return EXIT_CODES.ok;
    case 'syntax-error':
    case 'static-error':
      return EXIT_CODES.dataError;
    case 'runtime-error':
      return EXIT_CODES.software;
  }
}
