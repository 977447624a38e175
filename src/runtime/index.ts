/**
 * treelox Runtime
 *
 * Public API for executing programs.
 *
 * Module Structure:
 * - core/: Essential execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, RunResult)
 *   - callable.ts: Callable types and type guards
 *   - values.ts: LoxValue, truthiness, equality, display
 *   - environment.ts: Lexical scope chain
 *   - signals.ts: Statement outcomes (normal, break, continue, return)
 *   - context.ts: Runtime context factory
 *   - execute.ts: Program execution (run, createSession, execute)
 *   - eval/: Mixin-composed evaluator (internal)
 * - ext/: Self-contained extensions
 *   - builtins.ts: Built-in native functions
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  RunResult,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './core/types.js';

// ============================================================
// CALLABLE TYPES AND GUARDS
// ============================================================

export type {
  BoundMethod,
  HostFunctionDefinition,
  LoxCallable,
  LoxClass,
  LoxFunction,
  NativeFn,
  NativeFunction,
} from './core/callable.js';

export {
  arityOf,
  callable,
  findMethod,
  isCallable,
  isClass,
} from './core/callable.js';

// ============================================================
// VALUE TYPES AND UTILITIES
// ============================================================

export type { LoxInstance, LoxTypeName, LoxValue } from './core/values.js';

export {
  formatValue,
  isEqual,
  isInstance,
  isTruthy,
  typeName,
} from './core/values.js';

export { Environment } from './core/environment.js';

// ============================================================
// CONTROL FLOW OUTCOMES
// ============================================================

export type { ExecOutcome } from './core/signals.js';

// ============================================================
// CONTEXT AND EXECUTION
// ============================================================

export {
  createRuntimeContext,
  DEFAULT_MAX_CALL_DEPTH,
} from './core/context.js';

export {
  createSession,
  execute,
  EXIT_CODES,
  exitCodeFor,
  run,
  type Session,
  type SessionOptions,
} from './core/execute.js';

export { BUILTIN_FUNCTIONS } from './ext/builtins.js';
