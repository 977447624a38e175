/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 * Public API for host applications.
 */

import { BUILTIN_FUNCTIONS } from '../ext/builtins.js';
import type { Locals } from '../../resolver/index.js';
import { callable, type HostFunctionDefinition } from './callable.js';
import { Environment } from './environment.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';

export const DEFAULT_MAX_CALL_DEPTH = 256;

const defaultCallbacks: RuntimeCallbacks = {
  onPrint: (text) => {
    console.log(text);
  },
  onExit: (code) => {
    process.exit(code);
  },
};

function defineFunction(
  globals: Environment,
  name: string,
  definition: HostFunctionDefinition
): void {
  if (!Number.isInteger(definition.arity) || definition.arity < 0) {
    throw new Error(
      `Function '${name}' must declare a non-negative integer arity`
    );
  }
  globals.define(
    name,
    callable(name, definition.arity, definition.fn, definition.description)
  );
}

/**
 * Create a runtime context for script execution.
 * This is the main entry point for configuring the runtime.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {},
  locals: Locals = new WeakMap()
): RuntimeContext {
  const maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  if (!Number.isInteger(maxCallDepth) || maxCallDepth < 1) {
    throw new Error('maxCallDepth must be a positive integer');
  }

  const globals = new Environment();

  if (options.natives !== false) {
    for (const [name, definition] of Object.entries(BUILTIN_FUNCTIONS)) {
      defineFunction(globals, name, definition);
    }
  }

  // Host functions can override built-ins
  if (options.functions) {
    for (const [name, definition] of Object.entries(options.functions)) {
      defineFunction(globals, name, definition);
    }
  }

  return {
    globals,
    environment: globals,
    locals,
    callbacks: {
      onPrint: options.callbacks?.onPrint ?? defaultCallbacks.onPrint,
      onExit: options.callbacks?.onExit ?? defaultCallbacks.onExit,
    },
    maxCallDepth,
    callDepth: 0,
  };
}
