/**
 * Built-in Functions
 *
 * Natives defined in the global scope of every runtime context unless
 * disabled with `natives: false`. Host applications add their own via
 * RuntimeOptions.functions.
 *
 * @internal - Not part of public API
 */

import { RuntimeError } from '../../error-classes.js';
import type { SourceLocation } from '../../types.js';
import type { HostFunctionDefinition } from '../core/callable.js';
import {
  describeCallable,
  isCallable,
  NO_DOCUMENTATION,
} from '../core/callable.js';
import { typeName, type LoxValue } from '../core/values.js';

function isInteger(value: LoxValue): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function argumentError(
  name: string,
  reason: string,
  location?: SourceLocation
): RuntimeError {
  return new RuntimeError('LOX-R012', { name, reason }, location);
}

/** Round half away from zero */
function roundAway(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

// ============================================================
// BUILT-IN FUNCTIONS
// ============================================================

export const BUILTIN_FUNCTIONS: Record<string, HostFunctionDefinition> = {
  clock: {
    arity: 0,
    description: 'Returns the amount of time elapsed since the Unix epoch.',
    fn: () => Date.now() / 1000,
  },

  type: {
    arity: 1,
    description: 'Returns the type name of the given value.',
    fn: ([value = null]) => typeName(value),
  },

  round: {
    arity: 2,
    description: 'Rounds a number to a given precision in decimal digits.',
    fn: ([value = null, digits = null], _ctx, location) => {
      if (typeof value !== 'number' || !isInteger(digits)) {
        throw argumentError(
          'round',
          'expected a number and an integer precision',
          location
        );
      }
      if (digits < 0) {
        throw argumentError(
          'round',
          'precision must be a non-negative integer',
          location
        );
      }
      const scale = 10 ** digits;
      return roundAway(value * scale) / scale;
    },
  },

  rand: {
    arity: 0,
    description: 'Returns a number between 0 (inclusive) and 1 (exclusive).',
    fn: () => Math.random(),
  },

  randint: {
    arity: 2,
    description: 'Returns an integer between the two provided bounds, inclusive.',
    fn: ([low = null, high = null], _ctx, location) => {
      if (!isInteger(low) || !isInteger(high)) {
        throw argumentError('randint', 'expected two integers', location);
      }
      if (low > high) {
        throw argumentError(
          'randint',
          'lower bound must not exceed upper bound',
          location
        );
      }
      return low + Math.floor(Math.random() * (high - low + 1));
    },
  },

  help: {
    arity: 1,
    description: 'Prints the documentation of the given value.',
    fn: ([value = null], ctx) => {
      if (isCallable(value)) {
        ctx.callbacks.onPrint(`${value.name}\n\t${describeCallable(value)}`);
      } else {
        ctx.callbacks.onPrint(NO_DOCUMENTATION);
      }
      return null;
    },
  },

  exit: {
    arity: 1,
    description: 'Terminates the current process with the specified exit code.',
    fn: ([code = null], ctx, location) => {
      if (!isInteger(code)) {
        throw argumentError('exit', 'expected an integer exit code', location);
      }
      ctx.callbacks.onExit(code);
      return null;
    },
  },

  quit: {
    arity: 0,
    description: 'Terminates the current process with an exit code of 0.',
    fn: (_args, ctx) => {
      ctx.callbacks.onExit(0);
      return null;
    },
  },

  dir: {
    arity: 0,
    description: 'Prints every name defined in the global scope.',
    fn: (_args, ctx) => {
      for (const name of ctx.globals.names().sort()) {
        ctx.callbacks.onPrint(name);
      }
      return null;
    },
  },
};
