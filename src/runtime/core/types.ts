/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { LexerError } from '../../lexer/index.js';
import type {
  ParseError,
  ResolveError,
  RuntimeError,
} from '../../error-classes.js';
import type { Locals } from '../../resolver/index.js';
import type { HostFunctionDefinition } from './callable.js';
import type { Environment } from './environment.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Receives the display text of each `print` (and of `help`/`dir` output) */
  onPrint: (text: string) => void;
  /** Called by `exit` and `quit`. Default: process.exit */
  onExit: (code: number) => void;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** I/O callbacks; unspecified ones default to the console */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Host functions added to the global scope, overriding built-ins of the same name */
  functions?: Record<string, HostFunctionDefinition>;
  /** Define the built-in natives (clock, type, ...). Default: true */
  natives?: boolean;
  /** Maximum nesting of calls before "Stack overflow." Default: 256 */
  maxCallDepth?: number;
}

/** Runtime context for one script run or interactive session */
export interface RuntimeContext {
  readonly globals: Environment;
  /** Environment of the code currently executing */
  environment: Environment;
  /** Scope depths from the resolver, shared by every input of a session */
  readonly locals: Locals;
  readonly callbacks: RuntimeCallbacks;
  readonly maxCallDepth: number;
  /** Calls currently in progress */
  callDepth: number;
}

/** Outcome of running one source text */
export type RunResult =
  | { readonly status: 'ok' }
  | {
      readonly status: 'syntax-error';
      readonly errors: (LexerError | ParseError)[];
    }
  | { readonly status: 'static-error'; readonly errors: ResolveError[] }
  | { readonly status: 'runtime-error'; readonly error: RuntimeError };
