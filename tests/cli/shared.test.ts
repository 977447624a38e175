/**
 * treelox CLI Tests: Shared Formatting
 */

import { describe, expect, it } from 'vitest';

import {
  formatCliError,
  formatError,
  formatRunResult,
  readVersion,
} from '../../src/cli-shared.js';
import { RuntimeError } from '../../src/error-classes.js';
import { scan } from '../../src/lexer/index.js';
import { parse, parseWithRecovery } from '../../src/parser/index.js';
import { resolve } from '../../src/resolver/index.js';

function firstError<T>(errors: readonly T[]): T {
  const [error] = errors;
  if (error === undefined) throw new Error('expected an error');
  return error;
}

describe('treelox CLI: formatting', () => {
  describe('formatError', () => {
    it('names the offending token of a syntax error', () => {
      const error = firstError(parseWithRecovery('print 1\nprint 2;').errors);
      expect(formatError(error)).toBe(
        "[line 2] Error at 'print': Expect ';' after value."
      );
    });

    it('says at end for errors at end of input', () => {
      const error = firstError(parseWithRecovery('print 1').errors);
      expect(formatError(error)).toBe(
        "[line 1] Error at end: Expect ';' after value."
      );
    });

    it('formats lexical errors without a token', () => {
      const error = firstError(scan('\n@').errors);
      expect(formatError(error)).toBe(
        "[line 2] Error: Unexpected character '@'."
      );
    });

    it('formats static errors without a token', () => {
      const error = firstError(resolve(parse('return 1;')).errors);
      expect(formatError(error)).toBe(
        "[line 1] Error: Can't return from top-level code."
      );
    });

    it('puts the line of a runtime error on its own line', () => {
      const located = new RuntimeError(
        'LOX-R001',
        { name: 'x' },
        { line: 3, column: 1, offset: 20 }
      );
      expect(formatError(located)).toBe("Undefined variable 'x'.\n[line 3]");
      expect(formatError(new RuntimeError('LOX-R001', { name: 'x' }))).toBe(
        "Undefined variable 'x'."
      );
    });
  });

  describe('formatRunResult', () => {
    it('is empty for a successful run', () => {
      expect(formatRunResult({ status: 'ok' })).toEqual([]);
    });

    it('formats every collected error', () => {
      const { errors } = parseWithRecovery('print ;\nprint ;');
      expect(formatRunResult({ status: 'syntax-error', errors })).toEqual([
        "[line 1] Error at ';': Expect expression.",
        "[line 2] Error at ';': Expect expression.",
      ]);
    });
  });

  describe('formatCliError', () => {
    it('reports missing files by path', () => {
      const err = Object.assign(new Error('ENOENT: no such file'), {
        code: 'ENOENT',
        path: 'missing.lox',
      });
      expect(formatCliError(err)).toBe('File not found: missing.lox');
    });

    it('falls back to the error message', () => {
      expect(formatCliError(new Error('plain failure'))).toBe('plain failure');
      expect(formatCliError('text')).toBe('text');
    });
  });

  it('reads the package version', () => {
    expect(readVersion()).toBe('0.1.0');
  });
});
