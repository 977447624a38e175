/**
 * treelox Language Tests: Runtime Errors
 */

import { describe, expect, it } from 'vitest';

import { runProgram, runtimeError } from '../helpers/runtime.js';

describe('treelox Language: Runtime Errors', () => {
  it('reports undefined variables with their line', () => {
    expect(runtimeError('var a = 1;\nprint b;')).toMatchObject({
      message: "Undefined variable 'b'.",
      line: 2,
    });
    expect(runtimeError('c = 1;').message).toBe("Undefined variable 'c'.");
  });

  it('only calls functions and classes', () => {
    expect(runtimeError('"str"();').message).toBe(
      'Can only call functions and classes.'
    );
    expect(runtimeError('var x = nil;\nx();').line).toBe(2);
  });

  it('checks argument counts', () => {
    expect(runtimeError('fun f(a, b) {}\nf(1);')).toMatchObject({
      message: 'Expected 2 arguments but got 1.',
      line: 2,
    });
  });

  it('reports the line inside a function body', () => {
    const script = 'fun f() {\n  return nil + 1;\n}\nf();';
    expect(runtimeError(script)).toMatchObject({
      message: 'Operands must be two numbers or two strings.',
      line: 2,
    });
  });

  it('turns runaway recursion into a stack overflow error', () => {
    const { result } = runProgram('fun r() { r(); }\nr();', {
      maxCallDepth: 100,
    });
    expect(result.status).toBe('runtime-error');
    if (result.status === 'runtime-error') {
      expect(result.error.message).toBe('Stack overflow.');
      expect(result.error.errorId).toBe('LOX-R011');
    }
  });

  it('keeps output printed before the error', () => {
    const error = runtimeError('print 1;\nprint 2;\nprint nil.field;');
    expect(error.lines).toEqual(['1', '2']);
    expect(error.line).toBe(3);
  });
});
