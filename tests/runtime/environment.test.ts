/**
 * treelox Runtime Tests: Environment
 */

import { describe, expect, it } from 'vitest';

import { InternalError, RuntimeError } from '../../src/error-classes.js';
import { Environment } from '../../src/runtime/index.js';

describe('treelox Runtime: Environment', () => {
  it('reads through enclosing scopes', () => {
    const globals = new Environment();
    globals.define('a', 1);
    const inner = new Environment(new Environment(globals));
    expect(inner.get('a')).toBe(1);
  });

  it('lets a definition shadow an outer binding', () => {
    const outer = new Environment();
    outer.define('a', 'outer');
    const inner = new Environment(outer);
    inner.define('a', 'inner');
    expect(inner.get('a')).toBe('inner');
    expect(outer.get('a')).toBe('outer');
  });

  it('assigns in the nearest scope that binds the name', () => {
    const outer = new Environment();
    outer.define('a', 1);
    const inner = new Environment(outer);
    inner.assign('a', 2);
    expect(outer.get('a')).toBe(2);
    expect(inner.has('a')).toBe(false);
  });

  it('fails on undefined names', () => {
    const env = new Environment();
    expect(() => env.get('missing')).toThrow(RuntimeError);
    expect(() => env.get('missing')).toThrow("Undefined variable 'missing'.");
    expect(() => env.assign('missing', 1)).toThrow(
      "Undefined variable 'missing'."
    );
  });

  it('reports the location it is given', () => {
    const env = new Environment();
    try {
      env.get('x', { line: 4, column: 2, offset: 30 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RuntimeError);
      if (err instanceof RuntimeError) expect(err.line).toBe(4);
    }
  });

  it('reads and writes at a fixed depth', () => {
    const outer = new Environment();
    outer.define('x', 'outer');
    const middle = new Environment(outer);
    middle.define('x', 'middle');
    const inner = new Environment(middle);

    expect(inner.getAt(2, 'x')).toBe('outer');
    expect(inner.getAt(1, 'x')).toBe('middle');

    inner.assignAt(2, 'x', 'changed');
    expect(outer.get('x')).toBe('changed');
    expect(middle.get('x')).toBe('middle');
  });

  it('treats a depth mismatch as an internal error', () => {
    const env = new Environment(new Environment());
    expect(() => env.ancestor(2)).toThrow(InternalError);
    expect(() => env.getAt(1, 'nope')).toThrow(InternalError);
    expect(() => env.assignAt(0, 'nope', null)).toThrow(InternalError);
  });

  it('lists names of its own scope only', () => {
    const outer = new Environment();
    outer.define('a', 1);
    const inner = new Environment(outer);
    inner.define('b', 2);
    inner.define('c', null);
    expect(inner.names()).toEqual(['b', 'c']);
    expect(inner.get('c')).toBeNull();
  });
});
