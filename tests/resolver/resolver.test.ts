/**
 * treelox Resolver Tests
 */

import { describe, expect, it } from 'vitest';

import { parse } from '../../src/parser/index.js';
import { resolve } from '../../src/resolver/index.js';
import type { ExprNode, StmtNode } from '../../src/types.js';

function messages(source: string): string[] {
  return resolve(parse(source)).errors.map((e) => e.message);
}

/** Expression of a print, return or expression statement */
function exprOf(stmt: StmtNode | undefined): ExprNode {
  switch (stmt?.type) {
    case 'PrintStmt':
    case 'ExpressionStmt':
      return stmt.expression;
    case 'ReturnStmt':
      if (stmt.value) return stmt.value;
      break;
  }
  throw new Error('statement has no expression');
}

describe('treelox Resolver', () => {
  describe('Scope depths', () => {
    it('records block locals and leaves globals unresolved', () => {
      const program = parse('var a = 1; { var b = a; print b; }');
      const { locals, success } = resolve(program);
      expect(success).toBe(true);

      const block = program.statements[1];
      if (block?.type !== 'Block') throw new Error('expected a block');
      const init = block.statements[0];
      if (init?.type !== 'VarStmt' || !init.initializer) {
        throw new Error('expected a var declaration');
      }
      const printed = exprOf(block.statements[1]);

      expect(init.initializer.type).toBe('Variable');
      if (init.initializer.type !== 'Variable') {
        throw new Error('expected a variable');
      }
      expect(locals.get(init.initializer)).toBeUndefined();
      expect(printed.type).toBe('Variable');
      if (printed.type !== 'Variable') throw new Error('expected a variable');
      expect(locals.get(printed)).toBe(0);
    });

    it('counts scopes between a closure and its captured variable', () => {
      const program = parse(
        'fun outer() { var x = 1; fun inner() { return x; } }'
      );
      const { locals } = resolve(program);

      const outer = program.statements[0];
      if (outer?.type !== 'FunctionStmt') throw new Error('expected outer');
      const inner = outer.body[1];
      if (inner?.type !== 'FunctionStmt') throw new Error('expected inner');
      const ref = exprOf(inner.body[0]);

      expect(ref.type).toBe('Variable');
      if (ref.type !== 'Variable') throw new Error('expected a variable');
      expect(locals.get(ref)).toBe(1);
    });

    it('places super one scope outside this', () => {
      const program = parse(
        'class A {} class B < A { m() { this; return super.m(); } }'
      );
      const { locals, success } = resolve(program);
      expect(success).toBe(true);

      const klass = program.statements[1];
      if (klass?.type !== 'ClassStmt') throw new Error('expected a class');
      const body = klass.methods[0]?.body ?? [];
      const thisExpr = exprOf(body[0]);
      const call = exprOf(body[1]);

      expect(thisExpr.type).toBe('This');
      if (thisExpr.type !== 'This') throw new Error('expected this');
      expect(locals.get(thisExpr)).toBe(1);

      expect(call.type).toBe('Call');
      if (call.type !== 'Call') throw new Error('expected a call');
      expect(call.callee.type).toBe('Super');
      if (call.callee.type !== 'Super') throw new Error('expected super');
      expect(locals.get(call.callee)).toBe(2);
    });

    it('extends a locals table passed in', () => {
      const table = resolve(parse('{ var a = 1; print a; }')).locals;
      const again = resolve(parse('{ var b = 2; print b; }'), table);
      expect(again.locals).toBe(table);
    });
  });

  describe('Static errors', () => {
    it('rejects reading a local in its own initializer', () => {
      expect(messages('{ var a = a; }')).toEqual([
        "Can't read local variable in its own initializer.",
      ]);
    });

    it('allows a global initializer to name the global', () => {
      expect(messages('var a = a;')).toEqual([]);
    });

    it('rejects redeclaring a local', () => {
      expect(messages('{ var a = 1; var a = 2; }')).toEqual([
        "Already a variable named 'a' in this scope.",
      ]);
    });

    it('rejects duplicate parameter names', () => {
      expect(messages('fun f(a, a) {}')).toEqual([
        "Already a variable named 'a' in this scope.",
      ]);
    });

    it('allows redeclaring a global', () => {
      expect(messages('var a = 1; var a = 2;')).toEqual([]);
    });

    it('rejects top-level return', () => {
      expect(messages('return 1;')).toEqual([
        "Can't return from top-level code.",
      ]);
    });

    it('rejects returning a value from an initializer', () => {
      expect(messages('class A { init() { return 1; } }')).toEqual([
        "Can't return a value from an initializer.",
      ]);
      expect(messages('class A { init() { return; } }')).toEqual([]);
    });

    it('rejects loop control outside a loop', () => {
      expect(messages('break;')).toEqual([
        "Can't use 'break' outside of a loop.",
      ]);
      expect(messages('continue;')).toEqual([
        "Can't use 'continue' outside of a loop.",
      ]);
    });

    it('does not let loop control cross a function boundary', () => {
      expect(messages('while (true) { fun f() { break; } }')).toEqual([
        "Can't use 'break' outside of a loop.",
      ]);
    });

    it('rejects this outside a class', () => {
      expect(messages('print this;')).toEqual([
        "Can't use 'this' outside of a class.",
      ]);
      expect(messages('fun f() { return this; }')).toEqual([
        "Can't use 'this' outside of a class.",
      ]);
    });

    it('rejects misplaced super', () => {
      expect(messages('super.m();')).toEqual([
        "Can't use 'super' outside of a class.",
      ]);
      expect(messages('class A { m() { super.m(); } }')).toEqual([
        "Can't use 'super' in a class with no superclass.",
      ]);
    });

    it('rejects a class inheriting from itself', () => {
      expect(messages('class A < A {}')).toEqual([
        "A class can't inherit from itself.",
      ]);
    });

    it('collects every error with its line', () => {
      const { errors, success } = resolve(
        parse('break;\nreturn;\nprint this;')
      );
      expect(success).toBe(false);
      expect(errors.map((e) => [e.errorId, e.line])).toEqual([
        ['LOX-S005', 1],
        ['LOX-S003', 2],
        ['LOX-S006', 3],
      ]);
    });
  });
});
