/**
 * treelox Language Tests: Operators, Equality and Display
 */

import { describe, expect, it } from 'vitest';

import { output, runtimeError } from '../helpers/runtime.js';

describe('treelox Language: Operators', () => {
  describe('Arithmetic', () => {
    it('follows precedence and associativity', () => {
      const script = `
        print 1 + 2 * 3;
        print (1 + 2) * 3;
        print 10 / 4;
        print -3 - -3;
        print 7 - 2 - 1;
      `;
      expect(output(script)).toEqual(['7', '9', '2.5', '0', '4']);
    });

    it('concatenates two strings', () => {
      expect(output('print "foo" + "bar";')).toEqual(['foobar']);
    });

    it('divides by zero without an error', () => {
      const script = `
        print 1 / 0 > 1000000;
        var nan = 0 / 0;
        print nan == nan;
      `;
      expect(output(script)).toEqual(['true', 'false']);
    });

    it('rejects mixed operands for +', () => {
      expect(runtimeError('print "a" + 1;').message).toBe(
        'Operands must be two numbers or two strings.'
      );
      expect(runtimeError('print 1 + nil;').message).toBe(
        'Operands must be two numbers or two strings.'
      );
    });

    it('requires numbers for other operators', () => {
      expect(runtimeError('print 1 < "2";').message).toBe(
        'Operands must be numbers.'
      );
      expect(runtimeError('print "a" < "b";').message).toBe(
        'Operands must be numbers.'
      );
      expect(runtimeError('print true * 2;').message).toBe(
        'Operands must be numbers.'
      );
      expect(runtimeError('print -"x";').message).toBe(
        'Operand must be a number.'
      );
    });
  });

  describe('Comparison and logic', () => {
    it('compares numbers', () => {
      expect(
        output('print 1 <= 1; print 2 > 3; print 3 >= 2; print 1 < 2;')
      ).toEqual(['true', 'false', 'true', 'true']);
    });

    it('negates truthiness', () => {
      expect(output('print !nil; print !0; print !!"x";')).toEqual([
        'true',
        'false',
        'true',
      ]);
    });
  });

  describe('Equality', () => {
    it('never equates values of different kinds', () => {
      const script = `
        print nil == nil;
        print nil == false;
        print 1 == 1;
        print "a" == "a";
        print 1 == "1";
        print true != false;
      `;
      expect(output(script)).toEqual([
        'true',
        'false',
        'true',
        'true',
        'false',
        'true',
      ]);
    });

    it('compares objects by identity', () => {
      const script = `
        class A {}
        var a = A();
        var b = A();
        fun f() {}
        print a == a;
        print a == b;
        print A == A;
        print f == f;
      `;
      expect(output(script)).toEqual(['true', 'false', 'true', 'true']);
    });
  });

  describe('Display', () => {
    it('prints values in their display form', () => {
      const script = `
        print 3.0;
        print 2.50;
        print true;
        print nil;
        print "text";
        print clock;
      `;
      expect(output(script)).toEqual([
        '3',
        '2.5',
        'true',
        'nil',
        'text',
        '<native fn clock>',
      ]);
    });
  });
});
