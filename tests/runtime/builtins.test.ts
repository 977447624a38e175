/**
 * treelox Runtime Tests: Native Functions
 */

import { describe, expect, it } from 'vitest';

import {
  createRuntimeContext,
  run,
  RuntimeError,
  type HostFunctionDefinition,
} from '../../src/index.js';
import { output, runProgram, runtimeError } from '../helpers/runtime.js';

describe('treelox Runtime: Natives', () => {
  describe('type', () => {
    it('names every kind of value', () => {
      expect(
        output(`
          class A {}
          fun f() {}
          print type(nil);
          print type(true);
          print type(1.5);
          print type("s");
          print type(f);
          print type(clock);
          print type(A);
          print type(A());
        `)
      ).toEqual([
        'nil',
        'bool',
        'number',
        'string',
        'fn',
        'fn',
        'class',
        'instance',
      ]);
    });

    it('names bound methods as functions', () => {
      expect(
        output('class A { m() {} } print type(A().m);')
      ).toEqual(['fn']);
    });
  });

  describe('round', () => {
    it('rounds to the given number of digits', () => {
      expect(
        output('print round(3.14159, 2); print round(7, 0); print round(12.5, 1);')
      ).toEqual(['3.14', '7', '12.5']);
    });

    it('rounds halves away from zero', () => {
      expect(output('print round(2.5, 0); print round(-2.5, 0);')).toEqual([
        '3',
        '-3',
      ]);
    });

    it('rejects non-numbers and bad precision', () => {
      expect(runtimeError('print round("a", 1);').message).toBe(
        'round: expected a number and an integer precision'
      );
      expect(runtimeError('print round(1, 1.5);').message).toBe(
        'round: expected a number and an integer precision'
      );
      expect(runtimeError('\nprint round(1, -1);')).toMatchObject({
        message: 'round: precision must be a non-negative integer',
        line: 2,
      });
    });
  });

  describe('rand and randint', () => {
    it('returns a number in [0, 1)', () => {
      expect(output('var r = rand(); print r >= 0 and r < 1;')).toEqual([
        'true',
      ]);
    });

    it('returns an integer within inclusive bounds', () => {
      expect(output('print randint(3, 3);')).toEqual(['3']);
      expect(
        output(`
          var ok = true;
          for (var i = 0; i < 20; i = i + 1) {
            var n = randint(1, 6);
            if (n < 1 or n > 6 or round(n, 0) != n) ok = false;
          }
          print ok;
        `)
      ).toEqual(['true']);
    });

    it('rejects non-integer or reversed bounds', () => {
      expect(runtimeError('randint(1.5, 2);').message).toBe(
        'randint: expected two integers'
      );
      expect(runtimeError('randint(2, 1);').message).toBe(
        'randint: lower bound must not exceed upper bound'
      );
    });
  });

  describe('clock', () => {
    it('returns seconds as a number', () => {
      expect(output('print type(clock()); print clock() > 0;')).toEqual([
        'number',
        'true',
      ]);
    });

    it('takes no arguments', () => {
      expect(runtimeError('clock(1);').message).toBe(
        'Expected 0 arguments but got 1.'
      );
    });
  });

  describe('help and dir', () => {
    it('prints native documentation', () => {
      expect(output('help(clock);')).toEqual([
        'clock\n\tReturns the amount of time elapsed since the Unix epoch.',
      ]);
    });

    it('prints a placeholder for user callables and other values', () => {
      expect(
        output('fun f() {} class A {} help(f); help(A); print help(1);')
      ).toEqual([
        'f\n\tNo documentation available.',
        'A\n\tNo documentation available.',
        'No documentation available.',
        'nil',
      ]);
    });

    it('lists global names in sorted order', () => {
      expect(output('var zeta = 1; var alpha = 2; dir();')).toEqual([
        'alpha',
        'clock',
        'dir',
        'exit',
        'help',
        'quit',
        'rand',
        'randint',
        'round',
        'type',
        'zeta',
      ]);
    });
  });

  describe('exit and quit', () => {
    function exitCodes(source: string): { codes: number[]; lines: string[] } {
      const codes: number[] = [];
      const lines: string[] = [];
      const result = run(source, {
        callbacks: {
          onPrint: (text) => lines.push(text),
          onExit: (code) => codes.push(code),
        },
      });
      expect(result).toEqual({ status: 'ok' });
      return { codes, lines };
    }

    it('exits with the given code', () => {
      expect(exitCodes('exit(3);')).toEqual({ codes: [3], lines: [] });
    });

    it('quits with code 0', () => {
      expect(exitCodes('quit();')).toEqual({ codes: [0], lines: [] });
    });

    it('returns nil when the host does not stop the process', () => {
      expect(exitCodes('print exit(1); print quit();')).toEqual({
        codes: [1, 0],
        lines: ['nil', 'nil'],
      });
    });

    it('rejects a non-integer exit code', () => {
      expect(runtimeError('\nexit("1");')).toMatchObject({
        message: 'exit: expected an integer exit code',
        line: 2,
      });
      expect(runtimeError('exit(1.5);').message).toBe(
        'exit: expected an integer exit code'
      );
    });

    it('documents both natives', () => {
      expect(output('help(exit); help(quit);')).toEqual([
        'exit\n\tTerminates the current process with the specified exit code.',
        'quit\n\tTerminates the current process with an exit code of 0.',
      ]);
    });
  });

  describe('Configuration', () => {
    it('leaves natives undefined when disabled', () => {
      const { result } = runProgram('dir();', { natives: false });
      expect(result.status).toBe('runtime-error');
      if (result.status === 'runtime-error') {
        expect(result.error.message).toBe("Undefined variable 'dir'.");
      }
    });

    it('registers host functions', () => {
      const double: HostFunctionDefinition = {
        arity: 1,
        fn: ([x = null]) => (typeof x === 'number' ? x * 2 : null),
      };
      expect(
        output('print double(21); print double; help(double);', {
          functions: { double },
        })
      ).toEqual([
        '42',
        '<native fn double>',
        'double\n\tNo documentation available.',
      ]);
    });

    it('lets host functions override built-ins', () => {
      expect(
        output('print clock();', {
          functions: { clock: { arity: 0, fn: () => 5 } },
        })
      ).toEqual(['5']);
    });

    it('passes the call site to host functions', () => {
      const fail: HostFunctionDefinition = {
        arity: 0,
        fn: (_args, _ctx, location) => {
          throw new RuntimeError(
            'LOX-R012',
            { name: 'fail', reason: 'placeholder failure' },
            location
          );
        },
      };
      const { result } = runProgram('print 1;\n\nfail();', {
        functions: { fail },
      });
      expect(result.status).toBe('runtime-error');
      if (result.status === 'runtime-error') {
        expect(result.error.message).toBe('fail: placeholder failure');
        expect(result.error.line).toBe(3);
      }
    });

    it('rejects an invalid host arity', () => {
      expect(() =>
        createRuntimeContext({
          functions: { bad: { arity: -1, fn: () => null } },
        })
      ).toThrow("Function 'bad' must declare a non-negative integer arity");
    });

    it('rejects a non-positive call depth', () => {
      expect(() => createRuntimeContext({ maxCallDepth: 0 })).toThrow(
        'maxCallDepth must be a positive integer'
      );
    });
  });
});
