/**
 * treelox CLI Tests: Interactive Session
 */

import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';

import { startRepl } from '../../src/cli-repl.js';
import { createDefaultConfig, type TreeloxConfig } from '../../src/config.js';

async function session(
  lines: string[],
  config: TreeloxConfig = createDefaultConfig()
) {
  const input = new PassThrough();
  const output = new PassThrough();
  const printed: string[] = [];
  const errors: string[] = [];
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString();
  });

  const done = startRepl(config, {
    input,
    output,
    onPrint: (text) => printed.push(text),
    onError: (text) => errors.push(text),
  });
  input.end(lines.map((line) => `${line}\n`).join(''));
  await done;

  return { printed, errors, written };
}

describe('treelox CLI: interactive session', () => {
  it('runs each line against one session and echoes expressions', async () => {
    const { printed, errors } = await session([
      'var a = 2;',
      'a * 3;',
      'print "done";',
    ]);
    expect(printed).toEqual(['6', 'done']);
    expect(errors).toEqual([]);
  });

  it('reports errors and keeps going', async () => {
    const { printed, errors } = await session([
      'print a +;',
      'print missing;',
      '',
      'print "still here";',
    ]);
    expect(errors).toEqual([
      "[line 1] Error at ';': Expect expression.",
      "Undefined variable 'missing'.\n[line 1]",
    ]);
    expect(printed).toEqual(['still here']);
  });

  it('does not echo when echo is off', async () => {
    const config = { ...createDefaultConfig(), echo: false };
    const { printed } = await session(['1 + 2;', 'print 4;'], config);
    expect(printed).toEqual(['4']);
  });

  it('writes the configured prompt', async () => {
    const config = { ...createDefaultConfig(), prompt: 'lox> ' };
    const { written } = await session(['print 1;'], config);
    expect(written.startsWith('lox> ')).toBe(true);
  });
});
