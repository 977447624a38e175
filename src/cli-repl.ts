/**
 * Interactive Session
 *
 * Reads one input unit per line and runs it against a persistent session.
 * Errors are reported and the loop keeps going; it ends on end of input.
 */

import * as readline from 'node:readline';
import { sessionOptionsFor, type TreeloxConfig } from './config.js';
import { formatRunResult } from './cli-shared.js';
import { createSession } from './runtime/index.js';

export interface ReplOptions {
  input?: NodeJS.ReadableStream;
  /** Receives the prompt; also the default destination for printed values */
  output?: NodeJS.WritableStream;
  onPrint?: (text: string) => void;
  onError?: (text: string) => void;
}

/**
 * Run the interactive loop until the input ends.
 */
export function startRepl(
  config: TreeloxConfig,
  options: ReplOptions = {}
): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const onPrint =
    options.onPrint ??
    ((text: string) => {
      output.write(`${text}\n`);
    });
  const onError =
    options.onError ??
    ((text: string) => {
      console.error(text);
    });

  const session = createSession({
    ...sessionOptionsFor(config),
    callbacks: { onPrint },
  });

  const rl = readline.createInterface({
    input,
    output,
    prompt: config.prompt,
    terminal: false,
  });

  return new Promise((resolve) => {
    let closed = false;

    rl.on('line', (line) => {
      if (line.trim() !== '') {
        for (const message of formatRunResult(session.run(line))) {
          onError(message);
        }
      }
      if (!closed) rl.prompt();
    });

    rl.on('close', () => {
      closed = true;
      resolve();
    });

    rl.prompt();
  });
}
