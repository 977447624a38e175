#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs(), and executeSource() for the treelox binary.
 * Runs a script file, inline source, or an interactive session.
 */

import * as fs from 'node:fs/promises';
import { loadConfig, sessionOptionsFor, type TreeloxConfig } from './config.js';
import {
  formatCliError,
  formatRunResult,
  readVersion,
  UsageError,
  USAGE,
} from './cli-shared.js';
import { startRepl } from './cli-repl.js';
import { EXIT_CODES, exitCodeFor, run } from './runtime/index.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'script'; file: string; configPath: string | null }
  | { mode: 'source'; source: string; configPath: string | null }
  | { mode: 'repl'; configPath: string | null }
  | { mode: 'help' }
  | { mode: 'version' };

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws UsageError for unknown options, missing option values or surplus arguments
 */
export function parseArgs(argv: string[]): ParsedArgs {
  let configPath: string | null = null;
  let source: string | null = null;
  let file: string | null = null;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--help' || arg === '-h') return { mode: 'help' };
    if (arg === '--version' || arg === '-v') return { mode: 'version' };

    if (arg === '--config' || arg === '-c') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`Missing value after ${arg}`);
      }
      i++;
      if (arg === '--config') {
        configPath = value;
        continue;
      }
      if (source !== null || file !== null) {
        throw new UsageError(`Unexpected argument: ${arg}`);
      }
      source = value;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    if (source !== null || file !== null) {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
    file = arg;
  }

  if (source !== null) return { mode: 'source', source, configPath };
  if (file !== null) return { mode: 'script', file, configPath };
  return { mode: 'repl', configPath };
}

/** Output destinations for a non-interactive run */
export interface ExecuteIO {
  onPrint: (text: string) => void;
  onError: (text: string) => void;
}

const consoleIO: ExecuteIO = {
  onPrint: (text) => {
    console.log(text);
  },
  onError: (text) => {
    console.error(text);
  },
};

/**
 * Run a complete program and report its diagnostics
 *
 * @returns Process exit code (0, 65 or 70)
 */
export function executeSource(
  source: string,
  config: TreeloxConfig,
  io: ExecuteIO = consoleIO
): number {
  const result = run(source, {
    ...sessionOptionsFor(config),
    callbacks: { onPrint: io.onPrint },
  });
  for (const message of formatRunResult(result)) {
    io.onError(message);
  }
  return exitCodeFor(result);
}

/**
 * Entry point for the treelox binary
 *
 * Parses command-line arguments, runs the requested mode, and returns the
 * process exit code. Diagnostics go to stderr.
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  cwd: string = process.cwd()
): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      console.error(USAGE);
      return EXIT_CODES.usage;
    }
    throw err;
  }

  if (parsed.mode === 'help') {
    console.log(USAGE);
    return EXIT_CODES.ok;
  }
  if (parsed.mode === 'version') {
    console.log(readVersion());
    return EXIT_CODES.ok;
  }

  let config: TreeloxConfig;
  try {
    config = loadConfig(cwd, parsed.configPath ?? undefined);
  } catch (err) {
    console.error(formatCliError(err));
    return EXIT_CODES.config;
  }

  switch (parsed.mode) {
    case 'source':
      return executeSource(parsed.source, config);

    case 'script': {
      let source: string;
      try {
        source = await fs.readFile(parsed.file, 'utf-8');
      } catch (err) {
        console.error(formatCliError(err));
        return EXIT_CODES.noInput;
      }
      return executeSource(source, config);
    }

    case 'repl':
      await startRepl(config);
      return EXIT_CODES.ok;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(formatCliError(err));
      process.exitCode = EXIT_CODES.software;
    }
  );
}
