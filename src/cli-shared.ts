/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { isRecord } from './config.js';
import { LoxError, ParseError, RuntimeError } from './error-classes.js';
import type { RunResult } from './runtime/index.js';

/** Bad command-line usage; the driver exits with code 64 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Format a language error for stderr output
 *
 * - syntax: `[line N] Error at 'x': message` (`at end` at end of input)
 * - lexical and static: `[line N] Error: message`
 * - runtime: `message` then `[line N]` on its own line
 */
export function formatError(err: LoxError): string {
  if (err instanceof ParseError) {
    const where = err.where === null ? 'at end' : `at '${err.where}'`;
    return `[line ${err.line}] Error ${where}: ${err.message}`;
  }

  if (err instanceof RuntimeError) {
    return err.location
      ? `${err.message}\n[line ${err.line}]`
      : err.message;
  }

  return `[line ${err.line}] Error: ${err.message}`;
}

/** Diagnostic lines for a run, empty on success */
export function formatRunResult(result: RunResult): string[] {
  switch (result.status) {
    case 'ok':
      return [];
    case 'syntax-error':
    case 'static-error':
      return result.errors.map(formatError);
    case 'runtime-error':
      return [formatError(result.error)];
  }
}

/**
 * Format any error raised outside the language pipeline
 */
export function formatCliError(err: unknown): string {
  if (err instanceof LoxError) {
    return formatError(err);
  }

  // Handle file not found errors (ENOENT)
  if (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT' &&
    'path' in err
  ) {
    return `File not found: ${String(err.path)}`;
  }

  return err instanceof Error ? err.message : String(err);
}

/**
 * Read the package version from package.json
 */
export function readVersion(): string {
  const packageJsonPath = fileURLToPath(
    new URL('../package.json', import.meta.url)
  );
  try {
    const data: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (isRecord(data) && typeof data['version'] === 'string') {
      return data['version'];
    }
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
      throw err;
    }
  }
  return '0.0.0';
}

export const USAGE = `Usage:
  treelox                     Start an interactive session
  treelox <script>            Run a script file
  treelox -c <source>         Run source given on the command line
  treelox --config <file>     Read configuration from <file> instead of .treelox.yaml
  treelox --help              Show this help message
  treelox --version           Show version information`;
