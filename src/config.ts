/**
 * Configuration Loader
 * Loads and validates .treelox.yaml driver configuration.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_MAX_CALL_DEPTH } from './runtime/index.js';
import type { SessionOptions } from './runtime/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.treelox.yaml';

export interface TreeloxConfig {
  /** Calls allowed in progress before "Stack overflow." */
  readonly maxCallDepth: number;
  /** Define the built-in native functions */
  readonly natives: boolean;
  /** Interactive prompt text */
  readonly prompt: string;
  /** Interactive mode prints the value of a bare expression statement */
  readonly echo: boolean;
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): TreeloxConfig {
  return {
    maxCallDepth: DEFAULT_MAX_CALL_DEPTH,
    natives: true,
    prompt: '> ',
    echo: true,
  };
}

// ============================================================
// VALIDATION
// ============================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(reason: string): Error {
  return new Error(`Invalid configuration: ${reason}`);
}

function readBoolean(key: string, value: unknown): boolean {
  if (typeof value !== 'boolean') {
    throw invalid(`${key} must be a boolean`);
  }
  return value;
}

/**
 * Validate parsed YAML and merge it over the defaults.
 * An empty document yields the defaults.
 */
export function validateConfig(data: unknown): TreeloxConfig {
  const defaults = createDefaultConfig();
  if (data === null || data === undefined) return defaults;
  if (!isRecord(data)) {
    throw invalid('must be a mapping');
  }

  let { maxCallDepth, natives, prompt, echo } = defaults;

  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case 'maxCallDepth':
        if (
          typeof value !== 'number' ||
          !Number.isInteger(value) ||
          value < 1
        ) {
          throw invalid('maxCallDepth must be a positive integer');
        }
        maxCallDepth = value;
        break;
      case 'natives':
        natives = readBoolean(key, value);
        break;
      case 'prompt':
        if (typeof value !== 'string') {
          throw invalid('prompt must be a string');
        }
        prompt = value;
        break;
      case 'echo':
        echo = readBoolean(key, value);
        break;
      default:
        throw invalid(`unknown key ${key}`);
    }
  }

  return { maxCallDepth, natives, prompt, echo };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/** Parse configuration from YAML text */
export function parseConfig(text: string): TreeloxConfig {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (err) {
    throw invalid(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return validateConfig(data);
}

/**
 * Load configuration.
 *
 * With `explicitPath` the file must exist. Otherwise .treelox.yaml is read
 * from `cwd` when present, and the defaults are used when it is not.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function loadConfig(cwd: string, explicitPath?: string): TreeloxConfig {
  const configPath = explicitPath ?? join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    if (explicitPath !== undefined) {
      throw invalid(`file not found: ${explicitPath}`);
    }
    return createDefaultConfig();
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw invalid(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(fileContent);
}

/** Runtime options carried by a configuration */
export function sessionOptionsFor(config: TreeloxConfig): SessionOptions {
  return {
    maxCallDepth: config.maxCallDepth,
    natives: config.natives,
    echo: config.echo,
  };
}
