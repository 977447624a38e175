/**
 * treelox CLI Tests: treelox command
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  afterAll,
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
  vi,
} from 'vitest';

import { executeSource, main, parseArgs } from '../../src/cli-exec.js';
import { UsageError, USAGE } from '../../src/cli-shared.js';
import { createDefaultConfig, type TreeloxConfig } from '../../src/config.js';

function capture(source: string, config: TreeloxConfig = createDefaultConfig()) {
  const out: string[] = [];
  const err: string[] = [];
  const code = executeSource(source, config, {
    onPrint: (text) => out.push(text),
    onError: (text) => err.push(text),
  });
  return { code, out, err };
}

describe('treelox CLI: treelox', () => {
  describe('parseArgs', () => {
    it('starts an interactive session without arguments', () => {
      expect(parseArgs([])).toEqual({ mode: 'repl', configPath: null });
    });

    it('parses a script path', () => {
      expect(parseArgs(['script.lox'])).toEqual({
        mode: 'script',
        file: 'script.lox',
        configPath: null,
      });
    });

    it('parses inline source', () => {
      expect(parseArgs(['-c', 'print 1;'])).toEqual({
        mode: 'source',
        source: 'print 1;',
        configPath: null,
      });
    });

    it('parses a config path in any position', () => {
      expect(parseArgs(['--config', 'conf.yaml', 'script.lox'])).toEqual({
        mode: 'script',
        file: 'script.lox',
        configPath: 'conf.yaml',
      });
      expect(parseArgs(['script.lox', '--config', 'conf.yaml'])).toEqual({
        mode: 'script',
        file: 'script.lox',
        configPath: 'conf.yaml',
      });
    });

    it('parses help and version flags anywhere', () => {
      expect(parseArgs(['-h'])).toEqual({ mode: 'help' });
      expect(parseArgs(['script.lox', '--help'])).toEqual({ mode: 'help' });
      expect(parseArgs(['-v'])).toEqual({ mode: 'version' });
      expect(parseArgs(['--version'])).toEqual({ mode: 'version' });
    });

    it('treats help and version flags after -c or --config as values', () => {
      expect(parseArgs(['-c', '-v'])).toEqual({
        mode: 'source',
        source: '-v',
        configPath: null,
      });
      expect(parseArgs(['--config', '--help'])).toEqual({
        mode: 'repl',
        configPath: '--help',
      });
      expect(parseArgs(['-c', 'print 1;', '--version'])).toEqual({
        mode: 'version',
      });
    });

    it('rejects unknown options and surplus arguments', () => {
      expect(() => parseArgs(['--bogus'])).toThrow(UsageError);
      expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
      expect(() => parseArgs(['a.lox', 'b.lox'])).toThrow(
        'Unexpected argument: b.lox'
      );
      expect(() => parseArgs(['-c'])).toThrow('Missing value after -c');
      expect(() => parseArgs(['--config'])).toThrow(
        'Missing value after --config'
      );
      expect(() => parseArgs(['-c', 'print 1;', 'file.lox'])).toThrow(
        'Unexpected argument: file.lox'
      );
      expect(() => parseArgs(['file.lox', '-c', 'print 1;'])).toThrow(
        'Unexpected argument: -c'
      );
    });
  });

  describe('executeSource', () => {
    it('prints output and exits 0', () => {
      expect(capture('print 1 + 1;')).toEqual({ code: 0, out: ['2'], err: [] });
    });

    it('exits 65 on syntax errors', () => {
      expect(capture('print 1')).toEqual({
        code: 65,
        out: [],
        err: ["[line 1] Error at end: Expect ';' after value."],
      });
    });

    it('exits 65 on static errors', () => {
      expect(capture('return 1;')).toEqual({
        code: 65,
        out: [],
        err: ["[line 1] Error: Can't return from top-level code."],
      });
    });

    it('exits 70 on runtime errors', () => {
      expect(capture('print "ok";\nprint 1 < "a";')).toEqual({
        code: 70,
        out: ['ok'],
        err: ['Operands must be numbers.\n[line 2]'],
      });
    });

    it('applies the configuration', () => {
      const config = { ...createDefaultConfig(), natives: false };
      expect(capture('clock();', config)).toEqual({
        code: 70,
        out: [],
        err: ["Undefined variable 'clock'.\n[line 1]"],
      });
    });
  });

  describe('main', () => {
    let tempDir: string;
    let logs: string[];
    let errors: string[];

    beforeAll(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'treelox-exec-'));
    });

    afterAll(async () => {
      await fs.rm(tempDir, { recursive: true });
    });

    beforeEach(() => {
      logs = [];
      errors = [];
      vi.spyOn(console, 'log').mockImplementation((text: unknown) => {
        logs.push(String(text));
      });
      vi.spyOn(console, 'error').mockImplementation((text: unknown) => {
        errors.push(String(text));
      });
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('prints usage for --help', async () => {
      expect(await main(['--help'], tempDir)).toBe(0);
      expect(logs).toEqual([USAGE]);
    });

    it('prints the version', async () => {
      expect(await main(['--version'], tempDir)).toBe(0);
      expect(logs).toEqual(['0.1.0']);
    });

    it('exits 64 on bad usage', async () => {
      expect(await main(['--bogus'], tempDir)).toBe(64);
      expect(errors).toEqual(['Unknown option: --bogus', USAGE]);
    });

    it('runs a script file', async () => {
      const script = path.join(tempDir, 'hello.lox');
      await fs.writeFile(script, 'var greeting = "hello";\nprint greeting;\n');
      expect(await main([script], tempDir)).toBe(0);
      expect(logs).toEqual(['hello']);
    });

    it('exits 66 when the script is missing', async () => {
      const missing = path.join(tempDir, 'missing.lox');
      expect(await main([missing], tempDir)).toBe(66);
      expect(errors).toEqual([`File not found: ${missing}`]);
    });

    it('runs inline source that looks like a flag', async () => {
      expect(await main(['-c', '-v'], tempDir)).toBe(65);
      expect(logs).toEqual([]);
      expect(errors).toEqual([
        "[line 1] Error at end: Expect ';' after expression.",
      ]);
    });

    it('runs inline source', async () => {
      expect(await main(['-c', 'print 6 * 7;'], tempDir)).toBe(0);
      expect(logs).toEqual(['42']);
    });

    it('exits 78 on an invalid configuration', async () => {
      const configDir = await fs.mkdtemp(path.join(tempDir, 'bad-config-'));
      await fs.writeFile(
        path.join(configDir, '.treelox.yaml'),
        'maxCallDepth: -1\n'
      );
      expect(await main(['-c', 'print 1;'], configDir)).toBe(78);
      expect(errors).toEqual([
        'Invalid configuration: maxCallDepth must be a positive integer',
      ]);
    });

    it('reads the configuration from the working directory', async () => {
      const configDir = await fs.mkdtemp(path.join(tempDir, 'no-natives-'));
      await fs.writeFile(path.join(configDir, '.treelox.yaml'), 'natives: false\n');
      expect(await main(['-c', 'print clock;'], configDir)).toBe(70);
      expect(errors).toEqual(["Undefined variable 'clock'.\n[line 1]"]);
    });

    it('exits 78 when an explicit config file is missing', async () => {
      const missing = path.join(tempDir, 'absent.yaml');
      expect(
        await main(['--config', missing, '-c', 'print 1;'], tempDir)
      ).toBe(78);
      expect(errors).toEqual([
        `Invalid configuration: file not found: ${missing}`,
      ]);
    });
  });
});
