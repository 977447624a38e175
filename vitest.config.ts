/**
 * Vitest Configuration
 *
 * Tests live under tests/ and mirror the src/ layout:
 * lexer, parser, resolver, runtime, language, cli.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'treelox',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/cli-exec.ts'],
    },
  },
});
