/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'static' | 'runtime' | 'internal';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LOX-{category}{3-digit} (e.g., LOX-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/** Letter following `LOX-` in the ids of each category */
export const CATEGORY_PREFIXES: Readonly<Record<ErrorCategory, string>> = {
  lexer: 'L',
  parse: 'P',
  static: 'S',
  runtime: 'R',
  internal: 'I',
};

const ERROR_ID_PATTERN = /^LOX-([A-Z])\d{3}$/;

/** Read-only lookup of error definitions by id */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
  /** Definitions of one category, in declaration order */
  byCategory(category: ErrorCategory): ErrorDefinition[];
}

/**
 * Build a registry, rejecting malformed or duplicate ids and ids whose
 * letter does not match their category.
 */
export function createErrorRegistry(
  definitions: readonly ErrorDefinition[]
): ErrorRegistry {
  const byId = new Map<string, ErrorDefinition>();

  for (const definition of definitions) {
    const { errorId, category } = definition;
    const letter = ERROR_ID_PATTERN.exec(errorId)?.[1];
    if (letter !== CATEGORY_PREFIXES[category]) {
      throw new TypeError(
        `Error ID ${errorId} does not fit category ${category}`
      );
    }
    if (byId.has(errorId)) {
      throw new TypeError(`Duplicate error ID: ${errorId}`);
    }
    byId.set(errorId, definition);
  }

  return {
    get: (errorId) => byId.get(errorId),
    has: (errorId) => byId.has(errorId),
    get size() {
      return byId.size;
    },
    entries: () => byId.entries(),
    byCategory: (category) =>
      [...byId.values()].filter((def) => def.category === category),
  };
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (LOX-L0xx)
  {
    errorId: 'LOX-L001',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: "Unexpected character '{char}'.",
  },
  {
    errorId: 'LOX-L002',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string.',
  },
  {
    errorId: 'LOX-L003',
    category: 'lexer',
    description: 'Invalid number literal',
    messageTemplate: "Invalid number '{lexeme}'.",
  },

  // Parse Errors (LOX-P0xx)
  {
    errorId: 'LOX-P001',
    category: 'parse',
    description: 'Expected an expression',
    messageTemplate: 'Expect expression.',
  },
  {
    errorId: 'LOX-P002',
    category: 'parse',
    description: 'Missing expected token',
    messageTemplate: 'Expect {expected}.',
  },
  {
    errorId: 'LOX-P003',
    category: 'parse',
    description: 'Invalid assignment target',
    messageTemplate: 'Invalid assignment target.',
  },
  {
    errorId: 'LOX-P004',
    category: 'parse',
    description: 'Too many arguments or parameters',
    messageTemplate: "Can't have more than {max} {what}.",
  },
  {
    errorId: 'LOX-P005',
    category: 'parse',
    description: 'Nesting too deep',
    messageTemplate: 'Too much nesting.',
  },

  // Static Errors (LOX-S0xx)
  {
    errorId: 'LOX-S001',
    category: 'static',
    description: 'Variable read in its own initializer',
    messageTemplate: "Can't read local variable in its own initializer.",
  },
  {
    errorId: 'LOX-S002',
    category: 'static',
    description: 'Duplicate declaration in scope',
    messageTemplate: "Already a variable named '{name}' in this scope.",
  },
  {
    errorId: 'LOX-S003',
    category: 'static',
    description: 'Return outside function',
    messageTemplate: "Can't return from top-level code.",
  },
  {
    errorId: 'LOX-S004',
    category: 'static',
    description: 'Value returned from initializer',
    messageTemplate: "Can't return a value from an initializer.",
  },
  {
    errorId: 'LOX-S005',
    category: 'static',
    description: 'Loop control outside loop',
    messageTemplate: "Can't use '{keyword}' outside of a loop.",
  },
  {
    errorId: 'LOX-S006',
    category: 'static',
    description: 'this outside class',
    messageTemplate: "Can't use 'this' outside of a class.",
  },
  {
    errorId: 'LOX-S007',
    category: 'static',
    description: 'super outside class',
    messageTemplate: "Can't use 'super' outside of a class.",
  },
  {
    errorId: 'LOX-S008',
    category: 'static',
    description: 'super without superclass',
    messageTemplate: "Can't use 'super' in a class with no superclass.",
  },
  {
    errorId: 'LOX-S009',
    category: 'static',
    description: 'Class inherits from itself',
    messageTemplate: "A class can't inherit from itself.",
  },

  // Runtime Errors (LOX-R0xx)
  {
    errorId: 'LOX-R001',
    category: 'runtime',
    description: 'Undefined variable',
    messageTemplate: "Undefined variable '{name}'.",
  },
  {
    errorId: 'LOX-R002',
    category: 'runtime',
    description: 'Undefined property',
    messageTemplate: "Undefined property '{name}'.",
  },
  {
    errorId: 'LOX-R003',
    category: 'runtime',
    description: 'Unary operand not a number',
    messageTemplate: 'Operand must be a number.',
  },
  {
    errorId: 'LOX-R004',
    category: 'runtime',
    description: 'Binary operands not numbers',
    messageTemplate: 'Operands must be numbers.',
  },
  {
    errorId: 'LOX-R005',
    category: 'runtime',
    description: 'Invalid operands for +',
    messageTemplate: 'Operands must be two numbers or two strings.',
  },
  {
    errorId: 'LOX-R006',
    category: 'runtime',
    description: 'Value is not callable',
    messageTemplate: 'Can only call functions and classes.',
  },
  {
    errorId: 'LOX-R007',
    category: 'runtime',
    description: 'Wrong argument count',
    messageTemplate: 'Expected {expected} arguments but got {actual}.',
  },
  {
    errorId: 'LOX-R008',
    category: 'runtime',
    description: 'Property read on non-instance',
    messageTemplate: 'Only instances have properties.',
  },
  {
    errorId: 'LOX-R009',
    category: 'runtime',
    description: 'Field write on non-instance',
    messageTemplate: 'Only instances have fields.',
  },
  {
    errorId: 'LOX-R010',
    category: 'runtime',
    description: 'Superclass is not a class',
    messageTemplate: 'Superclass must be a class.',
  },
  {
    errorId: 'LOX-R011',
    category: 'runtime',
    description: 'Call depth limit exceeded',
    messageTemplate: 'Stack overflow.',
  },
  {
    errorId: 'LOX-R012',
    category: 'runtime',
    description: 'Native function rejected its arguments',
    messageTemplate: '{name}: {reason}',
  },

  // Internal Errors (LOX-I0xx)
  {
    errorId: 'LOX-I001',
    category: 'internal',
    description: 'Interpreter invariant violated',
    messageTemplate: 'Internal error: {reason}',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry =
  createErrorRegistry(ERROR_DEFINITIONS);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected} arguments but got {actual}.", { expected: 2, actual: 1 })
 * // Returns: "Expected 2 arguments but got 1."
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      // Unclosed brace - return template unchanged
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
