/**
 * Parser Extension: Script Parsing
 * Program, declarations, simple statements, and panic-mode recovery
 */

import { Parser } from './parser.js';
import { ParseError } from '../error-classes.js';
import type {
  ExpressionStmtNode,
  PrintStmtNode,
  ProgramNode,
  SourceLocation,
  StmtNode,
  TokenType,
  VarStmtNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  makeSpan,
  match,
  previous,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseDeclaration(): StmtNode | null;
    parseStatement(): StmtNode;
    parseVarDeclaration(start: SourceLocation): VarStmtNode;
    parsePrintStatement(start: SourceLocation): PrintStmtNode;
    parseExpressionStatement(): ExpressionStmtNode;
    synchronize(): void;
  }
}

/** Tokens that begin a statement; recovery stops in front of them */
const STATEMENT_STARTS: readonly TokenType[] = [
  TOKEN_TYPES.CLASS,
  TOKEN_TYPES.FUN,
  TOKEN_TYPES.VAR,
  TOKEN_TYPES.FOR,
  TOKEN_TYPES.IF,
  TOKEN_TYPES.WHILE,
  TOKEN_TYPES.PRINT,
  TOKEN_TYPES.RETURN,
  TOKEN_TYPES.BREAK,
  TOKEN_TYPES.CONTINUE,
];

// ============================================================
// PROGRAM
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const start = current(this.state).span.start;
  const statements: StmtNode[] = [];

  while (!isAtEnd(this.state)) {
    const stmt = this.parseDeclaration();
    if (stmt) statements.push(stmt);
  }

  return {
    type: 'Program',
    statements,
    span: makeSpan(start, current(this.state).span.end),
  };
};

/**
 * Parse one declaration. In recovery mode a syntax error is recorded, the
 * parser resynchronizes, and null is returned in place of the statement.
 */
Parser.prototype.parseDeclaration = function (this: Parser): StmtNode | null {
  try {
    const start = current(this.state).span.start;
    if (match(this.state, TOKEN_TYPES.CLASS)) {
      return this.parseClassDeclaration(start);
    }
    if (match(this.state, TOKEN_TYPES.FUN)) {
      return this.parseFunction('function', start);
    }
    if (match(this.state, TOKEN_TYPES.VAR)) {
      return this.parseVarDeclaration(start);
    }
    return this.parseStatement();
  } catch (err) {
    if (err instanceof ParseError && this.state.recoveryMode) {
      this.state.errors.push(err);
      this.synchronize();
      return null;
    }
    throw err;
  }
};

Parser.prototype.synchronize = function (this: Parser): void {
  advance(this.state);

  while (!isAtEnd(this.state)) {
    if (previous(this.state).type === TOKEN_TYPES.SEMICOLON) return;
    if (check(this.state, ...STATEMENT_STARTS)) return;
    advance(this.state);
  }
};

// ============================================================
// STATEMENTS
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StmtNode {
  return this.nested<StmtNode>(() => {
    const start = current(this.state).span.start;

    if (match(this.state, TOKEN_TYPES.PRINT)) {
      return this.parsePrintStatement(start);
    }
    if (match(this.state, TOKEN_TYPES.LBRACE)) {
      return this.parseBlock(start);
    }
    if (match(this.state, TOKEN_TYPES.IF)) {
      return this.parseIfStatement(start);
    }
    if (match(this.state, TOKEN_TYPES.WHILE)) {
      return this.parseWhileStatement(start);
    }
    if (match(this.state, TOKEN_TYPES.FOR)) {
      return this.parseForStatement(start);
    }
    if (match(this.state, TOKEN_TYPES.RETURN)) {
      return this.parseReturnStatement(start);
    }
    if (match(this.state, TOKEN_TYPES.BREAK)) {
      return this.parseBreakStatement(start);
    }
    if (match(this.state, TOKEN_TYPES.CONTINUE)) {
      return this.parseContinueStatement(start);
    }

    return this.parseExpressionStatement();
  });
};

Parser.prototype.parseVarDeclaration = function (
  this: Parser,
  start: SourceLocation
): VarStmtNode {
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'variable name');

  const initializer = match(this.state, TOKEN_TYPES.ASSIGN)
    ? this.parseExpression()
    : null;

  expect(
    this.state,
    TOKEN_TYPES.SEMICOLON,
    "';' after variable declaration"
  );

  return {
    type: 'VarStmt',
    name: name.lexeme,
    initializer,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parsePrintStatement = function (
  this: Parser,
  start: SourceLocation
): PrintStmtNode {
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after value");
  return {
    type: 'PrintStmt',
    expression,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStmtNode {
  const start = current(this.state).span.start;
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after expression");
  return {
    type: 'ExpressionStmt',
    expression,
    span: spanFrom(this.state, start),
  };
};
