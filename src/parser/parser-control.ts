/**
 * Parser Extension: Control Flow Parsing
 * Blocks, conditionals, loops, and jump statements
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  BreakStmtNode,
  ContinueStmtNode,
  ExprNode,
  IfStmtNode,
  ReturnStmtNode,
  SourceLocation,
  StmtNode,
  WhileStmtNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  check,
  current,
  expect,
  isAtEnd,
  match,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseBlock(start: SourceLocation): BlockNode;
    parseBlockStatements(): StmtNode[];
    parseIfStatement(start: SourceLocation): IfStmtNode;
    parseWhileStatement(start: SourceLocation): WhileStmtNode;
    parseForStatement(start: SourceLocation): BlockNode;
    parseReturnStatement(start: SourceLocation): ReturnStmtNode;
    parseBreakStatement(start: SourceLocation): BreakStmtNode;
    parseContinueStatement(start: SourceLocation): ContinueStmtNode;
  }
}

// ============================================================
// BLOCKS
// ============================================================

/** Parse a block whose opening brace has been consumed */
Parser.prototype.parseBlock = function (
  this: Parser,
  start: SourceLocation
): BlockNode {
  const statements = this.parseBlockStatements();
  return { type: 'Block', statements, span: spanFrom(this.state, start) };
};

/** Declarations up to and including the closing brace */
Parser.prototype.parseBlockStatements = function (this: Parser): StmtNode[] {
  const statements: StmtNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE) && !isAtEnd(this.state)) {
    const stmt = this.parseDeclaration();
    if (stmt) statements.push(stmt);
  }

  expect(this.state, TOKEN_TYPES.RBRACE, "'}' after block");
  return statements;
};

// ============================================================
// CONDITIONALS
// ============================================================

Parser.prototype.parseIfStatement = function (
  this: Parser,
  start: SourceLocation
): IfStmtNode {
  expect(this.state, TOKEN_TYPES.LPAREN, "'(' after 'if'");
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after if condition");

  const thenBranch = this.parseStatement();
  // Dangling else binds to the nearest if
  const elseBranch = match(this.state, TOKEN_TYPES.ELSE)
    ? this.parseStatement()
    : null;

  return {
    type: 'IfStmt',
    condition,
    thenBranch,
    elseBranch,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhileStatement = function (
  this: Parser,
  start: SourceLocation
): WhileStmtNode {
  expect(this.state, TOKEN_TYPES.LPAREN, "'(' after 'while'");
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after condition");
  const body = this.parseStatement();

  return {
    type: 'WhileStmt',
    condition,
    body,
    increment: null,
    span: spanFrom(this.state, start),
  };
};

/**
 * Desugar `for (init; cond; incr) body` into
 * `{ init; while (cond) body }` with the increment kept on the loop node.
 */
Parser.prototype.parseForStatement = function (
  this: Parser,
  start: SourceLocation
): BlockNode {
  expect(this.state, TOKEN_TYPES.LPAREN, "'(' after 'for'");

  const initStart = current(this.state).span.start;
  let initializer: StmtNode | null;
  if (match(this.state, TOKEN_TYPES.SEMICOLON)) {
    initializer = null;
  } else if (match(this.state, TOKEN_TYPES.VAR)) {
    initializer = this.parseVarDeclaration(initStart);
  } else {
    initializer = this.parseExpressionStatement();
  }

  let condition: ExprNode | null = null;
  if (!check(this.state, TOKEN_TYPES.SEMICOLON)) {
    condition = this.parseExpression();
  }
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after loop condition");

  let increment: ExprNode | null = null;
  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    increment = this.parseExpression();
  }
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after for clauses");

  const body = this.parseStatement();
  const span = spanFrom(this.state, start);

  const loop: WhileStmtNode = {
    type: 'WhileStmt',
    condition: condition ?? { type: 'Literal', value: true, span },
    body,
    increment,
    span,
  };

  return {
    type: 'Block',
    statements: initializer ? [initializer, loop] : [loop],
    span,
  };
};

// ============================================================
// JUMPS
// ============================================================

Parser.prototype.parseReturnStatement = function (
  this: Parser,
  start: SourceLocation
): ReturnStmtNode {
  const value = check(this.state, TOKEN_TYPES.SEMICOLON)
    ? null
    : this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after return value");
  return { type: 'ReturnStmt', value, span: spanFrom(this.state, start) };
};

Parser.prototype.parseBreakStatement = function (
  this: Parser,
  start: SourceLocation
): BreakStmtNode {
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after 'break'");
  return { type: 'BreakStmt', span: spanFrom(this.state, start) };
};

Parser.prototype.parseContinueStatement = function (
  this: Parser,
  start: SourceLocation
): ContinueStmtNode {
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after 'continue'");
  return { type: 'ContinueStmt', span: spanFrom(this.state, start) };
};
