/**
 * Parser Extension: Function Parsing
 * Function and class declarations, calls, and property access
 */

import { Parser } from './parser.js';
import type {
  ClassStmtNode,
  ExprNode,
  FunctionStmtNode,
  ParamNode,
  SourceLocation,
  VariableNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  check,
  current,
  errorAt,
  expect,
  isAtEnd,
  makeSpan,
  match,
  previous,
  spanFrom,
} from './state.js';

/** Upper bound on parameters per declaration and arguments per call */
export const MAX_ARITY = 255;

export type FunctionKind = 'function' | 'method';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFunction(kind: FunctionKind, start: SourceLocation): FunctionStmtNode;
    parseClassDeclaration(start: SourceLocation): ClassStmtNode;
    parseCall(): ExprNode;
    finishCall(callee: ExprNode): ExprNode;
  }
}

// ============================================================
// DECLARATIONS
// ============================================================

Parser.prototype.parseFunction = function (
  this: Parser,
  kind: FunctionKind,
  start: SourceLocation
): FunctionStmtNode {
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, `${kind} name`);
  expect(this.state, TOKEN_TYPES.LPAREN, `'(' after ${kind} name`);

  const params: ParamNode[] = [];
  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    do {
      if (params.length >= MAX_ARITY) {
        this.report(
          errorAt(current(this.state), 'LOX-P004', {
            max: MAX_ARITY,
            what: 'parameters',
          })
        );
      }
      const param = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'parameter name');
      params.push({ type: 'Param', name: param.lexeme, span: param.span });
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after parameters");

  expect(this.state, TOKEN_TYPES.LBRACE, `'{' before ${kind} body`);
  const body = this.parseBlockStatements();

  return {
    type: 'FunctionStmt',
    name: name.lexeme,
    params,
    body,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseClassDeclaration = function (
  this: Parser,
  start: SourceLocation
): ClassStmtNode {
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'class name');

  let superclass: VariableNode | null = null;
  if (match(this.state, TOKEN_TYPES.LT)) {
    const superName = expect(
      this.state,
      TOKEN_TYPES.IDENTIFIER,
      'superclass name'
    );
    superclass = {
      type: 'Variable',
      name: superName.lexeme,
      span: superName.span,
    };
  }

  expect(this.state, TOKEN_TYPES.LBRACE, "'{' before class body");

  const methods: FunctionStmtNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RBRACE) && !isAtEnd(this.state)) {
    methods.push(this.parseFunction('method', current(this.state).span.start));
  }

  expect(this.state, TOKEN_TYPES.RBRACE, "'}' after class body");

  return {
    type: 'ClassStmt',
    name: name.lexeme,
    superclass,
    methods,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// CALLS AND PROPERTY ACCESS
// ============================================================

Parser.prototype.parseCall = function (this: Parser): ExprNode {
  let expr = this.parsePrimary();

  for (;;) {
    if (match(this.state, TOKEN_TYPES.LPAREN)) {
      expr = this.finishCall(expr);
    } else if (match(this.state, TOKEN_TYPES.DOT)) {
      const name = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        "property name after '.'"
      );
      expr = {
        type: 'Get',
        object: expr,
        name: name.lexeme,
        span: makeSpan(expr.span.start, name.span.end),
      };
    } else {
      return expr;
    }
  }
};

/** Parse the argument list of a call whose '(' has been consumed */
Parser.prototype.finishCall = function (
  this: Parser,
  callee: ExprNode
): ExprNode {
  const args: ExprNode[] = [];

  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    do {
      if (args.length >= MAX_ARITY) {
        this.report(
          errorAt(current(this.state), 'LOX-P004', {
            max: MAX_ARITY,
            what: 'arguments',
          })
        );
      }
      args.push(this.parseExpression());
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }

  expect(this.state, TOKEN_TYPES.RPAREN, "')' after arguments");

  return {
    type: 'Call',
    callee,
    args,
    span: makeSpan(callee.span.start, previous(this.state).span.end),
  };
};
