/**
 * Parser Extension: Expression Parsing
 * Assignment and the binary/unary precedence chain
 */

import { Parser } from './parser.js';
import type { BinaryOp, ExprNode, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  errorAt,
  expect,
  makeSpan,
  match,
  type ParserState,
  previous,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExprNode;
    parseAssignment(): ExprNode;
    parseOr(): ExprNode;
    parseAnd(): ExprNode;
    parseEquality(): ExprNode;
    parseComparison(): ExprNode;
    parseTerm(): ExprNode;
    parseFactor(): ExprNode;
    parseUnary(): ExprNode;
    parsePrimary(): ExprNode;
  }
}

// ============================================================
// OPERATOR TABLES
// ============================================================

type OperatorTable = Partial<Record<TokenType, BinaryOp>>;

const EQUALITY_OPS: OperatorTable = {
  [TOKEN_TYPES.NE]: '!=',
  [TOKEN_TYPES.EQ]: '==',
};

const COMPARISON_OPS: OperatorTable = {
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.GE]: '>=',
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.LE]: '<=',
};

const TERM_OPS: OperatorTable = {
  [TOKEN_TYPES.MINUS]: '-',
  [TOKEN_TYPES.PLUS]: '+',
};

const FACTOR_OPS: OperatorTable = {
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.STAR]: '*',
};

/** Consume and return the operator at the current token, if it is in `ops` */
function matchOperator(state: ParserState, ops: OperatorTable): BinaryOp | null {
  const op = ops[current(state).type];
  if (op === undefined) return null;
  advance(state);
  return op;
}

/** Left-associative binary level over `operand` */
function parseBinaryLevel(
  parser: Parser,
  ops: OperatorTable,
  operand: () => ExprNode
): ExprNode {
  let left = operand();

  let op = matchOperator(parser.state, ops);
  while (op !== null) {
    const right = operand();
    left = {
      type: 'Binary',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
    op = matchOperator(parser.state, ops);
  }

  return left;
}

// ============================================================
// ASSIGNMENT
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExprNode {
  return this.parseAssignment();
};

/**
 * Parse the left side as an ordinary expression, then rewrite it into an
 * assignment target when '=' follows. Right-associative.
 */
Parser.prototype.parseAssignment = function (this: Parser): ExprNode {
  return this.nested<ExprNode>(() => {
    const expr = this.parseOr();

    if (!check(this.state, TOKEN_TYPES.ASSIGN)) return expr;
    const equals = advance(this.state);
    const value = this.parseAssignment();
    const span = makeSpan(expr.span.start, value.span.end);

    if (expr.type === 'Variable') {
      return { type: 'Assign', name: expr.name, value, span };
    }
    if (expr.type === 'Get') {
      return {
        type: 'Set',
        object: expr.object,
        name: expr.name,
        value,
        span,
      };
    }

    this.report(errorAt(equals, 'LOX-P003'));
    return expr;
  });
};

// ============================================================
// LOGICAL OPERATORS
// ============================================================

Parser.prototype.parseOr = function (this: Parser): ExprNode {
  let left = this.parseAnd();

  while (match(this.state, TOKEN_TYPES.OR)) {
    const right = this.parseAnd();
    left = {
      type: 'Logical',
      op: 'or',
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }

  return left;
};

Parser.prototype.parseAnd = function (this: Parser): ExprNode {
  let left = this.parseEquality();

  while (match(this.state, TOKEN_TYPES.AND)) {
    const right = this.parseEquality();
    left = {
      type: 'Logical',
      op: 'and',
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }

  return left;
};

// ============================================================
// BINARY OPERATORS
// ============================================================

Parser.prototype.parseEquality = function (this: Parser): ExprNode {
  return parseBinaryLevel(this, EQUALITY_OPS, () => this.parseComparison());
};

Parser.prototype.parseComparison = function (this: Parser): ExprNode {
  return parseBinaryLevel(this, COMPARISON_OPS, () => this.parseTerm());
};

Parser.prototype.parseTerm = function (this: Parser): ExprNode {
  return parseBinaryLevel(this, TERM_OPS, () => this.parseFactor());
};

Parser.prototype.parseFactor = function (this: Parser): ExprNode {
  return parseBinaryLevel(this, FACTOR_OPS, () => this.parseUnary());
};

// ============================================================
// UNARY AND PRIMARY
// ============================================================

Parser.prototype.parseUnary = function (this: Parser): ExprNode {
  return this.nested<ExprNode>(() => {
    const start = current(this.state).span.start;

    if (match(this.state, TOKEN_TYPES.BANG, TOKEN_TYPES.MINUS)) {
      const op = previous(this.state).type === TOKEN_TYPES.BANG ? '!' : '-';
      const operand = this.parseUnary();
      return {
        type: 'Unary',
        op,
        operand,
        span: spanFrom(this.state, start),
      };
    }

    return this.parseCall();
  });
};

Parser.prototype.parsePrimary = function (this: Parser): ExprNode {
  const token = current(this.state);
  const span = token.span;

  switch (token.type) {
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return { type: 'Literal', value: false, span };
    case TOKEN_TYPES.TRUE:
      advance(this.state);
      return { type: 'Literal', value: true, span };
    case TOKEN_TYPES.NIL:
      advance(this.state);
      return { type: 'Literal', value: null, span };
    case TOKEN_TYPES.NUMBER:
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'Literal', value: token.literal, span };
    case TOKEN_TYPES.THIS:
      advance(this.state);
      return { type: 'This', span };
    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Variable', name: token.lexeme, span };
    case TOKEN_TYPES.SUPER: {
      advance(this.state);
      expect(this.state, TOKEN_TYPES.DOT, "'.' after 'super'");
      const method = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        'superclass method name'
      );
      return {
        type: 'Super',
        method: method.lexeme,
        span: spanFrom(this.state, span.start),
      };
    }
    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      const expression = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RPAREN, "')' after expression");
      return {
        type: 'Grouping',
        expression,
        span: spanFrom(this.state, span.start),
      };
    }
    default:
      throw errorAt(token, 'LOX-P001');
  }
};
