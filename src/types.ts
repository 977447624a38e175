/**
 * treelox AST Types
 * Tokens, source locations, and the node model shared by parser,
 * resolver, and interpreter.
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Single-character punctuation
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  MINUS: 'MINUS', // -
  PLUS: 'PLUS', // +
  SEMICOLON: 'SEMICOLON', // ;
  SLASH: 'SLASH', // /
  STAR: 'STAR', // *

  // One or two character operators
  BANG: 'BANG', // !
  NE: 'NE', // !=
  ASSIGN: 'ASSIGN', // =
  EQ: 'EQ', // ==
  GT: 'GT', // >
  GE: 'GE', // >=
  LT: 'LT', // <
  LE: 'LE', // <=

  // Literals
  IDENTIFIER: 'IDENTIFIER',
  STRING: 'STRING',
  NUMBER: 'NUMBER',

  // Keywords
  AND: 'AND',
  BREAK: 'BREAK',
  CLASS: 'CLASS',
  CONTINUE: 'CONTINUE',
  ELSE: 'ELSE',
  FALSE: 'FALSE',
  FOR: 'FOR',
  FUN: 'FUN',
  IF: 'IF',
  NIL: 'NIL',
  OR: 'OR',
  PRINT: 'PRINT',
  RETURN: 'RETURN',
  SUPER: 'SUPER',
  THIS: 'THIS',
  TRUE: 'TRUE',
  VAR: 'VAR',
  WHILE: 'WHILE',

  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Source text of the token (empty for EOF) */
  readonly lexeme: string;
  /** Parsed value for NUMBER and STRING tokens */
  readonly literal: number | string | null;
  readonly span: SourceSpan;
}

// ============================================================
// AST NODE TYPES
// ============================================================

interface BaseNode {
  readonly span: SourceSpan;
}

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly statements: StmtNode[];
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type LiteralValue = number | string | boolean | null;

export interface LiteralNode extends BaseNode {
  readonly type: 'Literal';
  readonly value: LiteralValue;
}

/** Parenthesized expression: ( expression ) */
export interface GroupingNode extends BaseNode {
  readonly type: 'Grouping';
  readonly expression: ExprNode;
}

export type UnaryOp = '-' | '!';

export interface UnaryNode extends BaseNode {
  readonly type: 'Unary';
  readonly op: UnaryOp;
  readonly operand: ExprNode;
}

export type BinaryOp =
  | '+'
  | '-'
  | '*'
  | '/' // arithmetic
  | '=='
  | '!='
  | '<'
  | '>'
  | '<='
  | '>='; // comparison

export interface BinaryNode extends BaseNode {
  readonly type: 'Binary';
  readonly op: BinaryOp;
  readonly left: ExprNode;
  readonly right: ExprNode;
}

/** Short-circuit operators; the result is the deciding operand, not a bool */
export interface LogicalNode extends BaseNode {
  readonly type: 'Logical';
  readonly op: 'and' | 'or';
  readonly left: ExprNode;
  readonly right: ExprNode;
}

export interface VariableNode extends BaseNode {
  readonly type: 'Variable';
  readonly name: string;
}

export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly name: string;
  readonly value: ExprNode;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: ExprNode;
  readonly args: ExprNode[];
}

/** Property access: object.name */
export interface GetNode extends BaseNode {
  readonly type: 'Get';
  readonly object: ExprNode;
  readonly name: string;
}

/** Property assignment: object.name = value (rewritten from a Get target) */
export interface SetNode extends BaseNode {
  readonly type: 'Set';
  readonly object: ExprNode;
  readonly name: string;
  readonly value: ExprNode;
}

export interface ThisNode extends BaseNode {
  readonly type: 'This';
}

/** Superclass method reference: super.method */
export interface SuperNode extends BaseNode {
  readonly type: 'Super';
  readonly method: string;
}

export type ExprNode =
  | LiteralNode
  | GroupingNode
  | UnaryNode
  | BinaryNode
  | LogicalNode
  | VariableNode
  | AssignNode
  | CallNode
  | GetNode
  | SetNode
  | ThisNode
  | SuperNode;

/**
 * Expressions that denote a variable binding.
 * The resolver records a scope depth for each occurrence, keyed by node identity.
 */
export type ResolvableNode = VariableNode | AssignNode | ThisNode | SuperNode;

// ============================================================
// STATEMENTS
// ============================================================

export interface ExpressionStmtNode extends BaseNode {
  readonly type: 'ExpressionStmt';
  readonly expression: ExprNode;
}

export interface PrintStmtNode extends BaseNode {
  readonly type: 'PrintStmt';
  readonly expression: ExprNode;
}

export interface VarStmtNode extends BaseNode {
  readonly type: 'VarStmt';
  readonly name: string;
  readonly initializer: ExprNode | null;
}

export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: StmtNode[];
}

export interface IfStmtNode extends BaseNode {
  readonly type: 'IfStmt';
  readonly condition: ExprNode;
  readonly thenBranch: StmtNode;
  readonly elseBranch: StmtNode | null;
}

/**
 * While loop. A desugared `for` keeps its increment here so that the
 * increment runs after the body on both normal completion and `continue`.
 */
export interface WhileStmtNode extends BaseNode {
  readonly type: 'WhileStmt';
  readonly condition: ExprNode;
  readonly body: StmtNode;
  readonly increment: ExprNode | null;
}

export interface BreakStmtNode extends BaseNode {
  readonly type: 'BreakStmt';
}

export interface ContinueStmtNode extends BaseNode {
  readonly type: 'ContinueStmt';
}

export interface ReturnStmtNode extends BaseNode {
  readonly type: 'ReturnStmt';
  readonly value: ExprNode | null;
}

export interface ParamNode extends BaseNode {
  readonly type: 'Param';
  readonly name: string;
}

export interface FunctionStmtNode extends BaseNode {
  readonly type: 'FunctionStmt';
  readonly name: string;
  readonly params: ParamNode[];
  readonly body: StmtNode[];
}

export interface ClassStmtNode extends BaseNode {
  readonly type: 'ClassStmt';
  readonly name: string;
  readonly superclass: VariableNode | null;
  readonly methods: FunctionStmtNode[];
}

export type StmtNode =
  | ExpressionStmtNode
  | PrintStmtNode
  | VarStmtNode
  | BlockNode
  | IfStmtNode
  | WhileStmtNode
  | BreakStmtNode
  | ContinueStmtNode
  | ReturnStmtNode
  | FunctionStmtNode
  | ClassStmtNode;

// ============================================================
// UNION TYPE FOR ALL NODES
// ============================================================

export type ASTNode = ProgramNode | ExprNode | StmtNode | ParamNode;

export type NodeType = ASTNode['type'];
