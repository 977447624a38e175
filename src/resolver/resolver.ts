/**
 * Resolver
 * Static scope pass run between parsing and execution.
 *
 * For every Variable, Assign, This and Super node it records how many
 * scopes separate the use from the declaring scope. Names not found in any
 * local scope are left unrecorded and looked up as globals at run time.
 * Misuses that can be detected without running the program are collected
 * as ResolveErrors; resolution continues past each one.
 */

import { ResolveError } from '../error-classes.js';
import type {
  ClassStmtNode,
  ExprNode,
  FunctionStmtNode,
  ProgramNode,
  ResolvableNode,
  SourceSpan,
  StmtNode,
} from '../types.js';

/** Scope depth per resolvable node, keyed by node identity */
export type Locals = WeakMap<ResolvableNode, number>;

type FunctionType = 'none' | 'function' | 'method' | 'initializer';
type ClassType = 'none' | 'class' | 'subclass';

/**
 * One local scope: name to "definition finished" flag.
 * A name is declared (false) before its initializer runs and defined
 * (true) after, so reads inside the initializer can be rejected.
 */
type Scope = Map<string, boolean>;

export class Resolver {
  readonly locals: Locals;
  readonly errors: ResolveError[] = [];

  private readonly scopes: Scope[] = [];
  private currentFunction: FunctionType = 'none';
  private currentClass: ClassType = 'none';
  /** Loops enclosing the current point within the current function */
  private loopDepth = 0;

  constructor(locals: Locals) {
    this.locals = locals;
  }

  resolveProgram(program: ProgramNode): void {
    for (const stmt of program.statements) {
      this.resolveStmt(stmt);
    }
  }

  // ============================================================
  // STATEMENTS
  // ============================================================

  resolveStmt(stmt: StmtNode): void {
    switch (stmt.type) {
      case 'Block':
        this.beginScope();
        for (const inner of stmt.statements) {
          this.resolveStmt(inner);
        }
        this.endScope();
        break;

      case 'VarStmt':
        this.declare(stmt.name, stmt);
        if (stmt.initializer) {
          this.resolveExpr(stmt.initializer);
        }
        this.define(stmt.name);
        break;

      case 'FunctionStmt':
        // Defined before the body so the function can refer to itself
        this.declare(stmt.name, stmt);
        this.define(stmt.name);
        this.resolveFunction(stmt, 'function');
        break;

      case 'ClassStmt':
        this.resolveClass(stmt);
        break;

      case 'ExpressionStmt':
      case 'PrintStmt':
        this.resolveExpr(stmt.expression);
        break;

      case 'IfStmt':
        this.resolveExpr(stmt.condition);
        this.resolveStmt(stmt.thenBranch);
        if (stmt.elseBranch) {
          this.resolveStmt(stmt.elseBranch);
        }
        break;

      case 'WhileStmt':
        this.resolveExpr(stmt.condition);
        this.loopDepth++;
        this.resolveStmt(stmt.body);
        if (stmt.increment) {
          this.resolveExpr(stmt.increment);
        }
        this.loopDepth--;
        break;

      case 'BreakStmt':
      case 'ContinueStmt':
        if (this.loopDepth === 0) {
          this.error('LOX-S005', stmt, {
            keyword: stmt.type === 'BreakStmt' ? 'break' : 'continue',
          });
        }
        break;

      case 'ReturnStmt':
        if (this.currentFunction === 'none') {
          this.error('LOX-S003', stmt);
        }
        if (stmt.value) {
          if (this.currentFunction === 'initializer') {
            this.error('LOX-S004', stmt);
          }
          this.resolveExpr(stmt.value);
        }
        break;
    }
  }

  private resolveClass(stmt: ClassStmtNode): void {
    const enclosingClass = this.currentClass;
    this.currentClass = 'class';

    this.declare(stmt.name, stmt);
    this.define(stmt.name);

    const superclass = stmt.superclass;
    if (superclass) {
      if (superclass.name === stmt.name) {
        this.error('LOX-S009', superclass);
      }
      this.currentClass = 'subclass';
      this.resolveExpr(superclass);

      this.beginScope();
      this.currentScope()?.set('super', true);
    }

    this.beginScope();
    this.currentScope()?.set('this', true);

    for (const method of stmt.methods) {
      this.resolveFunction(
        method,
        method.name === 'init' ? 'initializer' : 'method'
      );
    }

    this.endScope();
    if (superclass) this.endScope();

    this.currentClass = enclosingClass;
  }

  private resolveFunction(fn: FunctionStmtNode, type: FunctionType): void {
    const enclosingFunction = this.currentFunction;
    const enclosingLoopDepth = this.loopDepth;
    this.currentFunction = type;
    // break/continue cannot cross a function boundary
    this.loopDepth = 0;

    this.beginScope();
    for (const param of fn.params) {
      this.declare(param.name, param);
      this.define(param.name);
    }
    for (const stmt of fn.body) {
      this.resolveStmt(stmt);
    }
    this.endScope();

    this.currentFunction = enclosingFunction;
    this.loopDepth = enclosingLoopDepth;
  }

  // ============================================================
  // EXPRESSIONS
  // ============================================================

  resolveExpr(expr: ExprNode): void {
    switch (expr.type) {
      case 'Literal':
        break;

      case 'Variable':
        if (this.currentScope()?.get(expr.name) === false) {
          this.error('LOX-S001', expr);
        }
        this.resolveLocal(expr, expr.name);
        break;

      case 'Assign':
        this.resolveExpr(expr.value);
        this.resolveLocal(expr, expr.name);
        break;

      case 'This':
        if (this.currentClass === 'none') {
          this.error('LOX-S006', expr);
          break;
        }
        this.resolveLocal(expr, 'this');
        break;

      case 'Super':
        if (this.currentClass === 'none') {
          this.error('LOX-S007', expr);
          break;
        }
        if (this.currentClass !== 'subclass') {
          this.error('LOX-S008', expr);
          break;
        }
        this.resolveLocal(expr, 'super');
        break;

      case 'Grouping':
        this.resolveExpr(expr.expression);
        break;

      case 'Unary':
        this.resolveExpr(expr.operand);
        break;

      case 'Binary':
      case 'Logical':
        this.resolveExpr(expr.left);
        this.resolveExpr(expr.right);
        break;

      case 'Call':
        this.resolveExpr(expr.callee);
        for (const arg of expr.args) {
          this.resolveExpr(arg);
        }
        break;

      case 'Get':
        this.resolveExpr(expr.object);
        break;

      case 'Set':
        this.resolveExpr(expr.value);
        this.resolveExpr(expr.object);
        break;
    }
  }

  // ============================================================
  // SCOPES
  // ============================================================

  private beginScope(): void {
    this.scopes.push(new Map());
  }

  private endScope(): void {
    this.scopes.pop();
  }

  private currentScope(): Scope | undefined {
    return this.scopes[this.scopes.length - 1];
  }

  private declare(name: string, node: { span: SourceSpan }): void {
    const scope = this.currentScope();
    if (!scope) return;
    if (scope.has(name)) {
      this.error('LOX-S002', node, { name });
    }
    scope.set(name, false);
  }

  private define(name: string): void {
    this.currentScope()?.set(name, true);
  }

  /** Record the distance to the innermost scope declaring `name` */
  private resolveLocal(node: ResolvableNode, name: string): void {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      if (this.scopes[i]?.has(name)) {
        this.locals.set(node, this.scopes.length - 1 - i);
        return;
      }
    }
  }

  private error(
    errorId: string,
    node: { span: SourceSpan },
    context: Record<string, unknown> = {}
  ): void {
    this.errors.push(ResolveError.fromNode(errorId, node, context));
  }
}
