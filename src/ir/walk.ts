import type { Expr, Stmt } from './types.js';

/** Visit an expression and all of its subexpressions, parents first. */
export function visitExpr(expr: Expr, fn: (e: Expr) => void): void {
  fn(expr);
  switch (expr.kind) {
    case 'Binop':
      visitExpr(expr.left, fn);
      visitExpr(expr.right, fn);
      return;
    case 'Unop':
    case 'Cast':
      visitExpr(expr.operand, fn);
      return;
    case 'DiffSwitch':
      for (const c of expr.cases) if (c) visitExpr(c, fn);
      return;
    case 'PreDecrement':
      visitExpr(expr.target, fn);
      return;
    default:
      return;
  }
}

/**
 * Rebuild an expression bottom-up. `fn` sees each node after its children were
 * rebuilt and returns the replacement.
 */
export function mapExpr(expr: Expr, fn: (e: Expr) => Expr): Expr {
  switch (expr.kind) {
    case 'Binop':
      return fn({ ...expr, left: mapExpr(expr.left, fn), right: mapExpr(expr.right, fn) });
    case 'Unop':
    case 'Cast':
      return fn({ ...expr, operand: mapExpr(expr.operand, fn) });
    case 'DiffSwitch':
      return fn({ ...expr, cases: expr.cases.map((c) => (c ? mapExpr(c, fn) : null)) });
    default:
      return fn(expr);
  }
}

/** Expressions owned directly by a statement (not by its nested bodies). */
export function stmtExprs(stmt: Stmt): Expr[] {
  switch (stmt.kind) {
    case 'Call':
      return stmt.args;
    case 'Assign':
      return [stmt.target, stmt.value];
    case 'CondGoto':
      return [stmt.cond];
    case 'CondChain':
      return stmt.branches.map((b) => b.cond);
    case 'While':
      return [stmt.cond];
    case 'Times':
      return stmt.clobber ? [stmt.count, stmt.clobber] : [stmt.count];
    case 'Break':
      return stmt.cond ? [stmt.cond] : [];
    case 'Declare':
      return stmt.vars.flatMap((v) => (v.init ? [v.init] : []));
    default:
      return [];
  }
}

/** Nested statement lists of a compound statement. */
export function childBodies(stmt: Stmt): Stmt[][] {
  switch (stmt.kind) {
    case 'CondChain':
      return [...stmt.branches.map((b) => b.body), ...(stmt.elseBody ? [stmt.elseBody] : [])];
    case 'Loop':
    case 'While':
    case 'Times':
      return [stmt.body];
    default:
      return [];
  }
}

/** Visit every statement of a body, recursing into nested bodies. */
export function visitStmts(body: readonly Stmt[], fn: (s: Stmt) => void): void {
  for (const stmt of body) {
    fn(stmt);
    for (const child of childBodies(stmt)) visitStmts(child, fn);
  }
}
